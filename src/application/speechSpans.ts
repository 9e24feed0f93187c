import type { SpeechSpan, SpeechSpanOptions, TranscriptSegment } from "../domain/types";

export const DEFAULT_SPEECH_SPAN_OPTIONS: SpeechSpanOptions = {
  minSpan: 1,
  maxSpan: 60,
  maxGap: 1
};

/**
 * Groups transcript segments into coarse speech spans. A span closes at a pause
 * longer than `maxGap` once it is at least `minSpan` long, and is split before
 * it would grow past `maxSpan`. A trailing span shorter than `minSpan` is dropped.
 */
export function groupSpeechSegments(
  segments: readonly TranscriptSegment[],
  options: SpeechSpanOptions = DEFAULT_SPEECH_SPAN_OPTIONS
): SpeechSpan[] {
  const sorted = segments
    .filter((segment) => Number.isFinite(segment.start) && Number.isFinite(segment.end) && segment.end > segment.start)
    .slice()
    .sort((a, b) => a.start - b.start);

  const spans: SpeechSpan[] = [];
  let current: { start: number; end: number } | null = null;

  for (let index = 0; index < sorted.length; index += 1) {
    const segment = sorted[index];
    if (!current) {
      current = { start: segment.start, end: segment.end };
    } else if (segment.end - current.start > options.maxSpan) {
      spans.push(current);
      current = { start: segment.start, end: segment.end };
    } else {
      current.end = Math.max(current.end, segment.end);
    }

    const next = sorted[index + 1];
    const pause = !next || next.start - segment.end > options.maxGap;
    if (pause && current.end - current.start >= options.minSpan) {
      spans.push(current);
      current = null;
    }
  }

  return spans;
}
