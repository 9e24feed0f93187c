import { InvalidInputError } from "../domain/errors";
import { createScene, fuseScenes } from "../domain/scene";
import type { FrameDiffSignal, Scene, SceneDetectionOptions, SpeechSpan } from "../domain/types";

export const DEFAULT_DETECTION_OPTIONS: SceneDetectionOptions = {
  threshold: 27,
  minSceneLength: 0.5
};

const TIME_EPSILON = 1e-9;

/** Frame indices a producer samples to build a signal: one frame per second of video. */
export function sampleFrameIndices(fps: number, frameCount: number) {
  const step = Math.max(1, Math.floor(fps));
  const indices: number[] = [];
  for (let frame = 0; frame < frameCount; frame += step) {
    indices.push(frame);
  }
  return indices;
}

export function detectScenes(
  signal: FrameDiffSignal,
  speechSpans: readonly SpeechSpan[] = [],
  options: SceneDetectionOptions = DEFAULT_DETECTION_OPTIONS
): Scene[] {
  assertValidSignal(signal);
  const { fps, frameCount } = signal;
  const threshold = options.threshold / 255;
  const minSceneFrames = Math.floor(options.minSceneLength * fps);

  const scenes: Scene[] = [];
  let currentStart = 0;

  for (const sample of signal.samples) {
    if (sample.difference > threshold && sample.frameIndex - currentStart >= minSceneFrames) {
      const start = currentStart / fps;
      const end = sample.frameIndex / fps;
      scenes.push(createScene(start, end, clipSpeech(speechSpans, start, end)));
      currentStart = sample.frameIndex;
    }
  }

  if (currentStart < frameCount) {
    const start = currentStart / fps;
    const end = frameCount / fps;
    scenes.push(createScene(start, end, clipSpeech(speechSpans, start, end)));
  }

  return scenes;
}

export function mergeShortScenes(scenes: readonly Scene[], minDuration: number): Scene[] {
  assertValidScenes(scenes);
  if (!scenes.length) {
    return [];
  }

  const merged: Scene[] = [];
  let current = scenes[0];
  for (const next of scenes.slice(1)) {
    if (current.duration < minDuration) {
      current = fuseScenes(current, next);
    } else {
      merged.push(current);
      current = next;
    }
  }

  const previous = merged.pop();
  if (!previous) {
    merged.push(current);
  } else if (current.duration < minDuration) {
    merged.push(fuseScenes(previous, current));
  } else {
    merged.push(previous, current);
  }
  return merged;
}

export function assertValidScenes(scenes: readonly Scene[]) {
  scenes.forEach((scene, index) => {
    if (!Number.isFinite(scene.startTime) || !Number.isFinite(scene.endTime)) {
      throw new InvalidInputError(`Scene ${index} has non-finite bounds.`);
    }
    if (scene.startTime < 0) {
      throw new InvalidInputError(`Scene ${index} starts before 0 (${scene.startTime}).`);
    }
    if (scene.endTime <= scene.startTime) {
      throw new InvalidInputError(`Scene ${index} has a non-positive duration (${scene.startTime}-${scene.endTime}).`);
    }
    const prev = scenes[index - 1];
    if (prev && scene.startTime < prev.endTime - TIME_EPSILON) {
      throw new InvalidInputError(
        `Scene ${index} starts at ${scene.startTime} before scene ${index - 1} ends at ${prev.endTime}.`
      );
    }
  });
}

function clipSpeech(spans: readonly SpeechSpan[], start: number, end: number): SpeechSpan[] {
  return spans
    .filter((span) => span.start < end && span.end > start)
    .map((span) => ({ start: Math.max(start, span.start), end: Math.min(end, span.end) }));
}

function assertValidSignal(signal: FrameDiffSignal) {
  if (!Number.isFinite(signal.fps) || signal.fps <= 0) {
    throw new InvalidInputError(`Frame rate must be positive (got ${signal.fps}).`);
  }
  if (!Number.isInteger(signal.frameCount) || signal.frameCount < 0) {
    throw new InvalidInputError(`Frame count must be a non-negative integer (got ${signal.frameCount}).`);
  }
  let lastIndex = 0;
  for (const sample of signal.samples) {
    if (sample.frameIndex <= lastIndex || sample.frameIndex >= signal.frameCount) {
      throw new InvalidInputError(`Sample at frame ${sample.frameIndex} is out of order or outside the video.`);
    }
    if (!(sample.difference >= 0 && sample.difference <= 1)) {
      throw new InvalidInputError(`Sample at frame ${sample.frameIndex} has difference ${sample.difference} outside [0, 1].`);
    }
    lastIndex = sample.frameIndex;
  }
}
