import { hasSpeech } from "../domain/scene";
import type { CandidateConfig, CandidateGroup, Scene, SceneRange, Word } from "../domain/types";

export const DEFAULT_CANDIDATE_CONFIG: CandidateConfig = {
  minDuration: 30,
  maxDuration: 90,
  contextWindow: 5,
  frameRate: 30,
  legacyRightPadding: false
};

const RICHNESS_SATURATION = 10;

/**
 * Grows a window from every scene and records each window whose length fits its
 * adaptive target, or that reaches the minimum at a silence boundary. Recorded
 * windows carry one scene of context on each side plus `contextWindow` seconds
 * of padding, so candidates overlap freely. Without words there is nothing to
 * cut around, so no candidates are produced.
 */
export function buildCandidates(
  scenes: readonly Scene[],
  words: readonly Word[],
  config: CandidateConfig = DEFAULT_CANDIDATE_CONFIG
): CandidateGroup[] {
  const candidates: CandidateGroup[] = [];
  if (!words.length) {
    return candidates;
  }
  const videoEnd = scenes.length ? scenes[scenes.length - 1].endTime : 0;

  for (let i = 0; i < scenes.length; i += 1) {
    let currentDuration = 0;
    let speechFrames = 0;
    let totalFrames = 0;

    for (let j = i; j < scenes.length; j += 1) {
      const scene = scenes[j];
      currentDuration += scene.duration;
      speechFrames += scene.speechDuration * config.frameRate;
      totalFrames += scene.duration * config.frameRate;

      const speechDensity = speechFrames / Math.max(1, totalFrames);
      const contentRichness = Math.min(1, (j - i + 1) / RICHNESS_SATURATION);
      const adaptiveMin = config.minDuration;
      const adaptiveMax = Math.min(
        config.maxDuration,
        config.minDuration + (config.maxDuration - config.minDuration) * (0.5 * speechDensity + 0.5 * contentRichness)
      );

      const next = scenes[j + 1];
      const naturalBreak = j > i && next !== undefined && !hasSpeech(scene) && hasSpeech(next);
      const fitsTarget = adaptiveMin <= currentDuration && currentDuration <= adaptiveMax;

      if (fitsTarget || (currentDuration >= adaptiveMin && naturalBreak)) {
        const first = Math.max(0, i - 1);
        const last = Math.min(scenes.length - 1, j + 1);
        candidates.push(toCandidate(scenes, { first, last }, currentDuration, words, config, videoEnd));
      }

      if (currentDuration > config.maxDuration) {
        break;
      }
    }
  }

  return candidates;
}

/** Words lying fully inside `[start, end]`, in timestamp order, joined by single spaces. */
export function wordsInRange(words: readonly Word[], start: number, end: number) {
  return words
    .filter((word) => start <= word.start && word.end <= end)
    .slice()
    .sort((a, b) => a.start - b.start)
    .map((word) => word.text.trim())
    .filter(Boolean)
    .join(" ");
}

function toCandidate(
  scenes: readonly Scene[],
  sceneRange: SceneRange,
  windowDuration: number,
  words: readonly Word[],
  config: CandidateConfig,
  videoEnd: number
): CandidateGroup {
  const group = scenes.slice(sceneRange.first, sceneRange.last + 1);
  const groupStart = group[0].startTime;
  const groupEnd = group[group.length - 1].endTime;
  const startTime = Math.max(0, groupStart - config.contextWindow);
  // legacy: min(end + pad, end) never pads the right edge
  const endTime = config.legacyRightPadding
    ? Math.min(groupEnd + config.contextWindow, groupEnd)
    : Math.min(groupEnd + config.contextWindow, Math.max(groupEnd, videoEnd));
  return {
    scenes: group,
    sceneRange,
    windowDuration,
    startTime,
    endTime,
    duration: endTime - startTime,
    text: wordsInRange(words, startTime, endTime)
  };
}
