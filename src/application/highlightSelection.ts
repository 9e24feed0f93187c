import type { Highlight, Scene, ScoredCandidate, SelectionOptions, Word } from "../domain/types";
import type { EngagementScorerPort } from "../interfaces/ports";
import { DEFAULT_CANDIDATE_CONFIG, buildCandidates } from "./candidateBuilder";
import { KeywordEngagementScorer, scoreCandidates } from "./highlightScoring";
import { assertValidScenes } from "./sceneSegmentation";

export const DEFAULT_SELECTION_OPTIONS: SelectionOptions = {
  ...DEFAULT_CANDIDATE_CONFIG,
  maxHighlights: 5
};

/**
 * Picks the highest-scoring candidates that do not overlap in time. Greedy by
 * score, so it does not maximise covered duration or the total score.
 */
export async function selectHighlights(
  scenes: readonly Scene[],
  words: readonly Word[],
  options: SelectionOptions = DEFAULT_SELECTION_OPTIONS,
  scorer: EngagementScorerPort = new KeywordEngagementScorer(),
  runId?: string
): Promise<Highlight[]> {
  assertValidScenes(scenes);
  if (options.maxHighlights < 1) {
    return [];
  }
  const candidates = buildCandidates(scenes, words, options);
  const scored = await scoreCandidates(candidates, scorer, runId);
  return pickNonOverlapping(rankByScore(scored), options.maxHighlights).map(toHighlight);
}

/** Stable: equal scores keep generation order. */
export function rankByScore(candidates: readonly ScoredCandidate[]) {
  return [...candidates].sort((a, b) => b.score - a.score);
}

export function pickNonOverlapping(ranked: readonly ScoredCandidate[], maxHighlights: number) {
  const accepted: ScoredCandidate[] = [];
  if (maxHighlights < 1) {
    return accepted;
  }
  for (const candidate of ranked) {
    if (accepted.every((pick) => !overlaps(candidate, pick))) {
      accepted.push(candidate);
      if (accepted.length >= maxHighlights) {
        break;
      }
    }
  }
  return accepted;
}

export function anchorScene(highlight: Highlight, scenes: readonly Scene[]): Scene | null {
  return scenes[highlight.anchorSceneIndex] ?? null;
}

function overlaps(a: ScoredCandidate, b: ScoredCandidate) {
  return a.startTime < b.endTime && a.endTime > b.startTime;
}

function toHighlight(candidate: ScoredCandidate): Highlight {
  return {
    startTime: candidate.startTime,
    endTime: candidate.endTime,
    duration: candidate.endTime - candidate.startTime,
    score: candidate.score,
    text: candidate.text,
    anchorSceneIndex: candidate.sceneRange.first
  };
}
