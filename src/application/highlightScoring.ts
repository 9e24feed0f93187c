import defaultKeywords from "../../config/keywords.json";
import type { CandidateGroup, KeywordTiers, ScoredCandidate } from "../domain/types";
import type { EngagementScorerPort } from "../interfaces/ports";
import { keywordTiersSchema } from "../interfaces/schemas";

export const DEFAULT_KEYWORD_TIERS: KeywordTiers = keywordTiersSchema.parse(defaultKeywords);

const TIER_WEIGHTS: [keyof KeywordTiers, number][] = [
  ["highImpact", 0.15],
  ["contentIndicator", 0.25],
  ["emotionalTrigger", 0.3],
  ["callToAction", 0.2]
];

export const MIN_SCORABLE_WORDS = 5;

export function countWords(text: string) {
  return tokenize(text).length;
}

export function scoreContent(text: string, tiers: KeywordTiers = DEFAULT_KEYWORD_TIERS) {
  const lower = text.toLowerCase();
  const wordCount = countWords(lower);
  // terminal punctuation leaves an empty trailing piece, which counts
  const sentenceCount = lower.split(/[.!?]+/).length;
  if (wordCount < MIN_SCORABLE_WORDS) {
    return 0;
  }

  const densityScore = Math.min(wordCount / sentenceCount / 10, 1);
  const keywordScore = keywordTierScore(lower, tiers);
  const qualityScore =
    (lower.includes("?") ? 0.2 : 0) +
    (lower.includes("!") ? 0.15 : 0) +
    (/\d/.test(lower) ? 0.1 : 0) +
    (lower.includes('"') || lower.includes("'") ? 0.15 : 0) +
    (wordCount >= 10 && wordCount <= 30 ? 0.2 : 0);

  return Math.min(keywordScore * 0.4 + qualityScore * 0.3 + densityScore * 0.3, 1);
}

/** Unbounded above 1 for very long text. */
export function scoreContext(text: string) {
  return countWords(text) / 100;
}

/** Unbounded above 1 for groups spanning more than ten scenes. */
export function scoreTransitions(group: Pick<CandidateGroup, "scenes">) {
  return group.scenes.length / 10;
}

export function combineScores(content: number, context: number, transition: number) {
  return content * 0.5 + context * 0.3 + transition * 0.2;
}

export function scoreGroup(group: CandidateGroup, contentScore: number) {
  return combineScores(contentScore, scoreContext(group.text), scoreTransitions(group));
}

/** Scores candidates in generation order, asking the scorer once per distinct text. */
export async function scoreCandidates(
  groups: readonly CandidateGroup[],
  scorer: EngagementScorerPort,
  runId?: string
): Promise<ScoredCandidate[]> {
  const contentScores = new Map<string, number>();
  const scored: ScoredCandidate[] = [];
  for (const group of groups) {
    let content = contentScores.get(group.text);
    if (content === undefined) {
      content = await scorer.score(group.text, runId);
      contentScores.set(group.text, content);
    }
    scored.push({ ...group, score: scoreGroup(group, content) });
  }
  return scored;
}

export class KeywordEngagementScorer implements EngagementScorerPort {
  constructor(private tiers: KeywordTiers = DEFAULT_KEYWORD_TIERS) {}

  async score(text: string) {
    return scoreContent(text, this.tiers);
  }
}

function keywordTierScore(lower: string, tiers: KeywordTiers) {
  let score = 0;
  for (const [tier, weight] of TIER_WEIGHTS) {
    const hits = tiers[tier].filter((keyword) => lower.includes(keyword.toLowerCase())).length;
    score += hits * weight;
  }
  return score;
}

function tokenize(text: string) {
  return text.split(/\s+/).filter(Boolean);
}
