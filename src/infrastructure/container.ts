import { KeywordEngagementScorer } from "../application/highlightScoring";
import type { HighlightDependencies } from "../application/highlightService";
import type { EngagementScorerPort, LoggerPort } from "../interfaces/ports";
import { type AppConfig, loadKeywordTiers } from "./config";
import { LocalLogger } from "./logger/localLogger";
import { OpenAiCompletionClient } from "./scoring/openAiCompletionClient";
import { FallbackEngagementScorer, RemoteEngagementScorer } from "./scoring/remoteEngagementScorer";

let cached: Promise<HighlightDependencies> | null = null;

export function getDependencies(config: AppConfig): Promise<HighlightDependencies> {
  if (!cached) {
    cached = buildDependencies(config).catch((error: unknown) => {
      cached = null;
      throw error;
    });
  }
  return cached;
}

export async function buildDependencies(config: AppConfig): Promise<HighlightDependencies> {
  const logger = new LocalLogger(config.logsPath);
  const tiers = await loadKeywordTiers(config.keywordsPath);
  return { logger, scorer: createScorer(config, new KeywordEngagementScorer(tiers), logger) };
}

export function createScorer(
  config: AppConfig,
  heuristic: EngagementScorerPort,
  logger: LoggerPort
): EngagementScorerPort {
  const settings = config.scorer;
  if (settings.provider === "heuristic") {
    return heuristic;
  }
  const client = new OpenAiCompletionClient({ apiKey: settings.apiKey, baseURL: settings.baseURL }, settings.model);
  return new FallbackEngagementScorer(new RemoteEngagementScorer(client, settings.timeoutMs), heuristic, logger);
}
