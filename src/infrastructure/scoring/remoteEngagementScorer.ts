import { ExternalScorerFailure } from "../../domain/errors";
import { MIN_SCORABLE_WORDS, countWords } from "../../application/highlightScoring";
import type { CompletionClient, EngagementScorerPort, LoggerPort } from "../../interfaces/ports";

export function buildViralityPrompt(text: string) {
  return [
    "Rate the following content for its viral potential on social media platforms like TikTok and Instagram Reels.",
    "Consider factors like surprise, emotion, relatability, and entertainment value.",
    `Content: "${text}"`,
    "Rate from 0 to 100, where 100 is extremely viral:"
  ].join("\n");
}

export function parseRating(reply: string) {
  const match = reply.match(/\d+/);
  if (!match) {
    throw new ExternalScorerFailure("malformed", `Scorer reply has no rating: "${reply.trim().slice(0, 80)}"`);
  }
  const rating = Number.parseInt(match[0], 10);
  if (rating > 100) {
    throw new ExternalScorerFailure("malformed", `Scorer rating ${rating} is outside 0-100.`);
  }
  return rating / 100;
}

export class RemoteEngagementScorer implements EngagementScorerPort {
  constructor(
    private client: CompletionClient,
    private timeoutMs: number
  ) {}

  async score(text: string) {
    if (countWords(text) < MIN_SCORABLE_WORDS) {
      return 0;
    }
    const reply = await withTimeout(
      this.client.complete(buildViralityPrompt(text), { timeoutMs: this.timeoutMs }),
      this.timeoutMs
    );
    return parseRating(reply);
  }
}

/** Scores with `primary`, answering with `fallback` whenever the primary fails. */
export class FallbackEngagementScorer implements EngagementScorerPort {
  constructor(
    private primary: EngagementScorerPort,
    private fallback: EngagementScorerPort,
    private logger: LoggerPort
  ) {}

  async score(text: string, runId = "scorer") {
    try {
      return await this.primary.score(text, runId);
    } catch (error) {
      const reason = error instanceof ExternalScorerFailure ? error.reason : "unreachable";
      const message = error instanceof Error ? error.message : String(error);
      await this.logger.warn(runId, `Engagement scorer failed (${reason}), using keyword heuristic: ${message}`);
      return this.fallback.score(text, runId);
    }
  }
}

async function withTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ExternalScorerFailure("timeout", `Scorer did not answer within ${timeoutMs}ms.`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([task, timeout]);
  } catch (error) {
    if (error instanceof ExternalScorerFailure) {
      throw error;
    }
    throw new ExternalScorerFailure("unreachable", error instanceof Error ? error.message : String(error), {
      cause: error
    });
  } finally {
    clearTimeout(timer);
  }
}
