import type { HighlightJobPayload } from "./schemas";

/** Rates how engaging a piece of transcript text is, in [0, 1]. `runId` names the run log for diagnostics. */
export interface EngagementScorerPort {
  score(text: string, runId?: string): Promise<number>;
}

/** Single-prompt text completion, bounded by `timeoutMs`. */
export interface CompletionClient {
  complete(prompt: string, options: { timeoutMs: number }): Promise<string>;
}

export interface HighlightQueuePort {
  enqueue(payload: HighlightJobPayload): Promise<string>;
}

export interface LoggerPort {
  info(runId: string, message: string): Promise<void>;
  warn(runId: string, message: string): Promise<void>;
  error(runId: string, message: string): Promise<void>;
}
