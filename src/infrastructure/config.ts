import path from "node:path";
import { promises as fs } from "node:fs";
import { z } from "zod";
import type { EngineConfig, KeywordTiers } from "../domain/types";
import { DEFAULT_KEYWORD_TIERS } from "../application/highlightScoring";
import { describeIssues, keywordTiersSchema } from "../interfaces/schemas";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z
  .object({
    SCENE_THRESHOLD: z.coerce.number().min(0).max(255).default(27),
    MIN_SCENE_LEN: z.coerce.number().min(0).default(0.5),
    SCENE_MERGE_MIN_DURATION: z.coerce.number().min(0).default(1),
    HIGHLIGHT_MIN_DURATION: z.coerce.number().positive().default(30),
    HIGHLIGHT_MAX_DURATION: z.coerce.number().positive().default(90),
    MAX_HIGHLIGHTS: z.coerce.number().int().min(1).default(5),
    CONTEXT_WINDOW: z.coerce.number().min(0).default(5),
    FRAME_RATE_PROXY: z.coerce.number().positive().default(30),
    LEGACY_RIGHT_PADDING: booleanFlag,
    SPEECH_MIN_SPAN: z.coerce.number().min(0).default(1),
    SPEECH_MAX_SPAN: z.coerce.number().positive().default(60),
    SPEECH_MAX_GAP: z.coerce.number().min(0).default(1),
    SCORER_PROVIDER: z.enum(["heuristic", "openai"]).default("heuristic"),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    SCORER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    KEYWORDS_PATH: z.string().min(1).optional(),
    LOGS_PATH: z.string().min(1).optional(),
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
    WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(1),
    WORKER_MAX_RSS_MB: z.coerce.number().min(0).default(0)
  })
  .superRefine((env, ctx) => {
    if (env.HIGHLIGHT_MAX_DURATION < env.HIGHLIGHT_MIN_DURATION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["HIGHLIGHT_MAX_DURATION"],
        message: "must not be below HIGHLIGHT_MIN_DURATION"
      });
    }
    if (env.SCORER_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "is required when SCORER_PROVIDER=openai"
      });
    }
  });

export type ScorerSettings =
  | { provider: "heuristic" }
  | { provider: "openai"; apiKey: string; baseURL?: string; model: string; timeoutMs: number };

export interface AppConfig {
  engine: EngineConfig;
  scorer: ScorerSettings;
  keywordsPath: string | null;
  logsPath: string;
  redisUrl: string;
  workerConcurrency: number;
  /** 0 disables the memory guard. */
  workerMaxRssMb: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${describeIssues(parsed.error)}`);
  }
  const values = parsed.data;

  const scorer: ScorerSettings =
    values.SCORER_PROVIDER === "openai" && values.OPENAI_API_KEY
      ? {
          provider: "openai",
          apiKey: values.OPENAI_API_KEY,
          baseURL: values.OPENAI_BASE_URL,
          model: values.OPENAI_MODEL,
          timeoutMs: values.SCORER_TIMEOUT_MS
        }
      : { provider: "heuristic" };

  return {
    engine: {
      detection: { threshold: values.SCENE_THRESHOLD, minSceneLength: values.MIN_SCENE_LEN },
      mergeMinDuration: values.SCENE_MERGE_MIN_DURATION,
      speech: { minSpan: values.SPEECH_MIN_SPAN, maxSpan: values.SPEECH_MAX_SPAN, maxGap: values.SPEECH_MAX_GAP },
      selection: {
        minDuration: values.HIGHLIGHT_MIN_DURATION,
        maxDuration: values.HIGHLIGHT_MAX_DURATION,
        maxHighlights: values.MAX_HIGHLIGHTS,
        contextWindow: values.CONTEXT_WINDOW,
        frameRate: values.FRAME_RATE_PROXY,
        legacyRightPadding: values.LEGACY_RIGHT_PADDING
      }
    },
    scorer,
    keywordsPath: values.KEYWORDS_PATH ?? null,
    logsPath: values.LOGS_PATH ?? path.join(process.cwd(), "logs"),
    redisUrl: values.REDIS_URL,
    workerConcurrency: values.WORKER_CONCURRENCY,
    workerMaxRssMb: values.WORKER_MAX_RSS_MB
  };
}

export async function loadKeywordTiers(filePath: string | null): Promise<KeywordTiers> {
  if (!filePath) {
    return DEFAULT_KEYWORD_TIERS;
  }
  const raw = await fs.readFile(filePath, "utf-8");
  const parsed = keywordTiersSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid keyword tiers in ${filePath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
