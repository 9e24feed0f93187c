import { randomUUID } from "node:crypto";
import { InvalidInputError } from "../domain/errors";
import type { EngineConfig, FrameDiffSignal, HighlightRunResult, SelectionOptions, Transcript } from "../domain/types";
import type { EngagementScorerPort, LoggerPort } from "../interfaces/ports";
import { type HighlightJobPayload, describeIssues, highlightJobPayloadSchema } from "../interfaces/schemas";
import { anchorScene, selectHighlights } from "./highlightSelection";
import { detectScenes, mergeShortScenes } from "./sceneSegmentation";
import { groupSpeechSegments } from "./speechSpans";

export interface HighlightDependencies {
  scorer: EngagementScorerPort;
  logger: LoggerPort;
}

export interface HighlightInput {
  signal: FrameDiffSignal;
  transcript: Transcript;
}

export async function runHighlightPipeline(
  runId: string,
  input: HighlightInput,
  config: EngineConfig,
  deps: HighlightDependencies
): Promise<HighlightRunResult> {
  const { signal, transcript } = input;
  const speechSpans = groupSpeechSegments(transcript.segments, config.speech);
  await deps.logger.info(runId, `Grouped ${transcript.segments.length} transcript segments into ${speechSpans.length} speech spans.`);

  const detected = detectScenes(signal, speechSpans, config.detection);
  const scenes = mergeShortScenes(detected, config.mergeMinDuration);
  const withSpeech = scenes.filter((scene) => scene.speechSegments.length).length;
  await deps.logger.info(
    runId,
    `Detected ${detected.length} scenes, ${scenes.length} after merging (${withSpeech} with speech).`
  );

  const highlights = await selectHighlights(scenes, transcript.words, config.selection, deps.scorer, runId);
  await deps.logger.info(runId, `Selected ${highlights.length} highlights.`);
  for (const [index, highlight] of highlights.entries()) {
    const density = anchorScene(highlight, scenes)?.speechDensity ?? 0;
    await deps.logger.info(
      runId,
      `Highlight ${index + 1}: ${highlight.startTime.toFixed(1)}s-${highlight.endTime.toFixed(1)}s ` +
        `score=${highlight.score.toFixed(2)} speechDensity=${density.toFixed(2)}`
    );
  }

  return { runId, scenes, highlights };
}

export async function processHighlightJob(
  payload: unknown,
  config: EngineConfig,
  deps: HighlightDependencies
): Promise<HighlightRunResult> {
  const parsed = highlightJobPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const error = new InvalidInputError(`Invalid highlight job payload: ${describeIssues(parsed.error)}`);
    await deps.logger.error(declaredRunId(payload) ?? randomUUID(), error.message);
    throw error;
  }
  const job = parsed.data;
  const runId = job.runId ?? randomUUID();

  try {
    const engine = { ...config, selection: applyOverrides(config.selection, job.options) };
    return await runHighlightPipeline(runId, job, engine, deps);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    await deps.logger.error(runId, message);
    throw error;
  }
}

function applyOverrides(selection: SelectionOptions, overrides: HighlightJobPayload["options"]): SelectionOptions {
  const merged = {
    ...selection,
    maxHighlights: overrides?.maxHighlights ?? selection.maxHighlights,
    minDuration: overrides?.minDuration ?? selection.minDuration,
    maxDuration: overrides?.maxDuration ?? selection.maxDuration
  };
  if (merged.maxDuration < merged.minDuration) {
    throw new InvalidInputError(
      `maxDuration ${merged.maxDuration} is below minDuration ${merged.minDuration}.`
    );
  }
  return merged;
}

function declaredRunId(payload: unknown) {
  if (typeof payload === "object" && payload !== null && "runId" in payload && typeof payload.runId === "string") {
    return payload.runId || null;
  }
  return null;
}
