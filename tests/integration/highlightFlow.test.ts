import { describe, expect, it } from "vitest";
import { processHighlightJob } from "../../src/application/highlightService";
import { KeywordEngagementScorer } from "../../src/application/highlightScoring";
import { ExternalScorerFailure, InvalidInputError } from "../../src/domain/errors";
import { FallbackEngagementScorer } from "../../src/infrastructure/scoring/remoteEngagementScorer";
import { loadConfig } from "../../src/infrastructure/config";
import type { LoggerPort } from "../../src/interfaces/ports";

type LogLine = { level: "info" | "warn" | "error"; runId: string; message: string };

class MockLogger implements LoggerPort {
  lines: LogLine[] = [];

  async info(runId: string, message: string) {
    this.lines.push({ level: "info", runId, message });
  }

  async warn(runId: string, message: string) {
    this.lines.push({ level: "warn", runId, message });
  }

  async error(runId: string, message: string) {
    this.lines.push({ level: "error", runId, message });
  }

  messages(level: LogLine["level"]) {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}

const CUT_FRAMES = new Set([200, 400, 600, 800]);

function analysis(options?: Record<string, number>) {
  const samples: { frameIndex: number; difference: number }[] = [];
  for (let frameIndex = 10; frameIndex < 1000; frameIndex += 10) {
    samples.push({ frameIndex, difference: CUT_FRAMES.has(frameIndex) ? 0.6 : 0.02 });
  }
  return {
    runId: "run-test",
    signal: { fps: 10, frameCount: 1000, samples },
    transcript: {
      language: "en",
      segments: Array.from({ length: 10 }, (_, index) => ({
        start: index * 10,
        end: index * 10 + 10,
        text: `part ${index}`
      })),
      words: Array.from({ length: 100 }, (_, n) => ({ text: `w${n}`, start: n, end: n + 0.5 }))
    },
    options
  };
}

describe("highlight flow", () => {
  const config = loadConfig({});

  it("turns a frame signal and transcript into highlights", async () => {
    const logger = new MockLogger();
    const result = await processHighlightJob(analysis(), config.engine, {
      scorer: new KeywordEngagementScorer(),
      logger
    });

    expect(result.runId).toBe("run-test");
    expect(result.scenes.map((scene) => [scene.startTime, scene.endTime])).toEqual([
      [0, 20],
      [20, 40],
      [40, 60],
      [60, 80],
      [80, 100]
    ]);
    expect(result.scenes.every((scene) => scene.speechDensity === 1)).toBe(true);

    expect(result.highlights).toHaveLength(1);
    const [highlight] = result.highlights;
    expect(highlight.startTime).toBe(0);
    expect(highlight.endTime).toBe(100);
    expect(highlight.score).toBeCloseTo(0.565, 10);
    expect(highlight.anchorSceneIndex).toBe(0);

    const info = logger.messages("info");
    expect(info.slice(0, 3)).toEqual([
      "Grouped 10 transcript segments into 2 speech spans.",
      "Detected 5 scenes, 5 after merging (5 with speech).",
      "Selected 1 highlights."
    ]);
    expect(info[3].startsWith("Highlight 1: 0.0s-100.0s score=")).toBe(true);
    expect(logger.lines.every((line) => line.runId === "run-test")).toBe(true);
  });

  it("applies per-job option overrides", async () => {
    const logger = new MockLogger();
    const result = await processHighlightJob(analysis({ minDuration: 150, maxDuration: 200 }), config.engine, {
      scorer: new KeywordEngagementScorer(),
      logger
    });

    expect(result.scenes).toHaveLength(5);
    expect(result.highlights).toEqual([]);
    expect(logger.messages("info")).toContain("Selected 0 highlights.");
  });

  it("rejects and logs contradictory overrides", async () => {
    const logger = new MockLogger();
    await expect(
      processHighlightJob(analysis({ minDuration: 50, maxDuration: 40 }), config.engine, {
        scorer: new KeywordEngagementScorer(),
        logger
      })
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(logger.lines).toEqual([
      { level: "error", runId: "run-test", message: "maxDuration 40 is below minDuration 50." }
    ]);
  });

  it("rejects malformed payloads", async () => {
    const logger = new MockLogger();
    const payload = { ...analysis(), signal: { fps: -1, frameCount: 10, samples: [] } };

    await expect(
      processHighlightJob(payload, config.engine, { scorer: new KeywordEngagementScorer(), logger })
    ).rejects.toThrow(/Invalid highlight job payload: signal\.fps/);
    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0].level).toBe("error");
    expect(logger.lines[0].runId).toBe("run-test");
    expect(logger.lines[0].message.startsWith("Invalid highlight job payload: signal.fps")).toBe(true);
  });

  it("logs rejected payloads without a run id under a generated one", async () => {
    const logger = new MockLogger();

    await expect(
      processHighlightJob({ transcript: "nope" }, config.engine, { scorer: new KeywordEngagementScorer(), logger })
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0].runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("logs scorer fallbacks under the job's run id", async () => {
    const logger = new MockLogger();
    const unreachable = {
      score: async () => Promise.reject(new ExternalScorerFailure("unreachable", "connect ECONNREFUSED"))
    };
    const scorer = new FallbackEngagementScorer(unreachable, new KeywordEngagementScorer(), logger);

    const result = await processHighlightJob(analysis(), config.engine, { scorer, logger });

    expect(result.highlights).toHaveLength(1);
    expect(result.highlights[0].score).toBeCloseTo(0.565, 10);
    const warnings = logger.lines.filter((line) => line.level === "warn");
    expect(warnings.length).toBeGreaterThan(0);
    expect(warnings.every((line) => line.runId === "run-test")).toBe(true);
    expect(warnings[0].message).toBe(
      "Engagement scorer failed (unreachable), using keyword heuristic: connect ECONNREFUSED"
    );
  });

  it("assigns a run id when the payload has none", async () => {
    const logger = new MockLogger();
    const payload = { ...analysis(), runId: undefined };
    const result = await processHighlightJob(payload, config.engine, { scorer: new KeywordEngagementScorer(), logger });

    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
  });
});
