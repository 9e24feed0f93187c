import { describe, expect, it } from "vitest";
import {
  DEFAULT_SELECTION_OPTIONS,
  anchorScene,
  pickNonOverlapping,
  rankByScore,
  selectHighlights
} from "../../src/application/highlightSelection";
import { createScene } from "../../src/domain/scene";
import { InvalidInputError } from "../../src/domain/errors";
import type { Scene, ScoredCandidate, Word } from "../../src/domain/types";

function spokenScenes(count: number, length: number): Scene[] {
  return Array.from({ length: count }, (_, index) => {
    const start = index * length;
    return createScene(start, start + length, [{ start, end: start + length }]);
  });
}

const words: Word[] = Array.from({ length: 100 }, (_, n) => ({ text: `w${n}`, start: n, end: n + 0.5 }));

const candidate = (startTime: number, endTime: number, score: number, first = 0): ScoredCandidate => ({
  scenes: [],
  sceneRange: { first, last: first },
  windowDuration: endTime - startTime,
  startTime,
  endTime,
  duration: endTime - startTime,
  text: "",
  score
});

describe("highlight selection", () => {
  it("selects the best candidate and drops everything overlapping it", async () => {
    const highlights = await selectHighlights(spokenScenes(5, 20), words);

    expect(highlights).toHaveLength(1);
    const [best] = highlights;
    expect(best.startTime).toBe(0);
    expect(best.endTime).toBe(100);
    expect(best.duration).toBe(100);
    expect(best.score).toBeCloseTo(0.565, 10);
    expect(best.anchorSceneIndex).toBe(0);
    expect(best.text.split(" ")).toHaveLength(100);
  });

  it("scores through the injected scorer", async () => {
    const runIds: (string | undefined)[] = [];
    const scorer = {
      score: async (_: string, runId?: string) => {
        runIds.push(runId);
        return 0;
      }
    };
    const highlights = await selectHighlights(spokenScenes(5, 20), words, DEFAULT_SELECTION_OPTIONS, scorer, "run-3");
    expect(highlights).toHaveLength(1);
    expect(new Set(runIds)).toEqual(new Set(["run-3"]));
    expect(highlights[0].score).toBeCloseTo(0.4, 10);
  });

  it("returns nothing when no highlights are requested", async () => {
    await expect(
      selectHighlights(spokenScenes(5, 20), words, { ...DEFAULT_SELECTION_OPTIONS, maxHighlights: 0 })
    ).resolves.toEqual([]);
  });

  it("returns nothing without words", async () => {
    await expect(selectHighlights(spokenScenes(5, 20), [])).resolves.toEqual([]);
  });

  it("returns nothing for a single silent scene shorter than the minimum", async () => {
    await expect(selectHighlights([createScene(0, 10)], words.slice(0, 10))).resolves.toEqual([]);
  });

  it("returns nothing for an empty scene list", async () => {
    await expect(selectHighlights([], words)).resolves.toEqual([]);
  });

  it("rejects overlapping scenes", async () => {
    await expect(selectHighlights([createScene(0, 40), createScene(30, 80)], words)).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });

  it("ranks by score and keeps generation order on ties", () => {
    const a = candidate(0, 10, 0.4);
    const b = candidate(10, 20, 0.9);
    const c = candidate(20, 30, 0.4);
    expect(rankByScore([a, b, c])).toEqual([b, a, c]);
  });

  it("greedily accepts non-overlapping candidates in rank order", () => {
    const ranked = [
      candidate(0, 40, 0.9),
      candidate(30, 70, 0.8),
      candidate(40, 80, 0.7),
      candidate(100, 130, 0.6)
    ];
    expect(pickNonOverlapping(ranked, 5).map((pick) => pick.score)).toEqual([0.9, 0.7, 0.6]);
    expect(pickNonOverlapping(ranked, 2).map((pick) => pick.score)).toEqual([0.9, 0.7]);
    expect(pickNonOverlapping(ranked, 0)).toEqual([]);
  });

  it("keeps results pairwise disjoint", () => {
    const ranked = rankByScore([
      candidate(0, 35, 0.3),
      candidate(5, 50, 0.8),
      candidate(45, 90, 0.5),
      candidate(50, 95, 0.6),
      candidate(95, 130, 0.2)
    ]);
    const picks = pickNonOverlapping(ranked, 5);
    expect(picks.map((pick) => [pick.startTime, pick.endTime])).toEqual([
      [5, 50],
      [50, 95],
      [95, 130]
    ]);
  });

  it("resolves the anchor scene by index", () => {
    const scenes = spokenScenes(3, 20);
    const highlight = { startTime: 0, endTime: 60, duration: 60, score: 1, text: "", anchorSceneIndex: 1 };
    expect(anchorScene(highlight, scenes)).toBe(scenes[1]);
    expect(anchorScene({ ...highlight, anchorSceneIndex: 7 }, scenes)).toBeNull();
  });
});
