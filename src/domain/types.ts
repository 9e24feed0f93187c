export interface SpeechSpan {
  readonly start: number;
  readonly end: number;
}

export interface Scene {
  readonly startTime: number;
  readonly endTime: number;
  readonly duration: number;
  readonly speechSegments: readonly SpeechSpan[];
  readonly speechDuration: number;
  readonly speechDensity: number;
}

export interface Word {
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly confidence?: number;
}

export interface TranscriptSegment {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

export interface Transcript {
  readonly language?: string | null;
  readonly segments: readonly TranscriptSegment[];
  readonly words: readonly Word[];
}

/** Dissimilarity between a sampled frame and the sampled frame before it. */
export interface FrameDiffSample {
  readonly frameIndex: number;
  readonly difference: number;
}

export interface FrameDiffSignal {
  readonly fps: number;
  readonly frameCount: number;
  readonly samples: readonly FrameDiffSample[];
}

export interface SceneRange {
  readonly first: number;
  readonly last: number;
}

export interface CandidateGroup {
  readonly scenes: readonly Scene[];
  readonly sceneRange: SceneRange;
  /** Length of the matched run of scenes, before context is added. */
  readonly windowDuration: number;
  readonly startTime: number;
  readonly endTime: number;
  readonly duration: number;
  readonly text: string;
}

export interface ScoredCandidate extends CandidateGroup {
  readonly score: number;
}

export interface Highlight {
  readonly startTime: number;
  readonly endTime: number;
  readonly duration: number;
  readonly score: number;
  readonly text: string;
  /** Index of the originating group's first scene in the selector's scene list. */
  readonly anchorSceneIndex: number;
}

export interface KeywordTiers {
  readonly highImpact: readonly string[];
  readonly contentIndicator: readonly string[];
  readonly emotionalTrigger: readonly string[];
  readonly callToAction: readonly string[];
}

export interface SceneDetectionOptions {
  /** Boundary threshold on the 0-255 scale. */
  threshold: number;
  minSceneLength: number;
}

export interface SpeechSpanOptions {
  minSpan: number;
  maxSpan: number;
  maxGap: number;
}

export interface CandidateConfig {
  minDuration: number;
  maxDuration: number;
  contextWindow: number;
  frameRate: number;
  legacyRightPadding: boolean;
}

export interface SelectionOptions extends CandidateConfig {
  maxHighlights: number;
}

export interface EngineConfig {
  detection: SceneDetectionOptions;
  mergeMinDuration: number;
  speech: SpeechSpanOptions;
  selection: SelectionOptions;
}

export interface HighlightRunResult {
  runId: string;
  scenes: Scene[];
  highlights: Highlight[];
}
