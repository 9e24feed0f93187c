import type { Scene, SpeechSpan } from "./types";

export function createScene(startTime: number, endTime: number, speechSegments: readonly SpeechSpan[] = []): Scene {
  const duration = endTime - startTime;
  const speechDuration = speechSegments.reduce((acc, span) => acc + (span.end - span.start), 0);
  return {
    startTime,
    endTime,
    duration,
    speechSegments: [...speechSegments],
    speechDuration,
    speechDensity: duration > 0 ? speechDuration / duration : 0
  };
}

export function fuseScenes(first: Scene, second: Scene): Scene {
  return createScene(first.startTime, second.endTime, [...first.speechSegments, ...second.speechSegments]);
}

export function hasSpeech(scene: Scene) {
  return scene.speechSegments.length > 0;
}
