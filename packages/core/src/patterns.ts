import type { KeyTime, PairEvent, PairOrder } from "@keyladder/types";
import { isBoundarySymbol, isCorrectionSymbol } from "./symbols";

export const DEFAULT_HESITATION_FLOOR_MS = 800;
export const DEFAULT_HESITATION_MULTIPLIER = 2.5;

export interface ExtractedPairs {
  bigrams: PairEvent[];
  trigrams: PairEvent[];
}

function extractWindows(keyTimes: KeyTime[], order: PairOrder, hesitationThresholdMs: number): PairEvent[] {
  const events: PairEvent[] = [];

  for (let i = 0; i + order <= keyTimes.length; i++) {
    const window = keyTimes.slice(i, i + order);

    // No pairs across word boundaries
    if (window.some((kt) => isBoundarySymbol(kt.key))) continue;

    // The first symbol's time is the transition into the window, not part of it.
    const transitions = window.slice(1);

    events.push({
      symbols: window.map((kt) => kt.key),
      totalTimeMs: transitions.reduce((sum, kt) => sum + kt.timeMs, 0),
      correct: window.every((kt) => kt.correct),
      hesitation: transitions.some((kt) => kt.timeMs > hesitationThresholdMs),
    });
  }

  return events;
}

/**
 * Turns one session's keystrokes into two- and three-symbol pair observations.
 * Correction keystrokes are dropped first, so a window may span a fixed typo.
 */
export function extractPairEvents(keyTimes: KeyTime[], hesitationThresholdMs: number): ExtractedPairs {
  const filtered = keyTimes.filter((kt) => !isCorrectionSymbol(kt.key));

  return {
    bigrams: extractWindows(filtered, 2, hesitationThresholdMs),
    trigrams: extractWindows(filtered, 3, hesitationThresholdMs),
  };
}

// Scales with the user's own pace, but never below the absolute floor.
export function hesitationThreshold(
  medianTransitionMs: number,
  floorMs = DEFAULT_HESITATION_FLOOR_MS,
  multiplier = DEFAULT_HESITATION_MULTIPLIER
): number {
  return Math.max(floorMs, multiplier * medianTransitionMs);
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
