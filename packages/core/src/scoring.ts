import type { KeyTime, SessionSummary } from "@keyladder/types";
import { isCorrectionSymbol } from "./symbols";

export function summarizeSession(keyTimes: KeyTime[]): SessionSummary {
  const typed = keyTimes.filter((kt) => !isCorrectionSymbol(kt.key));
  const correct = typed.filter((kt) => kt.correct).length;
  const elapsedMs = typed.reduce((sum, kt) => sum + kt.timeMs, 0);
  const minutes = elapsedMs / 60000;

  return {
    cpm: minutes > 0 ? correct / minutes : 0,
    incorrect: typed.length - correct,
    totalChars: typed.length,
  };
}

export function computeScore(summary: SessionSummary, complexity: number): number {
  return ((summary.cpm * complexity) / (summary.incorrect + 1)) * (summary.totalChars / 50);
}

// Unlocked share of all defined symbols, floored at 0.1
export function computeComplexity(unlockedCount: number, totalSymbols: number): number {
  if (totalSymbols <= 0) return 0.1;
  return Math.max(0.1, unlockedCount / totalSymbols);
}

export function levelFromScore(totalScore: number): number {
  return Math.max(1, Math.floor(Math.sqrt(Math.max(0, totalScore) / 100)));
}

export function scoreToNextLevel(totalScore: number): number {
  const next = levelFromScore(totalScore) + 1;
  return next * next * 100 - totalScore;
}
