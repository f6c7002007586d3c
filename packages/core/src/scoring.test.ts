import { describe, expect, it } from "vitest";
import { computeComplexity, computeScore, levelFromScore, scoreToNextLevel, summarizeSession } from "./scoring";

describe("summarizeSession", () => {
  it("leaves corrections out of speed and counts", () => {
    const summary = summarizeSession([
      { key: "a", timeMs: 200, correct: true },
      { key: "b", timeMs: 300, correct: false },
      { key: "\b", timeMs: 100, correct: true },
      { key: "b", timeMs: 100, correct: true },
    ]);
    expect(summary.cpm).toBeCloseTo(200, 8);
    expect(summary.incorrect).toBe(1);
    expect(summary.totalChars).toBe(3);
  });

  it("reports zero speed for an empty session", () => {
    expect(summarizeSession([])).toEqual({ cpm: 0, incorrect: 0, totalChars: 0 });
  });
});

describe("computeScore", () => {
  it("rewards speed, breadth and length and divides by errors", () => {
    expect(computeScore({ cpm: 300, incorrect: 2, totalChars: 100 }, 0.5)).toBe(100);
  });
});

describe("computeComplexity", () => {
  it("is the unlocked share, floored at 0.1", () => {
    expect(computeComplexity(6, 96)).toBe(0.1);
    expect(computeComplexity(48, 96)).toBe(0.5);
    expect(computeComplexity(0, 0)).toBe(0.1);
  });
});

describe("levels", () => {
  it("grows with the square root of the score", () => {
    expect(levelFromScore(0)).toBe(1);
    expect(levelFromScore(399)).toBe(1);
    expect(levelFromScore(400)).toBe(2);
    expect(levelFromScore(900)).toBe(3);
  });

  it("reports the score still needed for the next level", () => {
    expect(scoreToNextLevel(150)).toBe(250);
    expect(scoreToNextLevel(400)).toBe(500);
  });
});
