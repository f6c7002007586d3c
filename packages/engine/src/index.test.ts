import { beforeEach, describe, expect, it, vi } from "vitest";
import type {
  KeyTime,
  Logger,
  ProfileData,
  ProfileStorage,
  SessionHistoryData,
  SymbolStatsData,
} from "@keyladder/types";
import { ConfigError, UnknownBranchError } from "@keyladder/core";
import { MasteryEngine, type MasteryState } from "./index";

class MemoryStorage implements ProfileStorage {
  profile: ProfileData | null = null;
  symbolStats: SymbolStatsData | null = null;
  history: SessionHistoryData | null = null;

  async loadProfile() {
    return this.profile && structuredClone(this.profile);
  }
  async saveProfile(profile: ProfileData) {
    this.profile = structuredClone(profile);
  }
  async loadSymbolStats() {
    return this.symbolStats && structuredClone(this.symbolStats);
  }
  async saveSymbolStats(data: SymbolStatsData) {
    this.symbolStats = structuredClone(data);
  }
  async loadHistory() {
    return this.history && structuredClone(this.history);
  }
  async saveHistory(data: SessionHistoryData) {
    this.history = structuredClone(data);
  }
}

function quietLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

function typed(text: string, timeMs = 150): KeyTime[] {
  return Array.from(text).map((key) => ({ key, timeMs, correct: true }));
}

function mulberry32(seed: number) {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomSession(rand: () => number, symbols: string[]): KeyTime[] {
  const keyTimes: KeyTime[] = [];
  for (let i = 0; i < 60; i++) {
    const r = rand();
    if (i % 6 === 5) {
      keyTimes.push({ key: " ", timeMs: 120 + Math.floor(rand() * 100), correct: true });
    } else if (r < 0.05) {
      keyTimes.push({ key: "Backspace", timeMs: 180, correct: true });
    } else {
      keyTimes.push({
        key: symbols[Math.floor(rand() * symbols.length)],
        timeMs: 100 + Math.floor(rand() * 900),
        correct: r > 0.12,
      });
    }
  }
  return keyTimes;
}

const FIXED_NOW = () => new Date("2026-03-01T12:00:00.000Z");
const LOWERCASE = "etaoinshrdlcumwfgypbvkjxqz";

describe("MasteryEngine", () => {
  let storage: MemoryStorage;
  let logger: ReturnType<typeof quietLogger>;
  let engine: MasteryEngine;

  beforeEach(async () => {
    storage = new MemoryStorage();
    logger = quietLogger();
    engine = new MasteryEngine({ storage, logger, now: FIXED_NOW });
    await engine.init();
  });

  it("starts on the first symbols of the root branch", () => {
    expect(engine.getState().isLoaded).toBe(true);
    expect(engine.unlockedSymbols()).toEqual(["e", "t", "a", "o", "i", "n"]);
    expect(engine.getFocus()).toEqual({ charFocus: "e", pairFocus: null });
    expect(engine.getPrimaryFocus()).toEqual({ kind: "char", symbol: "e" });
  });

  it("unlocks the next symbol once the initial set is confident", async () => {
    const outcome = await engine.completeSession(typed("eat into tone"));

    expect(engine.unlockedSymbols()).toEqual(["e", "t", "a", "o", "i", "n", "s"]);
    expect(outcome.focus.charFocus).toBe("s");
    expect(outcome.focusChanged).toBe(true);
    expect(outcome.changeset.newlyAvailable).toEqual([]);
    expect(storage.profile?.skillTree.lowercase).toEqual({ status: "in_progress", currentLevel: 1 });
  });

  it("persists the session, the symbol stats and the profile", async () => {
    await engine.completeSession(typed("tea"), { partial: true });

    expect(storage.history?.sessions).toEqual([
      { keyTimes: typed("tea"), partial: true, timestamp: "2026-03-01T12:00:00.000Z" },
    ]);
    expect(Object.keys(storage.symbolStats?.stats ?? {}).sort()).toEqual(["a", "e", "t"]);
    expect(storage.profile?.totalSessions).toBe(1);
  });

  it("awards no score for partial sessions", async () => {
    const partial = await engine.completeSession(typed("tone"), { partial: true });
    expect(partial.score).toBe(0);

    const full = await engine.completeSession(typed("tone"));
    expect(full.score).toBeGreaterThan(0);
    expect(engine.getState().totalScore).toBe(full.score);
  });

  it("maps key names and drops keys that are not symbols", async () => {
    await engine.completeSession([
      { key: "t", timeMs: 200, correct: true },
      { key: "Shift", timeMs: 50, correct: true },
      { key: "Backspace", timeMs: 180, correct: true },
    ]);

    expect(engine.getHistory()[0].keyTimes.map((kt) => kt.key)).toEqual(["t", "\b"]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("rebuilds identical statistics from the stored history", async () => {
    const rand = mulberry32(7);
    for (let i = 0; i < 40; i++) {
      await engine.completeSession(randomSession(rand, engine.unlockedSymbols()));
    }

    const reloaded = new MasteryEngine({ storage, logger, now: FIXED_NOW });
    await reloaded.init();

    expect(reloaded.getModel().snapshot()).toEqual(engine.getModel().snapshot());
    expect(reloaded.getSkillTree().toJSON()).toEqual(engine.getSkillTree().toJSON());
    expect(reloaded.getFocus()).toEqual(engine.getFocus());
    expect(reloaded.getState().totalSessions).toBe(40);
    expect(reloaded.getState().hesitationThresholdMs).toBe(engine.getState().hesitationThresholdMs);
  });

  it("only starts branches that are available", async () => {
    expect(await engine.startBranch("capitals")).toBe(false);
    await expect(engine.startBranch("greek")).rejects.toBeInstanceOf(UnknownBranchError);
  });

  it("starts an available branch and narrows focus to it", async () => {
    await engine.completeSession(typed(LOWERCASE));
    expect(engine.getSkillTree().status("numbers")).toBe("available");

    expect(await engine.startBranch("numbers")).toBe(true);
    expect(storage.profile?.skillTree.numbers).toEqual({ status: "in_progress", currentLevel: 0 });

    engine.setScope({ kind: "branch", branch: "numbers" });
    expect(engine.getFocus().charFocus).toBe("1");
  });

  it("rejects scopes for unknown branches", () => {
    expect(() => engine.setScope({ kind: "branch", branch: "greek" })).toThrow(UnknownBranchError);
  });

  it("recomputes confidence when the target speed changes", async () => {
    await engine.completeSession(typed("eat", 300));
    expect(engine.getSymbolStats().confidence("e")).toBeCloseTo(60000 / 175 / 300, 6);

    await engine.setTargetWpm(60);
    expect(engine.getSymbolStats().confidence("e")).toBeCloseTo(200 / 300, 6);
    expect(storage.profile?.targetWpm).toBe(60);
  });

  it("rejects a non-positive target speed", async () => {
    await expect(engine.setTargetWpm(0)).rejects.toBeInstanceOf(ConfigError);
  });

  it("notifies subscribers until they unsubscribe", async () => {
    const seen: MasteryState[] = [];
    const unsubscribe = engine.subscribe((state) => seen.push({ ...state }));
    expect(seen).toHaveLength(1);

    await engine.completeSession(typed("tan"));
    expect(seen).toHaveLength(2);
    expect(seen[1].totalSessions).toBe(1);

    unsubscribe();
    await engine.completeSession(typed("tan"));
    expect(seen).toHaveLength(2);
  });

  it("reports the transitions a lower target speed causes, once", async () => {
    await engine.completeSession(typed(LOWERCASE, 400));
    expect(engine.getSkillTree().status("lowercase")).toBe("in_progress");

    const changeset = await engine.setTargetWpm(20);
    expect(changeset.newlyCompleted).toEqual(["lowercase"]);
    expect(changeset.newlyAvailable).toEqual(["capitals", "numbers", "prose_punctuation", "whitespace", "code_symbols"]);
    expect(engine.getState().lastChangeset).toBe(changeset);

    const next = await engine.completeSession(typed("tea", 400));
    expect(next.changeset.newlyAvailable).toEqual([]);
    expect(next.changeset.newlyCompleted).toEqual([]);
  });

  it("reports transitions found while loading", async () => {
    await engine.completeSession(typed(LOWERCASE, 400));
    const saved = storage.profile;
    if (!saved) throw new Error("profile was not saved");
    storage.profile = { ...saved, targetWpm: 20 };

    const reloaded = new MasteryEngine({ storage, logger, now: FIXED_NOW });
    const changeset = await reloaded.init();
    expect(changeset.newlyCompleted).toEqual(["lowercase"]);
    expect(reloaded.getState().lastChangeset.newlyAvailable).toHaveLength(5);
  });

  it("advances a newly started branch whose first level is already confident", async () => {
    await engine.completeSession(typed(`${LOWERCASE}.,'`));
    expect(engine.getSkillTree().status("prose_punctuation")).toBe("available");

    await engine.startBranch("prose_punctuation");
    expect(engine.getSkillTree().branchProgress("prose_punctuation")).toEqual({
      status: "in_progress",
      currentLevel: 1,
    });
    expect(storage.profile?.skillTree.prose_punctuation.currentLevel).toBe(1);

    engine.setScope({ kind: "branch", branch: "prose_punctuation" });
    expect(engine.getFocus().charFocus).toBe(";");
  });

  it("drops keystrokes with unusable times", async () => {
    await engine.completeSession([
      { key: "e", timeMs: 200, correct: true },
      { key: "t", timeMs: Number.NaN, correct: true },
      { key: "a", timeMs: -5, correct: true },
      { key: "o", timeMs: Number.POSITIVE_INFINITY, correct: false },
    ]);

    expect(engine.getHistory()[0].keyTimes).toEqual([{ key: "e", timeMs: 200, correct: true }]);
    expect(engine.getSymbolStats().has("t")).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(3);
  });

  it("tracks the daily practice streak", async () => {
    let now = new Date("2026-03-01T09:00:00.000Z");
    const clocked = new MasteryEngine({ storage, logger, now: () => now });
    await clocked.init();

    const streakAfter = async (iso: string) => {
      now = new Date(iso);
      await clocked.completeSession(typed("tea"));
      return clocked.getState().streak.streakDays;
    };

    expect(await streakAfter("2026-03-01T09:00:00.000Z")).toBe(1);
    expect(await streakAfter("2026-03-01T18:00:00.000Z")).toBe(1);
    expect(await streakAfter("2026-03-02T07:00:00.000Z")).toBe(2);
    expect(await streakAfter("2026-03-04T07:00:00.000Z")).toBe(1);

    expect(storage.profile).toMatchObject({ streakDays: 1, bestStreak: 2, lastPracticeDate: "2026-03-04" });

    const reloaded = new MasteryEngine({ storage, logger, now: () => now });
    await reloaded.init();
    expect(reloaded.getState().streak).toEqual({ streakDays: 1, bestStreak: 2, lastPracticeDate: "2026-03-04" });
  });

  it("refuses sessions before init", async () => {
    const fresh = new MasteryEngine({ logger });
    await expect(fresh.completeSession(typed("eat"))).rejects.toThrow("init()");
  });
});
