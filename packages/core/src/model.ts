import type { KeySymbol, KeyTime, PairEvent, PairStat, SessionRecord, SymbolStat } from "@keyladder/types";
import { DEFAULT_CONFIG, type EngineConfig, targetTimeMs } from "./config";
import { type AnomalyContext, type PairStatsOptions, PairStatsStore } from "./pairs";
import { extractPairEvents, hesitationThreshold, median } from "./patterns";
import { SymbolStatsStore } from "./stats";
import { isCorrectionSymbol, pairIdOf } from "./symbols";

export interface SessionApplication {
  sessionIndex: number;
  hesitationThresholdMs: number;
  bigramEvents: PairEvent[];
  trigramEvents: PairEvent[];
  prunedTrigrams: number;
}

export interface PracticeModelSnapshot {
  sessionsApplied: number;
  symbols: Record<KeySymbol, SymbolStat>;
  bigrams: PairStat[];
  trigrams: PairStat[];
}

function pairOptions(config: EngineConfig): PairStatsOptions {
  return {
    targetTimeMs: targetTimeMs(config),
    emaAlpha: config.emaAlpha,
    errorAnomalyThreshold: config.errorAnomalyThreshold,
    speedAnomalyThreshold: config.speedAnomalyThreshold,
    streakRequired: config.streakRequired,
    minSamplesForFocus: config.minSamplesForFocus,
    minSpeedBaselineSamples: config.minSpeedBaselineSamples,
    anomalyFloor: config.anomalyFloor,
  };
}

/**
 * All derived statistics, and the one update path that produces them.
 * The live session-end path and startup replay both go through
 * `applySession`, so replaying the history from empty reproduces the live
 * values exactly.
 */
export class PracticeModel {
  readonly bigrams: PairStatsStore;
  readonly trigrams: PairStatsStore;
  private symbolStats: SymbolStatsStore;
  private config: EngineConfig;
  private recentTransitionTimes: number[][] = [];
  private sessionCount = 0;

  constructor(config: EngineConfig = DEFAULT_CONFIG) {
    this.config = config;
    this.symbolStats = new SymbolStatsStore({ targetTimeMs: targetTimeMs(config), emaAlpha: config.emaAlpha });
    this.bigrams = new PairStatsStore(2, pairOptions(config));
    this.trigrams = new PairStatsStore(3, pairOptions(config));
  }

  get symbols(): SymbolStatsStore {
    return this.symbolStats;
  }

  get sessionsApplied(): number {
    return this.sessionCount;
  }

  /** Replaces the symbol store, e.g. with the persisted one after a replay. */
  adoptSymbolStats(store: SymbolStatsStore) {
    store.setTargetTimeMs(targetTimeMs(this.config));
    this.symbolStats = store;
  }

  bigramContext(): AnomalyContext {
    return { symbols: this.symbolStats };
  }

  trigramContext(): AnomalyContext {
    return { symbols: this.symbolStats, bigrams: this.bigrams };
  }

  setTargetWpm(targetWpm: number) {
    this.config = { ...this.config, targetWpm };
    const ms = targetTimeMs(this.config);
    this.symbolStats.setTargetTimeMs(ms);
    this.bigrams.setTargetTimeMs(ms);
    this.trigrams.setTargetTimeMs(ms);
  }

  currentHesitationThreshold(): number {
    return hesitationThreshold(
      median(this.recentTransitionTimes.flat()),
      this.config.hesitationFloorMs,
      this.config.hesitationMultiplier
    );
  }

  applySession(keyTimes: readonly KeyTime[]): SessionApplication {
    const sessionIndex = this.sessionCount;

    // 1. Per-symbol stats, corrections included as their own key
    for (const kt of keyTimes) {
      if (kt.correct) {
        this.symbolStats.updateCorrect(kt.key, kt.timeMs);
      } else {
        this.symbolStats.updateError(kt.key);
      }
    }

    // 2. Rolling baseline for the hesitation threshold
    const transitions = keyTimes.filter((kt) => kt.correct && !isCorrectionSymbol(kt.key)).map((kt) => kt.timeMs);
    this.recentTransitionTimes.push(transitions);
    if (this.recentTransitionTimes.length > this.config.medianWindowSessions) {
      this.recentTransitionTimes.shift();
    }
    const hesitationThresholdMs = this.currentHesitationThreshold();

    // 3. Pair observations
    const { bigrams, trigrams } = extractPairEvents([...keyTimes], hesitationThresholdMs);
    for (const ev of bigrams) {
      this.bigrams.update(ev.symbols, ev.totalTimeMs, ev.correct, ev.hesitation, sessionIndex);
    }
    for (const ev of trigrams) {
      this.trigrams.update(ev.symbols, ev.totalTimeMs, ev.correct, ev.hesitation, sessionIndex);
    }

    // 4. One stability check per pair seen this session, against the refreshed symbols
    const bigramCtx = this.bigramContext();
    new Set(bigrams.map((ev) => pairIdOf(ev.symbols))).forEach((id) => this.bigrams.updateStreaks(id, bigramCtx));
    const trigramCtx = this.trigramContext();
    new Set(trigrams.map((ev) => pairIdOf(ev.symbols))).forEach((id) => this.trigrams.updateStreaks(id, trigramCtx));

    // 5. Bound the three-symbol table
    this.sessionCount += 1;
    const prunedTrigrams = this.trigrams.prune(this.config.maxTrigramEntries, this.sessionCount, trigramCtx);

    return { sessionIndex, hesitationThresholdMs, bigramEvents: bigrams, trigramEvents: trigrams, prunedTrigrams };
  }

  snapshot(): PracticeModelSnapshot {
    return {
      sessionsApplied: this.sessionCount,
      symbols: this.symbolStats.toJSON(),
      bigrams: this.bigrams.toJSON(),
      trigrams: this.trigrams.toJSON(),
    };
  }
}

/** Rebuilds every statistic from an empty state by replaying the session log in order. */
export function replayHistory(history: readonly SessionRecord[], config: EngineConfig = DEFAULT_CONFIG): PracticeModel {
  const model = new PracticeModel(config);
  for (const session of history) {
    model.applySession(session.keyTimes);
  }
  return model;
}
