import type { KeySymbol, SymbolStat } from "@keyladder/types";

export const NEUTRAL_ERROR_RATE = 0.5; // "unknown, assume moderate risk"
export const INITIAL_TIME_MS = 1000;
export const RECENT_TIMES_LIMIT = 30;

export interface SymbolStatsOptions {
  targetTimeMs: number;
  emaAlpha: number;
}

export function createInitialSymbolStat(): SymbolStat {
  return {
    filteredTimeMs: INITIAL_TIME_MS,
    bestTimeMs: Number.MAX_VALUE,
    confidence: 0,
    sampleCount: 0,
    errorCount: 0,
    totalCount: 0,
    errorRateEma: NEUTRAL_ERROR_RATE,
    recentTimes: [],
  };
}

/**
 * One step of the error-rate EMA shared by symbols and pairs.
 * The first observation replaces the neutral prior outright.
 */
export function updateErrorEma(previous: number, signal: 0 | 1, observations: number, alpha: number): number {
  if (observations <= 1) return signal;
  return alpha * signal + (1 - alpha) * previous;
}

export function updateTimeEma(previous: number, timeMs: number, samples: number, alpha: number): number {
  if (samples <= 1) return timeMs;
  return alpha * timeMs + (1 - alpha) * previous;
}

// Laplace smoothing: strictly inside (0, 1) for any counts.
export function laplaceRate(errors: number, total: number): number {
  return (errors + 1) / (total + 2);
}

export function confidenceFor(targetTimeMs: number, filteredTimeMs: number): number {
  return targetTimeMs / Math.max(1, filteredTimeMs);
}

export function applyCorrectKeystroke(stat: SymbolStat, timeMs: number, options: SymbolStatsOptions): SymbolStat {
  const newStat = { ...stat };
  newStat.sampleCount += 1;
  newStat.totalCount += 1;

  newStat.filteredTimeMs = updateTimeEma(stat.filteredTimeMs, timeMs, newStat.sampleCount, options.emaAlpha);
  newStat.bestTimeMs = Math.min(stat.bestTimeMs, newStat.filteredTimeMs);
  newStat.confidence = confidenceFor(options.targetTimeMs, newStat.filteredTimeMs);

  newStat.recentTimes = [...stat.recentTimes, timeMs].slice(-RECENT_TIMES_LIMIT);
  newStat.errorRateEma = updateErrorEma(stat.errorRateEma, 0, newStat.totalCount, options.emaAlpha);

  return newStat;
}

// A wrong key has no valid keystroke time, so timing and confidence stay put.
export function applyErrorKeystroke(stat: SymbolStat, options: SymbolStatsOptions): SymbolStat {
  const newStat = { ...stat };
  newStat.errorCount += 1;
  newStat.totalCount += 1;
  newStat.errorRateEma = updateErrorEma(stat.errorRateEma, 1, newStat.totalCount, options.emaAlpha);
  return newStat;
}

export class SymbolStatsStore {
  private stats = new Map<KeySymbol, SymbolStat>();
  private options: SymbolStatsOptions;

  constructor(options: SymbolStatsOptions) {
    this.options = { ...options };
  }

  static fromJSON(data: Record<KeySymbol, SymbolStat>, options: SymbolStatsOptions): SymbolStatsStore {
    const store = new SymbolStatsStore(options);
    for (const [symbol, stat] of Object.entries(data)) {
      store.stats.set(symbol, { ...stat, recentTimes: [...stat.recentTimes] });
    }
    store.recomputeConfidence();
    return store;
  }

  get targetTimeMs(): number {
    return this.options.targetTimeMs;
  }

  get size(): number {
    return this.stats.size;
  }

  updateCorrect(symbol: KeySymbol, timeMs: number): SymbolStat {
    const stat = this.stats.get(symbol) ?? createInitialSymbolStat();
    const updated = applyCorrectKeystroke(stat, timeMs, this.options);
    this.stats.set(symbol, updated);
    return updated;
  }

  updateError(symbol: KeySymbol): SymbolStat {
    const stat = this.stats.get(symbol) ?? createInitialSymbolStat();
    const updated = applyErrorKeystroke(stat, this.options);
    this.stats.set(symbol, updated);
    return updated;
  }

  /** Undefined means "never practiced", as opposed to practiced and scoring neutral. */
  get(symbol: KeySymbol): Readonly<SymbolStat> | undefined {
    return this.stats.get(symbol);
  }

  has(symbol: KeySymbol): boolean {
    return this.stats.has(symbol);
  }

  symbols(): KeySymbol[] {
    return Array.from(this.stats.keys());
  }

  confidence(symbol: KeySymbol): number {
    return this.stats.get(symbol)?.confidence ?? 0;
  }

  sampleCount(symbol: KeySymbol): number {
    return this.stats.get(symbol)?.sampleCount ?? 0;
  }

  smoothedErrorRate(symbol: KeySymbol): number {
    return this.stats.get(symbol)?.errorRateEma ?? NEUTRAL_ERROR_RATE;
  }

  laplaceErrorRate(symbol: KeySymbol): number {
    const stat = this.stats.get(symbol);
    return stat ? laplaceRate(stat.errorCount, stat.totalCount) : laplaceRate(0, 0);
  }

  setTargetTimeMs(targetTimeMs: number) {
    this.options.targetTimeMs = targetTimeMs;
    this.recomputeConfidence();
  }

  toJSON(): Record<KeySymbol, SymbolStat> {
    const out: Record<KeySymbol, SymbolStat> = {};
    this.stats.forEach((stat, symbol) => {
      out[symbol] = { ...stat, recentTimes: [...stat.recentTimes] };
    });
    return out;
  }

  private recomputeConfidence() {
    this.stats.forEach((stat, symbol) => {
      if (stat.sampleCount > 0) {
        this.stats.set(symbol, {
          ...stat,
          confidence: confidenceFor(this.options.targetTimeMs, stat.filteredTimeMs),
        });
      }
    });
  }
}
