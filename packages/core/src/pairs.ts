import type { AnomalyKind, KeySymbol, PairAnomaly, PairId, PairOrder, PairStat } from "@keyladder/types";
import {
  INITIAL_TIME_MS,
  NEUTRAL_ERROR_RATE,
  type SymbolStatsStore,
  confidenceFor,
  laplaceRate,
  updateErrorEma,
  updateTimeEma,
} from "./stats";
import { pairIdOf, splitPairId } from "./symbols";

export const STREAK_CAP = 255;
const SIGNAL_CAP = 3;

const PRUNE_WEIGHTS = { recency: 0.3, signal: 0.5, data: 0.2 };

export interface PairThresholds {
  errorAnomalyThreshold: number;
  speedAnomalyThreshold: number;
  streakRequired: number;
  minSamplesForFocus: number;
  minSpeedBaselineSamples: number;
  anomalyFloor: number;
}

export interface PairStatsOptions extends PairThresholds {
  targetTimeMs: number; // per symbol; a pair's target scales with its order
  emaAlpha: number;
}

/**
 * What a pair's behaviour is measured against: its symbols, and for
 * three-symbol pairs also the two-symbol pairs inside it.
 */
export interface AnomalyContext {
  symbols: SymbolStatsStore;
  bigrams?: PairStatsStore;
}

export interface PairObservation {
  timeMs: number;
  correct: boolean;
  hesitation: boolean;
  sessionIndex: number;
}

export function saturatingIncrement(streak: number): number {
  return Math.min(STREAK_CAP, streak + 1);
}

export function createInitialPairStat(symbols: readonly KeySymbol[]): PairStat {
  return {
    id: pairIdOf(symbols),
    symbols: [...symbols],
    filteredTimeMs: INITIAL_TIME_MS,
    bestTimeMs: Number.MAX_VALUE,
    confidence: 0,
    sampleCount: 0,
    errorCount: 0,
    hesitationCount: 0,
    errorRateEma: NEUTRAL_ERROR_RATE,
    errorAnomalyStreak: 0,
    speedAnomalyStreak: 0,
    lastSeenIndex: 0,
  };
}

export function applyPairObservation(
  stat: PairStat,
  observation: PairObservation,
  options: Pick<PairStatsOptions, "targetTimeMs" | "emaAlpha">
): PairStat {
  const newStat = { ...stat, symbols: [...stat.symbols] };
  // A hesitation is an error-like signal even when every key was right.
  const errorSignal = !observation.correct || observation.hesitation;

  newStat.lastSeenIndex = observation.sessionIndex;
  newStat.sampleCount += 1;
  if (errorSignal) newStat.errorCount += 1;
  if (observation.hesitation) newStat.hesitationCount += 1;

  newStat.filteredTimeMs = updateTimeEma(stat.filteredTimeMs, observation.timeMs, newStat.sampleCount, options.emaAlpha);
  newStat.bestTimeMs = Math.min(stat.bestTimeMs, newStat.filteredTimeMs);
  newStat.confidence = confidenceFor(options.targetTimeMs * stat.symbols.length, newStat.filteredTimeMs);
  newStat.errorRateEma = updateErrorEma(stat.errorRateEma, errorSignal ? 1 : 0, newStat.sampleCount, options.emaAlpha);

  return newStat;
}

export class PairStatsStore {
  readonly order: PairOrder;
  private stats = new Map<PairId, PairStat>();
  private options: PairStatsOptions;

  constructor(order: PairOrder, options: PairStatsOptions) {
    this.order = order;
    this.options = { ...options };
  }

  static fromStats(order: PairOrder, options: PairStatsOptions, stats: PairStat[]): PairStatsStore {
    const store = new PairStatsStore(order, options);
    for (const stat of stats) {
      store.assertOrder(stat.symbols);
      store.stats.set(stat.id, { ...stat, symbols: [...stat.symbols] });
    }
    return store;
  }

  get size(): number {
    return this.stats.size;
  }

  update(
    symbols: readonly KeySymbol[],
    timeMs: number,
    correct: boolean,
    hesitation: boolean,
    sessionIndex: number
  ): PairStat {
    this.assertOrder(symbols);
    const id = pairIdOf(symbols);
    const stat = this.stats.get(id) ?? createInitialPairStat(symbols);
    const updated = applyPairObservation(stat, { timeMs, correct, hesitation, sessionIndex }, this.options);
    this.stats.set(id, updated);
    return updated;
  }

  get(id: PairId): Readonly<PairStat> | undefined {
    return this.stats.get(id);
  }

  has(id: PairId): boolean {
    return this.stats.has(id);
  }

  values(): PairStat[] {
    return Array.from(this.stats.values());
  }

  smoothedErrorRate(id: PairId): number {
    return this.stats.get(id)?.errorRateEma ?? NEUTRAL_ERROR_RATE;
  }

  laplaceErrorRate(id: PairId): number {
    const stat = this.stats.get(id);
    return stat ? laplaceRate(stat.errorCount, stat.sampleCount) : laplaceRate(0, 0);
  }

  setTargetTimeMs(targetTimeMs: number) {
    this.options.targetTimeMs = targetTimeMs;
    this.stats.forEach((stat, id) => {
      if (stat.sampleCount > 0) {
        this.stats.set(id, {
          ...stat,
          confidence: confidenceFor(targetTimeMs * stat.symbols.length, stat.filteredTimeMs),
        });
      }
    });
  }

  // ------------------------
  // Error anomaly
  // ------------------------

  /**
   * Error rate the pair would have if it were no harder than its parts:
   * `1 - Π(1 - e_i)` over its symbols, and for three-symbol pairs at least
   * the worse of its two-symbol sub-pairs.
   */
  expectedErrorRate(id: PairId, ctx: AnomalyContext): number {
    const symbols = this.symbolsOf(id);
    const fromSymbols = 1 - symbols.reduce((p, s) => p * (1 - ctx.symbols.smoothedErrorRate(s)), 1);

    if (symbols.length < 3 || !ctx.bigrams) return fromSymbols;

    let fromSubPairs = 0;
    for (let i = 0; i + 2 <= symbols.length; i++) {
      const sub = pairIdOf(symbols.slice(i, i + 2));
      fromSubPairs = Math.max(fromSubPairs, ctx.bigrams.smoothedErrorRate(sub));
    }
    return Math.max(fromSymbols, fromSubPairs);
  }

  errorAnomalyRatio(id: PairId, ctx: AnomalyContext): number {
    const expected = this.expectedErrorRate(id, ctx);
    return this.smoothedErrorRate(id) / Math.max(expected, this.options.anomalyFloor);
  }

  errorAnomalyPercent(id: PairId, ctx: AnomalyContext): number {
    return (this.errorAnomalyRatio(id, ctx) - 1) * 100;
  }

  // ------------------------
  // Speed anomaly
  // ------------------------

  /**
   * Pair transition time relative to typing its non-first symbols on their own.
   * Null means unknown: a baseline symbol has too few samples for its EMA to
   * have moved away from the seed.
   */
  speedAnomalyRatio(id: PairId, ctx: AnomalyContext): number | null {
    const stat = this.stats.get(id);
    if (!stat || stat.sampleCount === 0) return null;

    let baseline = 0;
    for (const symbol of stat.symbols.slice(1)) {
      const symbolStat = ctx.symbols.get(symbol);
      if (!symbolStat || symbolStat.sampleCount < this.options.minSpeedBaselineSamples) {
        return null;
      }
      baseline += symbolStat.filteredTimeMs;
    }

    return stat.filteredTimeMs / Math.max(1, baseline);
  }

  speedAnomalyPercent(id: PairId, ctx: AnomalyContext): number | null {
    const ratio = this.speedAnomalyRatio(id, ctx);
    return ratio === null ? null : (ratio - 1) * 100;
  }

  // ------------------------
  // Stability gating
  // ------------------------

  /**
   * One stability check. Qualifying evaluations grow a streak, disqualifying
   * ones reset it, and an unknown evaluation leaves it where it was.
   */
  updateStreaks(id: PairId, ctx: AnomalyContext) {
    const stat = this.stats.get(id);
    if (!stat) return;

    const errorRatio = this.errorAnomalyRatio(id, ctx);
    const errorAnomalyStreak =
      errorRatio > this.options.errorAnomalyThreshold ? saturatingIncrement(stat.errorAnomalyStreak) : 0;

    const speedRatio = this.speedAnomalyRatio(id, ctx);
    let speedAnomalyStreak = stat.speedAnomalyStreak;
    if (speedRatio !== null) {
      speedAnomalyStreak =
        speedRatio > this.options.speedAnomalyThreshold ? saturatingIncrement(stat.speedAnomalyStreak) : 0;
    }

    this.stats.set(id, { ...stat, errorAnomalyStreak, speedAnomalyStreak });
  }

  /** Anomaly percentage if the pair is confirmed on this axis, otherwise null. */
  confirmedPercent(id: PairId, kind: AnomalyKind, ctx: AnomalyContext): number | null {
    const stat = this.stats.get(id);
    if (!stat || stat.sampleCount < this.options.minSamplesForFocus) return null;

    if (kind === "error") {
      if (stat.errorAnomalyStreak < this.options.streakRequired) return null;
      const ratio = this.errorAnomalyRatio(id, ctx);
      return ratio > this.options.errorAnomalyThreshold ? (ratio - 1) * 100 : null;
    }

    if (stat.speedAnomalyStreak < this.options.streakRequired) return null;
    const ratio = this.speedAnomalyRatio(id, ctx);
    if (ratio === null || ratio <= this.options.speedAnomalyThreshold) return null;
    return (ratio - 1) * 100;
  }

  isConfirmed(id: PairId, kind: AnomalyKind, ctx: AnomalyContext): boolean {
    return this.confirmedPercent(id, kind, ctx) !== null;
  }

  /**
   * Every confirmed anomaly, one per pair: a pair confirmed on both axes keeps
   * the higher percentage, and the error axis on a tie.
   */
  confirmedAnomalies(ctx: AnomalyContext, allowed?: ReadonlySet<KeySymbol>): PairAnomaly[] {
    const anomalies: PairAnomaly[] = [];

    this.stats.forEach((stat, id) => {
      if (allowed && !stat.symbols.every((s) => allowed.has(s))) return;

      const errorPercent = this.confirmedPercent(id, "error", ctx);
      const speedPercent = this.confirmedPercent(id, "speed", ctx);

      if (errorPercent !== null && (speedPercent === null || errorPercent >= speedPercent)) {
        anomalies.push({ id, symbols: [...stat.symbols], kind: "error", anomalyPercent: errorPercent });
      } else if (speedPercent !== null) {
        anomalies.push({ id, symbols: [...stat.symbols], kind: "speed", anomalyPercent: speedPercent });
      }
    });

    return anomalies;
  }

  worstConfirmedAnomaly(ctx: AnomalyContext, allowed?: ReadonlySet<KeySymbol>): PairAnomaly | null {
    let worst: PairAnomaly | null = null;
    for (const anomaly of this.confirmedAnomalies(ctx, allowed)) {
      if (!worst || anomaly.anomalyPercent > worst.anomalyPercent) {
        worst = anomaly;
      }
    }
    return worst;
  }

  // ------------------------
  // Table maintenance
  // ------------------------

  /**
   * Shrinks the table to `maxEntries` by utility, so rare pairs that carry a
   * strong signal outlive frequent unremarkable ones.
   * `totalSessions` must be on the same scale as `lastSeenIndex`.
   * Returns the number of removed entries.
   */
  prune(maxEntries: number, totalSessions: number, ctx: AnomalyContext): number {
    if (this.stats.size <= maxEntries) return 0;

    const scored = Array.from(this.stats.values()).map((stat) => {
      const sessionsSince = Math.max(0, totalSessions - stat.lastSeenIndex);
      const recency = 1 / (sessionsSince + 1);
      const signal = Math.min(this.errorAnomalyRatio(stat.id, ctx), SIGNAL_CAP);
      const data = Math.log1p(stat.sampleCount);
      return {
        id: stat.id,
        utility: PRUNE_WEIGHTS.recency * recency + PRUNE_WEIGHTS.signal * signal + PRUNE_WEIGHTS.data * data,
      };
    });

    scored.sort((a, b) => b.utility - a.utility);
    const keep = new Set(scored.slice(0, maxEntries).map((s) => s.id));

    const before = this.stats.size;
    const kept = new Map<PairId, PairStat>();
    this.stats.forEach((stat, id) => {
      if (keep.has(id)) kept.set(id, stat);
    });
    this.stats = kept;
    return before - kept.size;
  }

  /**
   * Share of well-sampled entries whose error ratio clears the anomaly gate,
   * in [0, 1]. Tells whether tracking this order adds anything over its parts.
   */
  marginalGain(ctx: AnomalyContext): number {
    const qualified = this.values().filter((s) => s.sampleCount >= this.options.minSamplesForFocus);
    if (qualified.length === 0) return 0;

    const withSignal = qualified.filter(
      (s) => this.errorAnomalyRatio(s.id, ctx) > this.options.errorAnomalyThreshold
    ).length;
    return withSignal / qualified.length;
  }

  toJSON(): PairStat[] {
    return this.values().map((stat) => ({ ...stat, symbols: [...stat.symbols] }));
  }

  private symbolsOf(id: PairId): KeySymbol[] {
    return this.stats.get(id)?.symbols ?? splitPairId(id);
  }

  private assertOrder(symbols: readonly KeySymbol[]) {
    if (symbols.length !== this.order) {
      throw new RangeError(`Expected ${this.order} symbols, got ${symbols.length}`);
    }
  }
}
