import type { DrillScope, FocusSelection, FocusTarget } from "@keyladder/types";
import type { PairStatsStore } from "./pairs";
import type { SkillTree } from "./progression";
import type { SymbolStatsStore } from "./stats";

/**
 * Computes the weakest unlocked symbol and the worst confirmed pair anomaly
 * for the scope, independently. Pairs are only considered when every one of
 * their symbols is unlocked in the scope. `subPairs` is the two-symbol store
 * when `pairStats` holds three-symbol pairs.
 */
export function selectFocus(
  skillTree: SkillTree,
  scope: DrillScope,
  symbolStats: SymbolStatsStore,
  pairStats: PairStatsStore,
  subPairs?: PairStatsStore
): FocusSelection {
  const unlocked = new Set(skillTree.unlockedSymbols(scope));

  return {
    charFocus: skillTree.focusedSymbol(scope, symbolStats),
    pairFocus: pairStats.worstConfirmedAnomaly({ symbols: symbolStats, bigrams: subPairs }, unlocked),
  };
}

/**
 * The single target for consumers that can only bias toward one thing.
 * A confirmed pair anomaly always wins: it already survived the multi-session
 * gate, and anomaly percentages and confidences are not comparable numbers.
 */
export function primaryFocus(selection: FocusSelection): FocusTarget | null {
  if (selection.pairFocus) {
    return { kind: "pair", id: selection.pairFocus.id, symbols: [...selection.pairFocus.symbols] };
  }
  if (selection.charFocus !== null) {
    return { kind: "char", symbol: selection.charFocus };
  }
  return null;
}

export function sameFocus(a: FocusSelection, b: FocusSelection): boolean {
  return a.charFocus === b.charFocus && a.pairFocus?.id === b.pairFocus?.id && a.pairFocus?.kind === b.pairFocus?.kind;
}
