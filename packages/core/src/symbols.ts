import type { KeySymbol, PairId } from "@keyladder/types";

// Sentinel symbols for keys that have no printable character.
// Everything outside this module asks the helpers below instead of matching
// sentinels directly.
export const BACKSPACE: KeySymbol = "\b";
export const TAB: KeySymbol = "\t";
export const ENTER: KeySymbol = "\n";
export const SPACE: KeySymbol = " ";

interface SymbolInfo {
  displayName: string;
  shortLabel: string;
  boundary: boolean; // splits pair windows
  correction: boolean; // never part of a pair window
}

const SPECIAL_SYMBOLS = new Map<KeySymbol, SymbolInfo>([
  [BACKSPACE, { displayName: "Backspace", shortLabel: "Bksp", boundary: false, correction: true }],
  [TAB, { displayName: "Tab", shortLabel: "Tab", boundary: true, correction: false }],
  [ENTER, { displayName: "Enter", shortLabel: "Ent", boundary: true, correction: false }],
  [SPACE, { displayName: "Space", shortLabel: "Spc", boundary: true, correction: false }],
]);

// Key names as reported by input layers (DOM KeyboardEvent.key, terminal key codes).
const KEY_NAME_ALIASES = new Map<string, KeySymbol>([
  ["Backspace", BACKSPACE],
  ["Tab", TAB],
  ["Enter", ENTER],
  ["Return", ENTER],
  ["\r", ENTER],
  ["\r\n", ENTER],
  ["Space", SPACE],
  ["Spacebar", SPACE],
]);

/**
 * Maps a raw key (a character or a key name) to the symbol the stores are keyed by.
 * Returns null for keys that are not practiced symbols (modifiers, arrows, ...).
 */
export function normalizeSymbol(key: string): KeySymbol | null {
  const alias = KEY_NAME_ALIASES.get(key);
  if (alias !== undefined) return alias;
  return Array.from(key).length === 1 ? key : null;
}

export function symbolDisplayName(symbol: KeySymbol): string {
  return SPECIAL_SYMBOLS.get(symbol)?.displayName ?? symbol;
}

export function symbolShortLabel(symbol: KeySymbol): string {
  return SPECIAL_SYMBOLS.get(symbol)?.shortLabel ?? symbol;
}

export function isBoundarySymbol(symbol: KeySymbol): boolean {
  return SPECIAL_SYMBOLS.get(symbol)?.boundary ?? false;
}

export function isCorrectionSymbol(symbol: KeySymbol): boolean {
  return SPECIAL_SYMBOLS.get(symbol)?.correction ?? false;
}

export function pairIdOf(symbols: readonly KeySymbol[]): PairId {
  return symbols.join("");
}

export function splitPairId(id: PairId): KeySymbol[] {
  return Array.from(id);
}

export function pairDisplayName(symbols: readonly KeySymbol[]): string {
  return symbols.map(symbolShortLabel).join(" ");
}
