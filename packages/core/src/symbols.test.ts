import { describe, expect, it } from "vitest";
import {
  isBoundarySymbol,
  isCorrectionSymbol,
  normalizeSymbol,
  pairDisplayName,
  pairIdOf,
  splitPairId,
  symbolDisplayName,
} from "./symbols";

describe("normalizeSymbol", () => {
  it("maps key names to their symbols", () => {
    expect(normalizeSymbol("Backspace")).toBe("\b");
    expect(normalizeSymbol("Return")).toBe("\n");
    expect(normalizeSymbol("Tab")).toBe("\t");
  });

  it("passes single characters through", () => {
    expect(normalizeSymbol("a")).toBe("a");
    expect(normalizeSymbol("é")).toBe("é");
  });

  it("rejects keys that are not symbols", () => {
    expect(normalizeSymbol("Shift")).toBeNull();
    expect(normalizeSymbol("ArrowLeft")).toBeNull();
    expect(normalizeSymbol("")).toBeNull();
  });
});

describe("symbol classes", () => {
  it("treats whitespace as a boundary and Backspace as a correction", () => {
    expect([" ", "\t", "\n"].every(isBoundarySymbol)).toBe(true);
    expect(isBoundarySymbol("\b")).toBe(false);
    expect(isCorrectionSymbol("\b")).toBe(true);
    expect(isCorrectionSymbol("a")).toBe(false);
  });
});

describe("pair ids", () => {
  it("joins and splits symbols", () => {
    expect(pairIdOf(["t", "h", "e"])).toBe("the");
    expect(splitPairId("th")).toEqual(["t", "h"]);
  });

  it("names sentinels readably", () => {
    expect(symbolDisplayName("\t")).toBe("Tab");
    expect(pairDisplayName([" ", "\n"])).toBe("Spc Ent");
    expect(pairDisplayName(["o", "f"])).toBe("o f");
  });
});
