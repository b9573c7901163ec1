/**
 * Tests for the deterministic decimal math engine.
 *
 * Covers:
 * - parseDecimal / formatDecimal
 * - Rounding modes at ties, for positive and negative values
 * - Arithmetic across different scales
 * - Tolerance comparison at the boundary
 */

import { describe, it, expect } from "vitest";
import {
  parseDecimal,
  formatDecimal,
  rescale,
  roundDecimal,
  padDecimal,
  canonicalDecimal,
  addDecimals,
  subtractDecimals,
  sumDecimals,
  compareDecimals,
  absDecimal,
  negateDecimal,
  isNegativeDecimal,
  isZeroDecimal,
  zeroDecimal,
  exceedsTolerance,
} from "../src/decimal-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseDecimal ────────────────────────────────────────────────────────

describe("parseDecimal", () => {
  it("parses a whole number", () => {
    expect(parseDecimal("100")).toEqual({ units: 100n, scale: 0 });
  });

  it("keeps every fractional digit", () => {
    expect(parseDecimal("-25.0005")).toEqual({ units: -250005n, scale: 4 });
  });

  it("keeps trailing zeros as scale", () => {
    expect(parseDecimal("100.000")).toEqual({ units: 100000n, scale: 3 });
  });

  it("trims surrounding whitespace", () => {
    expect(parseDecimal("  1.5 ")).toEqual({ units: 15n, scale: 1 });
  });

  it("rejects empty string", () => {
    expect(() => parseDecimal("")).toThrow(LedgerError);
  });

  it("rejects exponent notation", () => {
    expect(() => parseDecimal("1e5")).toThrow("Invalid amount format");
  });

  it("rejects a bare decimal point", () => {
    expect(() => parseDecimal("5.")).toThrow(LedgerError);
  });

  it("uses the INVALID_AMOUNT code", () => {
    try {
      parseDecimal("abc");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("INVALID_AMOUNT");
    }
  });
});

// ─── formatDecimal ───────────────────────────────────────────────────────

describe("formatDecimal", () => {
  it("formats whole units", () => {
    expect(formatDecimal({ units: 42n, scale: 0 })).toBe("42");
  });

  it("pads small fractions with leading zeros", () => {
    expect(formatDecimal({ units: -5n, scale: 3 })).toBe("-0.005");
  });

  it("formats zero at scale", () => {
    expect(formatDecimal({ units: 0n, scale: 2 })).toBe("0.00");
  });
});

// ─── rescale / roundDecimal ──────────────────────────────────────────────

describe("roundDecimal", () => {
  it("rounds a tie up under HALF_UP", () => {
    expect(roundDecimal("74.9995", 3, "HALF_UP")).toBe("75.000");
  });

  it("rounds a negative tie away from zero under HALF_UP", () => {
    expect(roundDecimal("-74.9995", 3, "HALF_UP")).toBe("-75.000");
  });

  it("rounds below the tie down under HALF_UP", () => {
    expect(roundDecimal("1.0049", 2, "HALF_UP")).toBe("1.00");
  });

  it("rounds a tie to the even neighbour under HALF_EVEN", () => {
    expect(roundDecimal("2.125", 2, "HALF_EVEN")).toBe("2.12");
    expect(roundDecimal("2.135", 2, "HALF_EVEN")).toBe("2.14");
  });

  it("rounds above the tie away under HALF_EVEN", () => {
    expect(roundDecimal("2.1251", 2, "HALF_EVEN")).toBe("2.13");
  });

  it("truncates toward zero under DOWN", () => {
    expect(roundDecimal("9.999", 2, "DOWN")).toBe("9.99");
    expect(roundDecimal("-9.999", 2, "DOWN")).toBe("-9.99");
  });

  it("extends shorter values with zeros", () => {
    expect(roundDecimal("5", 4, "HALF_UP")).toBe("5.0000");
  });

  it("never produces negative zero", () => {
    expect(roundDecimal("-0.0004", 3, "HALF_UP")).toBe("0.000");
  });

  it("rejects negative decimal places", () => {
    expect(() => rescale(parseDecimal("1"), -1, "HALF_UP")).toThrow(LedgerError);
  });
});

describe("padDecimal", () => {
  it("pads without rounding", () => {
    expect(padDecimal("100", 3)).toBe("100.000");
  });

  it("keeps extra digits", () => {
    expect(padDecimal("1.23456", 2)).toBe("1.23456");
  });
});

describe("canonicalDecimal", () => {
  it("drops leading zeros of the integer part", () => {
    expect(canonicalDecimal("007.50")).toBe("7.50");
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("addDecimals / subtractDecimals", () => {
  it("adds at the larger scale", () => {
    expect(addDecimals("100.000", "-25.0005")).toBe("74.9995");
  });

  it("subtracts across scales", () => {
    expect(subtractDecimals("75.000", "74.9995")).toBe("0.0005");
  });

  it("handles crossing zero", () => {
    expect(subtractDecimals("1.00", "6")).toBe("-5.00");
  });
});

describe("sumDecimals", () => {
  it("returns 0 for an empty list", () => {
    expect(sumDecimals([])).toBe("0");
  });

  it("sums mixed scales exactly", () => {
    expect(sumDecimals(["0.1", "0.2", "0.003"])).toBe("0.303");
  });
});

describe("compareDecimals", () => {
  it("compares values of different scales", () => {
    expect(compareDecimals("1.50", "1.5")).toBe(0);
    expect(compareDecimals("-2", "1.999")).toBe(-1);
    expect(compareDecimals("0.006", "0.005")).toBe(1);
  });
});

describe("sign helpers", () => {
  it("absDecimal removes the sign", () => {
    expect(absDecimal("-3.20")).toBe("3.20");
  });

  it("negateDecimal flips the sign", () => {
    expect(negateDecimal("3.20")).toBe("-3.20");
    expect(negateDecimal("0.00")).toBe("0.00");
  });

  it("isNegativeDecimal / isZeroDecimal", () => {
    expect(isNegativeDecimal("-0.01")).toBe(true);
    expect(isNegativeDecimal("-0.00")).toBe(false);
    expect(isZeroDecimal("0.000")).toBe(true);
  });

  it("zeroDecimal formats at scale", () => {
    expect(zeroDecimal(3)).toBe("0.000");
    expect(zeroDecimal(0)).toBe("0");
  });
});

// ─── Tolerance ───────────────────────────────────────────────────────────

describe("exceedsTolerance", () => {
  it("is false exactly at the tolerance", () => {
    expect(exceedsTolerance("10.005", "10.000", "0.005")).toBe(false);
  });

  it("is true just above the tolerance", () => {
    expect(exceedsTolerance("10.0051", "10.000", "0.005")).toBe(true);
  });

  it("is symmetric", () => {
    expect(exceedsTolerance("10.000", "10.006", "0.005")).toBe(true);
  });
});
