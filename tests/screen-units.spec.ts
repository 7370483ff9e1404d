import { describe, expect, it } from "vitest";
import { ScreenInputError } from "@shared/screen-errors";
import {
  DENSITY_UNITS,
  LENGTH_UNITS,
  SCREEN_PARSERS,
  formatAspect,
  parseAspect,
  parseCount,
  parseDensity,
  parseLength,
  parseQuantity,
} from "@shared/screen-units";

const codeOf = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (err) {
    return err instanceof ScreenInputError ? err.code : "not-a-screen-input-error";
  }
  return undefined;
};

describe("screen-units: lengths", () => {
  it("normalizes every length unit to centimeters", () => {
    expect(parseLength("10cm")).toBe(10);
    expect(parseLength("100mm")).toBeCloseTo(10, 10);
    expect(parseLength("0.1m")).toBeCloseTo(10, 10);
    expect(parseLength("1m")).toBe(100);
    expect(parseLength("3.937in")).toBeCloseTo(10, 4);
  });

  it("converts inches exactly at 2.54 cm", () => {
    expect(parseLength("55in")).toBeCloseTo(139.7, 10);
  });

  it("accepts whitespace, decimals without a leading digit and exponents", () => {
    expect(parseLength(" 12.5 cm ")).toBe(12.5);
    expect(parseLength(".5m")).toBe(50);
    expect(parseLength("1e1cm")).toBe(10);
  });

  it("matches unit suffixes case-insensitively", () => {
    expect(parseLength("2IN")).toBeCloseTo(5.08, 10);
  });

  it("requires a unit because lengths have no default", () => {
    expect(codeOf(() => parseLength("10"))).toBe("MissingUnit");
  });

  it("rejects unknown units", () => {
    expect(codeOf(() => parseLength("10ft"))).toBe("UnrecognizedUnit");
  });

  it("rejects malformed or negative numbers", () => {
    expect(codeOf(() => parseLength("cm"))).toBe("InvalidNumber");
    expect(codeOf(() => parseLength("-3cm"))).toBe("InvalidNumber");
    expect(codeOf(() => parseLength(""))).toBe("InvalidNumber");
  });
});

describe("screen-units: density", () => {
  it("defaults to dots per inch", () => {
    expect(parseDensity("254")).toBeCloseTo(100, 10);
    expect(parseDensity("254dpi")).toBeCloseTo(100, 10);
  });

  it("normalizes dpcm and dpm", () => {
    expect(parseDensity("40dpcm")).toBe(40);
    expect(parseDensity("4000dpm")).toBe(40);
  });

  it("rejects unknown density units", () => {
    expect(codeOf(() => parseDensity("300xyz"))).toBe("UnrecognizedUnit");
  });

  it("names the accepted units in the error message", () => {
    expect(() => parseDensity("300ppx")).toThrow(
      'unknown density unit "ppx" (expected one of dpi, dpcm, dpm)',
    );
  });
});

describe("screen-units: generic quantity tables", () => {
  it("uses the table's default unit only when no suffix is given", () => {
    const table = { quantity: "weight", factors: { g: 1, kg: 1000 }, defaultUnit: "kg" };
    expect(parseQuantity("2", table)).toBe(2000);
    expect(parseQuantity("2g", table)).toBe(2);
  });

  it("keeps the declared tables", () => {
    expect(LENGTH_UNITS.defaultUnit).toBeUndefined();
    expect(DENSITY_UNITS.defaultUnit).toBe("dpi");
  });
});

describe("screen-units: counts and aspect", () => {
  it("parses non-negative integers", () => {
    expect(parseCount("1920")).toBe(1920);
    expect(parseCount(" 0 ")).toBe(0);
  });

  it("rejects fractional, signed and non-numeric counts", () => {
    expect(codeOf(() => parseCount("19.5"))).toBe("InvalidInteger");
    expect(codeOf(() => parseCount("-4"))).toBe("InvalidInteger");
    expect(codeOf(() => parseCount("1e3"))).toBe("InvalidInteger");
    expect(codeOf(() => parseCount("99999999999999999999"))).toBe("InvalidInteger");
  });

  it("reads W:H into height over width without reducing", () => {
    expect(parseAspect("16:9")).toEqual({ numerator: 9, denominator: 16 });
    expect(parseAspect("32:18")).toEqual({ numerator: 18, denominator: 32 });
  });

  it("rejects malformed aspect ratios", () => {
    for (const raw of ["16/9", "16:", ":9", "16:0", "1.5:1", "a:b"]) {
      expect(codeOf(() => parseAspect(raw))).toBe("InvalidAspectSyntax");
    }
  });

  it("formats a ratio back as W:H", () => {
    expect(formatAspect({ numerator: 9, denominator: 16 })).toBe("16:9");
  });

  it("exposes one parser per parameter", () => {
    expect(SCREEN_PARSERS.aspect("4:3")).toEqual({ numerator: 3, denominator: 4 });
    expect(SCREEN_PARSERS.distance("2m")).toBe(200);
    expect(SCREEN_PARSERS.pixels("2073600")).toBe(2073600);
    expect(codeOf(() => SCREEN_PARSERS.height("10"))).toBe("MissingUnit");
  });
});
