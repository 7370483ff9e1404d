import { CM_PER_INCH } from "./physics-const";
import { ScreenInputError } from "./screen-errors";
import type { Ratio, TScreenParamId, ScreenValues } from "./screen-params";

/**
 * Unit normalization for user-supplied quantities.
 *
 * Lengths come out in centimeters, densities in dots per centimeter.
 */
export type UnitTable = {
  quantity: string;
  factors: Readonly<Record<string, number>>;
  defaultUnit?: string;
};

export const LENGTH_UNITS: UnitTable = {
  quantity: "length",
  factors: {
    cm: 1,
    mm: 0.1,
    m: 100,
    in: CM_PER_INCH,
  },
};

export const DENSITY_UNITS: UnitTable = {
  quantity: "density",
  factors: {
    dpi: 1 / CM_PER_INCH,
    dpcm: 1,
    dpm: 0.01,
  },
  defaultUnit: "dpi",
};

const QUANTITY_RE = /^([+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)\s*(.*)$/;
const INTEGER_RE = /^\d+$/;
const ASPECT_RE = /^(\d+):(\d+)$/;

export function parseQuantity(raw: string, table: UnitTable): number {
  const text = raw.trim();
  const match = QUANTITY_RE.exec(text);
  if (!match) {
    throw new ScreenInputError("InvalidNumber", `expected a ${table.quantity} with a unit, got "${raw}"`);
  }
  const magnitude = Number(match[1]);
  if (!Number.isFinite(magnitude) || magnitude < 0) {
    throw new ScreenInputError("InvalidNumber", `${table.quantity} must be a non-negative number, got "${raw}"`);
  }

  const suffix = match[2].toLowerCase();
  const unit = suffix || table.defaultUnit;
  if (unit === undefined) {
    throw new ScreenInputError(
      "MissingUnit",
      `"${raw}" needs a unit (one of ${Object.keys(table.factors).join(", ")})`,
    );
  }
  const factor = Object.hasOwn(table.factors, unit) ? table.factors[unit] : undefined;
  if (factor === undefined) {
    throw new ScreenInputError(
      "UnrecognizedUnit",
      `unknown ${table.quantity} unit "${suffix}" (expected one of ${Object.keys(table.factors).join(", ")})`,
    );
  }
  return magnitude * factor;
}

export const parseLength = (raw: string): number => parseQuantity(raw, LENGTH_UNITS);

export const parseDensity = (raw: string): number => parseQuantity(raw, DENSITY_UNITS);

export function parseCount(raw: string): number {
  const text = raw.trim();
  const value = Number(text);
  if (!INTEGER_RE.test(text) || !Number.isSafeInteger(value)) {
    throw new ScreenInputError("InvalidInteger", `expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

/** `W:H` as screens are named (16:9); stored height over width, unreduced. */
export function parseAspect(raw: string): Ratio {
  const match = ASPECT_RE.exec(raw.trim());
  const width = match ? Number(match[1]) : NaN;
  const height = match ? Number(match[2]) : NaN;
  if (!(width > 0) || !(height > 0) || !Number.isSafeInteger(width) || !Number.isSafeInteger(height)) {
    throw new ScreenInputError("InvalidAspectSyntax", `expected an aspect ratio like "16:9", got "${raw}"`);
  }
  return { numerator: height, denominator: width };
}

export const formatAspect = (ratio: Ratio): string => `${ratio.denominator}:${ratio.numerator}`;

export const SCREEN_PARSERS: { readonly [K in TScreenParamId]: (raw: string) => ScreenValues[K] } = {
  aspect: parseAspect,
  density: parseDensity,
  diagonal: parseLength,
  distance: parseLength,
  height: parseLength,
  heightpx: parseCount,
  width: parseLength,
  widthpx: parseCount,
  pixels: parseCount,
};
