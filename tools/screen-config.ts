import { DEFAULT_MAX_ASPECT_DENOMINATOR } from "../modules/screen/parameter-registry";

export type ScreenCalcConfig = {
  maxAspectDenominator: number;
  reportDecimals: number;
  trace: boolean;
};

const DEFAULT_REPORT_DECIMALS = 3;
const MAX_REPORT_DECIMALS = 10;

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const clampPositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

const parseDecimals = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > MAX_REPORT_DECIMALS) {
    return fallback;
  }
  return parsed;
};

export const readScreenCalcConfig = (
  env: Record<string, string | undefined> = typeof process !== "undefined" ? process.env : {},
): ScreenCalcConfig => {
  return {
    maxAspectDenominator: clampPositiveInt(env.SCREEN_ASPECT_MAX_DENOMINATOR, DEFAULT_MAX_ASPECT_DENOMINATOR),
    reportDecimals: parseDecimals(env.SCREEN_REPORT_DECIMALS, DEFAULT_REPORT_DECIMALS),
    trace: flagEnabled(env.SCREEN_SOLVER_TRACE, false),
  };
};
