import { CM_PER_INCH } from "@shared/physics-const";
import { formatAspect } from "@shared/screen-units";
import { SCREEN_PARAM_ORDER, type TScreenParamId, type ScreenState } from "@shared/screen-params";
import { SCREEN_REGISTRY, type ParameterRegistry } from "../modules/screen/parameter-registry";
import type { SolveResult } from "../modules/screen/fixpoint-solver";

export type ScreenReportOptions = {
  decimals: number;
  registry?: ParameterRegistry;
};

export type ScreenReportJson = {
  values: Record<string, string | number>;
  unresolved: TScreenParamId[];
};

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const sortedIds = (ids: readonly TScreenParamId[]): TScreenParamId[] => [...ids].sort(byName);

export function formatScreenValue(
  id: TScreenParamId,
  state: ScreenState,
  options: ScreenReportOptions,
): string | undefined {
  const registry = options.registry ?? SCREEN_REGISTRY;
  const d = options.decimals;
  if (id === "aspect") {
    return state.aspect ? formatAspect(state.aspect) : undefined;
  }
  const value = state[id];
  if (value === undefined) return undefined;

  const spec = registry[id];
  if (spec.kind === "count") return String(value);
  switch (spec.unit) {
    case "length":
      return `${value.toFixed(d)} cm (${(value / CM_PER_INCH).toFixed(d)} in)`;
    case "density":
      return `${value.toFixed(d)} dpcm (${(value * CM_PER_INCH).toFixed(d)} dpi)`;
    default:
      return value.toFixed(d);
  }
}

export function renderScreenReport(result: SolveResult, options: ScreenReportOptions): string[] {
  const lines: string[] = [];
  for (const id of sortedIds(SCREEN_PARAM_ORDER)) {
    const text = formatScreenValue(id, result.state, options);
    if (text !== undefined) lines.push(`${id}: ${text}`);
  }
  if (result.unresolved.length > 0) {
    lines.push(`undetermined: ${sortedIds(result.unresolved).join(", ")}`);
  }
  return lines;
}

export function toScreenReportJson(result: SolveResult): ScreenReportJson {
  const values: Record<string, string | number> = {};
  for (const id of sortedIds(SCREEN_PARAM_ORDER)) {
    if (id === "aspect") {
      if (result.state.aspect) values.aspect = formatAspect(result.state.aspect);
      continue;
    }
    const value = result.state[id];
    if (value !== undefined) values[id] = value;
  }
  return { values, unresolved: sortedIds(result.unresolved) };
}
