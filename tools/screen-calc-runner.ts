import { ScreenInputError } from "@shared/screen-errors";
import {
  RawScreenInput,
  SCREEN_PARAM_ORDER,
  isScreenParamId,
  type TRawScreenInput,
  type TScreenParamId,
  type ScreenState,
} from "@shared/screen-params";
import { SCREEN_PARSERS } from "@shared/screen-units";
import { buildParameterRegistry } from "../modules/screen/parameter-registry";
import { solveScreen, type SolveResult } from "../modules/screen/fixpoint-solver";
import { log } from "./log";
import type { ScreenCalcConfig } from "./screen-config";
import { renderScreenReport, toScreenReportJson } from "./screen-report";

export const USAGE =
  "Usage: screen-calc [--aspect W:H] [--density <n>[dpi|dpcm|dpm]] [--distance <n><cm|mm|m|in>] " +
  "[--diagonal <len>] [--height <len>] [--width <len>] [--heightpx <n>] [--widthpx <n>] [--pixels <n>] " +
  "[--json] [--trace] [--help]";

export type ScreenCalcArgs = {
  input: TRawScreenInput;
  json: boolean;
  trace: boolean;
  help: boolean;
};

const SWITCHES = new Set(["json", "trace", "help"]);

/**
 * Accepts `--name value` and `--name=value`. Anything that is not a known
 * flag is rejected; a repeated flag keeps its last value.
 */
export function parseScreenCalcArgs(argv: readonly string[]): ScreenCalcArgs {
  const input: TRawScreenInput = {};
  const parsed: ScreenCalcArgs = { input, json: false, trace: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      throw new ScreenInputError("UnexpectedArgument", `unexpected argument "${token}"`);
    }
    const eq = token.indexOf("=");
    const name = eq >= 0 ? token.slice(2, eq) : token.slice(2);

    if (SWITCHES.has(name) && eq < 0) {
      if (name === "json") parsed.json = true;
      else if (name === "trace") parsed.trace = true;
      else parsed.help = true;
      continue;
    }
    if (!isScreenParamId(name)) {
      throw new ScreenInputError("UnexpectedArgument", `unknown option "${token}"`);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = token.slice(eq + 1);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
      value = argv[i + 1];
      i += 1;
    }
    if (value === undefined || value === "") {
      throw new ScreenInputError("UnexpectedArgument", `option --${name} needs a value`, name);
    }
    input[name] = value;
  }

  return parsed;
}

function parseParam<T extends TScreenParamId>(id: T, raw: string, state: ScreenState): void {
  try {
    state[id] = SCREEN_PARSERS[id](raw);
  } catch (err) {
    if (err instanceof ScreenInputError) throw err.withParam(id);
    throw err;
  }
}

/** Raw strings to typed initial state; the first invalid value aborts. */
export function parseScreenInputs(raw: TRawScreenInput): ScreenState {
  const input = RawScreenInput.parse(raw);
  const state: ScreenState = {};
  for (const id of SCREEN_PARAM_ORDER) {
    const value = input[id];
    if (value !== undefined) parseParam(id, value, state);
  }
  return state;
}

export type ScreenCalcOutcome = {
  result: SolveResult;
  lines: string[];
};

export function runScreenCalc(
  args: Pick<ScreenCalcArgs, "input" | "json" | "trace">,
  config: ScreenCalcConfig,
): ScreenCalcOutcome {
  const initial = parseScreenInputs(args.input);
  const registry = buildParameterRegistry({ maxAspectDenominator: config.maxAspectDenominator });
  const trace = args.trace || config.trace;

  const result = solveScreen(initial, {
    registry,
    onResolve: trace
      ? (d) => log(`pass ${d.pass}: ${d.param} <- ${d.requires.join(", ")}`, "screen-solver")
      : undefined,
  });
  if (trace) {
    log(`stopped after ${result.passes} pass(es), ${result.unresolved.length} unresolved`, "screen-solver");
  }

  const lines = args.json
    ? [JSON.stringify(toScreenReportJson(result), null, 2)]
    : renderScreenReport(result, { decimals: config.reportDecimals, registry });
  return { result, lines };
}
