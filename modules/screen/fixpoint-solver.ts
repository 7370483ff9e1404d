/**
 * Fixpoint solver for screen parameters.
 *
 * Each pass walks the parameters in enumeration order and resolves every
 * unknown one with its first applicable rule. A value resolved earlier in a
 * pass is visible later in the same pass. Solving stops once everything is
 * known or a pass adds nothing. The pass count is bounded by the number of
 * parameters.
 */
import {
  SCREEN_PARAM_ORDER,
  type Ratio,
  type TScreenParamId,
  type ScreenState,
  type ScreenValues,
  type ValueKind,
} from "@shared/screen-params";
import {
  SCREEN_REGISTRY,
  applyRule,
  type DerivationRule,
  type ParameterRegistry,
  type ParameterSpec,
} from "./parameter-registry";

export type Derivation = {
  param: TScreenParamId;
  requires: readonly TScreenParamId[];
  pass: number;
};

export type SolveOptions = {
  registry?: ParameterRegistry;
  onResolve?: (derivation: Derivation) => void;
};

export type SolveResult = {
  state: ScreenState;
  unresolved: TScreenParamId[];
  passes: number;
  derivations: Derivation[];
};

const isRatio = (value: ScreenValues[TScreenParamId]): value is Ratio => typeof value === "object";

const isUsable = (value: ScreenValues[TScreenParamId], kind: ValueKind): boolean => {
  if (isRatio(value)) {
    const { numerator, denominator } = value;
    return numerator > 0 && denominator > 0 && Number.isSafeInteger(numerator) && Number.isSafeInteger(denominator);
  }
  if (kind === "count") return Number.isSafeInteger(value) && value >= 0;
  return Number.isFinite(value);
};

type Applied<T extends TScreenParamId> = {
  value: ScreenValues[T];
  rule: DerivationRule<T>;
};

function applyFirstRule<T extends TScreenParamId>(
  spec: ParameterSpec<T>,
  state: ScreenState,
): Applied<T> | undefined {
  for (const rule of spec.rules) {
    const value = applyRule(rule, state);
    if (value !== undefined && isUsable(value, spec.kind)) {
      return { value, rule };
    }
  }
  return undefined;
}

function resolveParam<T extends TScreenParamId>(
  id: T,
  registry: ParameterRegistry,
  state: ScreenState,
): DerivationRule<T> | undefined {
  const applied = applyFirstRule(registry[id], state);
  if (!applied) return undefined;
  state[id] = applied.value;
  return applied.rule;
}

export function unresolvedParams(state: ScreenState): TScreenParamId[] {
  return SCREEN_PARAM_ORDER.filter((id) => state[id] === undefined);
}

export function solveScreen(initial: ScreenState, options: SolveOptions = {}): SolveResult {
  const registry = options.registry ?? SCREEN_REGISTRY;
  const state: ScreenState = { ...initial };
  const derivations: Derivation[] = [];
  let passes = 0;

  while (unresolvedParams(state).length > 0) {
    passes += 1;
    let progressed = false;
    for (const id of SCREEN_PARAM_ORDER) {
      if (state[id] !== undefined) continue;
      const rule = resolveParam(id, registry, state);
      if (!rule) continue;
      progressed = true;
      const derivation: Derivation = { param: id, requires: rule.requires, pass: passes };
      derivations.push(derivation);
      options.onResolve?.(derivation);
    }
    if (!progressed) break;
  }

  return { state, unresolved: unresolvedParams(state), passes, derivations };
}
