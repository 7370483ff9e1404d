/**
 * Parameter registry for the screen solver.
 *
 * One entry per parameter: its value kind, the unit family the reporter uses,
 * and its derivation rules in the order the solver tries them. The first rule
 * whose prerequisites are all known wins, so reordering a list changes results.
 */
import { approximateRatio, roundHalfEven } from "@shared/rational";
import {
  ratioToFloat,
  type ReportUnit,
  type TScreenParamId,
  type ScreenState,
  type ScreenValues,
  type ValueKind,
} from "@shared/screen-params";
import { densityForDistance, distanceForDensity } from "./acuity";

export const DEFAULT_MAX_ASPECT_DENOMINATOR = 100;

/**
 * `derive` sees only the prerequisites named in `requires`. Returning
 * undefined means the rule does not apply to these particular values (a zero
 * divisor, a negative radicand) and the solver moves on to the next rule.
 */
export interface DerivationRule<T extends TScreenParamId, K extends TScreenParamId = TScreenParamId> {
  requires: readonly K[];
  derive: (known: Pick<ScreenValues, K>) => ScreenValues[T] | undefined;
}

export interface ParameterSpec<T extends TScreenParamId> {
  id: T;
  kind: ValueKind;
  unit: ReportUnit;
  rules: readonly DerivationRule<T>[];
}

export type ParameterRegistry = { readonly [T in TScreenParamId]: ParameterSpec<T> };

export type RegistryOptions = {
  maxAspectDenominator?: number;
};

const hasAll = <K extends TScreenParamId>(
  state: ScreenState,
  keys: readonly K[],
): state is ScreenState & Pick<ScreenValues, K> => keys.every((key) => state[key] !== undefined);

/** Runs a rule against a partial state; undefined when a prerequisite is missing. */
export function applyRule<T extends TScreenParamId>(
  rule: DerivationRule<T>,
  state: ScreenState,
): ScreenValues[T] | undefined {
  if (!hasAll(state, rule.requires)) return undefined;
  return rule.derive(state);
}

const rule = <K extends TScreenParamId, V>(
  requires: readonly K[],
  derive: (known: Pick<ScreenValues, K>) => V | undefined,
) => ({ requires, derive });

const nonNegativeRoot = (square: number): number | undefined =>
  square >= 0 ? Math.sqrt(square) : undefined;

const intDiv = (total: number, divisor: number): number | undefined =>
  divisor > 0 ? Math.floor(total / divisor) : undefined;

export function buildParameterRegistry(options: RegistryOptions = {}): ParameterRegistry {
  const maxDen = options.maxAspectDenominator ?? DEFAULT_MAX_ASPECT_DENOMINATOR;

  return {
    aspect: {
      id: "aspect",
      kind: "ratio",
      unit: "none",
      rules: [
        rule(["height", "width"], ({ height, width }) => approximateRatio(height, width, maxDen)),
        rule(["heightpx", "widthpx"], ({ heightpx, widthpx }) =>
          approximateRatio(heightpx, widthpx, maxDen),
        ),
      ],
    },
    density: {
      id: "density",
      kind: "continuous",
      unit: "density",
      rules: [
        rule(["distance"], ({ distance }) => densityForDistance(distance)),
        rule(["height", "heightpx"], ({ height, heightpx }) => heightpx / height),
        rule(["width", "widthpx"], ({ width, widthpx }) => widthpx / width),
      ],
    },
    diagonal: {
      id: "diagonal",
      kind: "continuous",
      unit: "length",
      rules: [
        rule(["aspect", "height"], ({ aspect, height }) =>
          (height / aspect.numerator) * Math.hypot(aspect.numerator, aspect.denominator),
        ),
        rule(["aspect", "width"], ({ aspect, width }) =>
          (width / aspect.denominator) * Math.hypot(aspect.numerator, aspect.denominator),
        ),
        rule(["height", "width"], ({ height, width }) => Math.hypot(height, width)),
      ],
    },
    distance: {
      id: "distance",
      kind: "continuous",
      unit: "length",
      rules: [rule(["density"], ({ density }) => distanceForDensity(density))],
    },
    height: {
      id: "height",
      kind: "continuous",
      unit: "length",
      rules: [
        rule(["aspect", "diagonal"], ({ aspect, diagonal }) =>
          (diagonal / Math.hypot(aspect.numerator, aspect.denominator)) * aspect.numerator,
        ),
        rule(["aspect", "width"], ({ aspect, width }) => (width / aspect.denominator) * aspect.numerator),
        rule(["density", "heightpx"], ({ density, heightpx }) => heightpx / density),
        rule(["diagonal", "width"], ({ diagonal, width }) => nonNegativeRoot(diagonal ** 2 - width ** 2)),
      ],
    },
    heightpx: {
      id: "heightpx",
      kind: "count",
      unit: "none",
      rules: [
        rule(["aspect", "pixels"], ({ aspect, pixels }) =>
          roundHalfEven(Math.sqrt(pixels * ratioToFloat(aspect))),
        ),
        rule(["aspect", "widthpx"], ({ aspect, widthpx }) =>
          roundHalfEven((widthpx / aspect.denominator) * aspect.numerator),
        ),
        rule(["density", "height"], ({ density, height }) => Math.floor(height * density)),
        rule(["pixels", "widthpx"], ({ pixels, widthpx }) => intDiv(pixels, widthpx)),
      ],
    },
    width: {
      id: "width",
      kind: "continuous",
      unit: "length",
      rules: [
        rule(["aspect", "diagonal"], ({ aspect, diagonal }) =>
          (diagonal / Math.hypot(aspect.numerator, aspect.denominator)) * aspect.denominator,
        ),
        rule(["aspect", "height"], ({ aspect, height }) => (height / aspect.numerator) * aspect.denominator),
        rule(["density", "widthpx"], ({ density, widthpx }) => widthpx / density),
        rule(["diagonal", "height"], ({ diagonal, height }) => nonNegativeRoot(diagonal ** 2 - height ** 2)),
      ],
    },
    widthpx: {
      id: "widthpx",
      kind: "count",
      unit: "none",
      rules: [
        rule(["aspect", "pixels"], ({ aspect, pixels }) =>
          roundHalfEven(Math.sqrt(pixels / ratioToFloat(aspect))),
        ),
        rule(["aspect", "heightpx"], ({ aspect, heightpx }) =>
          roundHalfEven((heightpx / aspect.numerator) * aspect.denominator),
        ),
        rule(["density", "width"], ({ density, width }) => Math.floor(width * density)),
        rule(["pixels", "heightpx"], ({ pixels, heightpx }) => intDiv(pixels, heightpx)),
      ],
    },
    pixels: {
      id: "pixels",
      kind: "count",
      unit: "none",
      rules: [rule(["heightpx", "widthpx"], ({ heightpx, widthpx }) => heightpx * widthpx)],
    },
  };
}

export const SCREEN_REGISTRY: ParameterRegistry = buildParameterRegistry();
