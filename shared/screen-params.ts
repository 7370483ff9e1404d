import { z } from "zod";

/**
 * Screen parameter contract.
 *
 * The enum order is the solver's enumeration order; it is never re-sorted.
 */
export const ScreenParamId = z.enum([
  "aspect",
  "density",
  "diagonal",
  "distance",
  "height",
  "heightpx",
  "width",
  "widthpx",
  "pixels",
]);
export type TScreenParamId = z.infer<typeof ScreenParamId>;

export const SCREEN_PARAM_ORDER: readonly TScreenParamId[] = ScreenParamId.options;

/** Height-relative over width-relative, both positive integers. */
export type Ratio = {
  numerator: number;
  denominator: number;
};

export type ValueKind = "ratio" | "continuous" | "count";

// Secondary unit family used when reporting a continuous value.
export type ReportUnit = "length" | "density" | "none";

export type ScreenValues = {
  aspect: Ratio;
  density: number; // dots/cm
  diagonal: number; // cm
  distance: number; // cm
  height: number; // cm
  heightpx: number;
  width: number; // cm
  widthpx: number;
  pixels: number;
};

export type ScreenState = Partial<ScreenValues>;

export const RawScreenInput = z
  .object({
    aspect: z.string(),
    density: z.string(),
    diagonal: z.string(),
    distance: z.string(),
    height: z.string(),
    heightpx: z.string(),
    width: z.string(),
    widthpx: z.string(),
    pixels: z.string(),
  })
  .partial()
  .strict();
export type TRawScreenInput = z.infer<typeof RawScreenInput>;

export const ratioToFloat = (ratio: Ratio): number => ratio.numerator / ratio.denominator;

export const isScreenParamId = (value: string): value is TScreenParamId =>
  ScreenParamId.safeParse(value).success;
