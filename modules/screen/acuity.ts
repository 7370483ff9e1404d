/**
 * Visual acuity model.
 *
 * A typical eye resolves two points one arc-minute apart. Pixels are spaced
 * diagonally as well as along the axes, so the diagonal pitch (sqrt 2 times the
 * axis pitch) has to fall below that angle. Both directions of the relation
 * share ACUITY_FACTOR so distance -> density -> distance round-trips.
 */
import { ARCMINUTE_RAD } from "@shared/physics-const";

export const PIXEL_ANGLE_RAD = ARCMINUTE_RAD;

// cm * dots/cm; divide by one to get the other.
export const ACUITY_FACTOR = Math.SQRT2 / Math.tan(PIXEL_ANGLE_RAD);

/** Farthest distance (cm) at which a density (dots/cm) is still resolvable. */
export function distanceForDensity(densityDpcm: number): number {
  return ACUITY_FACTOR / densityDpcm;
}

/** Highest density (dots/cm) the eye resolves from a distance (cm). */
export function densityForDistance(distanceCm: number): number {
  return ACUITY_FACTOR / distanceCm;
}
