/**
 * Physical constants (shared).
 *
 * Canonical units for screen geometry: length in centimeters, pixel density in
 * dots per centimeter. Every layer converts through these values.
 */

// Centimeters per inch (exact by definition).
export const CM_PER_INCH = 2.54;

// One arc-minute in radians.
export const ARCMINUTE_RAD = Math.PI / (180 * 60);
