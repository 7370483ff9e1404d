import type { Ratio } from "./screen-params";

export type BigFraction = {
  n: bigint;
  d: bigint;
};

const absBig = (value: bigint): bigint => (value < 0n ? -value : value);

export const gcdBig = (a: bigint, b: bigint): bigint => {
  let x = absBig(a);
  let y = absBig(b);
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
};

/**
 * Exact value of a finite double as a fraction with a power-of-two
 * denominator. Doubling is exact in binary floating point, so the loop ends
 * with an integer-valued double that converts to bigint without loss.
 */
export function exactFraction(value: number): BigFraction {
  if (!Number.isFinite(value)) {
    throw new RangeError(`cannot represent ${value} as a fraction`);
  }
  let scaled = value;
  let d = 1n;
  while (!Number.isInteger(scaled)) {
    scaled *= 2;
    d *= 2n;
  }
  return reduce({ n: BigInt(scaled), d });
}

export function reduce(f: BigFraction): BigFraction {
  if (f.d === 0n) {
    throw new RangeError("zero denominator");
  }
  const sign = f.d < 0n ? -1n : 1n;
  const g = gcdBig(f.n, f.d);
  if (g === 0n) return { n: 0n, d: 1n };
  return { n: (sign * f.n) / g, d: (sign * f.d) / g };
}

/**
 * Closest fraction to `f` whose denominator does not exceed `maxDenominator`.
 *
 * Walks the continued-fraction convergents of f until the next one would
 * overflow the bound, then compares the last convergent with the best
 * semiconvergent below the bound. A tie keeps the convergent.
 */
export function limitDenominator(f: BigFraction, maxDenominator: bigint): BigFraction {
  if (maxDenominator < 1n) {
    throw new RangeError("maxDenominator must be at least 1");
  }
  const target = reduce(f);
  if (target.d <= maxDenominator) return target;

  const negative = target.n < 0n;
  const num = absBig(target.n);
  const den = target.d;

  let p0 = 0n;
  let q0 = 1n;
  let p1 = 1n;
  let q1 = 0n;
  let n = num;
  let d = den;
  for (;;) {
    const a = n / d;
    const q2 = q0 + a * q1;
    if (q2 > maxDenominator) break;
    [p0, q0, p1, q1] = [p1, q1, p0 + a * p1, q2];
    [n, d] = [d, n - a * d];
  }

  const k = (maxDenominator - q0) / q1;
  const semi: BigFraction = { n: p0 + k * p1, d: q0 + k * q1 };
  const convergent: BigFraction = { n: p1, d: q1 };

  // |p/q - num/den| compared without division: |p*den - num*q| / (q*den).
  const errSemi = absBig(semi.n * den - num * semi.d) * convergent.d;
  const errConvergent = absBig(convergent.n * den - num * convergent.d) * semi.d;
  const best = errConvergent <= errSemi ? convergent : semi;
  return reduce({ n: negative ? -best.n : best.n, d: best.d });
}

/**
 * Nearest height:width ratio with a bounded denominator. Returns undefined when
 * either side is not a positive finite number.
 */
export function approximateRatio(
  height: number,
  width: number,
  maxDenominator: number,
): Ratio | undefined {
  if (!(height > 0) || !(width > 0) || !Number.isFinite(height) || !Number.isFinite(width)) {
    return undefined;
  }
  const h = exactFraction(height);
  const w = exactFraction(width);
  const quotient = reduce({ n: h.n * w.d, d: h.d * w.n });
  const limited = limitDenominator(quotient, BigInt(Math.max(1, Math.floor(maxDenominator))));
  if (limited.n <= 0n) return undefined;
  return { numerator: Number(limited.n), denominator: Number(limited.d) };
}

/** Round to the nearest integer; exact halves go to the even neighbour. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}
