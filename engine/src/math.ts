/**
 * Lending Risk Engine - Fixed-Point Math
 *
 * Pure bigint helpers for the WAD (1e18) and BPS (1e4) scales used by every
 * component. No external dependencies.
 */

/** Basis points denominator */
export const BPS = 10_000n;

/** 1.0 in 18-decimal fixed point */
export const WAD = 10n ** 18n;

/** Seconds per year (365.25 days) */
export const SECONDS_PER_YEAR = 31_557_600n;

/** Indices are stored as uint128 */
export const MAX_INDEX = 2n ** 128n - 1n;

export type Rounding = "down" | "up";

/**
 * `a * b / denominator` with explicit rounding.
 * Operands are expected to be non-negative.
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denominator: bigint,
  rounding: Rounding = "down",
): bigint {
  if (denominator === 0n) {
    throw new RangeError("mulDiv: division by zero");
  }
  const product = a * b;
  const quotient = product / denominator;
  if (rounding === "up" && product % denominator !== 0n) {
    return quotient + 1n;
  }
  return quotient;
}

export function wadMul(a: bigint, b: bigint, rounding: Rounding = "down"): bigint {
  return mulDiv(a, b, WAD, rounding);
}

export function wadDiv(a: bigint, b: bigint, rounding: Rounding = "down"): bigint {
  return mulDiv(a, WAD, b, rounding);
}

export function bpsMul(amount: bigint, bps: bigint, rounding: Rounding = "down"): bigint {
  return mulDiv(amount, bps, BPS, rounding);
}

export function bpsToWad(bps: bigint): bigint {
  return (bps * WAD) / BPS;
}

/** Annual rate in bps → per-second rate in WAD. */
export function annualBpsToPerSecond(bps: bigint): bigint {
  return (bps * WAD) / (BPS * SECONDS_PER_YEAR);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * USD value (WAD) of a token amount.
 * @param amount   Amount in the token's smallest unit
 * @param price    USD per whole token (WAD)
 * @param decimals Token decimals
 */
export function toValue(
  amount: bigint,
  price: bigint,
  decimals: number,
  rounding: Rounding = "down",
): bigint {
  return mulDiv(amount, price, 10n ** BigInt(decimals), rounding);
}

/** Inverse of {@link toValue}: token amount worth `value` USD. */
export function fromValue(
  value: bigint,
  price: bigint,
  decimals: number,
  rounding: Rounding = "down",
): bigint {
  return mulDiv(value, 10n ** BigInt(decimals), price, rounding);
}
