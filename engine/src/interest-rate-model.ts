/**
 * Lending Risk Engine - Interest Rate Model
 *
 * Kinked (jump-rate) curve:
 *
 *   U ≤ kink:  borrowRate = base + slope1 × U / kink
 *   U > kink:  borrowRate = base + slope1 + slope2 × (U − kink) / (1 − kink)
 *
 *   supplyRate = borrowRate × U × (1 − reserveFactor)
 *
 * Curve parameters are annual bps; results are per-second WAD rates.
 */

import { BPS, WAD, SECONDS_PER_YEAR, bpsToWad, mulDiv, wadMul } from "./math";
import type { InterestRateCurve, MarketRates } from "./types";

/** Utilization in WAD. 0 with no supply, capped at 100%. */
export function utilizationRate(totalBorrows: bigint, totalSupply: bigint): bigint {
  if (totalSupply === 0n || totalBorrows === 0n) return 0n;
  const utilization = mulDiv(totalBorrows, WAD, totalSupply);
  return utilization > WAD ? WAD : utilization;
}

/** Annual borrow rate (WAD) at a given utilization. */
export function borrowRateAnnual(curve: InterestRateCurve, utilization: bigint): bigint {
  const base = bpsToWad(curve.baseRateBps);
  const slope1 = bpsToWad(curve.slope1Bps);
  const slope2 = bpsToWad(curve.slope2Bps);
  const kink = bpsToWad(curve.kinkBps);

  if (utilization <= kink) {
    return base + mulDiv(slope1, utilization, kink);
  }
  // kink < U ≤ 1 implies kink < WAD, so the divisor is non-zero
  return base + slope1 + mulDiv(slope2, utilization - kink, WAD - kink);
}

/** Annual supply rate (WAD) at a given utilization. */
export function supplyRateAnnual(curve: InterestRateCurve, utilization: bigint): bigint {
  const borrowRate = borrowRateAnnual(curve, utilization);
  return mulDiv(wadMul(borrowRate, utilization), BPS - curve.reserveFactorBps, BPS);
}

export function getBorrowRate(
  curve: InterestRateCurve,
  totalBorrows: bigint,
  totalSupply: bigint,
): bigint {
  return borrowRateAnnual(curve, utilizationRate(totalBorrows, totalSupply)) / SECONDS_PER_YEAR;
}

export function getSupplyRate(
  curve: InterestRateCurve,
  totalBorrows: bigint,
  totalSupply: bigint,
): bigint {
  return supplyRateAnnual(curve, utilizationRate(totalBorrows, totalSupply)) / SECONDS_PER_YEAR;
}

/** Per-second borrow and supply rates plus the utilization they were priced at. */
export function getRates(
  curve: InterestRateCurve,
  totalBorrows: bigint,
  totalSupply: bigint,
): MarketRates {
  const utilization = utilizationRate(totalBorrows, totalSupply);
  return {
    borrowRate: borrowRateAnnual(curve, utilization) / SECONDS_PER_YEAR,
    supplyRate: supplyRateAnnual(curve, utilization) / SECONDS_PER_YEAR,
    utilization,
  };
}

/** Annual borrow rate in bps, for display and parameter review. */
export function getBorrowRateAnnualBps(
  curve: InterestRateCurve,
  totalBorrows: bigint,
  totalSupply: bigint,
): bigint {
  return (borrowRateAnnual(curve, utilizationRate(totalBorrows, totalSupply)) * BPS) / WAD;
}

/**
 * Split accrued interest between suppliers and reserves.
 * @returns [supplierAmount, reserveAmount]
 */
export function splitInterest(interest: bigint, reserveFactorBps: bigint): [bigint, bigint] {
  const reserveAmount = mulDiv(interest, reserveFactorBps, BPS);
  return [interest - reserveAmount, reserveAmount];
}
