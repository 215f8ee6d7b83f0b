/**
 * Lending Risk Engine - Interest Accrual Index
 *
 * Per-asset borrow and supply indices that compound interest lazily.
 * Positions store balances divided by the index at the time of the write,
 * so charging interest to every account is a single index update:
 *
 *   borrowIndex' = borrowIndex × (1 + borrowRate × elapsed)
 *   supplyIndex' = supplyIndex × (1 + supplyRate × elapsed)
 *
 * The reserve-factor share of borrow interest is booked to totalReserves.
 */

import { MAX_INDEX, WAD, mulDiv, wadMul } from "./math";
import { RiskEngineError } from "./errors";
import { getRates, splitInterest } from "./interest-rate-model";
import type { Changeset } from "./ledger-state";
import type { RiskParameterStore } from "./risk-parameter-store";
import type { InterestRateCurve, MarketRates, MarketState } from "./types";

export function totalSupplyOf(market: MarketState): bigint {
  return wadMul(market.totalSupplyScaled, market.supplyIndex);
}

export function totalBorrowsOf(market: MarketState): bigint {
  return wadMul(market.totalBorrowScaled, market.borrowIndex, "up");
}

export function ratesOf(curve: InterestRateCurve, market: MarketState): MarketRates {
  return getRates(curve, totalBorrowsOf(market), totalSupplyOf(market));
}

/**
 * Advance a market to `now` without touching any state.
 * Throws AccrualOverflow when an index would leave the uint128 range.
 */
export function accrueMarket(
  asset: string,
  curve: InterestRateCurve,
  market: MarketState,
  now: number,
): MarketState {
  const elapsed = now - market.lastAccrualTimestamp;
  if (elapsed <= 0) return market;

  const dt = BigInt(elapsed);
  const rates = ratesOf(curve, market);
  const borrowFactor = WAD + rates.borrowRate * dt;
  const supplyFactor = WAD + rates.supplyRate * dt;

  const borrowIndex = mulDiv(market.borrowIndex, borrowFactor, WAD);
  const supplyIndex = mulDiv(market.supplyIndex, supplyFactor, WAD);
  if (borrowIndex > MAX_INDEX || supplyIndex > MAX_INDEX) {
    throw new RiskEngineError(
      "AccrualOverflow",
      `index for ${asset} exceeds fixed-point bound after ${elapsed}s`,
      { asset, elapsed, borrowRate: rates.borrowRate, supplyRate: rates.supplyRate },
    );
  }

  const totalBorrows = totalBorrowsOf(market);
  const borrowInterest = mulDiv(totalBorrows, rates.borrowRate * dt, WAD);
  const [, reserveShare] = splitInterest(borrowInterest, curve.reserveFactorBps);

  return {
    ...market,
    borrowIndex,
    supplyIndex,
    totalReserves: market.totalReserves + reserveShare,
    lastAccrualTimestamp: now,
  };
}

export class InterestAccrualIndex {
  constructor(private readonly parameters: RiskParameterStore) {}

  /** Read-only projection used by queries. */
  project(asset: string, market: MarketState, now: number): MarketState {
    return accrueMarket(asset, this.parameters.getAsset(asset).interestRate, market, now);
  }

  /**
   * Bring `asset` up to `now` inside the changeset. Idempotent per timestamp
   * and never moves an index backwards.
   */
  accrue(changeset: Changeset, asset: string, now: number): MarketState {
    const current = changeset.getMarket(asset);
    const next = this.project(asset, current, now);
    if (next !== current) {
      changeset.setMarket(asset, next);
    }
    return next;
  }

  /** Accrue several assets once each, in order. */
  accrueAll(changeset: Changeset, assets: Iterable<string>, now: number): void {
    const seen = new Set<string>();
    for (const asset of assets) {
      if (seen.has(asset)) continue;
      seen.add(asset);
      this.accrue(changeset, asset, now);
    }
  }

  currentRates(asset: string, market: MarketState): MarketRates {
    return ratesOf(this.parameters.getAsset(asset).interestRate, market);
  }
}
