/**
 * Lending Risk Engine - Health Engine
 *
 * healthFactor = Σ collateral × price × collateralFactor / Σ debt × price
 *
 * Price freshness is asymmetric:
 *   - "certify" (borrow, withdraw, public queries): a stale quote fails with
 *     StalePrice, so it can never vouch for a risk-increasing action.
 *   - "flag" (liquidation eligibility): stale quotes are accepted, so stale
 *     data never blocks an action that reduces risk.
 * A missing or non-positive price fails in both modes.
 */

import { MaxUint256 } from "ethers";
import { WAD, bpsMul, toValue, wadDiv, wadMul } from "./math";
import { RiskEngineError, isRiskEngineError } from "./errors";
import type { InterestAccrualIndex } from "./interest-accrual-index";
import type { LedgerView } from "./ledger-state";
import type { RiskParameterStore } from "./risk-parameter-store";
import type {
  AccountPosition,
  HealthPurpose,
  HealthSnapshot,
  MarketState,
  PriceFeed,
  PriceQuote,
} from "./types";

/** Health factor reported for accounts without debt */
export const MAX_HEALTH_FACTOR = MaxUint256;

/** 1.0 — below this an account is liquidatable */
export const HEALTH_FACTOR_ONE = WAD;

export interface HealthEngineConfig {
  /** Quotes older than this are treated as stale */
  maxPriceAgeSeconds: number;
}

export function balancesOf(
  view: LedgerView,
  account: string,
  asset: string,
  market: MarketState,
): AccountPosition {
  const entry = view.getPosition(account, asset);
  return {
    collateralAmount: wadMul(entry.collateralScaled, market.supplyIndex),
    debtAmount: wadMul(entry.debtScaled, market.borrowIndex, "up"),
  };
}

export class HealthEngine {
  constructor(
    private readonly parameters: RiskParameterStore,
    private readonly accrual: InterestAccrualIndex,
    private readonly priceFeed: PriceFeed,
    private readonly config: HealthEngineConfig,
  ) {}

  get maxPriceAgeSeconds(): number {
    return this.config.maxPriceAgeSeconds;
  }

  isStale(quote: PriceQuote, now: number): boolean {
    return quote.isStale || now - quote.timestamp > this.config.maxPriceAgeSeconds;
  }

  /**
   * Fetch a usable price for `asset`.
   * @returns the quote and whether it was stale (only possible for "flag")
   */
  quote(asset: string, now: number, purpose: HealthPurpose): { price: bigint; stale: boolean } {
    let quote: PriceQuote;
    try {
      quote = this.priceFeed.getPrice(asset);
    } catch (err) {
      if (isRiskEngineError(err)) throw err;
      throw new RiskEngineError("PriceUnavailable", `price feed failed for ${asset}`, { asset }, { cause: err });
    }
    if (quote.price <= 0n) {
      throw new RiskEngineError("PriceUnavailable", `non-positive price for ${asset}`, {
        asset,
        price: quote.price,
      });
    }
    const stale = this.isStale(quote, now);
    if (stale && purpose === "certify") {
      throw new RiskEngineError("StalePrice", `price for ${asset} is stale`, {
        asset,
        priceTimestamp: quote.timestamp,
        now,
        maxPriceAgeSeconds: this.config.maxPriceAgeSeconds,
      });
    }
    return { price: quote.price, stale };
  }

  computeHealthSnapshot(
    view: LedgerView,
    account: string,
    now: number,
    purpose: HealthPurpose = "certify",
  ): HealthSnapshot {
    let collateralValue = 0n;
    let adjustedCollateralValue = 0n;
    let liquidationCollateralValue = 0n;
    let debtValue = 0n;
    let usedStalePrice = false;

    for (const asset of view.accountAssets(account)) {
      const market = this.accrual.project(asset, view.getMarket(asset), now);
      const { collateralAmount, debtAmount } = balancesOf(view, account, asset, market);
      if (collateralAmount === 0n && debtAmount === 0n) continue;

      const config = this.parameters.getAsset(asset);
      const { price, stale } = this.quote(asset, now, purpose);
      usedStalePrice = usedStalePrice || stale;

      if (collateralAmount > 0n) {
        const value = toValue(collateralAmount, price, config.decimals);
        collateralValue += value;
        if (config.isCollateral) {
          adjustedCollateralValue += bpsMul(value, config.collateralFactorBps);
          liquidationCollateralValue += bpsMul(value, config.liquidationThresholdBps);
        }
      }
      if (debtAmount > 0n) {
        debtValue += toValue(debtAmount, price, config.decimals, "up");
      }
    }

    return {
      account,
      collateralValue,
      adjustedCollateralValue,
      liquidationCollateralValue,
      debtValue,
      healthFactor: debtValue === 0n ? MAX_HEALTH_FACTOR : wadDiv(adjustedCollateralValue, debtValue),
      usedStalePrice,
    };
  }

  computeHealthFactor(
    view: LedgerView,
    account: string,
    now: number,
    purpose: HealthPurpose = "certify",
  ): bigint {
    return this.computeHealthSnapshot(view, account, now, purpose).healthFactor;
  }

  /** Strictly below 1.0, evaluated with stale prices allowed. */
  isLiquidatable(view: LedgerView, account: string, now: number): boolean {
    return this.computeHealthFactor(view, account, now, "flag") < HEALTH_FACTOR_ONE;
  }

  /** Throws InsufficientCollateral unless the account certifies at ≥ 1.0. */
  assertHealthy(view: LedgerView, account: string, now: number): HealthSnapshot {
    const snapshot = this.computeHealthSnapshot(view, account, now, "certify");
    if (snapshot.healthFactor < HEALTH_FACTOR_ONE) {
      throw new RiskEngineError("InsufficientCollateral", `health factor of ${account} would fall below 1.0`, {
        account,
        healthFactor: snapshot.healthFactor,
      });
    }
    return snapshot;
  }
}
