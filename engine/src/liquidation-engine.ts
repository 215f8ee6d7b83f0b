/**
 * Lending Risk Engine - Liquidation Engine
 *
 * Repays part of an unhealthy account's debt on behalf of a liquidator and
 * hands the liquidator collateral worth the repaid value plus the seize
 * asset's incentive.
 *
 *   seizeAmount = repayAmount × price(repay) / price(seize) × (1 + incentive)
 *
 * Bounds:
 *   - repayAmount ≤ closeFactor × debt(repayAsset)
 *   - closeFactor is 100% once the health factor is below
 *     fullLiquidationThreshold
 *   - seizeAmount ≤ collateral(seizeAsset)
 *
 * Seized collateral moves from the account's position to the liquidator's;
 * the asset itself never leaves the market here.
 *
 * When the seize asset is the account's last collateral and it cannot cover
 * repay + incentive, all of it is seized and the liquidator pays only the
 * covered part. The rest of the repay is booked as bad debt, unless the
 * account still supplies some other asset, in which case it stays owed. An
 * account left with debt and no supply at all has that residual debt
 * socialized as bad debt.
 */

import { BPS, WAD, type Rounding, bpsMul, fromValue, minBigInt, mulDiv, toValue } from "./math";
import { RiskEngineError } from "./errors";
import { balancesOf, type HealthEngine } from "./health-engine";
import type { InterestAccrualIndex } from "./interest-accrual-index";
import type { Changeset } from "./ledger-state";
import type { PositionLedger } from "./position-ledger";
import type { RiskParameterStore } from "./risk-parameter-store";
import type { BadDebtRecord, LiquidationOutcome, LiquidationRequest } from "./types";

export interface LiquidationSettings {
  /** Share of one asset's debt repayable in a single call */
  closeFactorBps: bigint;
  /** Health factor (WAD) below which the whole debt may be repaid */
  fullLiquidationThreshold: bigint;
  incentiveRounding: Rounding;
}

export const DEFAULT_LIQUIDATION_SETTINGS: LiquidationSettings = {
  closeFactorBps: 5_000n,
  fullLiquidationThreshold: 0n,
  incentiveRounding: "down",
};

export function validateLiquidationSettings(settings: LiquidationSettings): void {
  if (settings.closeFactorBps <= 0n || settings.closeFactorBps > BPS) {
    throw new RiskEngineError("InvalidParameter", `closeFactorBps must be within (0, ${BPS}]`, {
      closeFactorBps: settings.closeFactorBps,
    });
  }
  if (settings.fullLiquidationThreshold < 0n || settings.fullLiquidationThreshold > WAD) {
    throw new RiskEngineError("InvalidParameter", "fullLiquidationThreshold must be within [0, 1.0]", {
      fullLiquidationThreshold: settings.fullLiquidationThreshold,
    });
  }
}

export class LiquidationEngine {
  private settings: LiquidationSettings;

  constructor(
    private readonly ledger: PositionLedger,
    private readonly parameters: RiskParameterStore,
    private readonly accrual: InterestAccrualIndex,
    private readonly health: HealthEngine,
    settings: Partial<LiquidationSettings> = {},
  ) {
    const merged = { ...DEFAULT_LIQUIDATION_SETTINGS, ...settings };
    validateLiquidationSettings(merged);
    this.settings = merged;
  }

  getSettings(): LiquidationSettings {
    return { ...this.settings };
  }

  setCloseFactor(closeFactorBps: bigint): void {
    const next = { ...this.settings, closeFactorBps };
    validateLiquidationSettings(next);
    this.settings = next;
  }

  setFullLiquidationThreshold(fullLiquidationThreshold: bigint): void {
    const next = { ...this.settings, fullLiquidationThreshold };
    validateLiquidationSettings(next);
    this.settings = next;
  }

  /** Largest repay accepted for `debt` at the given health factor. */
  maxRepay(debt: bigint, healthFactor: bigint): bigint {
    if (healthFactor < this.settings.fullLiquidationThreshold) return debt;
    return bpsMul(debt, this.settings.closeFactorBps);
  }

  // ─── Liquidation ─────────────────────────────────────────────────────

  liquidate(cs: Changeset, request: LiquidationRequest, now: number): LiquidationOutcome {
    const { liquidator, account, repayAsset, repayAmount, seizeAsset } = request;

    if (liquidator === account) {
      throw new RiskEngineError("SelfLiquidation", `${account} cannot liquidate itself`, { account });
    }
    if (repayAmount <= 0n) {
      throw new RiskEngineError("InvalidParameter", "repayAmount must be > 0", { repayAmount });
    }
    const repayConfig = this.parameters.getAsset(repayAsset);
    const seizeConfig = this.parameters.getAsset(seizeAsset);
    if (!seizeConfig.isCollateral) {
      throw new RiskEngineError("InvalidParameter", `${seizeAsset} is not collateral`, { seizeAsset });
    }

    this.accrual.accrueAll(cs, [...cs.accountAssets(account), repayAsset, seizeAsset], now);

    const snapshot = this.health.computeHealthSnapshot(cs, account, now, "flag");
    if (snapshot.healthFactor >= WAD) {
      throw new RiskEngineError("NotLiquidatable", `${account} is healthy`, {
        account,
        healthFactor: snapshot.healthFactor,
      });
    }

    const { debtAmount: debt } = balancesOf(cs, account, repayAsset, cs.getMarket(repayAsset));
    if (debt === 0n) {
      throw new RiskEngineError("InvalidParameter", `${account} owes no ${repayAsset}`, { account, repayAsset });
    }
    const { collateralAmount: collateral } = balancesOf(cs, account, seizeAsset, cs.getMarket(seizeAsset));
    if (collateral === 0n) {
      throw new RiskEngineError("InvalidParameter", `${account} holds no ${seizeAsset}`, { account, seizeAsset });
    }

    let repaid = minBigInt(repayAmount, this.maxRepay(debt, snapshot.healthFactor));
    const repayPrice = this.health.quote(repayAsset, now, "flag").price;
    const seizePrice = this.health.quote(seizeAsset, now, "flag").price;
    const incentiveBps = seizeConfig.liquidationIncentiveBps;
    const rounding = this.settings.incentiveRounding;

    const repayValue = toValue(repaid, repayPrice, repayConfig.decimals);
    const seizeValue = mulDiv(repayValue, BPS + incentiveBps, BPS, rounding);
    let seized = fromValue(seizeValue, seizePrice, seizeConfig.decimals, rounding);
    let liquidatorPaid = repaid;
    let uncovered = 0n;

    if (seized > collateral) {
      if (this.hasOtherCollateral(cs, account, seizeAsset, now)) {
        throw new RiskEngineError(
          "SeizeAmountExceedsCollateral",
          `seizing ${seized} ${seizeAsset} exceeds the ${collateral} held by ${account}`,
          { account, seizeAsset, seizeAmount: seized, collateral },
        );
      }
      // Last collateral: the seized value (net of incentive) is all the repay it can cover
      seized = collateral;
      const coveredValue = mulDiv(toValue(collateral, seizePrice, seizeConfig.decimals), BPS, BPS + incentiveBps);
      liquidatorPaid = minBigInt(fromValue(coveredValue, repayPrice, repayConfig.decimals), repaid);
      if (this.holdsSupply(cs, account, seizeAsset)) {
        repaid = liquidatorPaid;
      } else {
        uncovered = repaid - liquidatorPaid;
      }
    }
    const incentivePaid = mulDiv(seized, incentiveBps, BPS + incentiveBps);

    this.ledger.reduceDebt(cs, account, repayAsset, repaid);
    this.ledger.moveCollateral(cs, account, liquidator, seizeAsset, seized);
    this.ledger.adjustCash(cs, repayAsset, liquidatorPaid);

    let badDebtIncurred = 0n;
    if (uncovered > 0n) {
      this.recordBadDebt(cs, account, repayAsset, uncovered);
      badDebtIncurred += uncovered;
    }

    const residualBadDebt = this.socializeResidualDebt(cs, account);
    for (const record of residualBadDebt) {
      if (record.asset === repayAsset) badDebtIncurred += record.amount;
    }

    const event = {
      account,
      liquidator,
      repayAsset,
      repaidAmount: repaid,
      liquidatorPaid,
      seizeAsset,
      seizedAmount: seized,
      incentivePaid,
      badDebtIncurred,
      timestamp: now,
    };
    return {
      seizedAmount: seized,
      repaidAmount: repaid,
      liquidatorPaid,
      incentivePaid,
      badDebtIncurred,
      residualBadDebt,
      event,
    };
  }

  /** Run a liquidation against a throwaway changeset. */
  preview(request: LiquidationRequest, now: number): LiquidationOutcome {
    return this.liquidate(this.ledger.begin(), request, now);
  }

  // ─── Bad debt ────────────────────────────────────────────────────────

  /** @returns the amount written off (all of it when `amount` is omitted) */
  writeOffBadDebt(cs: Changeset, account: string, asset: string, amount?: bigint): bigint {
    const outstanding = this.outstandingBadDebt(cs, account, asset);
    const writtenOff = amount ?? outstanding;
    this.assertBadDebtAmount(writtenOff, outstanding);
    this.reduceBadDebt(cs, account, asset, writtenOff);
    return writtenOff;
  }

  /** Pay down bad debt out of the market's accrued reserves. */
  coverBadDebt(cs: Changeset, account: string, asset: string, amount: bigint, now: number): bigint {
    const outstanding = this.outstandingBadDebt(cs, account, asset);
    this.assertBadDebtAmount(amount, outstanding);

    const market = this.accrual.accrue(cs, asset, now);
    if (market.totalReserves < amount) {
      throw new RiskEngineError("InsufficientReserves", `reserves of ${asset} cannot cover ${amount}`, {
        asset,
        totalReserves: market.totalReserves,
        amount,
      });
    }
    cs.setMarket(asset, { ...market, totalReserves: market.totalReserves - amount });
    this.reduceBadDebt(cs, account, asset, amount);
    return amount;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private hasOtherCollateral(cs: Changeset, account: string, seizeAsset: string, now: number): boolean {
    for (const asset of cs.accountAssets(account)) {
      if (asset === seizeAsset || !this.parameters.getAsset(asset).isCollateral) continue;
      const { collateralAmount } = balancesOf(cs, account, asset, cs.getMarket(asset));
      if (collateralAmount === 0n) continue;
      const { price } = this.health.quote(asset, now, "flag");
      if (toValue(collateralAmount, price, this.parameters.getAsset(asset).decimals) > 0n) {
        return true;
      }
    }
    return false;
  }

  /** Whether `account` supplies anything, collateral or not, apart from `except`. */
  private holdsSupply(cs: Changeset, account: string, except?: string): boolean {
    return cs
      .accountAssets(account)
      .some((asset) => asset !== except && cs.getPosition(account, asset).collateralScaled > 0n);
  }

  private socializeResidualDebt(cs: Changeset, account: string): BadDebtRecord[] {
    if (this.holdsSupply(cs, account)) return [];

    const records: BadDebtRecord[] = [];
    for (const asset of cs.accountAssets(account)) {
      const { debtAmount } = balancesOf(cs, account, asset, cs.getMarket(asset));
      if (debtAmount === 0n) continue;
      this.ledger.reduceDebt(cs, account, asset, debtAmount);
      this.recordBadDebt(cs, account, asset, debtAmount);
      records.push({ account, asset, amount: debtAmount });
    }
    return records;
  }

  private recordBadDebt(cs: Changeset, account: string, asset: string, amount: bigint): void {
    cs.setBadDebt(account, asset, cs.getBadDebt(account, asset) + amount);
    const market = cs.getMarket(asset);
    cs.setMarket(asset, { ...market, totalBadDebt: market.totalBadDebt + amount });
  }

  private reduceBadDebt(cs: Changeset, account: string, asset: string, amount: bigint): void {
    cs.setBadDebt(account, asset, cs.getBadDebt(account, asset) - amount);
    const market = cs.getMarket(asset);
    cs.setMarket(asset, { ...market, totalBadDebt: market.totalBadDebt - amount });
  }

  private outstandingBadDebt(cs: Changeset, account: string, asset: string): bigint {
    this.parameters.getAsset(asset);
    const outstanding = cs.getBadDebt(account, asset);
    if (outstanding === 0n) {
      throw new RiskEngineError("NoBadDebt", `no bad debt recorded for ${account} in ${asset}`, { account, asset });
    }
    return outstanding;
  }

  private assertBadDebtAmount(amount: bigint, outstanding: bigint): void {
    if (amount <= 0n || amount > outstanding) {
      throw new RiskEngineError("InvalidParameter", `amount must be within (0, ${outstanding}]`, {
        amount,
        outstanding,
      });
    }
  }
}
