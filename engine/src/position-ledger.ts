/**
 * Lending Risk Engine - Position Ledger
 *
 * System of record for per-account collateral and debt. Balances are kept in
 * scaled units (amount / index at the time of the write); the current balance
 * is scaled × current index. Per-asset aggregates live in the same changeset as
 * the positions they summarize.
 *
 * Every operation:
 *   1. accrues the touched asset(s)
 *   2. converts the amount to scaled units at the current index
 *   3. applies the delta to the position and the market aggregate
 *   4. for withdraw/borrow, certifies the account's health factor ≥ 1.0
 *
 * Rounding always favours the protocol: deposits mint scaled collateral
 * rounded down, borrows mint scaled debt rounded up, withdrawals burn
 * collateral rounded up and repayments burn debt rounded down.
 */

import { wadDiv } from "./math";
import { RiskEngineError } from "./errors";
import { balancesOf, type HealthEngine } from "./health-engine";
import { totalBorrowsOf, totalSupplyOf, type InterestAccrualIndex } from "./interest-accrual-index";
import type { Changeset, LedgerStore, LedgerView } from "./ledger-state";
import type { RiskParameterStore } from "./risk-parameter-store";
import type { AccountPosition, MarketState } from "./types";

export class PositionLedger {
  constructor(
    private readonly store: LedgerStore,
    private readonly parameters: RiskParameterStore,
    private readonly accrual: InterestAccrualIndex,
    private readonly health: HealthEngine,
  ) {}

  /** Committed state */
  get view(): LedgerView {
    return this.store;
  }

  begin(): Changeset {
    return this.store.begin();
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  deposit(cs: Changeset, account: string, asset: string, amount: bigint, now: number): bigint {
    if (amount === 0n) return 0n;
    const config = this.parameters.getAsset(asset);
    const market = this.accrual.accrue(cs, asset, now);
    const scaled = wadDiv(amount, market.supplyIndex);
    if (scaled === 0n) {
      throw new RiskEngineError("InvalidParameter", `deposit of ${amount} ${asset} rounds to zero`, { asset, amount });
    }

    const next: MarketState = {
      ...market,
      totalSupplyScaled: market.totalSupplyScaled + scaled,
      cash: market.cash + amount,
    };
    if (config.supplyCap > 0n && totalSupplyOf(next) > config.supplyCap) {
      throw new RiskEngineError("SupplyCapExceeded", `supply cap of ${asset} exceeded`, {
        asset,
        supplyCap: config.supplyCap,
        totalSupply: totalSupplyOf(next),
      });
    }

    const entry = cs.getPosition(account, asset);
    cs.setMarket(asset, next);
    cs.setPosition(account, asset, { ...entry, collateralScaled: entry.collateralScaled + scaled });
    return amount;
  }

  withdraw(cs: Changeset, account: string, asset: string, amount: bigint, now: number): bigint {
    if (amount === 0n) return 0n;
    this.parameters.getAsset(asset);
    this.accrual.accrueAll(cs, [asset, ...cs.accountAssets(account)], now);

    const market = cs.getMarket(asset);
    const { collateralAmount } = balancesOf(cs, account, asset, market);
    if (amount > collateralAmount) {
      throw new RiskEngineError("InsufficientBalance", `${account} holds ${collateralAmount} ${asset}`, {
        account,
        asset,
        requested: amount,
        available: collateralAmount,
      });
    }
    if (amount > market.cash) {
      throw new RiskEngineError("InsufficientLiquidity", `market ${asset} holds ${market.cash} in cash`, {
        asset,
        requested: amount,
        cash: market.cash,
      });
    }

    this.debitCollateral(cs, account, asset, amount);
    this.adjustCash(cs, asset, -amount);
    this.certifyIfIndebted(cs, account, now);
    return amount;
  }

  borrow(cs: Changeset, account: string, asset: string, amount: bigint, now: number): bigint {
    if (amount === 0n) return 0n;
    const config = this.parameters.getAsset(asset);
    if (!config.isBorrowable) {
      throw new RiskEngineError("InvalidParameter", `${asset} is not borrowable`, { asset });
    }
    this.accrual.accrueAll(cs, [asset, ...cs.accountAssets(account)], now);

    const market = cs.getMarket(asset);
    const scaled = wadDiv(amount, market.borrowIndex, "up");
    const next: MarketState = {
      ...market,
      totalBorrowScaled: market.totalBorrowScaled + scaled,
      cash: market.cash - amount,
    };
    if (config.borrowCap > 0n && totalBorrowsOf(next) > config.borrowCap) {
      throw new RiskEngineError("BorrowCapExceeded", `borrow cap of ${asset} exceeded`, {
        asset,
        borrowCap: config.borrowCap,
        totalBorrows: totalBorrowsOf(next),
      });
    }
    if (amount > market.cash) {
      throw new RiskEngineError("InsufficientLiquidity", `market ${asset} holds ${market.cash} in cash`, {
        asset,
        requested: amount,
        cash: market.cash,
      });
    }

    const entry = cs.getPosition(account, asset);
    cs.setMarket(asset, next);
    cs.setPosition(account, asset, { ...entry, debtScaled: entry.debtScaled + scaled });
    this.health.assertHealthy(cs, account, now);
    return amount;
  }

  /** @returns the amount actually repaid, capped at the outstanding debt */
  repay(cs: Changeset, account: string, asset: string, amount: bigint, now: number): bigint {
    if (amount === 0n) return 0n;
    this.parameters.getAsset(asset);
    const market = this.accrual.accrue(cs, asset, now);
    const { debtAmount } = balancesOf(cs, account, asset, market);
    const repaid = amount < debtAmount ? amount : debtAmount;
    if (repaid === 0n) return 0n;

    this.reduceDebt(cs, account, asset, repaid);
    this.adjustCash(cs, asset, repaid);
    return repaid;
  }

  // ─── Primitives ──────────────────────────────────────────────────────

  /**
   * Remove `amount` of collateral from the position and the supply total.
   * Clears the position exactly when the whole balance is removed.
   */
  debitCollateral(cs: Changeset, account: string, asset: string, amount: bigint): void {
    const market = cs.getMarket(asset);
    const entry = cs.getPosition(account, asset);
    const burn = this.scaledCollateral(cs, account, asset, amount);

    cs.setPosition(account, asset, { ...entry, collateralScaled: entry.collateralScaled - burn });
    cs.setMarket(asset, { ...market, totalSupplyScaled: market.totalSupplyScaled - burn });
  }

  /**
   * Hand `amount` of `from`'s collateral to `to`. The scaled balance moves
   * as is, so the supply total and the market's cash do not change.
   */
  moveCollateral(cs: Changeset, from: string, to: string, asset: string, amount: bigint): void {
    const moved = this.scaledCollateral(cs, from, asset, amount);
    const source = cs.getPosition(from, asset);
    cs.setPosition(from, asset, { ...source, collateralScaled: source.collateralScaled - moved });
    const target = cs.getPosition(to, asset);
    cs.setPosition(to, asset, { ...target, collateralScaled: target.collateralScaled + moved });
  }

  /**
   * Remove `amount` of debt from the position and the borrow total.
   * Clears the position exactly when the whole debt is removed.
   */
  reduceDebt(cs: Changeset, account: string, asset: string, amount: bigint): void {
    const market = cs.getMarket(asset);
    const entry = cs.getPosition(account, asset);
    const { debtAmount } = balancesOf(cs, account, asset, market);
    let burn = amount >= debtAmount ? entry.debtScaled : wadDiv(amount, market.borrowIndex);
    if (burn > entry.debtScaled) burn = entry.debtScaled;

    cs.setPosition(account, asset, { ...entry, debtScaled: entry.debtScaled - burn });
    cs.setMarket(asset, { ...market, totalBorrowScaled: market.totalBorrowScaled - burn });
  }

  adjustCash(cs: Changeset, asset: string, delta: bigint): void {
    const market = cs.getMarket(asset);
    const cash = market.cash + delta;
    if (cash < 0n) {
      throw new RiskEngineError("InsufficientLiquidity", `market ${asset} cash would go negative`, {
        asset,
        cash: market.cash,
        delta,
      });
    }
    cs.setMarket(asset, { ...market, cash });
  }

  hasDebt(view: LedgerView, account: string): boolean {
    return view.accountAssets(account).some((asset) => view.getPosition(account, asset).debtScaled > 0n);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getAccountPosition(account: string, asset: string, now: number): AccountPosition {
    const market = this.accrual.project(asset, this.store.getMarket(asset), now);
    return balancesOf(this.store, account, asset, market);
  }

  listAccounts(): string[] {
    return this.store.accounts();
  }

  accountAssets(account: string): string[] {
    return this.store.accountAssets(account);
  }

  /** Scaled units behind `amount` of collateral, rounded up and clamped to the balance. */
  private scaledCollateral(cs: Changeset, account: string, asset: string, amount: bigint): bigint {
    const market = cs.getMarket(asset);
    const { collateralScaled } = cs.getPosition(account, asset);
    const { collateralAmount } = balancesOf(cs, account, asset, market);
    if (amount >= collateralAmount) return collateralScaled;
    const scaled = wadDiv(amount, market.supplyIndex, "up");
    return scaled > collateralScaled ? collateralScaled : scaled;
  }

  private certifyIfIndebted(cs: Changeset, account: string, now: number): void {
    // Debt-free accounts cannot become insolvent by withdrawing
    if (this.hasDebt(cs, account)) {
      this.health.assertHealthy(cs, account, now);
    }
  }
}
