/**
 * Lending Risk Engine - Facade
 *
 * The integrator-facing surface. Every mutating call runs the same pipeline:
 *
 *   re-entrancy guard → EmergencyGate → RateLimiter → staged changeset
 *     → component logic (accrual, ledger, health, liquidation)
 *     → AssetTransfer calls → commit → rate-limit slot, metrics, log, event
 *
 * Anything that throws before commit discards the changeset, so the ledger
 * is unchanged. The one side effect that survives a failure is the market
 * halt tripped by AccrualOverflow.
 *
 * Usage:
 *   const engine = new RiskEngine({ assets, priceFeed, transfers });
 *   engine.deposit("alice", "WETH", parseEther("10"));
 *   engine.borrow("alice", "USDC", parseUnits("5000", 6));
 */

import { EventEmitter } from "events";
import { formatUnits } from "ethers";
import type { Logger } from "winston";
import { RiskEngineError, isRiskEngineError } from "./errors";
import { AccessControl, type Role } from "./access-control";
import { DEFAULT_CONFIG, validateConfig, type EngineConfig } from "./config";
import { EmergencyGate, type GateMode, type GateStatus, type GatedAction, type MarketHalt } from "./emergency-gate";
import { HealthEngine } from "./health-engine";
import { InterestAccrualIndex, totalBorrowsOf, totalSupplyOf } from "./interest-accrual-index";
import { LedgerStore, type Changeset } from "./ledger-state";
import { LiquidationEngine, type LiquidationSettings } from "./liquidation-engine";
import { logger, scopedLogger } from "./logger";
import { loadAssetTable } from "./asset-table";
import {
  badDebtTotal,
  gateMode as gateModeGauge,
  liquidationsTotal,
  marketHalted as marketHaltedGauge,
  marketUtilization,
  operationDuration,
  operationsTotal,
  rejectionsTotal,
} from "./metrics";
import { PositionLedger } from "./position-ledger";
import { RateLimiter } from "./rate-limiter";
import { RiskParameterStore } from "./risk-parameter-store";
import {
  systemClock,
  type AccountPosition,
  type AssetConfig,
  type AssetParameters,
  type AssetParametersUpdate,
  type AssetTransfer,
  type BadDebtRecord,
  type Clock,
  type HealthPurpose,
  type HealthSnapshot,
  type LedgerAction,
  type LiquidationEvent,
  type LiquidationOutcome,
  type LiquidationRequest,
  type MarketRates,
  type MarketSnapshot,
  type OperationReceipt,
  type PriceFeed,
} from "./types";

export interface GovernanceAction {
  by: string;
}

export type RiskEngineEvents = {
  deposit: [OperationReceipt];
  withdraw: [OperationReceipt];
  borrow: [OperationReceipt];
  repay: [OperationReceipt];
  liquidation: [LiquidationEvent];
  badDebtRecorded: [BadDebtRecord];
  badDebtWrittenOff: [BadDebtRecord & GovernanceAction];
  badDebtCovered: [BadDebtRecord & GovernanceAction];
  marketHalted: [MarketHalt];
  parametersUpdated: [{ asset: string; parameters: AssetParameters } & GovernanceAction];
};

export interface RiskEngineOptions {
  priceFeed: PriceFeed;
  transfers: AssetTransfer;
  /**
   * Listed at construction; markets start at the clock's current time.
   * Defaults to the table at `config.assetTablePath`, if one is set.
   */
  assets?: readonly AssetConfig[];
  clock?: Clock;
  config?: Partial<EngineConfig>;
  logger?: Logger;
}

const GATE_MODE_VALUE: Record<GateMode, number> = {
  active: 0,
  "risk-increasing-paused": 1,
  "all-paused": 2,
};

export class RiskEngine {
  readonly config: EngineConfig;

  private readonly clock: Clock;
  private readonly transfers: AssetTransfer;
  private readonly log: Logger;
  private readonly events = new EventEmitter();

  private readonly parameters = new RiskParameterStore();
  private readonly store = new LedgerStore();
  private readonly accrual: InterestAccrualIndex;
  private readonly health: HealthEngine;
  private readonly ledger: PositionLedger;
  private readonly liquidation: LiquidationEngine;
  private readonly access: AccessControl;
  private readonly gate: EmergencyGate;
  private readonly rateLimiter: RateLimiter;

  private busy = false;

  constructor(options: RiskEngineOptions) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    validateConfig(this.config);

    this.clock = options.clock ?? systemClock;
    this.transfers = options.transfers;
    if (options.logger) {
      this.log = options.logger;
    } else {
      logger.level = this.config.logLevel;
      this.log = scopedLogger("RiskEngine");
    }

    this.accrual = new InterestAccrualIndex(this.parameters);
    this.health = new HealthEngine(this.parameters, this.accrual, options.priceFeed, {
      maxPriceAgeSeconds: this.config.maxPriceAgeSeconds,
    });
    this.ledger = new PositionLedger(this.store, this.parameters, this.accrual, this.health);
    this.liquidation = new LiquidationEngine(this.ledger, this.parameters, this.accrual, this.health, {
      closeFactorBps: this.config.closeFactorBps,
      fullLiquidationThreshold: this.config.fullLiquidationThreshold,
      incentiveRounding: this.config.incentiveRounding,
    });
    this.access = new AccessControl({ admins: this.config.admins, guardians: this.config.guardians });
    this.gate = new EmergencyGate(this.access, this.config.gateMode);
    this.rateLimiter = new RateLimiter(this.config.rateLimits);
    gateModeGauge.set(GATE_MODE_VALUE[this.gate.mode]);

    const assets =
      options.assets ?? (this.config.assetTablePath ? loadAssetTable(this.config.assetTablePath) : []);
    for (const asset of assets) {
      this.listAsset(asset);
    }
    this.log.info("Risk engine started", {
      assets: assets.map((asset) => asset.id),
      gateMode: this.gate.mode,
      environment: this.config.environment,
    });
  }

  // ─── Events ──────────────────────────────────────────────────────────

  on<E extends keyof RiskEngineEvents>(event: E, listener: (...args: RiskEngineEvents[E]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  once<E extends keyof RiskEngineEvents>(event: E, listener: (...args: RiskEngineEvents[E]) => void): this {
    this.events.once(event, listener);
    return this;
  }

  off<E extends keyof RiskEngineEvents>(event: E, listener: (...args: RiskEngineEvents[E]) => void): this {
    this.events.off(event, listener);
    return this;
  }

  // ─── Ledger operations ───────────────────────────────────────────────

  deposit(account: string, asset: string, amount: bigint): OperationReceipt {
    return this.ledgerOperation("deposit", account, asset, amount, (cs, now) => {
      const deposited = this.ledger.deposit(cs, account, asset, amount, now);
      this.transfers.transferIn(account, asset, deposited);
      return deposited;
    });
  }

  withdraw(account: string, asset: string, amount: bigint): OperationReceipt {
    return this.ledgerOperation("withdraw", account, asset, amount, (cs, now) => {
      const withdrawn = this.ledger.withdraw(cs, account, asset, amount, now);
      this.transfers.transferOut(account, asset, withdrawn);
      return withdrawn;
    });
  }

  borrow(account: string, asset: string, amount: bigint): OperationReceipt {
    return this.ledgerOperation("borrow", account, asset, amount, (cs, now) => {
      const borrowed = this.ledger.borrow(cs, account, asset, amount, now);
      this.transfers.transferOut(account, asset, borrowed);
      return borrowed;
    });
  }

  /** Repays at most the outstanding debt; the receipt carries the amount actually pulled. */
  repay(account: string, asset: string, amount: bigint): OperationReceipt {
    return this.ledgerOperation("repay", account, asset, amount, (cs, now) => {
      const repaid = this.ledger.repay(cs, account, asset, amount, now);
      if (repaid > 0n) this.transfers.transferIn(account, asset, repaid);
      return repaid;
    });
  }

  liquidate(
    liquidator: string,
    account: string,
    repayAsset: string,
    repayAmount: bigint,
    seizeAsset: string,
  ): LiquidationOutcome {
    const request: LiquidationRequest = { liquidator, account, repayAsset, repayAmount, seizeAsset };
    const outcome = this.run("liquidate", liquidator, [repayAsset, seizeAsset], (cs, now) => {
      const result = this.liquidation.liquidate(cs, request, now);
      // Seized collateral changes hands inside the ledger; only the repay moves
      if (result.liquidatorPaid > 0n) this.transfers.transferIn(liquidator, repayAsset, result.liquidatorPaid);
      return result;
    });

    liquidationsTotal.inc({ repay_asset: repayAsset, seize_asset: seizeAsset });
    this.log.info(`Liquidated ${account}`, {
      liquidator,
      repaid: this.format(repayAsset, outcome.repaidAmount),
      seized: this.format(seizeAsset, outcome.seizedAmount),
      badDebt: this.format(repayAsset, outcome.badDebtIncurred),
    });
    this.emit("liquidation", outcome.event);

    const uncovered = outcome.badDebtIncurred - this.residualIn(outcome.residualBadDebt, repayAsset);
    const recorded = uncovered > 0n ? [{ account, asset: repayAsset, amount: uncovered }] : [];
    for (const record of [...recorded, ...outcome.residualBadDebt]) {
      badDebtTotal.inc({ asset: record.asset }, Number(this.format(record.asset, record.amount)));
      this.log.warn(`Bad debt recorded for ${record.account}`, {
        asset: record.asset,
        amount: this.format(record.asset, record.amount),
      });
      this.emit("badDebtRecorded", record);
    }
    return outcome;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getHealthFactor(account: string): bigint {
    return this.health.computeHealthFactor(this.store, account, this.clock.now(), "certify");
  }

  getHealthSnapshot(account: string, purpose: HealthPurpose = "certify"): HealthSnapshot {
    return this.health.computeHealthSnapshot(this.store, account, this.clock.now(), purpose);
  }

  isLiquidatable(account: string): boolean {
    return this.health.isLiquidatable(this.store, account, this.clock.now());
  }

  /**
   * Scan every account with a position. Accounts whose prices are
   * unavailable are logged and left out of the result.
   */
  findLiquidatableAccounts(): string[] {
    const now = this.clock.now();
    const found: string[] = [];
    for (const account of this.ledger.listAccounts()) {
      try {
        if (this.health.isLiquidatable(this.store, account, now)) found.push(account);
      } catch (err) {
        if (!isRiskEngineError(err, "PriceUnavailable")) throw err;
        this.log.warn(`Skipping ${account} in liquidation scan`, { code: err.code, error: err.message });
      }
    }
    return found;
  }

  getAccountPosition(account: string, asset: string): AccountPosition {
    this.parameters.getAsset(asset);
    return this.ledger.getAccountPosition(account, asset, this.clock.now());
  }

  getCurrentRates(asset: string): MarketRates {
    const market = this.accrual.project(asset, this.store.getMarket(asset), this.clock.now());
    return this.accrual.currentRates(asset, market);
  }

  getMarket(asset: string): MarketSnapshot {
    const market = this.accrual.project(asset, this.store.getMarket(asset), this.clock.now());
    return {
      asset,
      totalSupply: totalSupplyOf(market),
      totalBorrows: totalBorrowsOf(market),
      cash: market.cash,
      totalReserves: market.totalReserves,
      totalBadDebt: market.totalBadDebt,
      borrowIndex: market.borrowIndex,
      supplyIndex: market.supplyIndex,
      lastAccrualTimestamp: market.lastAccrualTimestamp,
      rates: this.accrual.currentRates(asset, market),
    };
  }

  getBadDebt(account: string, asset: string): bigint {
    this.parameters.getAsset(asset);
    return this.store.getBadDebt(account, asset);
  }

  listBadDebt(): BadDebtRecord[] {
    return this.store.badDebtRecords();
  }

  previewLiquidation(
    liquidator: string,
    account: string,
    repayAsset: string,
    repayAmount: bigint,
    seizeAsset: string,
  ): LiquidationOutcome {
    return this.liquidation.preview({ liquidator, account, repayAsset, repayAmount, seizeAsset }, this.clock.now());
  }

  getAssetParameters(asset: string): AssetParameters {
    return this.parameters.getAssetParameters(asset);
  }

  listAssets(): AssetConfig[] {
    return this.parameters.listAssets();
  }

  listAccounts(): string[] {
    return this.ledger.listAccounts();
  }

  getGateStatus(): GateStatus {
    return this.gate.status();
  }

  isPaused(action: GatedAction, asset?: string): boolean {
    return this.gate.isPaused(action, asset);
  }

  getLiquidationSettings(): LiquidationSettings {
    return this.liquidation.getSettings();
  }

  getRateLimitUsage(action: GatedAction, account: string): number {
    return this.rateLimiter.usage(action, account, this.clock.now());
  }

  // ─── Governance ──────────────────────────────────────────────────────

  registerAsset(caller: string, asset: AssetConfig): AssetConfig {
    this.access.requireRole("admin", caller);
    return this.exclusive(() => {
      const listed = this.listAsset(asset);
      this.log.info(`Listed ${asset.id}`, { by: caller, symbol: asset.symbol });
      return listed;
    });
  }

  /** Past interest is charged at the old curve before the update applies. */
  setAssetParameters(caller: string, asset: string, update: AssetParametersUpdate): AssetParameters {
    this.access.requireRole("admin", caller);
    const parameters = this.exclusive(() => {
      this.parameters.previewAssetParameters(asset, update);
      this.commitStaged((cs, now) => {
        this.accrual.accrue(cs, asset, now);
      });
      return this.parameters.setAssetParameters(asset, update);
    });
    this.log.info(`Parameters updated for ${asset}`, { by: caller });
    this.emit("parametersUpdated", { asset, parameters, by: caller });
    return parameters;
  }

  setCloseFactor(caller: string, closeFactorBps: bigint): void {
    this.access.requireRole("admin", caller);
    this.liquidation.setCloseFactor(closeFactorBps);
    this.log.info("Close factor updated", { by: caller, closeFactorBps: closeFactorBps.toString() });
  }

  setFullLiquidationThreshold(caller: string, threshold: bigint): void {
    this.access.requireRole("admin", caller);
    this.liquidation.setFullLiquidationThreshold(threshold);
    this.log.info("Full liquidation threshold updated", { by: caller, threshold: formatUnits(threshold, 18) });
  }

  pause(caller: string, action: GatedAction): void {
    this.gate.pause(caller, action);
    this.log.warn(`${action} paused`, { by: caller });
  }

  unpause(caller: string, action: GatedAction): void {
    this.gate.unpause(caller, action);
    this.log.info(`${action} unpaused`, { by: caller });
  }

  setMode(caller: string, mode: GateMode): void {
    this.gate.setMode(caller, mode);
    gateModeGauge.set(GATE_MODE_VALUE[mode]);
    this.log.warn(`Gate mode set to ${mode}`, { by: caller });
  }

  haltMarket(caller: string, asset: string, reason: string): void {
    this.parameters.getAsset(asset);
    const halt = this.gate.haltMarket(caller, asset, reason);
    marketHaltedGauge.set({ asset }, 1);
    this.log.error(`Market ${asset} halted`, { by: caller, reason });
    this.emit("marketHalted", halt);
  }

  resumeMarket(caller: string, asset: string): void {
    this.gate.resumeMarket(caller, asset);
    marketHaltedGauge.set({ asset }, 0);
    this.log.info(`Market ${asset} resumed`, { by: caller });
  }

  grantRole(caller: string, role: Role, member: string): void {
    this.access.grant(caller, role, member);
  }

  revokeRole(caller: string, role: Role, member: string): void {
    this.access.revoke(caller, role, member);
  }

  hasRole(role: Role, member: string): boolean {
    return this.access.hasRole(role, member);
  }

  writeOffBadDebt(caller: string, account: string, asset: string, amount?: bigint): bigint {
    this.access.requireRole("admin", caller);
    const writtenOff = this.exclusive(() =>
      this.commitStaged((cs) => this.liquidation.writeOffBadDebt(cs, account, asset, amount)),
    );
    this.log.info(`Bad debt written off for ${account}`, { by: caller, asset, amount: this.format(asset, writtenOff) });
    this.emit("badDebtWrittenOff", { account, asset, amount: writtenOff, by: caller });
    return writtenOff;
  }

  coverBadDebt(caller: string, account: string, asset: string, amount: bigint): bigint {
    this.access.requireRole("admin", caller);
    const covered = this.exclusive(() =>
      this.commitStaged((cs, now) => this.liquidation.coverBadDebt(cs, account, asset, amount, now)),
    );
    this.log.info(`Bad debt covered from reserves for ${account}`, {
      by: caller,
      asset,
      amount: this.format(asset, covered),
    });
    this.emit("badDebtCovered", { account, asset, amount: covered, by: caller });
    return covered;
  }

  // ─── Pipeline ────────────────────────────────────────────────────────

  private ledgerOperation(
    action: LedgerAction,
    account: string,
    asset: string,
    amount: bigint,
    apply: (cs: Changeset, now: number) => bigint,
  ): OperationReceipt {
    this.parameters.getAsset(asset);
    if (amount < 0n) {
      throw new RiskEngineError("InvalidParameter", `${action} amount must be >= 0`, { action, amount });
    }
    if (amount === 0n) {
      return { action, account, asset, amount: 0n, timestamp: this.clock.now() };
    }

    const receipt = this.run(action, account, [asset], (cs, now): OperationReceipt => ({
      action,
      account,
      asset,
      amount: apply(cs, now),
      timestamp: now,
    }));

    this.log.info(`${action} committed`, { account, asset, amount: this.format(asset, receipt.amount) });
    if (receipt.amount > 0n) this.emit(action, receipt);
    return receipt;
  }

  /** Gate, rate-limit, stage, commit; with rejection bookkeeping. */
  private run<T>(action: GatedAction, account: string, assets: string[], body: (cs: Changeset, now: number) => T): T {
    const endTimer = operationDuration.startTimer({ action });
    try {
      const result = this.exclusive(() => {
        const now = this.clock.now();
        this.gate.assertAllowed(action, assets);
        this.rateLimiter.check(action, account, now);
        const value = this.commitStaged(body, now);
        this.rateLimiter.record(action, account, now);
        return value;
      });
      operationsTotal.inc({ action, status: "committed" });
      this.refreshUtilization(assets);
      return result;
    } catch (err) {
      operationsTotal.inc({ action, status: "rejected" });
      rejectionsTotal.inc({ action, code: isRiskEngineError(err) ? err.code : "external" });
      this.log.warn(`${action} rejected`, {
        account,
        code: isRiskEngineError(err) ? err.code : undefined,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      endTimer();
    }
  }

  /**
   * Run `body` on a fresh changeset and commit it if nothing threw.
   * An AccrualOverflow halts the offending market before propagating.
   */
  private commitStaged<T>(body: (cs: Changeset, now: number) => T, now = this.clock.now()): T {
    const cs = this.ledger.begin();
    try {
      const result = body(cs, now);
      cs.commit();
      return result;
    } catch (err) {
      if (isRiskEngineError(err, "AccrualOverflow")) this.tripOnOverflow(err);
      throw err;
    }
  }

  private exclusive<T>(fn: () => T): T {
    if (this.busy) {
      throw new RiskEngineError("ReentrantCall", "engine is already executing an operation");
    }
    this.busy = true;
    try {
      return fn();
    } finally {
      this.busy = false;
    }
  }

  private tripOnOverflow(err: RiskEngineError): void {
    const asset = err.details.asset;
    if (typeof asset !== "string" || this.gate.isHalted(asset)) return;
    const halt = this.gate.tripMarket(asset, err.message);
    marketHaltedGauge.set({ asset }, 1);
    this.log.error(`Market ${asset} halted after accrual overflow`, { reason: err.message });
    this.emit("marketHalted", halt);
  }

  private listAsset(asset: AssetConfig): AssetConfig {
    const listed = this.parameters.registerAsset(asset);
    this.store.initMarket(asset.id, this.clock.now());
    return listed;
  }

  private refreshUtilization(assets: string[]): void {
    for (const asset of new Set(assets)) {
      const { utilization } = this.accrual.currentRates(asset, this.store.getMarket(asset));
      marketUtilization.set({ asset }, Number(formatUnits(utilization, 18)));
    }
  }

  private residualIn(records: BadDebtRecord[], asset: string): bigint {
    return records.filter((record) => record.asset === asset).reduce((sum, record) => sum + record.amount, 0n);
  }

  private format(asset: string, amount: bigint): string {
    return formatUnits(amount, this.parameters.getAsset(asset).decimals);
  }

  /** Listener failures are logged; they never undo a committed operation. */
  private emit<E extends keyof RiskEngineEvents>(event: E, ...args: RiskEngineEvents[E]): void {
    try {
      this.events.emit(event, ...args);
    } catch (err) {
      this.log.error(`Listener for ${event} threw`, { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
