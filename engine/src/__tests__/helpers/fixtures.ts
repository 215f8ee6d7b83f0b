/**
 * Shared test doubles and builders.
 * Everything runs in-process: no feed, custody or clock outside the test.
 */

import { WAD } from "../../math";
import { HealthEngine } from "../../health-engine";
import { InterestAccrualIndex } from "../../interest-accrual-index";
import { LedgerStore } from "../../ledger-state";
import { LiquidationEngine, type LiquidationSettings } from "../../liquidation-engine";
import { PositionLedger } from "../../position-ledger";
import { RiskEngine } from "../../risk-engine";
import { RiskParameterStore } from "../../risk-parameter-store";
import type { EngineConfig } from "../../config";
import type {
  AssetConfig,
  AssetTransfer,
  Clock,
  InterestRateCurve,
  PriceFeed,
  PriceQuote,
} from "../../types";

export const T0 = 1_700_000_000;
export const ADMIN = "admin";
export const GUARDIAN = "guardian";

export const DEFAULT_CURVE: InterestRateCurve = {
  baseRateBps: 200n,
  slope1Bps: 400n,
  slope2Bps: 7_500n,
  kinkBps: 8_000n,
  reserveFactorBps: 1_000n,
};

/** No interest, so balances stay exact across time steps */
export const ZERO_CURVE: InterestRateCurve = {
  baseRateBps: 0n,
  slope1Bps: 0n,
  slope2Bps: 0n,
  kinkBps: 8_000n,
  reserveFactorBps: 0n,
};

export function makeAsset(id: string, overrides: Partial<AssetConfig> = {}): AssetConfig {
  return {
    id,
    symbol: id,
    decimals: 18,
    priceSource: `test:${id}`,
    isCollateral: true,
    isBorrowable: true,
    collateralFactorBps: 8_000n,
    liquidationThresholdBps: 8_500n,
    liquidationIncentiveBps: 1_000n,
    borrowCap: 0n,
    supplyCap: 0n,
    interestRate: { ...ZERO_CURVE },
    ...overrides,
  };
}

// ============================================================
//  Collaborators
// ============================================================

export class ManualClock implements Clock {
  constructor(private current = T0) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

interface StoredQuote {
  price: bigint;
  /** undefined = stamped at read time */
  timestamp?: number;
  isStale: boolean;
}

export class InMemoryPriceFeed implements PriceFeed {
  private readonly quotes = new Map<string, StoredQuote>();
  private readonly offline = new Set<string>();

  constructor(private readonly clock: Clock) {}

  setPrice(asset: string, price: bigint, options: { timestamp?: number; isStale?: boolean } = {}): void {
    this.quotes.set(asset, { price, timestamp: options.timestamp, isStale: options.isStale ?? false });
  }

  setOffline(asset: string, offline = true): void {
    if (offline) this.offline.add(asset);
    else this.offline.delete(asset);
  }

  getPrice(asset: string): PriceQuote {
    if (this.offline.has(asset)) {
      throw new Error(`feed offline for ${asset}`);
    }
    const quote = this.quotes.get(asset);
    if (!quote) {
      throw new Error(`no price for ${asset}`);
    }
    return {
      price: quote.price,
      timestamp: quote.timestamp ?? this.clock.now(),
      isStale: quote.isStale,
    };
  }
}

export interface TransferRecord {
  direction: "in" | "out";
  account: string;
  asset: string;
  amount: bigint;
}

export class RecordingTransfers implements AssetTransfer {
  readonly records: TransferRecord[] = [];
  /** Called before a transfer is recorded; may throw or call back into the engine */
  onTransfer?: (record: TransferRecord) => void;
  private failure?: Error;

  failNext(error = new Error("transfer rejected")): void {
    this.failure = error;
  }

  transferIn(account: string, asset: string, amount: bigint): void {
    this.handle({ direction: "in", account, asset, amount });
  }

  transferOut(recipient: string, asset: string, amount: bigint): void {
    this.handle({ direction: "out", account: recipient, asset, amount });
  }

  private handle(record: TransferRecord): void {
    if (this.failure) {
      const failure = this.failure;
      this.failure = undefined;
      throw failure;
    }
    this.onTransfer?.(record);
    this.records.push(record);
  }
}

// ============================================================
//  Harnesses
// ============================================================

export function createComponents(
  assets: AssetConfig[] = [makeAsset("X"), makeAsset("Y")],
  settings: Partial<LiquidationSettings> = {},
) {
  const clock = new ManualClock();
  const prices = new InMemoryPriceFeed(clock);
  const parameters = new RiskParameterStore(assets);
  const store = new LedgerStore();
  for (const asset of assets) {
    store.initMarket(asset.id, clock.now());
    prices.setPrice(asset.id, WAD);
  }
  const accrual = new InterestAccrualIndex(parameters);
  const health = new HealthEngine(parameters, accrual, prices, { maxPriceAgeSeconds: 3_600 });
  const ledger = new PositionLedger(store, parameters, accrual, health);
  const liquidation = new LiquidationEngine(ledger, parameters, accrual, health, settings);
  return { clock, prices, parameters, store, accrual, health, ledger, liquidation };
}

export function createEngine(
  options: { assets?: AssetConfig[]; config?: Partial<EngineConfig> } = {},
) {
  const assets = options.assets ?? [makeAsset("X"), makeAsset("Y")];
  const clock = new ManualClock();
  const prices = new InMemoryPriceFeed(clock);
  const transfers = new RecordingTransfers();
  for (const asset of assets) {
    prices.setPrice(asset.id, WAD);
  }
  const engine = new RiskEngine({
    assets,
    priceFeed: prices,
    transfers,
    clock,
    config: {
      admins: [ADMIN],
      guardians: [GUARDIAN],
      rateLimits: {},
      gateMode: "active",
      ...options.config,
    },
  });
  return { engine, clock, prices, transfers };
}
