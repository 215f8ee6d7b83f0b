/**
 * Lending Risk Engine - Ledger State & Changesets
 *
 * LedgerStore holds the committed system of record: per-asset market
 * aggregates, per-account scaled positions and bad-debt records.
 *
 * Every mutating operation works on a Changeset: an overlay that reads
 * through to the store and buffers writes. Nothing reaches the store until
 * commit(), so an operation that throws part-way leaves the committed state
 * exactly as it was.
 *
 * Usage:
 *   const cs = store.begin();
 *   cs.setPosition(account, asset, next);
 *   cs.commit();
 */

import { WAD } from "./math";
import { RiskEngineError } from "./errors";
import type { MarketState, PositionEntry } from "./types";

export const EMPTY_POSITION: PositionEntry = Object.freeze({
  collateralScaled: 0n,
  debtScaled: 0n,
});

export function genesisMarket(timestamp: number): MarketState {
  return {
    borrowIndex: WAD,
    supplyIndex: WAD,
    lastAccrualTimestamp: timestamp,
    totalSupplyScaled: 0n,
    totalBorrowScaled: 0n,
    cash: 0n,
    totalReserves: 0n,
    totalBadDebt: 0n,
  };
}

/** Read access shared by the committed store and open changesets. */
export interface LedgerView {
  hasMarket(asset: string): boolean;
  getMarket(asset: string): MarketState;
  getPosition(account: string, asset: string): PositionEntry;
  /** Assets the account has ever touched, in first-touch order */
  accountAssets(account: string): string[];
  accounts(): string[];
  getBadDebt(account: string, asset: string): bigint;
  badDebtRecords(): Array<{ account: string; asset: string; amount: bigint }>;
}

interface PendingChanges {
  markets: Map<string, MarketState>;
  positions: Map<string, Map<string, PositionEntry>>;
  badDebt: Map<string, Map<string, bigint>>;
}

function nestedGet<V>(outer: Map<string, Map<string, V>>, a: string, b: string): V | undefined {
  return outer.get(a)?.get(b);
}

function nestedSet<V>(outer: Map<string, Map<string, V>>, a: string, b: string, value: V): void {
  let inner = outer.get(a);
  if (!inner) {
    inner = new Map<string, V>();
    outer.set(a, inner);
  }
  inner.set(b, value);
}

// ============================================================
//                     COMMITTED STORE
// ============================================================

export class LedgerStore implements LedgerView {
  private readonly markets = new Map<string, MarketState>();
  private readonly positions = new Map<string, Map<string, PositionEntry>>();
  private readonly badDebt = new Map<string, Map<string, bigint>>();
  private _version = 0;

  /** Incremented on every commit */
  get version(): number {
    return this._version;
  }

  initMarket(asset: string, timestamp: number): MarketState {
    if (this.markets.has(asset)) {
      throw new RiskEngineError("InvalidParameter", `market ${asset} already initialized`, { asset });
    }
    const market = genesisMarket(timestamp);
    this.markets.set(asset, market);
    this._version++;
    return market;
  }

  hasMarket(asset: string): boolean {
    return this.markets.has(asset);
  }

  getMarket(asset: string): MarketState {
    const market = this.markets.get(asset);
    if (!market) {
      throw new RiskEngineError("AssetNotFound", `no market for asset ${asset}`, { asset });
    }
    return market;
  }

  getPosition(account: string, asset: string): PositionEntry {
    return nestedGet(this.positions, account, asset) ?? EMPTY_POSITION;
  }

  accountAssets(account: string): string[] {
    return Array.from(this.positions.get(account)?.keys() ?? []);
  }

  accounts(): string[] {
    return Array.from(this.positions.keys());
  }

  getBadDebt(account: string, asset: string): bigint {
    return nestedGet(this.badDebt, account, asset) ?? 0n;
  }

  badDebtRecords(): Array<{ account: string; asset: string; amount: bigint }> {
    const records: Array<{ account: string; asset: string; amount: bigint }> = [];
    for (const [account, byAsset] of this.badDebt) {
      for (const [asset, amount] of byAsset) {
        if (amount > 0n) records.push({ account, asset, amount });
      }
    }
    return records;
  }

  begin(): Changeset {
    return new Changeset(this, this._version);
  }

  /** Apply a changeset's buffered writes. Only Changeset.commit() calls this. */
  apply(changes: PendingChanges, baseVersion: number): void {
    if (baseVersion !== this._version) {
      throw new Error(
        `Changeset based on ledger version ${baseVersion} cannot commit over version ${this._version}`,
      );
    }
    for (const [asset, market] of changes.markets) {
      this.markets.set(asset, market);
    }
    for (const [account, byAsset] of changes.positions) {
      for (const [asset, entry] of byAsset) {
        nestedSet(this.positions, account, asset, entry);
      }
    }
    for (const [account, byAsset] of changes.badDebt) {
      for (const [asset, amount] of byAsset) {
        nestedSet(this.badDebt, account, asset, amount);
      }
    }
    this._version++;
  }
}

// ============================================================
//                     CHANGESET
// ============================================================

export class Changeset implements LedgerView {
  private readonly changes: PendingChanges = {
    markets: new Map(),
    positions: new Map(),
    badDebt: new Map(),
  };
  private _committed = false;

  constructor(
    private readonly base: LedgerStore,
    private readonly baseVersion: number,
  ) {}

  get committed(): boolean {
    return this._committed;
  }

  get isEmpty(): boolean {
    return (
      this.changes.markets.size === 0 &&
      this.changes.positions.size === 0 &&
      this.changes.badDebt.size === 0
    );
  }

  hasMarket(asset: string): boolean {
    return this.changes.markets.has(asset) || this.base.hasMarket(asset);
  }

  getMarket(asset: string): MarketState {
    return this.changes.markets.get(asset) ?? this.base.getMarket(asset);
  }

  setMarket(asset: string, market: MarketState): void {
    this.assertOpen();
    this.changes.markets.set(asset, market);
  }

  getPosition(account: string, asset: string): PositionEntry {
    return nestedGet(this.changes.positions, account, asset) ?? this.base.getPosition(account, asset);
  }

  setPosition(account: string, asset: string, entry: PositionEntry): void {
    this.assertOpen();
    nestedSet(this.changes.positions, account, asset, entry);
  }

  accountAssets(account: string): string[] {
    const assets = this.base.accountAssets(account);
    for (const asset of this.changes.positions.get(account)?.keys() ?? []) {
      if (!assets.includes(asset)) assets.push(asset);
    }
    return assets;
  }

  accounts(): string[] {
    const accounts = this.base.accounts();
    for (const account of this.changes.positions.keys()) {
      if (!accounts.includes(account)) accounts.push(account);
    }
    return accounts;
  }

  getBadDebt(account: string, asset: string): bigint {
    return nestedGet(this.changes.badDebt, account, asset) ?? this.base.getBadDebt(account, asset);
  }

  setBadDebt(account: string, asset: string, amount: bigint): void {
    this.assertOpen();
    nestedSet(this.changes.badDebt, account, asset, amount);
  }

  badDebtRecords(): Array<{ account: string; asset: string; amount: bigint }> {
    const merged = new Map<string, { account: string; asset: string; amount: bigint }>();
    for (const record of this.base.badDebtRecords()) {
      merged.set(`${record.account}\u0000${record.asset}`, record);
    }
    for (const [account, byAsset] of this.changes.badDebt) {
      for (const [asset, amount] of byAsset) {
        merged.set(`${account}\u0000${asset}`, { account, asset, amount });
      }
    }
    return Array.from(merged.values()).filter((r) => r.amount > 0n);
  }

  commit(): void {
    this.assertOpen();
    this.base.apply(this.changes, this.baseVersion);
    this._committed = true;
  }

  private assertOpen(): void {
    if (this._committed) {
      throw new Error("Changeset already committed");
    }
  }
}
