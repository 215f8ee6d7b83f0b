/**
 * Lending Risk Engine - Shared Types
 *
 * Amounts are in each asset's smallest unit. Prices, indices, rates and
 * health factors are WAD (1e18). Governance ratios are basis points.
 */

// ============================================================
//                     ASSETS & PARAMETERS
// ============================================================

/** Kinked interest curve. Rates are annual, in bps. */
export interface InterestRateCurve {
  baseRateBps: bigint;
  slope1Bps: bigint;
  slope2Bps: bigint;
  /** Utilization at which slope2 takes over */
  kinkBps: bigint;
  /** Share of borrow interest kept as protocol reserves */
  reserveFactorBps: bigint;
}

export interface AssetParameters {
  isCollateral: boolean;
  isBorrowable: boolean;
  collateralFactorBps: bigint;
  liquidationThresholdBps: bigint;
  /** Bonus paid to liquidators in extra seized collateral */
  liquidationIncentiveBps: bigint;
  /** 0 = uncapped */
  borrowCap: bigint;
  /** 0 = uncapped */
  supplyCap: bigint;
  interestRate: InterestRateCurve;
}

export interface AssetConfig extends AssetParameters {
  id: string;
  symbol: string;
  decimals: number;
  /** Opaque handle understood by the price feed */
  priceSource: string;
}

export type AssetParametersUpdate = Partial<Omit<AssetParameters, "interestRate">> & {
  interestRate?: Partial<InterestRateCurve>;
};

// ============================================================
//                     LEDGER STATE
// ============================================================

/** Per-asset aggregate, written in the same changeset as positions. */
export interface MarketState {
  readonly borrowIndex: bigint;
  readonly supplyIndex: bigint;
  readonly lastAccrualTimestamp: number;
  readonly totalSupplyScaled: bigint;
  readonly totalBorrowScaled: bigint;
  /** Underlying held by the protocol according to the ledger of record */
  readonly cash: bigint;
  readonly totalReserves: bigint;
  readonly totalBadDebt: bigint;
}

/** Index-normalized balances of one account in one asset. */
export interface PositionEntry {
  readonly collateralScaled: bigint;
  readonly debtScaled: bigint;
}

export interface AccountPosition {
  collateralAmount: bigint;
  debtAmount: bigint;
}

export interface MarketRates {
  /** Per-second, WAD */
  borrowRate: bigint;
  /** Per-second, WAD */
  supplyRate: bigint;
  /** WAD */
  utilization: bigint;
}

export interface MarketSnapshot {
  asset: string;
  totalSupply: bigint;
  totalBorrows: bigint;
  cash: bigint;
  totalReserves: bigint;
  totalBadDebt: bigint;
  borrowIndex: bigint;
  supplyIndex: bigint;
  lastAccrualTimestamp: number;
  rates: MarketRates;
}

// ============================================================
//                     HEALTH
// ============================================================

export type HealthPurpose = "certify" | "flag";

export interface HealthSnapshot {
  account: string;
  collateralValue: bigint;
  adjustedCollateralValue: bigint;
  liquidationCollateralValue: bigint;
  debtValue: bigint;
  /** WAD; MaxUint256 when the account has no debt */
  healthFactor: bigint;
  usedStalePrice: boolean;
}

// ============================================================
//                     LIQUIDATION
// ============================================================

export interface LiquidationRequest {
  liquidator: string;
  account: string;
  repayAsset: string;
  repayAmount: bigint;
  seizeAsset: string;
}

export interface LiquidationEvent {
  account: string;
  liquidator: string;
  repayAsset: string;
  /** Reduction of the account's debt */
  repaidAmount: bigint;
  /** Amount pulled from the liquidator */
  liquidatorPaid: bigint;
  seizeAsset: string;
  seizedAmount: bigint;
  /** Portion of seizedAmount that is the liquidation bonus */
  incentivePaid: bigint;
  /** Bad debt booked against (account, repayAsset) by this call */
  badDebtIncurred: bigint;
  timestamp: number;
}

export interface LiquidationOutcome {
  seizedAmount: bigint;
  repaidAmount: bigint;
  liquidatorPaid: bigint;
  incentivePaid: bigint;
  badDebtIncurred: bigint;
  /** Residual debt in other assets socialized because collateral ran out */
  residualBadDebt: BadDebtRecord[];
  event: LiquidationEvent;
}

export interface BadDebtRecord {
  account: string;
  asset: string;
  amount: bigint;
}

// ============================================================
//                     COLLABORATORS
// ============================================================

export interface PriceQuote {
  /** USD per whole token, WAD */
  price: bigint;
  /** Unix seconds of the observation */
  timestamp: number;
  isStale: boolean;
}

export interface PriceFeed {
  getPrice(asset: string): PriceQuote;
}

/** Custody lives outside the engine; these calls must be synchronous. */
export interface AssetTransfer {
  transferIn(account: string, asset: string, amount: bigint): void;
  transferOut(recipient: string, asset: string, amount: bigint): void;
}

export interface Clock {
  /** Unix seconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

// ============================================================
//                     OPERATIONS
// ============================================================

export type LedgerAction = "deposit" | "withdraw" | "borrow" | "repay";

export interface OperationReceipt {
  action: LedgerAction;
  account: string;
  asset: string;
  /** Amount actually applied (repay is capped at outstanding debt) */
  amount: bigint;
  timestamp: number;
}
