/**
 * Lending Risk Engine - Error Types
 *
 * Every rejected operation throws a RiskEngineError carrying a stable `code`.
 * The ledger is untouched whenever one of these escapes a public call.
 */

// ============================================================
//  Error Codes
// ============================================================

export type RiskErrorCode =
  | "InvalidParameter"
  | "AssetNotFound"
  | "InsufficientBalance"
  | "SelfLiquidation"
  | "Unauthorized"
  | "ReentrantCall"
  | "NoBadDebt"
  | "InsufficientReserves"
  | "InsufficientCollateral"
  | "BorrowCapExceeded"
  | "SupplyCapExceeded"
  | "InsufficientLiquidity"
  | "NotLiquidatable"
  | "SeizeAmountExceedsCollateral"
  | "AccrualOverflow"
  | "StalePrice"
  | "PriceUnavailable"
  | "OperationPaused"
  | "RateLimited";

export type RiskErrorCategory =
  | "validation"
  | "solvency"
  | "liquidation"
  | "arithmetic"
  | "freshness"
  | "gate";

const CATEGORY_BY_CODE: Record<RiskErrorCode, RiskErrorCategory> = {
  InvalidParameter: "validation",
  AssetNotFound: "validation",
  InsufficientBalance: "validation",
  SelfLiquidation: "validation",
  Unauthorized: "validation",
  ReentrantCall: "validation",
  NoBadDebt: "validation",
  InsufficientReserves: "validation",
  InsufficientCollateral: "solvency",
  BorrowCapExceeded: "solvency",
  SupplyCapExceeded: "solvency",
  InsufficientLiquidity: "solvency",
  NotLiquidatable: "liquidation",
  SeizeAmountExceedsCollateral: "liquidation",
  AccrualOverflow: "arithmetic",
  StalePrice: "freshness",
  PriceUnavailable: "freshness",
  OperationPaused: "gate",
  RateLimited: "gate",
};

// ============================================================
//  Error Type
// ============================================================

export class RiskEngineError extends Error {
  public readonly category: RiskErrorCategory;

  constructor(
    public readonly code: RiskErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(`${code}: ${message}`, options);
    this.name = "RiskEngineError";
    this.category = CATEGORY_BY_CODE[code];
  }
}

export function isRiskEngineError(err: unknown, code?: RiskErrorCode): err is RiskEngineError {
  return err instanceof RiskEngineError && (code === undefined || err.code === code);
}

/**
 * Raised by the asset table loader. Names the asset and field so a bad
 * deployment file can be fixed without reading the loader.
 */
export class AssetTableValidationError extends Error {
  constructor(
    public readonly assetId: string,
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Asset table validation failed for ${assetId}.${field}: ${reason}`);
    this.name = "AssetTableValidationError";
  }
}
