/**
 * Lending Risk Engine - Risk Parameter Store
 *
 * Lookup table of listed assets and their governance-set risk parameters.
 * Changes apply to every computation that follows; nothing is recomputed
 * retroactively.
 */

import { BPS } from "./math";
import { RiskEngineError } from "./errors";
import type { AssetConfig, AssetParameters, AssetParametersUpdate } from "./types";

/** Highest annual borrow rate the curve may reach (base + slope1 + slope2). */
export const MAX_ANNUAL_RATE_BPS = 10_000n;

const MAX_DECIMALS = 36;

function invalid(asset: string, reason: string): RiskEngineError {
  return new RiskEngineError("InvalidParameter", `${asset}: ${reason}`, { asset });
}

/**
 * Validate a complete parameter set.
 * Throws InvalidParameter describing the first violated rule.
 */
export function validateAssetParameters(asset: string, params: AssetParameters): void {
  const bpsFields: Array<[string, bigint]> = [
    ["collateralFactorBps", params.collateralFactorBps],
    ["liquidationThresholdBps", params.liquidationThresholdBps],
    ["liquidationIncentiveBps", params.liquidationIncentiveBps],
    ["reserveFactorBps", params.interestRate.reserveFactorBps],
    ["kinkBps", params.interestRate.kinkBps],
  ];
  for (const [field, value] of bpsFields) {
    if (value < 0n || value > BPS) {
      throw invalid(asset, `${field} must be within [0, ${BPS}], got ${value}`);
    }
  }

  const { baseRateBps, slope1Bps, slope2Bps, kinkBps } = params.interestRate;
  for (const [field, value] of [
    ["baseRateBps", baseRateBps],
    ["slope1Bps", slope1Bps],
    ["slope2Bps", slope2Bps],
  ] as const) {
    if (value < 0n) throw invalid(asset, `${field} must be >= 0, got ${value}`);
  }
  if (kinkBps === 0n) {
    throw invalid(asset, "kinkBps must be > 0");
  }
  const maxRate = baseRateBps + slope1Bps + slope2Bps;
  if (maxRate > MAX_ANNUAL_RATE_BPS) {
    throw invalid(asset, `max annual borrow rate ${maxRate} bps exceeds ${MAX_ANNUAL_RATE_BPS} bps`);
  }

  if (params.isCollateral && params.liquidationThresholdBps < params.collateralFactorBps) {
    throw invalid(
      asset,
      `liquidationThresholdBps (${params.liquidationThresholdBps}) < collateralFactorBps (${params.collateralFactorBps})`,
    );
  }
  if (params.borrowCap < 0n || params.supplyCap < 0n) {
    throw invalid(asset, "caps must be >= 0");
  }
}

export function mergeAssetParameters(
  current: AssetParameters,
  update: AssetParametersUpdate,
): AssetParameters {
  const { interestRate, ...rest } = update;
  return {
    ...current,
    ...rest,
    interestRate: { ...current.interestRate, ...interestRate },
  };
}

function toParameters(asset: AssetConfig): AssetParameters {
  return {
    isCollateral: asset.isCollateral,
    isBorrowable: asset.isBorrowable,
    collateralFactorBps: asset.collateralFactorBps,
    liquidationThresholdBps: asset.liquidationThresholdBps,
    liquidationIncentiveBps: asset.liquidationIncentiveBps,
    borrowCap: asset.borrowCap,
    supplyCap: asset.supplyCap,
    interestRate: { ...asset.interestRate },
  };
}

export class RiskParameterStore {
  private readonly assets = new Map<string, AssetConfig>();

  constructor(initial: readonly AssetConfig[] = []) {
    for (const asset of initial) {
      this.registerAsset(asset);
    }
  }

  /** Add an asset to the lookup table. Listing governance lives elsewhere. */
  registerAsset(asset: AssetConfig): AssetConfig {
    if (!asset.id) {
      throw new RiskEngineError("InvalidParameter", "asset id is required");
    }
    if (this.assets.has(asset.id)) {
      throw invalid(asset.id, "asset already registered");
    }
    if (!Number.isInteger(asset.decimals) || asset.decimals < 0 || asset.decimals > MAX_DECIMALS) {
      throw invalid(asset.id, `decimals must be an integer within [0, ${MAX_DECIMALS}]`);
    }
    validateAssetParameters(asset.id, asset);
    const stored: AssetConfig = { ...asset, interestRate: { ...asset.interestRate } };
    this.assets.set(asset.id, stored);
    return stored;
  }

  has(asset: string): boolean {
    return this.assets.has(asset);
  }

  getAsset(asset: string): AssetConfig {
    const config = this.assets.get(asset);
    if (!config) {
      throw new RiskEngineError("AssetNotFound", `unknown asset ${asset}`, { asset });
    }
    return config;
  }

  getAssetParameters(asset: string): AssetParameters {
    return toParameters(this.getAsset(asset));
  }

  /** Merge, validate and return the parameters an update would produce. */
  previewAssetParameters(asset: string, update: AssetParametersUpdate): AssetParameters {
    const current = this.getAsset(asset);
    const next = mergeAssetParameters(toParameters(current), update);
    validateAssetParameters(asset, next);
    return next;
  }

  setAssetParameters(asset: string, update: AssetParametersUpdate): AssetParameters {
    const next = this.previewAssetParameters(asset, update);
    const current = this.getAsset(asset);
    this.assets.set(asset, { ...current, ...next, interestRate: { ...next.interestRate } });
    return next;
  }

  listAssets(): AssetConfig[] {
    return Array.from(this.assets.values());
  }
}
