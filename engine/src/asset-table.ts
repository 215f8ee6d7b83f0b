/**
 * Lending Risk Engine - Asset Table Loader
 *
 * Reads the listed-asset table from JSON. Ratios are human-readable decimals
 * ("0.8" = 80%) and caps are whole-token decimals; both are converted with
 * ethers.parseUnits so no float ever touches a risk parameter.
 *
 * {
 *   "assets": [{
 *     "id": "WETH", "symbol": "WETH", "decimals": 18, "priceSource": "feed:eth-usd",
 *     "isCollateral": true, "isBorrowable": true,
 *     "collateralFactor": "0.8", "liquidationThreshold": "0.85", "liquidationIncentive": "0.05",
 *     "borrowCap": "1000", "supplyCap": "0",
 *     "interestRate": { "baseRate": "0.02", "slope1": "0.04", "slope2": "0.75", "kink": "0.8", "reserveFactor": "0.1" }
 *   }]
 * }
 */

import * as fs from "fs";
import { parseUnits } from "ethers";
import { AssetTableValidationError, isRiskEngineError } from "./errors";
import { validateAssetParameters } from "./risk-parameter-store";
import type { AssetConfig, InterestRateCurve } from "./types";

/** Ratios are stored in bps, i.e. 4 decimal places */
const RATIO_DECIMALS = 4;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

class FieldReader {
  constructor(
    private readonly assetId: string,
    private readonly source: JsonObject,
    private readonly prefix = "",
  ) {}

  fail(field: string, reason: string): AssetTableValidationError {
    return new AssetTableValidationError(this.assetId, `${this.prefix}${field}`, reason);
  }

  string(field: string): string {
    const value = this.source[field];
    if (typeof value !== "string" || value.length === 0) {
      throw this.fail(field, "must be a non-empty string");
    }
    return value;
  }

  boolean(field: string): boolean {
    const value = this.source[field];
    if (typeof value !== "boolean") throw this.fail(field, "must be a boolean");
    return value;
  }

  integer(field: string): number {
    const value = this.source[field];
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw this.fail(field, "must be a non-negative integer");
    }
    return value;
  }

  /** Decimal string scaled to `decimals` places. */
  units(field: string, decimals: number): bigint {
    const raw = this.string(field);
    let value: bigint;
    try {
      value = parseUnits(raw, decimals);
    } catch {
      throw this.fail(field, `"${raw}" is not a decimal with at most ${decimals} places`);
    }
    if (value < 0n) throw this.fail(field, "must not be negative");
    return value;
  }

  ratio(field: string): bigint {
    return this.units(field, RATIO_DECIMALS);
  }

  object(field: string): FieldReader {
    const value = this.source[field];
    if (!isObject(value)) throw this.fail(field, "must be an object");
    return new FieldReader(this.assetId, value, `${this.prefix}${field}.`);
  }
}

function parseCurve(reader: FieldReader): InterestRateCurve {
  return {
    baseRateBps: reader.ratio("baseRate"),
    slope1Bps: reader.ratio("slope1"),
    slope2Bps: reader.ratio("slope2"),
    kinkBps: reader.ratio("kink"),
    reserveFactorBps: reader.ratio("reserveFactor"),
  };
}

function parseAsset(entry: unknown, index: number): AssetConfig {
  if (!isObject(entry)) {
    throw new AssetTableValidationError(`#${index}`, "", "asset entry must be an object");
  }
  const id = typeof entry.id === "string" && entry.id.length > 0 ? entry.id : `#${index}`;
  const reader = new FieldReader(id, entry);
  const decimals = reader.integer("decimals");

  const asset: AssetConfig = {
    id: reader.string("id"),
    symbol: reader.string("symbol"),
    decimals,
    priceSource: reader.string("priceSource"),
    isCollateral: reader.boolean("isCollateral"),
    isBorrowable: reader.boolean("isBorrowable"),
    collateralFactorBps: reader.ratio("collateralFactor"),
    liquidationThresholdBps: reader.ratio("liquidationThreshold"),
    liquidationIncentiveBps: reader.ratio("liquidationIncentive"),
    borrowCap: reader.units("borrowCap", decimals),
    supplyCap: reader.units("supplyCap", decimals),
    interestRate: parseCurve(reader.object("interestRate")),
  };

  try {
    validateAssetParameters(asset.id, asset);
  } catch (err) {
    if (isRiskEngineError(err, "InvalidParameter")) {
      throw new AssetTableValidationError(asset.id, "parameters", err.message);
    }
    throw err;
  }
  return asset;
}

/** Parse an already-decoded asset table. */
export function parseAssetTable(json: unknown): AssetConfig[] {
  if (!isObject(json) || !Array.isArray(json.assets)) {
    throw new AssetTableValidationError("<table>", "assets", "must be an array");
  }
  const assets = json.assets.map((entry, index) => parseAsset(entry, index));

  const seen = new Set<string>();
  for (const asset of assets) {
    if (seen.has(asset.id)) {
      throw new AssetTableValidationError(asset.id, "id", "duplicate asset id");
    }
    seen.add(asset.id);
  }
  return assets;
}

export function loadAssetTable(path: string): AssetConfig[] {
  const raw = fs.readFileSync(path, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Asset table ${path} is not valid JSON`, { cause: err });
  }
  return parseAssetTable(json);
}
