/**
 * Lending Risk Engine - Configuration
 *
 * Reads from environment variables with sensible defaults.
 *
 *   CLOSE_FACTOR_BPS            share of one debt repayable per liquidation (5000)
 *   FULL_LIQUIDATION_THRESHOLD  health factor below which 100% is repayable ("0", off)
 *   MAX_PRICE_AGE_SECONDS       quotes older than this are stale (3600)
 *   INCENTIVE_ROUNDING          "down" | "up"
 *   GATE_MODE                   initial emergency gate mode ("active")
 *   ASSET_TABLE_PATH            JSON asset table loaded at startup
 *   RATE_LIMIT_<ACTION>         "<maxCalls>/<windowSeconds>[/account]"
 *   GUARDIANS, ADMINS           comma-separated role members
 */

import { parseUnits } from "ethers";
import { BPS, WAD, type Rounding } from "./math";
import { GATED_ACTIONS, isGateMode, type GateMode } from "./emergency-gate";
import type { RateLimitRule, RateLimitRules } from "./rate-limiter";

export interface EngineConfig {
  closeFactorBps: bigint;
  /** WAD */
  fullLiquidationThreshold: bigint;
  maxPriceAgeSeconds: number;
  incentiveRounding: Rounding;
  gateMode: GateMode;
  logLevel: string;
  assetTablePath?: string;
  rateLimits: RateLimitRules;
  guardians: string[];
  admins: string[];
  /** production | staging | development | test */
  environment: string;
}

function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseDecimal(name: string, value: string, decimals: number): bigint {
  try {
    return parseUnits(value, decimals);
  } catch (err) {
    throw new Error(`${name} must be a decimal number, got "${value}"`, { cause: err });
  }
}

function parseRounding(value: string | undefined): Rounding {
  if (value === undefined || value === "" || value === "down") return "down";
  if (value === "up") return "up";
  throw new Error(`INCENTIVE_ROUNDING must be "down" or "up", got "${value}"`);
}

function parseGateMode(value: string | undefined): GateMode {
  if (value === undefined || value === "") return "active";
  if (!isGateMode(value)) {
    throw new Error(`GATE_MODE must be active | risk-increasing-paused | all-paused, got "${value}"`);
  }
  return value;
}

/** "10/60" → 10 calls per 60s; a trailing "/account" counts per account. */
export function parseRateLimit(name: string, value: string): RateLimitRule {
  const [calls, window, scope, ...rest] = value.split("/").map((part) => part.trim());
  const maxCalls = Number(calls);
  const windowSeconds = Number(window);
  if (
    rest.length > 0 ||
    (scope !== undefined && scope !== "account") ||
    !Number.isInteger(maxCalls) ||
    !Number.isInteger(windowSeconds)
  ) {
    throw new Error(`${name} must look like "<maxCalls>/<windowSeconds>[/account]", got "${value}"`);
  }
  return { maxCalls, windowSeconds, perAccount: scope === "account" };
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const rateLimits: RateLimitRules = {};
  for (const action of GATED_ACTIONS) {
    const name = `RATE_LIMIT_${action.toUpperCase()}`;
    const value = env[name];
    if (value) rateLimits[action] = parseRateLimit(name, value);
  }

  return {
    closeFactorBps: env.CLOSE_FACTOR_BPS ? parseDecimal("CLOSE_FACTOR_BPS", env.CLOSE_FACTOR_BPS, 0) : 5_000n,
    fullLiquidationThreshold: parseDecimal(
      "FULL_LIQUIDATION_THRESHOLD",
      env.FULL_LIQUIDATION_THRESHOLD || "0",
      18,
    ),
    maxPriceAgeSeconds: Number(env.MAX_PRICE_AGE_SECONDS) || 3_600,
    incentiveRounding: parseRounding(env.INCENTIVE_ROUNDING),
    gateMode: parseGateMode(env.GATE_MODE),
    logLevel: env.LOG_LEVEL || "info",
    assetTablePath: env.ASSET_TABLE_PATH || undefined,
    rateLimits,
    guardians: parseList(env.GUARDIANS),
    admins: parseList(env.ADMINS),
    environment: env.NODE_ENV || "development",
  };
}

export const DEFAULT_CONFIG: EngineConfig = readConfig();

/**
 * Validate ranges and cross-field requirements.
 * Throws on the first problem found.
 */
export function validateConfig(config: EngineConfig): void {
  if (config.closeFactorBps <= 0n || config.closeFactorBps > BPS) {
    throw new Error(`CLOSE_FACTOR_BPS must be within (0, ${BPS}]`);
  }
  if (config.fullLiquidationThreshold < 0n || config.fullLiquidationThreshold > WAD) {
    throw new Error("FULL_LIQUIDATION_THRESHOLD must be within [0, 1.0]");
  }
  if (!Number.isInteger(config.maxPriceAgeSeconds) || config.maxPriceAgeSeconds < 1) {
    throw new Error("MAX_PRICE_AGE_SECONDS must be a positive integer");
  }
  for (const [action, rule] of Object.entries(config.rateLimits)) {
    if (rule && (rule.maxCalls < 1 || rule.windowSeconds < 1)) {
      throw new Error(`RATE_LIMIT_${action.toUpperCase()} must allow at least 1 call per second-long window`);
    }
  }
  if (config.environment === "production" && config.admins.length === 0) {
    throw new Error("ADMINS must name at least one admin in production");
  }
  const overlap = config.guardians.filter((member) => config.admins.includes(member));
  if (overlap.length > 0 && config.environment === "production") {
    throw new Error(`Guardian and admin roles must be held by distinct accounts: ${overlap.join(", ")}`);
  }
}
