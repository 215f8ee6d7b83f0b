/**
 * Lending Risk Engine
 *
 * Collateral, debt, interest accrual, health factors and liquidation for a
 * collateralized money market.
 */

export * from "./math";
export * from "./errors";
export * from "./types";
export * from "./interest-rate-model";
export * from "./risk-parameter-store";
export * from "./ledger-state";
export * from "./interest-accrual-index";
export * from "./health-engine";
export * from "./position-ledger";
export * from "./liquidation-engine";
export * from "./access-control";
export * from "./emergency-gate";
export * from "./rate-limiter";
export * from "./config";
export * from "./asset-table";
export { logger, scopedLogger } from "./logger";
export { register, renderMetrics } from "./metrics";
export { RiskEngine, type RiskEngineEvents, type RiskEngineOptions, type GovernanceAction } from "./risk-engine";
