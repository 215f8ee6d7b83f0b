/**
 * Lending Risk Engine - Prometheus Metrics
 *
 * Metrics naming convention:  lending_<subsystem>_<metric>_<unit>
 *
 * Runtime (default) metrics are not collected here; a hosting process that
 * wants them registers collectDefaultMetrics against `register` itself.
 */

import { Registry, Counter, Gauge, Histogram } from "prom-client";

// ============================================================
//  REGISTRY
// ============================================================

export const register: Registry = new Registry();

// ============================================================
//  COUNTERS
// ============================================================

/** Mutating operations by outcome. */
export const operationsTotal = new Counter({
  name: "lending_operations_total",
  help: "Total ledger operations processed",
  labelNames: ["action", "status"] as const, // status: committed | rejected
  registers: [register],
});

/** Rejections by error code (OperationPaused, StalePrice, ...). */
export const rejectionsTotal = new Counter({
  name: "lending_rejected_operations_total",
  help: "Rejected operations by error code",
  labelNames: ["action", "code"] as const,
  registers: [register],
});

export const liquidationsTotal = new Counter({
  name: "lending_liquidations_total",
  help: "Total liquidations executed",
  labelNames: ["repay_asset", "seize_asset"] as const,
  registers: [register],
});

/** Whole-token units. */
export const badDebtTotal = new Counter({
  name: "lending_bad_debt_recorded_total",
  help: "Bad debt booked by liquidations, in whole tokens",
  labelNames: ["asset"] as const,
  registers: [register],
});

// ============================================================
//  GAUGES
// ============================================================

/** 0 = active, 1 = risk-increasing-paused, 2 = all-paused */
export const gateMode = new Gauge({
  name: "lending_gate_mode",
  help: "Emergency gate mode (0=active, 1=risk-increasing-paused, 2=all-paused)",
  registers: [register],
});

export const marketHalted = new Gauge({
  name: "lending_market_halted",
  help: "1 if the market is halted, 0 otherwise",
  labelNames: ["asset"] as const,
  registers: [register],
});

export const marketUtilization = new Gauge({
  name: "lending_market_utilization_ratio",
  help: "Borrows / supply after the last committed operation",
  labelNames: ["asset"] as const,
  registers: [register],
});

// ============================================================
//  HISTOGRAMS
// ============================================================

export const operationDuration = new Histogram({
  name: "lending_operation_duration_seconds",
  help: "Wall time of mutating operations",
  labelNames: ["action"] as const,
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [register],
});

/** Prometheus text exposition of every engine metric. */
export async function renderMetrics(): Promise<string> {
  return register.metrics();
}
