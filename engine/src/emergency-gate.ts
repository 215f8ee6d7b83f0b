/**
 * Lending Risk Engine - Emergency Gate
 *
 * Three layers of circuit breaker, checked at the entry of every mutating
 * operation:
 *
 *   1. global mode   — "active" | "risk-increasing-paused" | "all-paused"
 *   2. action pauses — e.g. pause only "borrow"
 *   3. market halts  — block everything touching one asset
 *
 * Guardians can only tighten; loosening any layer needs an admin.
 * Market halts are also tripped internally when accrual overflows.
 */

import { RiskEngineError } from "./errors";
import type { AccessControl } from "./access-control";
import type { LedgerAction } from "./types";

export type GatedAction = LedgerAction | "liquidate";

export type GateMode = "active" | "risk-increasing-paused" | "all-paused";

export const GATED_ACTIONS: readonly GatedAction[] = ["deposit", "withdraw", "borrow", "repay", "liquidate"];

/** Blocked in "risk-increasing-paused" mode */
export const RISK_INCREASING_ACTIONS: ReadonlySet<GatedAction> = new Set(["borrow", "withdraw", "liquidate"]);

const MODE_SEVERITY: Record<GateMode, number> = {
  active: 0,
  "risk-increasing-paused": 1,
  "all-paused": 2,
};

export const GATE_MODES: readonly GateMode[] = ["active", "risk-increasing-paused", "all-paused"];

export function isGateMode(value: string): value is GateMode {
  return GATE_MODES.some((mode) => mode === value);
}

export function isGatedAction(value: string): value is GatedAction {
  return GATED_ACTIONS.some((action) => action === value);
}

export interface MarketHalt {
  asset: string;
  reason: string;
  haltedBy: string;
}

export interface GateStatus {
  mode: GateMode;
  pausedActions: GatedAction[];
  haltedMarkets: MarketHalt[];
}

export class EmergencyGate {
  private _mode: GateMode;
  private readonly pausedActions = new Set<GatedAction>();
  private readonly halts = new Map<string, MarketHalt>();

  constructor(
    private readonly access: AccessControl,
    initialMode: GateMode = "active",
  ) {
    this._mode = initialMode;
  }

  get mode(): GateMode {
    return this._mode;
  }

  isPaused(action: GatedAction, asset?: string): boolean {
    if (this._mode === "all-paused") return true;
    if (this._mode === "risk-increasing-paused" && RISK_INCREASING_ACTIONS.has(action)) return true;
    if (this.pausedActions.has(action)) return true;
    return asset !== undefined && this.halts.has(asset);
  }

  isHalted(asset: string): boolean {
    return this.halts.has(asset);
  }

  /** Throws OperationPaused if `action` is blocked for any of `assets`. */
  assertAllowed(action: GatedAction, assets: readonly string[]): void {
    if (this.isPaused(action)) {
      throw new RiskEngineError("OperationPaused", `${action} is paused`, { action, mode: this._mode });
    }
    for (const asset of assets) {
      const halt = this.halts.get(asset);
      if (halt) {
        throw new RiskEngineError("OperationPaused", `market ${asset} is halted: ${halt.reason}`, {
          action,
          asset,
          reason: halt.reason,
        });
      }
    }
  }

  // ─── Governance ──────────────────────────────────────────────────────

  pause(caller: string, action: GatedAction): void {
    this.access.requireRole("guardian", caller);
    this.pausedActions.add(action);
  }

  unpause(caller: string, action: GatedAction): void {
    this.access.requireRole("admin", caller);
    this.pausedActions.delete(action);
  }

  /** Guardians may raise the mode; lowering it takes an admin. */
  setMode(caller: string, mode: GateMode): void {
    const lowering = MODE_SEVERITY[mode] < MODE_SEVERITY[this._mode];
    this.access.requireRole(lowering ? "admin" : "guardian", caller);
    this._mode = mode;
  }

  haltMarket(caller: string, asset: string, reason: string): MarketHalt {
    this.access.requireRole("guardian", caller);
    return this.tripMarket(asset, reason, caller);
  }

  resumeMarket(caller: string, asset: string): void {
    this.access.requireRole("admin", caller);
    this.halts.delete(asset);
  }

  /** Internal halt, e.g. on AccrualOverflow. Keeps the first recorded reason. */
  tripMarket(asset: string, reason: string, haltedBy = "engine"): MarketHalt {
    const existing = this.halts.get(asset);
    if (existing) return existing;
    const halt = { asset, reason, haltedBy };
    this.halts.set(asset, halt);
    return halt;
  }

  status(): GateStatus {
    return {
      mode: this._mode,
      pausedActions: Array.from(this.pausedActions),
      haltedMarkets: Array.from(this.halts.values()),
    };
  }
}
