/**
 * Lending Risk Engine - Rate Limiter
 *
 * Sliding-window throughput cap per action, optionally per account.
 * check() runs before an operation; record() runs only after it commits, so
 * rejected operations never consume a slot.
 */

import { RiskEngineError } from "./errors";
import { GATED_ACTIONS, type GatedAction } from "./emergency-gate";

export interface RateLimitRule {
  maxCalls: number;
  windowSeconds: number;
  /** Count calls per account instead of globally */
  perAccount?: boolean;
}

export type RateLimitRules = Partial<Record<GatedAction, RateLimitRule>>;

export function validateRateLimitRule(action: string, rule: RateLimitRule): void {
  if (!Number.isInteger(rule.maxCalls) || rule.maxCalls < 1) {
    throw new RiskEngineError("InvalidParameter", `rate limit for ${action}: maxCalls must be a positive integer`, {
      action,
      maxCalls: rule.maxCalls,
    });
  }
  if (!Number.isInteger(rule.windowSeconds) || rule.windowSeconds < 1) {
    throw new RiskEngineError(
      "InvalidParameter",
      `rate limit for ${action}: windowSeconds must be a positive integer`,
      { action, windowSeconds: rule.windowSeconds },
    );
  }
}

export class RateLimiter {
  private readonly rules = new Map<GatedAction, RateLimitRule>();
  private readonly timestamps = new Map<string, number[]>();

  constructor(rules: RateLimitRules = {}) {
    for (const action of GATED_ACTIONS) {
      const rule = rules[action];
      if (rule) this.setRule(action, rule);
    }
  }

  setRule(action: GatedAction, rule: RateLimitRule): void {
    validateRateLimitRule(action, rule);
    this.rules.set(action, { ...rule });
  }

  removeRule(action: GatedAction): void {
    this.rules.delete(action);
    for (const key of Array.from(this.timestamps.keys())) {
      if (key === action || key.startsWith(`${action}:`)) this.timestamps.delete(key);
    }
  }

  getRule(action: GatedAction): RateLimitRule | undefined {
    return this.rules.get(action);
  }

  /** Calls counted in the current window for `action` (and `account` if per-account). */
  usage(action: GatedAction, account: string, now: number): number {
    const rule = this.rules.get(action);
    if (!rule) return 0;
    return this.prune(this.keyFor(action, account, rule), rule, now).length;
  }

  check(action: GatedAction, account: string, now: number): void {
    const rule = this.rules.get(action);
    if (!rule) return;
    const window = this.prune(this.keyFor(action, account, rule), rule, now);
    if (window.length >= rule.maxCalls) {
      const retryAfter = window[0] + rule.windowSeconds - now;
      throw new RiskEngineError(
        "RateLimited",
        `${action} limited to ${rule.maxCalls} calls per ${rule.windowSeconds}s`,
        { action, account, maxCalls: rule.maxCalls, windowSeconds: rule.windowSeconds, retryAfter },
      );
    }
  }

  record(action: GatedAction, account: string, now: number): void {
    const rule = this.rules.get(action);
    if (!rule) return;
    const key = this.keyFor(action, account, rule);
    const window = this.prune(key, rule, now);
    window.push(now);
    this.timestamps.set(key, window);
  }

  private keyFor(action: GatedAction, account: string, rule: RateLimitRule): string {
    return rule.perAccount ? `${action}:${account}` : action;
  }

  private prune(key: string, rule: RateLimitRule, now: number): number[] {
    const window = (this.timestamps.get(key) ?? []).filter((ts) => now - ts < rule.windowSeconds);
    this.timestamps.set(key, window);
    return window;
  }
}
