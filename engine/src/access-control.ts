/**
 * Lending Risk Engine - Governance Roles
 *
 * Guardians may only make the engine safer (pause, halt). Admins may also
 * restore normal operation and change risk parameters.
 */

import { RiskEngineError } from "./errors";

export type Role = "admin" | "guardian";

export interface RoleAssignments {
  admins: readonly string[];
  guardians: readonly string[];
}

export class AccessControl {
  private readonly members: Record<Role, Set<string>>;

  constructor(assignments: RoleAssignments) {
    this.members = {
      admin: new Set(assignments.admins),
      guardian: new Set(assignments.guardians),
    };
  }

  hasRole(role: Role, caller: string): boolean {
    // Admins hold every guardian power
    if (role === "guardian" && this.members.admin.has(caller)) return true;
    return this.members[role].has(caller);
  }

  requireRole(role: Role, caller: string): void {
    if (!this.hasRole(role, caller)) {
      throw new RiskEngineError("Unauthorized", `${caller} lacks the ${role} role`, { caller, role });
    }
  }

  grant(caller: string, role: Role, member: string): void {
    this.requireRole("admin", caller);
    this.members[role].add(member);
  }

  revoke(caller: string, role: Role, member: string): void {
    this.requireRole("admin", caller);
    if (role === "admin" && member === caller) {
      throw new RiskEngineError("InvalidParameter", "admins cannot revoke their own admin role", { caller });
    }
    this.members[role].delete(member);
  }
}
