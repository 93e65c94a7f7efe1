import type { ApproverRole, Scope } from './types.js';

export interface WorkloadEntry {
  approverId: string;
  role: ApproverRole;
  organizationId: string;
  enterpriseId: string;
  active: number;
}

function entryKey(approverId: string, role: ApproverRole, scope: Scope): string {
  return [approverId, role, scope.organizationId, scope.enterpriseId].join('|');
}

/**
 * Active-assignment counters per approver, role and scope. Every mutation is
 * synchronous, so a read-modify-write never interleaves with another caller.
 */
export class ApproverWorkload {
  private readonly entries = new Map<string, WorkloadEntry>();
  private readonly totals = new Map<string, number>();

  increment(approverId: string, role: ApproverRole, scope: Scope): number {
    const key = entryKey(approverId, role, scope);
    const entry = this.entries.get(key) ?? {
      approverId,
      role,
      organizationId: scope.organizationId,
      enterpriseId: scope.enterpriseId,
      active: 0
    };
    entry.active += 1;
    this.entries.set(key, entry);
    this.totals.set(approverId, (this.totals.get(approverId) ?? 0) + 1);
    return entry.active;
  }

  /** Never drops below zero; returns the remaining count for the entry. */
  decrement(approverId: string, role: ApproverRole, scope: Scope): number {
    const key = entryKey(approverId, role, scope);
    const entry = this.entries.get(key);
    if (!entry || entry.active === 0) {
      return 0;
    }
    entry.active -= 1;
    if (entry.active === 0) {
      this.entries.delete(key);
    }
    const total = (this.totals.get(approverId) ?? 1) - 1;
    if (total <= 0) {
      this.totals.delete(approverId);
    } else {
      this.totals.set(approverId, total);
    }
    return entry.active;
  }

  activeFor(approverId: string): number {
    return this.totals.get(approverId) ?? 0;
  }

  countFor(approverId: string, role: ApproverRole, scope: Scope): number {
    return this.entries.get(entryKey(approverId, role, scope))?.active ?? 0;
  }

  snapshot(): WorkloadEntry[] {
    return [...this.entries.values()]
      .map((entry) => ({ ...entry }))
      .sort((a, b) => a.approverId.localeCompare(b.approverId) || a.role.localeCompare(b.role));
  }

  reset(): void {
    this.entries.clear();
    this.totals.clear();
  }
}
