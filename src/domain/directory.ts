import type { ApproverRole, Scope } from './types.js';

/**
 * Capability and directory lookups owned by the organization's authority
 * service. The workflow only asks yes/no and "who can".
 */
export interface ApproverDirectory {
  canAct(userId: string, role: ApproverRole, scope: Scope): Promise<boolean>;
  listCandidates(role: ApproverRole, scope: Scope): Promise<string[]>;
}

export interface ApproverMembership {
  userId: string;
  enterpriseId: string;
  /** null: the member acts for every organization of the enterprise. */
  organizationId: string | null;
  roles: ApproverRole[];
}

export interface MembershipRegistry {
  upsertMembership(membership: ApproverMembership): ApproverMembership;
  removeMembership(userId: string): boolean;
  listMemberships(): ApproverMembership[];
}

export class InMemoryApproverDirectory implements ApproverDirectory, MembershipRegistry {
  private readonly memberships = new Map<string, ApproverMembership>();

  constructor(initial: ApproverMembership[] = []) {
    for (const membership of initial) {
      this.upsertMembership(membership);
    }
  }

  upsertMembership(membership: ApproverMembership): ApproverMembership {
    const normalized: ApproverMembership = {
      userId: membership.userId.trim(),
      enterpriseId: membership.enterpriseId.trim(),
      organizationId: membership.organizationId?.trim() || null,
      roles: [...new Set(membership.roles)]
    };
    this.memberships.set(normalized.userId, normalized);
    return structuredClone(normalized);
  }

  removeMembership(userId: string): boolean {
    return this.memberships.delete(userId);
  }

  listMemberships(): ApproverMembership[] {
    return [...this.memberships.values()]
      .sort((a, b) => a.userId.localeCompare(b.userId))
      .map((membership) => structuredClone(membership));
  }

  async canAct(userId: string, role: ApproverRole, scope: Scope): Promise<boolean> {
    const membership = this.memberships.get(userId);
    return membership !== undefined && this.covers(membership, role, scope);
  }

  async listCandidates(role: ApproverRole, scope: Scope): Promise<string[]> {
    return [...this.memberships.values()]
      .filter((membership) => this.covers(membership, role, scope))
      .map((membership) => membership.userId)
      .sort();
  }

  private covers(membership: ApproverMembership, role: ApproverRole, scope: Scope): boolean {
    if (!membership.roles.includes(role) || membership.enterpriseId !== scope.enterpriseId) {
      return false;
    }
    return membership.organizationId === null || membership.organizationId === scope.organizationId;
  }
}
