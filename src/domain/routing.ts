import { log } from '../observability/logger.js';
import type { ApproverDirectory } from './directory.js';
import { ApproverWorkload, type WorkloadEntry } from './workload.js';
import type { ApproverRole, Scope } from './types.js';

export class RoutingEngine {
  private readonly directory: ApproverDirectory;
  private readonly workload: ApproverWorkload;

  constructor(directory: ApproverDirectory, workload: ApproverWorkload = new ApproverWorkload()) {
    this.directory = directory;
    this.workload = workload;
  }

  /**
   * Least-loaded eligible approver for the role within the scope, ties broken
   * by approver id. Approvers in `excluded` are never chosen. Returns null
   * when nobody qualifies; the caller keeps the step unassigned.
   */
  async assign(role: ApproverRole, scope: Scope, excluded: readonly string[] = []): Promise<string | null> {
    const candidates = (await this.directory.listCandidates(role, scope)).filter(
      (candidate) => !excluded.includes(candidate)
    );
    if (candidates.length === 0) {
      return null;
    }

    // no await between selection and increment
    const [selected] = [...new Set(candidates)].sort((a, b) => {
      const load = this.workload.activeFor(a) - this.workload.activeFor(b);
      return load !== 0 ? load : a.localeCompare(b);
    });
    if (selected === undefined) {
      return null;
    }
    const active = this.workload.increment(selected, role, scope);
    log('DEBUG', 'approver assigned', { approverId: selected, role, scope, active });
    return selected;
  }

  release(approverId: string, role: ApproverRole, scope: Scope): void {
    this.workload.decrement(approverId, role, scope);
  }

  canAct(approverId: string, role: ApproverRole, scope: Scope): Promise<boolean> {
    return this.directory.canAct(approverId, role, scope);
  }

  async hasAvailableApprovers(role: ApproverRole, scope: Scope): Promise<boolean> {
    const candidates = await this.directory.listCandidates(role, scope);
    return candidates.length > 0;
  }

  activeAssignments(approverId: string): number {
    return this.workload.activeFor(approverId);
  }

  workloadSnapshot(): WorkloadEntry[] {
    return this.workload.snapshot();
  }
}
