import { NotFoundError } from './errors.js';
import type { WorkRequestRepository } from './repository.js';
import type { RoutingEngine } from './routing.js';
import type { SlaTracker } from './sla.js';
import {
  isTerminal,
  type RequestStatus,
  type RequestVariant,
  type SlaSweepResult,
  type WorkRequest,
  type WorkRequestStatistics
} from './types.js';
import type { WorkloadEntry } from './workload.js';

function emptyStatistics(): WorkRequestStatistics {
  return {
    total: 0,
    byStatus: { PENDING: 0, IN_PROGRESS: 0, APPROVED: 0, REJECTED: 0, CANCELLED: 0, COMPLETED: 0 },
    byVariant: {
      ITEM_CLAIM: 0,
      CROSS_CAMPUS_TRANSFER: 0,
      TRANSIT_TO_UNIVERSITY_TRANSFER: 0,
      AIRPORT_TO_UNIVERSITY_TRANSFER: 0,
      POLICE_EVIDENCE_REQUEST: 0,
      TRANSIT_TO_AIRPORT_EMERGENCY: 0,
      MULTI_ENTERPRISE_DISPUTE: 0
    },
    awaitingRole: {
      CAMPUS_COORDINATOR: 0,
      HIGH_VALUE_VERIFIER: 0,
      POLICE_EVIDENCE_CUSTODIAN: 0,
      STATION_MANAGER: 0,
      AIRPORT_LOST_FOUND_SPECIALIST: 0,
      TSA_SECURITY_COORDINATOR: 0
    }
  };
}

export interface RequestFilter {
  status?: RequestStatus;
  variant?: RequestVariant;
  requesterId?: string;
  approverId?: string;
}

export class QueryFacade {
  private readonly repository: WorkRequestRepository;
  private readonly sla: SlaTracker;
  private readonly routing: RoutingEngine;

  constructor(repository: WorkRequestRepository, sla: SlaTracker, routing: RoutingEngine) {
    this.repository = repository;
    this.sla = sla;
    this.routing = routing;
  }

  async getRequest(requestId: string): Promise<WorkRequest> {
    const request = await this.repository.findById(requestId);
    if (!request) {
      throw new NotFoundError(`request not found: ${requestId}`);
    }
    return request;
  }

  queryByStatus(status: RequestStatus): Promise<WorkRequest[]> {
    return this.repository.findByStatus(status);
  }

  queryByVariant(variant: RequestVariant): Promise<WorkRequest[]> {
    return this.repository.findByVariant(variant);
  }

  queryByRequester(requesterId: string): Promise<WorkRequest[]> {
    return this.repository.findByRequester(requesterId);
  }

  /** Every filter given must match. No filter lists every request. */
  async search(filter: RequestFilter = {}): Promise<WorkRequest[]> {
    const requests = await this.repository.findAll();
    return requests.filter(
      (request) =>
        (filter.status === undefined || request.status === filter.status) &&
        (filter.variant === undefined || request.variant === filter.variant) &&
        (filter.requesterId === undefined || request.requesterId === filter.requesterId) &&
        (filter.approverId === undefined || request.currentApproverId === filter.approverId)
    );
  }

  /** The approver's work queue: requests currently waiting on their decision. */
  async queryPendingForApprover(approverId: string): Promise<WorkRequest[]> {
    const assigned = await this.repository.findByApprover(approverId);
    return assigned.filter((request) => request.status === 'IN_PROGRESS');
  }

  async getStatistics(): Promise<WorkRequestStatistics> {
    const requests = await this.repository.findAll();
    const statistics = emptyStatistics();
    statistics.total = requests.length;
    for (const request of requests) {
      statistics.byStatus[request.status] += 1;
      statistics.byVariant[request.variant] += 1;
      const step = request.approvalChain[request.currentStepIndex];
      if (step && !isTerminal(request.status)) {
        statistics.awaitingRole[step.role] += 1;
      }
    }
    return statistics;
  }

  async slaSweep(now: Date): Promise<SlaSweepResult> {
    const requests = await this.repository.findAll();
    return this.sla.sweep(
      requests.filter((request) => !isTerminal(request.status)),
      now
    );
  }

  async overdueRequests(now: Date): Promise<WorkRequest[]> {
    const requests = await this.repository.findAll();
    return requests.filter((request) => this.sla.classify(request, now) === 'OVERDUE');
  }

  workload(): WorkloadEntry[] {
    return this.routing.workloadSnapshot();
  }
}
