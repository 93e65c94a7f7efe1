import { randomUUID } from 'node:crypto';
import { log } from '../observability/logger.js';
import { RequestCatalog, summarize } from './catalog.js';
import { resolveApprovalChain, resolveTargetScope, scopeForStep } from './chain.js';
import { DEFAULT_WORKFLOW_CONFIG, type WorkflowConfig } from './config.js';
import { AuthorizationError, DomainError, InvalidStateError, NotFoundError, ValidationError } from './errors.js';
import { KeyedMutex } from './mutex.js';
import { resolvePriority } from './priority.js';
import type { WorkRequestRepository } from './repository.js';
import type { RoutingEngine } from './routing.js';
import {
  isTerminal,
  type ActorContext,
  type ApprovalEvent,
  type ApproveOptions,
  type ApproverRole,
  type CreateRequestInput,
  type Scope,
  type WorkRequest
} from './types.js';

export const SYSTEM_ACTOR = 'system';

interface EngineOptions {
  now?: () => Date;
  idGenerator?: () => string;
  config?: WorkflowConfig;
}

interface Assignment {
  approverId: string;
  role: ApproverRole;
  scope: Scope;
}

type Transition = 'approve' | 'reject' | 'cancel' | 'complete' | 'reroute' | 'note';

export class WorkflowEngine {
  private readonly repository: WorkRequestRepository;
  private readonly routing: RoutingEngine;
  private readonly catalog: RequestCatalog;
  private readonly config: WorkflowConfig;
  private readonly locks = new KeyedMutex();
  private readonly options: EngineOptions;

  constructor(repository: WorkRequestRepository, routing: RoutingEngine, options?: EngineOptions) {
    this.repository = repository;
    this.routing = routing;
    this.options = options ?? {};
    this.config = this.options.config ?? DEFAULT_WORKFLOW_CONFIG;
    this.catalog = new RequestCatalog(this.config.thresholds);
  }

  async create(input: CreateRequestInput, requester: ActorContext): Promise<WorkRequest> {
    if (!requester.userId.trim()) {
      throw new ValidationError('requester identity is required', [{ path: 'requester', message: 'userId is required' }]);
    }
    const result = this.catalog.validate(input.variant, input.payload);
    if (!result.ok) {
      log('INFO', 'request failed validation', { variant: input.variant, issues: result.error.issues });
      throw result.error;
    }

    const validated = result.request;
    const now = this.nowIso();
    const request: WorkRequest = {
      ...validated,
      requestId: this.nextId('wr'),
      status: 'PENDING',
      priority: resolvePriority(validated, this.config.thresholds, input.priority),
      summary: summarize(validated),
      requesterId: requester.userId,
      requesterScope: { ...requester.scope },
      targetScope: { ...resolveTargetScope(validated, requester.scope, input.targetScope) },
      approvalChain: resolveApprovalChain(validated, this.config.thresholds),
      currentStepIndex: 0,
      currentApproverId: null,
      events: [],
      rejectionReason: null,
      version: 1,
      createdAt: now,
      updatedAt: now,
      completedAt: null
    };

    const assignment = await this.routeCurrentStep(request);
    try {
      await this.repository.create(request);
    } catch (error) {
      this.releaseAssignment(assignment);
      throw error;
    }

    log('INFO', 'work request created', {
      workRequestId: request.requestId,
      variant: request.variant,
      priority: request.priority,
      chain: request.approvalChain.map((step) => step.role),
      approverId: request.currentApproverId
    });
    return this.clone(request);
  }

  async approve(requestId: string, actorId: string, options: ApproveOptions = {}): Promise<WorkRequest> {
    return this.transition(requestId, 'approve', async (request) => {
      const expectedVersion = request.version;
      this.assertAwaitingDecision(request);
      if (options.stepIndex !== undefined && options.stepIndex !== request.currentStepIndex) {
        throw new InvalidStateError(
          `step ${options.stepIndex} is not the current step of ${request.requestId} (current: ${request.currentStepIndex})`
        );
      }
      const outgoing = await this.assertCurrentApprover(request, actorId);

      this.appendEvent(request, {
        actorId,
        action: 'APPROVED',
        stepIndex: request.currentStepIndex,
        assigneeId: null,
        note: options.note?.trim() || null
      });
      request.currentStepIndex += 1;
      request.currentApproverId = null;
      request.updatedAt = this.nowIso();

      let incoming: Assignment | null = null;
      if (request.currentStepIndex >= request.approvalChain.length) {
        request.status = 'APPROVED';
      } else {
        incoming = await this.routeCurrentStep(request);
      }

      await this.commit(request, expectedVersion, incoming);
      this.releaseAssignment(outgoing);
      log('INFO', 'approval step recorded', {
        workRequestId: request.requestId,
        actorId,
        stepIndex: request.currentStepIndex - 1,
        status: request.status
      });
      return request;
    });
  }

  async reject(requestId: string, actorId: string, reason: string): Promise<WorkRequest> {
    return this.transition(requestId, 'reject', async (request) => {
      const expectedVersion = request.version;
      this.assertAwaitingDecision(request);
      const outgoing = await this.assertCurrentApprover(request, actorId);
      const trimmed = reason.trim();
      if (!trimmed) {
        throw new ValidationError('rejection reason is required', [{ path: 'reason', message: 'reason is required' }]);
      }

      request.status = 'REJECTED';
      request.rejectionReason = trimmed;
      request.currentApproverId = null;
      request.updatedAt = this.nowIso();
      this.appendEvent(request, {
        actorId,
        action: 'REJECTED',
        stepIndex: request.currentStepIndex,
        assigneeId: null,
        note: trimmed
      });

      await this.commit(request, expectedVersion, null);
      this.releaseAssignment(outgoing);
      log('INFO', 'work request rejected', { workRequestId: request.requestId, actorId, reason: trimmed });
      return request;
    });
  }

  async cancel(requestId: string, actorId: string): Promise<WorkRequest> {
    return this.transition(requestId, 'cancel', async (request) => {
      const expectedVersion = request.version;
      if (isTerminal(request.status)) {
        throw new InvalidStateError(`request is terminal: ${request.status}`);
      }
      if (request.status === 'APPROVED') {
        throw new InvalidStateError('approved requests can only be completed');
      }
      if (request.requesterId !== actorId) {
        throw new AuthorizationError('only the requester can cancel a request');
      }

      const outgoing = this.currentAssignment(request);
      request.status = 'CANCELLED';
      request.currentApproverId = null;
      request.updatedAt = this.nowIso();
      this.appendEvent(request, {
        actorId,
        action: 'CANCELLED',
        stepIndex: request.currentStepIndex,
        assigneeId: null,
        note: null
      });

      await this.commit(request, expectedVersion, null);
      this.releaseAssignment(outgoing);
      log('INFO', 'work request cancelled', { workRequestId: request.requestId, actorId });
      return request;
    });
  }

  /** Confirms the physical handoff once every approval is in. */
  async complete(requestId: string, actorId: string = SYSTEM_ACTOR): Promise<WorkRequest> {
    return this.transition(requestId, 'complete', async (request) => {
      const expectedVersion = request.version;
      if (request.status !== 'APPROVED') {
        throw new InvalidStateError(`complete requires status APPROVED, found ${request.status}`);
      }

      const now = this.nowIso();
      request.status = 'COMPLETED';
      request.completedAt = now;
      request.updatedAt = now;
      this.appendEvent(request, { actorId, action: 'COMPLETED', stepIndex: null, assigneeId: null, note: null });

      await this.commit(request, expectedVersion, null);
      log('INFO', 'work request completed', { workRequestId: request.requestId, actorId });
      return request;
    });
  }

  /**
   * Retries routing for a request left without an approver, or whose assigned
   * approver no longer holds the step's role in its scope.
   */
  async reroute(requestId: string): Promise<WorkRequest> {
    return this.transition(requestId, 'reroute', async (request) => {
      const expectedVersion = request.version;
      const outgoing = await this.revokedAssignment(request);
      const unassigned = request.status === 'PENDING' && request.currentApproverId === null;
      if (!unassigned && !outgoing) {
        throw new InvalidStateError(`request ${request.requestId} is not awaiting routing (status: ${request.status})`);
      }

      const incoming = await this.routeCurrentStep(request);
      if (!incoming && !outgoing) {
        return request;
      }
      if (!incoming) {
        request.updatedAt = this.nowIso();
      }
      await this.commit(request, expectedVersion, incoming);
      this.releaseAssignment(outgoing);
      if (outgoing) {
        log('INFO', 'revoked approver replaced', {
          workRequestId: request.requestId,
          stepIndex: request.currentStepIndex,
          previousApproverId: outgoing.approverId,
          approverId: request.currentApproverId
        });
      }
      return request;
    });
  }

  /** Reroutes parked requests and those held by an approver who lost the step's role. Returns the ids now assigned. */
  async rerouteUnassigned(): Promise<string[]> {
    const candidates = [
      ...(await this.repository.findByStatus('PENDING')),
      ...(await this.repository.findByStatus('IN_PROGRESS'))
    ];
    const routed: string[] = [];
    for (const candidate of candidates) {
      const eligible =
        candidate.status === 'PENDING'
          ? candidate.currentApproverId === null
          : (await this.revokedAssignment(candidate)) !== null;
      if (!eligible) {
        continue;
      }
      try {
        const request = await this.reroute(candidate.requestId);
        if (request.currentApproverId !== null) {
          routed.push(request.requestId);
        }
      } catch (error) {
        // another caller moved the request on since it was listed
        if (!(error instanceof InvalidStateError)) {
          throw error;
        }
      }
    }
    return routed;
  }

  /** Audit notes are accepted in every status, terminal ones included. */
  async addNote(requestId: string, actorId: string, note: string): Promise<WorkRequest> {
    return this.transition(requestId, 'note', async (request) => {
      const expectedVersion = request.version;
      const trimmed = note.trim();
      if (!trimmed) {
        throw new ValidationError('note is required', [{ path: 'note', message: 'note is required' }]);
      }
      const participant =
        request.requesterId === actorId ||
        request.currentApproverId === actorId ||
        request.events.some((event) => event.actorId === actorId || event.assigneeId === actorId);
      if (!participant) {
        throw new AuthorizationError('only participants of a request can add notes');
      }

      request.updatedAt = this.nowIso();
      this.appendEvent(request, { actorId, action: 'NOTED', stepIndex: null, assigneeId: null, note: trimmed });
      await this.commit(request, expectedVersion, null);
      return request;
    });
  }

  async getRequest(requestId: string): Promise<WorkRequest> {
    return this.requireRequest(requestId);
  }

  private async transition(
    requestId: string,
    action: Transition,
    fn: (request: WorkRequest) => Promise<WorkRequest>
  ): Promise<WorkRequest> {
    try {
      return await this.locks.runExclusive(requestId, async () => {
        const request = await this.requireRequest(requestId);
        return this.clone(await fn(request));
      });
    } catch (error) {
      if (error instanceof InvalidStateError || error instanceof AuthorizationError) {
        log('WARN', 'transition refused', { workRequestId: requestId, action, code: error.code, reason: error.message });
      } else if (!(error instanceof DomainError)) {
        log('ERROR', 'transition failed', {
          workRequestId: requestId,
          action,
          error: error instanceof Error ? error.message : String(error)
        });
      }
      throw error;
    }
  }

  private assertAwaitingDecision(request: WorkRequest): void {
    if (isTerminal(request.status)) {
      throw new InvalidStateError(`request is terminal: ${request.status}`);
    }
    if (request.status === 'APPROVED') {
      throw new InvalidStateError('all approval steps are already consumed');
    }
    if (request.status === 'PENDING') {
      throw new InvalidStateError('request is awaiting approver assignment');
    }
  }

  private async assertCurrentApprover(request: WorkRequest, actorId: string): Promise<Assignment> {
    const current = this.currentAssignment(request);
    if (!current) {
      throw new InvalidStateError('request has no assigned approver');
    }
    if (current.approverId !== actorId) {
      const handledEarlier = request.events.some(
        (event) =>
          event.action === 'APPROVED' &&
          event.actorId === actorId &&
          event.stepIndex !== null &&
          event.stepIndex < request.currentStepIndex
      );
      if (handledEarlier) {
        throw new InvalidStateError(`approval by ${actorId} was already recorded for an earlier step`);
      }
      throw new AuthorizationError(`only the assigned approver can act on step ${request.currentStepIndex}`);
    }
    if (!(await this.routing.canAct(actorId, current.role, current.scope))) {
      throw new AuthorizationError(`${actorId} cannot act as ${current.role} in this scope`);
    }
    return current;
  }

  private async revokedAssignment(request: WorkRequest): Promise<Assignment | null> {
    const current = request.status === 'IN_PROGRESS' ? this.currentAssignment(request) : null;
    if (!current || (await this.routing.canAct(current.approverId, current.role, current.scope))) {
      return null;
    }
    return current;
  }

  private currentAssignment(request: WorkRequest): Assignment | null {
    const step = request.approvalChain[request.currentStepIndex];
    if (!step || request.currentApproverId === null) {
      return null;
    }
    return { approverId: request.currentApproverId, role: step.role, scope: scopeForStep(request, step) };
  }

  /**
   * Assigns the approver for the current step; leaves it unassigned and PENDING
   * when nobody qualifies. Whoever approved an earlier step is not eligible.
   */
  private async routeCurrentStep(request: WorkRequest): Promise<Assignment | null> {
    const step = request.approvalChain[request.currentStepIndex];
    if (!step) {
      return null;
    }
    const scope = scopeForStep(request, step);
    const priorApprovers = request.events
      .filter((event) => event.action === 'APPROVED')
      .map((event) => event.actorId);
    const approverId = await this.routing.assign(step.role, scope, priorApprovers);
    if (approverId === null) {
      request.status = 'PENDING';
      request.currentApproverId = null;
      log('WARN', 'routing unavailable', {
        workRequestId: request.requestId,
        stepIndex: request.currentStepIndex,
        role: step.role,
        scope
      });
      return null;
    }

    request.status = 'IN_PROGRESS';
    request.currentApproverId = approverId;
    request.updatedAt = this.nowIso();
    this.appendEvent(request, {
      actorId: SYSTEM_ACTOR,
      action: 'ASSIGNED',
      stepIndex: request.currentStepIndex,
      assigneeId: approverId,
      note: null
    });
    return { approverId, role: step.role, scope };
  }

  private async commit(request: WorkRequest, expectedVersion: number, incoming: Assignment | null): Promise<void> {
    request.version = expectedVersion + 1;
    try {
      await this.repository.update(request, expectedVersion);
    } catch (error) {
      this.releaseAssignment(incoming);
      throw error;
    }
  }

  private releaseAssignment(assignment: Assignment | null): void {
    if (assignment) {
      this.routing.release(assignment.approverId, assignment.role, assignment.scope);
    }
  }

  private appendEvent(
    request: WorkRequest,
    input: Pick<ApprovalEvent, 'actorId' | 'action' | 'stepIndex' | 'assigneeId' | 'note'>
  ): void {
    request.events.push({
      eventId: this.nextId('evt'),
      requestId: request.requestId,
      occurredAt: this.nowIso(),
      ...input
    });
  }

  private async requireRequest(requestId: string): Promise<WorkRequest> {
    const request = await this.repository.findById(requestId);
    if (!request) {
      throw new NotFoundError(`request not found: ${requestId}`);
    }
    return request;
  }

  private nowIso(): string {
    return (this.options.now?.() ?? new Date()).toISOString();
  }

  private nextId(prefix: string): string {
    return `${prefix}_${this.options.idGenerator?.() ?? randomUUID()}`;
  }

  private clone<T>(value: T): T {
    return structuredClone(value);
  }
}
