import { InvalidStateError, NotFoundError } from './errors.js';
import type { RequestStatus, RequestVariant, WorkRequest } from './types.js';

/**
 * Persistence boundary. `update` is a compare-and-swap on `version`: it must
 * fail when the stored record moved on since `expectedVersion` was read.
 */
export interface WorkRequestRepository {
  create(request: WorkRequest): Promise<void>;
  findById(requestId: string): Promise<WorkRequest | null>;
  update(request: WorkRequest, expectedVersion: number): Promise<void>;
  findByStatus(status: RequestStatus): Promise<WorkRequest[]>;
  findByVariant(variant: RequestVariant): Promise<WorkRequest[]>;
  findByRequester(requesterId: string): Promise<WorkRequest[]>;
  findByApprover(approverId: string): Promise<WorkRequest[]>;
  findAll(): Promise<WorkRequest[]>;
}

export class InMemoryWorkRequestRepository implements WorkRequestRepository {
  private readonly records = new Map<string, WorkRequest>();

  async create(request: WorkRequest): Promise<void> {
    if (this.records.has(request.requestId)) {
      throw new InvalidStateError(`request already exists: ${request.requestId}`);
    }
    this.records.set(request.requestId, structuredClone(request));
  }

  async findById(requestId: string): Promise<WorkRequest | null> {
    const record = this.records.get(requestId);
    return record ? structuredClone(record) : null;
  }

  async update(request: WorkRequest, expectedVersion: number): Promise<void> {
    const stored = this.records.get(request.requestId);
    if (!stored) {
      throw new NotFoundError(`request not found: ${request.requestId}`);
    }
    if (stored.version !== expectedVersion) {
      throw new InvalidStateError(
        `request ${request.requestId} was modified concurrently (expected version ${expectedVersion}, found ${stored.version})`
      );
    }
    this.records.set(request.requestId, structuredClone(request));
  }

  async findByStatus(status: RequestStatus): Promise<WorkRequest[]> {
    return this.select((request) => request.status === status);
  }

  async findByVariant(variant: RequestVariant): Promise<WorkRequest[]> {
    return this.select((request) => request.variant === variant);
  }

  async findByRequester(requesterId: string): Promise<WorkRequest[]> {
    return this.select((request) => request.requesterId === requesterId);
  }

  async findByApprover(approverId: string): Promise<WorkRequest[]> {
    return this.select((request) => request.currentApproverId === approverId);
  }

  async findAll(): Promise<WorkRequest[]> {
    return this.select(() => true);
  }

  private select(predicate: (request: WorkRequest) => boolean): WorkRequest[] {
    return [...this.records.values()]
      .filter(predicate)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.requestId.localeCompare(b.requestId))
      .map((request) => structuredClone(request));
  }
}
