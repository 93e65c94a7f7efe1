import type { VariantPayloads } from './catalog.js';

export const REQUEST_VARIANTS = [
  'ITEM_CLAIM',
  'CROSS_CAMPUS_TRANSFER',
  'TRANSIT_TO_UNIVERSITY_TRANSFER',
  'AIRPORT_TO_UNIVERSITY_TRANSFER',
  'POLICE_EVIDENCE_REQUEST',
  'TRANSIT_TO_AIRPORT_EMERGENCY',
  'MULTI_ENTERPRISE_DISPUTE'
] as const;

export type RequestVariant = (typeof REQUEST_VARIANTS)[number];

export const REQUEST_STATUSES = [
  'PENDING',
  'IN_PROGRESS',
  'APPROVED',
  'REJECTED',
  'CANCELLED',
  'COMPLETED'
] as const;

export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export const REQUEST_PRIORITIES = ['LOW', 'NORMAL', 'HIGH', 'URGENT'] as const;

export type RequestPriority = (typeof REQUEST_PRIORITIES)[number];

export const APPROVER_ROLES = [
  'CAMPUS_COORDINATOR',
  'HIGH_VALUE_VERIFIER',
  'POLICE_EVIDENCE_CUSTODIAN',
  'STATION_MANAGER',
  'AIRPORT_LOST_FOUND_SPECIALIST',
  'TSA_SECURITY_COORDINATOR'
] as const;

export type ApproverRole = (typeof APPROVER_ROLES)[number];

export const ENTERPRISE_TYPES = ['HIGHER_EDUCATION', 'PUBLIC_TRANSIT', 'AIRPORT', 'LAW_ENFORCEMENT'] as const;

export type EnterpriseType = (typeof ENTERPRISE_TYPES)[number];

export type ApprovalAction = 'ASSIGNED' | 'APPROVED' | 'REJECTED' | 'CANCELLED' | 'COMPLETED' | 'NOTED';

/** Where a chain step is actioned, resolved against the request it belongs to. */
export type StepScope = 'REQUESTER' | 'TARGET' | 'ORIGIN' | 'DESTINATION';

export type SlaClassification = 'ON_TRACK' | 'APPROACHING' | 'OVERDUE';

export interface Scope {
  organizationId: string;
  enterpriseId: string;
}

export interface ActorContext {
  userId: string;
  scope: Scope;
}

export interface ChainStep {
  role: ApproverRole;
  scope: StepScope;
}

export interface ApprovalEvent {
  eventId: string;
  requestId: string;
  actorId: string;
  action: ApprovalAction;
  stepIndex: number | null;
  assigneeId: string | null;
  note: string | null;
  occurredAt: string;
}

export type VariantRequest = {
  [V in RequestVariant]: { variant: V; payload: VariantPayloads[V] };
}[RequestVariant];

export interface WorkRequestState {
  requestId: string;
  status: RequestStatus;
  priority: RequestPriority;
  summary: string;
  requesterId: string;
  requesterScope: Scope;
  targetScope: Scope;
  approvalChain: ChainStep[];
  currentStepIndex: number;
  currentApproverId: string | null;
  events: ApprovalEvent[];
  rejectionReason: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

export type WorkRequest = WorkRequestState & VariantRequest;

export interface CreateRequestInput {
  variant: string;
  payload: unknown;
  priority?: RequestPriority;
  targetScope?: Scope;
}

export interface ApproveOptions {
  stepIndex?: number;
  note?: string;
}

export interface WorkRequestStatistics {
  total: number;
  byStatus: Record<RequestStatus, number>;
  byVariant: Record<RequestVariant, number>;
  awaitingRole: Record<ApproverRole, number>;
}

export interface SlaSweepResult {
  overdue: string[];
  approaching: string[];
}

export const TERMINAL_STATUSES: ReadonlySet<RequestStatus> = new Set<RequestStatus>([
  'REJECTED',
  'CANCELLED',
  'COMPLETED'
]);

export function isTerminal(status: RequestStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
