import type { ValueThresholds } from './config.js';
import type { ApproverRole, ChainStep, EnterpriseType, Scope, VariantRequest, WorkRequest } from './types.js';

const HOLDING_ENTERPRISE_ROLE: Record<EnterpriseType, ApproverRole | null> = {
  HIGHER_EDUCATION: null,
  PUBLIC_TRANSIT: 'STATION_MANAGER',
  AIRPORT: 'AIRPORT_LOST_FOUND_SPECIALIST',
  LAW_ENFORCEMENT: 'POLICE_EVIDENCE_CUSTODIAN'
};

const RECEIVING_ENTERPRISE_ROLE: Record<EnterpriseType, ApproverRole> = {
  HIGHER_EDUCATION: 'CAMPUS_COORDINATOR',
  PUBLIC_TRANSIT: 'STATION_MANAGER',
  AIRPORT: 'AIRPORT_LOST_FOUND_SPECIALIST',
  LAW_ENFORCEMENT: 'POLICE_EVIDENCE_CUSTODIAN'
};

function baseChain(request: VariantRequest): ChainStep[] {
  switch (request.variant) {
    case 'ITEM_CLAIM': {
      const chain: ChainStep[] = [{ role: 'CAMPUS_COORDINATOR', scope: 'REQUESTER' }];
      const holdingRole = request.payload.holdingEnterpriseType
        ? HOLDING_ENTERPRISE_ROLE[request.payload.holdingEnterpriseType]
        : null;
      if (holdingRole) {
        chain.push({ role: holdingRole, scope: 'TARGET' });
      }
      return chain;
    }
    case 'CROSS_CAMPUS_TRANSFER':
      return [
        { role: 'CAMPUS_COORDINATOR', scope: 'ORIGIN' },
        { role: RECEIVING_ENTERPRISE_ROLE[request.payload.destinationEnterpriseType], scope: 'DESTINATION' }
      ];
    case 'TRANSIT_TO_UNIVERSITY_TRANSFER':
      return [
        { role: 'STATION_MANAGER', scope: 'ORIGIN' },
        { role: 'CAMPUS_COORDINATOR', scope: 'DESTINATION' }
      ];
    case 'AIRPORT_TO_UNIVERSITY_TRANSFER':
      return [
        { role: 'AIRPORT_LOST_FOUND_SPECIALIST', scope: 'ORIGIN' },
        { role: 'CAMPUS_COORDINATOR', scope: 'DESTINATION' },
        { role: 'POLICE_EVIDENCE_CUSTODIAN', scope: 'DESTINATION' }
      ];
    case 'POLICE_EVIDENCE_REQUEST':
      return [
        { role: 'CAMPUS_COORDINATOR', scope: 'REQUESTER' },
        { role: 'POLICE_EVIDENCE_CUSTODIAN', scope: 'TARGET' }
      ];
    case 'TRANSIT_TO_AIRPORT_EMERGENCY':
      return [
        { role: 'STATION_MANAGER', scope: 'ORIGIN' },
        { role: 'AIRPORT_LOST_FOUND_SPECIALIST', scope: 'DESTINATION' }
      ];
    case 'MULTI_ENTERPRISE_DISPUTE':
      return [{ role: 'POLICE_EVIDENCE_CUSTODIAN', scope: 'TARGET' }];
  }
}

export function itemValueOf(request: VariantRequest): number | null {
  if ('itemValue' in request.payload) {
    return request.payload.itemValue ?? null;
  }
  return null;
}

export function foundInSecureArea(request: VariantRequest): boolean {
  return request.variant === 'AIRPORT_TO_UNIVERSITY_TRANSFER' && request.payload.foundInSecureArea;
}

/**
 * Ordered approval chain for a validated request. Pure: the same variant and
 * payload always give the same chain.
 */
export function resolveApprovalChain(request: VariantRequest, thresholds: ValueThresholds): ChainStep[] {
  const [head, ...rest] = baseChain(request);
  if (!head) {
    throw new Error(`empty base chain for ${request.variant}`);
  }

  const value = itemValueOf(request);
  const hasRole = (steps: ChainStep[], role: ApproverRole) => steps.some((step) => step.role === role);

  const inserted: ChainStep[] = [];
  if (value !== null && value >= thresholds.highValue && !hasRole([head, ...rest], 'HIGH_VALUE_VERIFIER')) {
    inserted.push({ role: 'HIGH_VALUE_VERIFIER', scope: head.scope });
  }
  if (foundInSecureArea(request)) {
    inserted.push({ role: 'TSA_SECURITY_COORDINATOR', scope: 'ORIGIN' });
  }

  const chain = [head, ...inserted, ...rest];
  if (value !== null && value >= thresholds.veryHighValue && !hasRole(chain, 'POLICE_EVIDENCE_CUSTODIAN')) {
    chain.push({ role: 'POLICE_EVIDENCE_CUSTODIAN', scope: 'TARGET' });
  }
  return chain;
}

/** Concrete organization/enterprise a chain step is routed within. */
export function scopeForStep(request: WorkRequest, step: ChainStep): Scope {
  switch (step.scope) {
    case 'REQUESTER':
      return request.requesterScope;
    case 'TARGET':
      return request.targetScope;
    case 'ORIGIN':
      return 'origin' in request.payload ? request.payload.origin : request.requesterScope;
    case 'DESTINATION':
      return 'destination' in request.payload ? request.payload.destination : request.targetScope;
  }
}

/** Transfers are actioned at their destination; everything else defaults to the requester's scope. */
export function resolveTargetScope(request: VariantRequest, requesterScope: Scope, explicit?: Scope): Scope {
  if ('destination' in request.payload) {
    return request.payload.destination;
  }
  return explicit ?? requesterScope;
}
