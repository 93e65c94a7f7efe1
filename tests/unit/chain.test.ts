import { describe, expect, it } from 'vitest';
import { RequestCatalog } from '../../src/domain/catalog.js';
import { resolveApprovalChain, resolveTargetScope } from '../../src/domain/chain.js';
import { DEFAULT_WORKFLOW_CONFIG } from '../../src/domain/config.js';
import { resolvePriority } from '../../src/domain/priority.js';
import type { VariantRequest } from '../../src/domain/types.js';
import {
  airportPayload,
  centralStation,
  claimPayload,
  evidenceUnit,
  northCampus,
  southCampus,
  terminalA
} from '../support/harness.js';

const thresholds = DEFAULT_WORKFLOW_CONFIG.thresholds;
const catalog = new RequestCatalog(thresholds);

function validated(variant: string, payload: unknown): VariantRequest {
  const result = catalog.validate(variant, payload);
  if (!result.ok) {
    throw result.error;
  }
  return result.request;
}

function chainOf(variant: string, payload: unknown): string[] {
  return resolveApprovalChain(validated(variant, payload), thresholds).map((step) => `${step.role}@${step.scope}`);
}

const emergencyPayload = {
  itemId: 'item-600',
  itemName: 'Passport',
  origin: centralStation,
  destination: terminalA,
  stationName: 'Central Station',
  flightNumber: 'XY123',
  travelerName: 'Pat Lee'
};

const disputePayload = (itemValue?: number) => ({
  itemId: 'item-400',
  itemName: 'Bicycle',
  itemValue,
  disputeReason: 'Two owners came forward',
  claimants: [
    { claimantId: 'c-1', enterpriseId: northCampus.enterpriseId, claimDescription: 'Bought it in May' },
    { claimantId: 'c-2', enterpriseId: centralStation.enterpriseId, claimDescription: 'Gift from family' }
  ]
});

describe('resolveApprovalChain', () => {
  it('routes a low-value claim to the campus coordinator only', () => {
    expect(chainOf('ITEM_CLAIM', claimPayload(499))).toEqual(['CAMPUS_COORDINATOR@REQUESTER']);
  });

  it('inserts the high-value verifier at the inclusive threshold', () => {
    expect(chainOf('ITEM_CLAIM', claimPayload(500))).toEqual([
      'CAMPUS_COORDINATOR@REQUESTER',
      'HIGH_VALUE_VERIFIER@REQUESTER'
    ]);
  });

  it('appends police verification at the very-high threshold', () => {
    expect(chainOf('ITEM_CLAIM', claimPayload(1000))).toEqual([
      'CAMPUS_COORDINATOR@REQUESTER',
      'HIGH_VALUE_VERIFIER@REQUESTER',
      'POLICE_EVIDENCE_CUSTODIAN@TARGET'
    ]);
  });

  it('adds the holding enterprise approver for claims on items held elsewhere', () => {
    expect(chainOf('ITEM_CLAIM', claimPayload(25, { holdingEnterpriseType: 'PUBLIC_TRANSIT' }))).toEqual([
      'CAMPUS_COORDINATOR@REQUESTER',
      'STATION_MANAGER@TARGET'
    ]);
  });

  it('never lists the police custodian twice', () => {
    expect(chainOf('ITEM_CLAIM', claimPayload(1200, { holdingEnterpriseType: 'LAW_ENFORCEMENT' }))).toEqual([
      'CAMPUS_COORDINATOR@REQUESTER',
      'HIGH_VALUE_VERIFIER@REQUESTER',
      'POLICE_EVIDENCE_CUSTODIAN@TARGET'
    ]);
  });

  it('picks the destination approver from the receiving enterprise type', () => {
    const transfer = {
      itemId: 'item-500',
      itemName: 'Calculator',
      origin: northCampus,
      destination: southCampus,
      studentName: 'Jamie Doe',
      pickupLocation: 'South library desk'
    };
    expect(chainOf('CROSS_CAMPUS_TRANSFER', transfer)).toEqual([
      'CAMPUS_COORDINATOR@ORIGIN',
      'CAMPUS_COORDINATOR@DESTINATION'
    ]);
    expect(chainOf('CROSS_CAMPUS_TRANSFER', { ...transfer, destination: terminalA, destinationEnterpriseType: 'AIRPORT' })).toEqual([
      'CAMPUS_COORDINATOR@ORIGIN',
      'AIRPORT_LOST_FOUND_SPECIALIST@DESTINATION'
    ]);
  });

  it('escalates a secure-area airport find in a fixed order', () => {
    const payload = airportPayload({
      itemValue: 600,
      foundInSecureArea: true,
      securityNotes: 'Found past screening at gate A4'
    });
    expect(chainOf('AIRPORT_TO_UNIVERSITY_TRANSFER', payload)).toEqual([
      'AIRPORT_LOST_FOUND_SPECIALIST@ORIGIN',
      'HIGH_VALUE_VERIFIER@ORIGIN',
      'TSA_SECURITY_COORDINATOR@ORIGIN',
      'CAMPUS_COORDINATOR@DESTINATION',
      'POLICE_EVIDENCE_CUSTODIAN@DESTINATION'
    ]);
    expect(chainOf('AIRPORT_TO_UNIVERSITY_TRANSFER', { ...payload, itemValue: 1500 })).toHaveLength(5);
  });

  it('covers the remaining variants', () => {
    expect(chainOf('TRANSIT_TO_AIRPORT_EMERGENCY', emergencyPayload)).toEqual([
      'STATION_MANAGER@ORIGIN',
      'AIRPORT_LOST_FOUND_SPECIALIST@DESTINATION'
    ]);
    expect(chainOf('MULTI_ENTERPRISE_DISPUTE', disputePayload())).toEqual(['POLICE_EVIDENCE_CUSTODIAN@TARGET']);
    expect(chainOf('MULTI_ENTERPRISE_DISPUTE', disputePayload(2000))).toEqual([
      'POLICE_EVIDENCE_CUSTODIAN@TARGET',
      'HIGH_VALUE_VERIFIER@TARGET'
    ]);
  });

  it('is deterministic', () => {
    const request = validated('ITEM_CLAIM', claimPayload(2499));
    expect(resolveApprovalChain(request, thresholds)).toEqual(resolveApprovalChain(request, thresholds));
  });
});

describe('resolveTargetScope', () => {
  it('uses the transfer destination, then an explicit target, then the requester scope', () => {
    expect(resolveTargetScope(validated('AIRPORT_TO_UNIVERSITY_TRANSFER', airportPayload()), southCampus, evidenceUnit)).toEqual(
      northCampus
    );
    expect(resolveTargetScope(validated('ITEM_CLAIM', claimPayload(25)), northCampus, evidenceUnit)).toEqual(evidenceUnit);
    expect(resolveTargetScope(validated('ITEM_CLAIM', claimPayload(25)), northCampus)).toEqual(northCampus);
  });
});

describe('resolvePriority', () => {
  it('derives defaults from variant and value', () => {
    expect(resolvePriority(validated('ITEM_CLAIM', claimPayload(25)), thresholds)).toBe('NORMAL');
    expect(resolvePriority(validated('ITEM_CLAIM', claimPayload(500)), thresholds)).toBe('HIGH');
    expect(resolvePriority(validated('ITEM_CLAIM', claimPayload(1000)), thresholds)).toBe('URGENT');
    expect(resolvePriority(validated('MULTI_ENTERPRISE_DISPUTE', disputePayload()), thresholds)).toBe('HIGH');
    expect(
      resolvePriority(
        validated('POLICE_EVIDENCE_REQUEST', {
          itemId: 'item-200',
          itemName: 'Phone',
          verificationReason: 'Possible theft report',
          stolenCheck: true,
          serialNumber: 'SN-1'
        }),
        thresholds
      )
    ).toBe('URGENT');
  });

  it('lets the caller override except for emergency handoffs', () => {
    expect(resolvePriority(validated('ITEM_CLAIM', claimPayload(1000)), thresholds, 'LOW')).toBe('LOW');
    expect(resolvePriority(validated('TRANSIT_TO_AIRPORT_EMERGENCY', emergencyPayload), thresholds, 'LOW')).toBe('URGENT');
  });
});
