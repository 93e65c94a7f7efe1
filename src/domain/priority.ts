import { itemValueOf } from './chain.js';
import type { ValueThresholds } from './config.js';
import type { RequestPriority, VariantRequest } from './types.js';

function defaultPriority(request: VariantRequest, thresholds: ValueThresholds): RequestPriority {
  switch (request.variant) {
    case 'TRANSIT_TO_AIRPORT_EMERGENCY':
      return 'URGENT';
    case 'MULTI_ENTERPRISE_DISPUTE':
      return 'HIGH';
    case 'POLICE_EVIDENCE_REQUEST':
      return request.payload.stolenCheck ? 'URGENT' : 'HIGH';
    case 'AIRPORT_TO_UNIVERSITY_TRANSFER':
      return request.payload.foundInSecureArea ? 'HIGH' : 'NORMAL';
    case 'ITEM_CLAIM': {
      const value = itemValueOf(request) ?? 0;
      if (value >= thresholds.veryHighValue) {
        return 'URGENT';
      }
      return value >= thresholds.highValue ? 'HIGH' : 'NORMAL';
    }
    default:
      return 'NORMAL';
  }
}

/** Caller's priority wins, except that emergency handoffs are always urgent. */
export function resolvePriority(
  request: VariantRequest,
  thresholds: ValueThresholds,
  requested?: RequestPriority
): RequestPriority {
  if (request.variant === 'TRANSIT_TO_AIRPORT_EMERGENCY') {
    return 'URGENT';
  }
  return requested ?? defaultPriority(request, thresholds);
}
