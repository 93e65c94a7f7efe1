import { z } from 'zod';
import { DEFAULT_WORKFLOW_CONFIG, type ValueThresholds } from './config.js';
import { ValidationError, type ValidationIssue } from './errors.js';
import { ENTERPRISE_TYPES, REQUEST_VARIANTS, type RequestVariant, type VariantRequest } from './types.js';

function requiredText(label: string) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` })
    .trim()
    .min(1, `${label} is required`);
}

const optionalText = z.string().trim().optional();

const scopeSchema = z.object({
  organizationId: requiredText('organizationId'),
  enterpriseId: requiredText('enterpriseId')
});

const itemFields = {
  itemId: requiredText('itemId'),
  itemName: requiredText('itemName')
};

const optionalItemValue = z.number().finite().nonnegative().optional();

const enterpriseType = z.enum(ENTERPRISE_TYPES);

const itemClaimPayload = z.object({
  ...itemFields,
  itemValue: z
    .number({ required_error: 'itemValue is required', invalid_type_error: 'itemValue must be a number' })
    .finite()
    .nonnegative(),
  lostItemId: optionalText,
  claimDetails: requiredText('claimDetails'),
  identifyingFeatures: optionalText,
  proofDescription: optionalText,
  holdingEnterpriseType: enterpriseType.optional()
});

const crossCampusTransferPayload = z.object({
  ...itemFields,
  itemValue: optionalItemValue,
  origin: scopeSchema,
  destination: scopeSchema,
  destinationEnterpriseType: enterpriseType.default('HIGHER_EDUCATION'),
  studentName: requiredText('studentName'),
  pickupLocation: requiredText('pickupLocation')
});

const transitToUniversityPayload = z.object({
  ...itemFields,
  itemValue: optionalItemValue,
  origin: scopeSchema,
  destination: scopeSchema,
  stationName: requiredText('stationName'),
  routeName: optionalText,
  studentId: requiredText('studentId'),
  campusPickupLocation: requiredText('campusPickupLocation')
});

const airportToUniversityPayload = z.object({
  ...itemFields,
  itemValue: optionalItemValue,
  origin: scopeSchema,
  destination: scopeSchema,
  terminal: requiredText('terminal'),
  airportIncidentNumber: requiredText('airportIncidentNumber'),
  studentId: requiredText('studentId'),
  campusPickupLocation: requiredText('campusPickupLocation'),
  flightNumber: optionalText,
  foundInSecureArea: z.boolean().default(false),
  securityNotes: optionalText
});

const policeEvidencePayload = z.object({
  ...itemFields,
  itemValue: optionalItemValue,
  verificationReason: requiredText('verificationReason'),
  stolenCheck: z.boolean().default(false),
  highValueVerification: z.boolean().default(false),
  serialNumber: optionalText,
  imeiNumber: optionalText,
  otherIdentifiers: optionalText
});

const transitToAirportEmergencyPayload = z.object({
  ...itemFields,
  origin: scopeSchema,
  destination: scopeSchema,
  stationName: requiredText('stationName'),
  flightNumber: requiredText('flightNumber'),
  travelerName: requiredText('travelerName'),
  flightDepartureTime: optionalText
});

const disputePayload = z.object({
  ...itemFields,
  itemValue: optionalItemValue,
  disputeReason: requiredText('disputeReason'),
  claimants: z
    .array(
      z.object({
        claimantId: requiredText('claimantId'),
        enterpriseId: requiredText('enterpriseId'),
        claimDescription: requiredText('claimDescription')
      })
    )
    .min(2, 'a dispute needs at least two claimants')
});

export type ItemClaimPayload = z.infer<typeof itemClaimPayload>;
export type CrossCampusTransferPayload = z.infer<typeof crossCampusTransferPayload>;
export type TransitToUniversityPayload = z.infer<typeof transitToUniversityPayload>;
export type AirportToUniversityPayload = z.infer<typeof airportToUniversityPayload>;
export type PoliceEvidencePayload = z.infer<typeof policeEvidencePayload>;
export type TransitToAirportEmergencyPayload = z.infer<typeof transitToAirportEmergencyPayload>;
export type DisputePayload = z.infer<typeof disputePayload>;

export interface VariantPayloads {
  ITEM_CLAIM: ItemClaimPayload;
  CROSS_CAMPUS_TRANSFER: CrossCampusTransferPayload;
  TRANSIT_TO_UNIVERSITY_TRANSFER: TransitToUniversityPayload;
  AIRPORT_TO_UNIVERSITY_TRANSFER: AirportToUniversityPayload;
  POLICE_EVIDENCE_REQUEST: PoliceEvidencePayload;
  TRANSIT_TO_AIRPORT_EMERGENCY: TransitToAirportEmergencyPayload;
  MULTI_ENTERPRISE_DISPUTE: DisputePayload;
}

function buildRequestSchema(thresholds: ValueThresholds) {
  const claim = itemClaimPayload.superRefine((payload, ctx) => {
    const proofLength = payload.proofDescription?.length ?? 0;
    if (payload.itemValue >= thresholds.highValue && proofLength < thresholds.minProofLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['proofDescription'],
        message: `proof description must be at least ${thresholds.minProofLength} characters for items valued at or above ${thresholds.highValue}`
      });
    }
  });

  const airport = airportToUniversityPayload.superRefine((payload, ctx) => {
    const notesLength = payload.securityNotes?.length ?? 0;
    if (payload.foundInSecureArea && notesLength < thresholds.minSecurityNotesLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['securityNotes'],
        message: `secure-area finds need security notes of at least ${thresholds.minSecurityNotesLength} characters`
      });
    }
  });

  const police = policeEvidencePayload.superRefine((payload, ctx) => {
    const identifiers = [payload.serialNumber, payload.imeiNumber, payload.otherIdentifiers];
    if (payload.stolenCheck && !identifiers.some((value) => Boolean(value))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [],
        message: 'stolen-property check requires a serial number, IMEI or other identifier'
      });
    }
    if (
      payload.highValueVerification &&
      payload.itemValue !== undefined &&
      payload.itemValue >= thresholds.highValue &&
      !payload.serialNumber
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['serialNumber'],
        message: 'high-value verification requires a serial number'
      });
    }
  });

  const dispute = disputePayload.superRefine((payload, ctx) => {
    const ids = new Set(payload.claimants.map((claimant) => claimant.claimantId));
    if (ids.size !== payload.claimants.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['claimants'],
        message: 'claimants must be distinct'
      });
    }
  });

  return z.discriminatedUnion('variant', [
    z.object({ variant: z.literal('ITEM_CLAIM'), payload: claim }),
    z.object({ variant: z.literal('CROSS_CAMPUS_TRANSFER'), payload: crossCampusTransferPayload }),
    z.object({ variant: z.literal('TRANSIT_TO_UNIVERSITY_TRANSFER'), payload: transitToUniversityPayload }),
    z.object({ variant: z.literal('AIRPORT_TO_UNIVERSITY_TRANSFER'), payload: airport }),
    z.object({ variant: z.literal('POLICE_EVIDENCE_REQUEST'), payload: police }),
    z.object({ variant: z.literal('TRANSIT_TO_AIRPORT_EMERGENCY'), payload: transitToAirportEmergencyPayload }),
    z.object({ variant: z.literal('MULTI_ENTERPRISE_DISPUTE'), payload: dispute })
  ]);
}

export type CatalogResult = { ok: true; request: VariantRequest } | { ok: false; error: ValidationError };

export function isRequestVariant(value: unknown): value is RequestVariant {
  return REQUEST_VARIANTS.some((variant) => variant === value);
}

function toIssue(issue: z.ZodIssue): ValidationIssue {
  return { path: issue.path.join('.'), message: issue.message };
}

/**
 * Structural and field-level rules for every request variant. Stateless apart
 * from the thresholds it was built with.
 */
export class RequestCatalog {
  private readonly schema: ReturnType<typeof buildRequestSchema>;

  constructor(thresholds: ValueThresholds = DEFAULT_WORKFLOW_CONFIG.thresholds) {
    this.schema = buildRequestSchema(thresholds);
  }

  validate(variant: string, payload: unknown): CatalogResult {
    if (!isRequestVariant(variant)) {
      return {
        ok: false,
        error: ValidationError.fromIssues([{ path: 'variant', message: `unknown request variant: ${variant}` }])
      };
    }
    const parsed = this.schema.safeParse({ variant, payload });
    if (!parsed.success) {
      return { ok: false, error: ValidationError.fromIssues(parsed.error.issues.map(toIssue)) };
    }
    return { ok: true, request: parsed.data };
  }
}

export function summarize(request: VariantRequest): string {
  switch (request.variant) {
    case 'ITEM_CLAIM':
      return `Item claim for ${request.payload.itemName} valued at $${request.payload.itemValue.toFixed(2)}`;
    case 'CROSS_CAMPUS_TRANSFER':
      return `Cross-campus transfer of ${request.payload.itemName} for ${request.payload.studentName}`;
    case 'TRANSIT_TO_UNIVERSITY_TRANSFER':
      return `Transit transfer of ${request.payload.itemName} from ${request.payload.stationName}`;
    case 'AIRPORT_TO_UNIVERSITY_TRANSFER': {
      const secure = request.payload.foundInSecureArea ? ' [SECURE AREA]' : '';
      return `Airport transfer of ${request.payload.itemName} from ${request.payload.terminal}${secure}`;
    }
    case 'POLICE_EVIDENCE_REQUEST':
      return `Police verification of ${request.payload.itemName}: ${request.payload.verificationReason}`;
    case 'TRANSIT_TO_AIRPORT_EMERGENCY':
      return `Emergency handoff of ${request.payload.itemName} for flight ${request.payload.flightNumber}`;
    case 'MULTI_ENTERPRISE_DISPUTE':
      return `Dispute over ${request.payload.itemName} between ${request.payload.claimants.length} claimants`;
  }
}
