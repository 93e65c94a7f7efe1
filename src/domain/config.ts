import type { RequestPriority } from './types.js';

export interface ValueThresholds {
  /** Inclusive lower bound that inserts the high-value verification step. */
  highValue: number;
  /** Inclusive lower bound that appends law-enforcement verification. */
  veryHighValue: number;
  minProofLength: number;
  minSecurityNotesLength: number;
}

export interface SlaConfig {
  windowHours: Record<RequestPriority, number>;
  approachingFraction: number;
}

export interface WorkflowConfig {
  thresholds: ValueThresholds;
  sla: SlaConfig;
}

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  thresholds: {
    highValue: 500,
    veryHighValue: 1000,
    minProofLength: 20,
    minSecurityNotesLength: 20
  },
  sla: {
    windowHours: {
      URGENT: 4,
      HIGH: 24,
      NORMAL: 48,
      LOW: 72
    },
    approachingFraction: 0.25
  }
};
