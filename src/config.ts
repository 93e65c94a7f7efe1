import { z } from 'zod';
import type { WorkflowConfig } from './domain/config.js';
import { ValidationError } from './domain/errors.js';
import type { LogLevel } from './observability/logger.js';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    LOG_LEVEL: z
      .string()
      .trim()
      .toUpperCase()
      .pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']))
      .default('INFO'),
    HIGH_VALUE_THRESHOLD: z.coerce.number().positive().default(500),
    VERY_HIGH_VALUE_THRESHOLD: z.coerce.number().positive().default(1000),
    MIN_PROOF_LENGTH: z.coerce.number().int().min(0).default(20),
    MIN_SECURITY_NOTES_LENGTH: z.coerce.number().int().min(0).default(20),
    SLA_URGENT_HOURS: z.coerce.number().positive().default(4),
    SLA_HIGH_HOURS: z.coerce.number().positive().default(24),
    SLA_NORMAL_HOURS: z.coerce.number().positive().default(48),
    SLA_LOW_HOURS: z.coerce.number().positive().default(72),
    SLA_APPROACHING_FRACTION: z.coerce.number().gt(0).lt(1).default(0.25),
    SLA_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
    REROUTE_PENDING: flag
  })
  .refine((env) => env.VERY_HIGH_VALUE_THRESHOLD >= env.HIGH_VALUE_THRESHOLD, {
    message: 'VERY_HIGH_VALUE_THRESHOLD must not be below HIGH_VALUE_THRESHOLD',
    path: ['VERY_HIGH_VALUE_THRESHOLD']
  });

export interface AppConfig {
  port: number;
  logLevel: LogLevel | 'SILENT';
  workflow: WorkflowConfig;
  sweepIntervalMs: number;
  reroutePending: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw ValidationError.fromIssues(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    workflow: {
      thresholds: {
        highValue: values.HIGH_VALUE_THRESHOLD,
        veryHighValue: values.VERY_HIGH_VALUE_THRESHOLD,
        minProofLength: values.MIN_PROOF_LENGTH,
        minSecurityNotesLength: values.MIN_SECURITY_NOTES_LENGTH
      },
      sla: {
        windowHours: {
          URGENT: values.SLA_URGENT_HOURS,
          HIGH: values.SLA_HIGH_HOURS,
          NORMAL: values.SLA_NORMAL_HOURS,
          LOW: values.SLA_LOW_HOURS
        },
        approachingFraction: values.SLA_APPROACHING_FRACTION
      }
    },
    sweepIntervalMs: values.SLA_SWEEP_INTERVAL_MS,
    reroutePending: values.REROUTE_PENDING
  };
}
