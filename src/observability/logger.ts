import { getRequestId } from './request-context.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel | 'SILENT', number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
  SILENT: 100
};

function isLevelName(value: string): value is keyof typeof LEVEL_RANK {
  return Object.hasOwn(LEVEL_RANK, value);
}

let configuredLevel: keyof typeof LEVEL_RANK | null = null;

/** Overrides the `LOG_LEVEL` environment threshold; `null` goes back to it. */
export function setLogLevel(level: keyof typeof LEVEL_RANK | null): void {
  configuredLevel = level;
}

function threshold(): number {
  if (configuredLevel !== null) {
    return LEVEL_RANK[configuredLevel];
  }
  const fromEnv = (process.env['LOG_LEVEL'] ?? 'INFO').trim().toUpperCase();
  return isLevelName(fromEnv) ? LEVEL_RANK[fromEnv] : LEVEL_RANK.INFO;
}

export function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < threshold()) {
    return;
  }

  const entry = {
    level,
    message,
    ts: Date.now(),
    requestId: getRequestId() ?? null,
    ...meta
  };

  // one JSON object per line
  const line = JSON.stringify(entry);
  if (level === 'ERROR') {
    console.error(line);
  } else {
    console.log(line);
  }
}
