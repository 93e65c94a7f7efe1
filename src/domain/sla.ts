import { DEFAULT_WORKFLOW_CONFIG, type SlaConfig } from './config.js';
import { isTerminal, type SlaClassification, type SlaSweepResult, type WorkRequest } from './types.js';

const HOUR_MS = 60 * 60 * 1000;

type SlaSubject = Pick<WorkRequest, 'requestId' | 'status' | 'priority' | 'createdAt'>;

export class SlaTracker {
  private readonly config: SlaConfig;

  constructor(config: SlaConfig = DEFAULT_WORKFLOW_CONFIG.sla) {
    this.config = config;
  }

  windowMs(request: Pick<WorkRequest, 'priority'>): number {
    return this.config.windowHours[request.priority] * HOUR_MS;
  }

  deadline(request: Pick<WorkRequest, 'priority' | 'createdAt'>): Date {
    return new Date(Date.parse(request.createdAt) + this.windowMs(request));
  }

  /** Terminal requests are always on track, however late they were observed. */
  classify(request: SlaSubject, now: Date): SlaClassification {
    if (isTerminal(request.status)) {
      return 'ON_TRACK';
    }
    const remaining = this.deadline(request).getTime() - now.getTime();
    if (remaining < 0) {
      return 'OVERDUE';
    }
    if (remaining < this.config.approachingFraction * this.windowMs(request)) {
      return 'APPROACHING';
    }
    return 'ON_TRACK';
  }

  sweep(requests: SlaSubject[], now: Date): SlaSweepResult {
    const byDeadline = [...requests].sort(
      (a, b) => this.deadline(a).getTime() - this.deadline(b).getTime() || a.requestId.localeCompare(b.requestId)
    );
    const result: SlaSweepResult = { overdue: [], approaching: [] };
    for (const request of byDeadline) {
      const classification = this.classify(request, now);
      if (classification === 'OVERDUE') {
        result.overdue.push(request.requestId);
      } else if (classification === 'APPROACHING') {
        result.approaching.push(request.requestId);
      }
    }
    return result;
  }
}
