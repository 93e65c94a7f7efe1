import { log } from '../observability/logger.js';
import { withRequestContext } from '../observability/request-context.js';
import type { WorkflowEngine } from './engine.js';
import type { QueryFacade } from './query.js';
import type { SlaSweepResult } from './types.js';

export interface SchedulerOptions {
  intervalMs?: number;
  runImmediately?: boolean;
  /** Retry routing for unassigned PENDING requests on each tick. */
  reroutePending?: boolean;
  enabled?: boolean;
  now?: () => Date;
}

export interface SweepReport extends SlaSweepResult {
  rerouted: string[];
  ranAt: string;
}

/**
 * Periodic SLA sweep. Only alerts; it never moves a request except through
 * the engine's own reroute operation.
 */
export class WorkflowScheduler {
  private readonly engine: WorkflowEngine;
  private readonly queries: QueryFacade;
  private readonly intervalMs: number;
  private readonly runImmediately: boolean;
  private readonly reroutePending: boolean;
  private readonly enabled: boolean;
  private readonly now: () => Date;

  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight = false;

  constructor(engine: WorkflowEngine, queries: QueryFacade, options?: SchedulerOptions) {
    this.engine = engine;
    this.queries = queries;
    this.intervalMs = options?.intervalMs ?? 5 * 60 * 1000;
    this.runImmediately = options?.runImmediately ?? false;
    this.reroutePending = options?.reroutePending ?? true;
    this.enabled = options?.enabled ?? true;
    this.now = options?.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (!this.enabled) {
      log('INFO', 'sla scheduler disabled');
      return;
    }
    if (this.running) return;

    this.running = true;
    if (this.runImmediately) {
      void this.safeRun();
    }
    this.timer = setInterval(() => {
      void this.safeRun();
    }, this.intervalMs);
    this.timer.unref();
    log('INFO', 'sla scheduler started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    log('INFO', 'sla scheduler stopped');
  }

  /** One sweep, independent of the timer. Errors propagate to the caller. */
  async runOnce(now: Date = this.now()): Promise<SweepReport> {
    const rerouted = this.reroutePending ? await this.engine.rerouteUnassigned() : [];
    const sweep = await this.queries.slaSweep(now);

    if (rerouted.length > 0) {
      log('INFO', 'pending requests rerouted', { workRequestIds: rerouted });
    }
    for (const workRequestId of sweep.overdue) {
      log('WARN', 'sla breached', { workRequestId, classification: 'OVERDUE' });
    }
    for (const workRequestId of sweep.approaching) {
      log('WARN', 'sla deadline approaching', { workRequestId, classification: 'APPROACHING' });
    }
    return { ...sweep, rerouted, ranAt: now.toISOString() };
  }

  private async safeRun(): Promise<void> {
    if (!this.running || this.inFlight) return;

    this.inFlight = true;
    try {
      await withRequestContext(() => this.runOnce());
    } catch (error) {
      log('ERROR', 'sla sweep failed', { error: error instanceof Error ? error.message : String(error) });
    } finally {
      this.inFlight = false;
    }
  }
}
