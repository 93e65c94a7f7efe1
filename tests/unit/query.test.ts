import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError } from '../../src/domain/errors.js';
import { WorkflowScheduler } from '../../src/domain/scheduler.js';
import {
  HOUR_MS,
  START,
  claimPayload,
  createHarness,
  northCampus,
  southCampus,
  student,
  type Harness
} from '../support/harness.js';

const otherStudent = { userId: 'student-02', scope: southCampus };

describe('QueryFacade', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = createHarness();
    const { engine } = harness;
    await engine.create({ variant: 'ITEM_CLAIM', payload: claimPayload(25) }, student);
    harness.advance(HOUR_MS);
    await engine.create({ variant: 'ITEM_CLAIM', payload: claimPayload(700) }, student);
    harness.advance(HOUR_MS);
    const cancelled = await engine.create({ variant: 'ITEM_CLAIM', payload: claimPayload(40) }, otherStudent);
    await engine.cancel(cancelled.requestId, otherStudent.userId);
  });

  it('counts requests by status, variant and awaited role', async () => {
    const statistics = await harness.queries.getStatistics();
    expect(statistics.total).toBe(3);
    expect(statistics.byStatus).toEqual({
      PENDING: 0,
      IN_PROGRESS: 2,
      APPROVED: 0,
      REJECTED: 0,
      CANCELLED: 1,
      COMPLETED: 0
    });
    expect(statistics.byVariant.ITEM_CLAIM).toBe(3);
    expect(statistics.byVariant.POLICE_EVIDENCE_REQUEST).toBe(0);
    expect(statistics.awaitingRole.CAMPUS_COORDINATOR).toBe(2);
    expect(statistics.awaitingRole.HIGH_VALUE_VERIFIER).toBe(0);
  });

  it('filters by status, variant, requester and approver', async () => {
    const { queries } = harness;
    const ids = (requests: { requestId: string }[]) => requests.map((request) => request.requestId);

    expect(ids(await queries.queryByStatus('CANCELLED'))).toEqual(['wr_0005']);
    expect(ids(await queries.queryByVariant('ITEM_CLAIM'))).toEqual(['wr_0001', 'wr_0003', 'wr_0005']);
    expect(ids(await queries.queryByRequester('student-01'))).toEqual(['wr_0001', 'wr_0003']);
    expect(ids(await queries.queryPendingForApprover('coord-north'))).toEqual(['wr_0001', 'wr_0003']);
    expect(ids(await queries.queryPendingForApprover('coord-south'))).toEqual([]);
    expect(ids(await queries.search({ requesterId: 'student-02', status: 'IN_PROGRESS' }))).toEqual([]);
    expect(ids(await queries.search())).toHaveLength(3);
  });

  it('sweeps only open requests', async () => {
    const now = new Date(START.getTime() + 47 * HOUR_MS);
    expect(await harness.queries.slaSweep(now)).toEqual({ overdue: ['wr_0003'], approaching: ['wr_0001'] });
    expect((await harness.queries.overdueRequests(now)).map((request) => request.requestId)).toEqual(['wr_0003']);
  });

  it('reports the current workload', () => {
    expect(harness.queries.workload()).toEqual([
      { approverId: 'coord-north', role: 'CAMPUS_COORDINATOR', ...northCampus, active: 2 }
    ]);
  });

  it('raises NotFoundError for unknown ids', async () => {
    await expect(harness.queries.getRequest('wr_missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('WorkflowScheduler', () => {
  const coordinator = {
    userId: 'coord-north',
    enterpriseId: northCampus.enterpriseId,
    organizationId: northCampus.organizationId,
    roles: ['CAMPUS_COORDINATOR' as const]
  };

  it('reroutes unassigned requests before sweeping', async () => {
    const harness = createHarness({ memberships: [] });
    const created = await harness.engine.create({ variant: 'ITEM_CLAIM', payload: claimPayload(25) }, student);
    expect(created.status).toBe('PENDING');

    harness.directory.upsertMembership(coordinator);
    const scheduler = new WorkflowScheduler(harness.engine, harness.queries);
    const now = new Date(START.getTime() + 47 * HOUR_MS);
    const report = await scheduler.runOnce(now);

    expect(report).toEqual({
      overdue: [],
      approaching: ['wr_0001'],
      rerouted: ['wr_0001'],
      ranAt: '2026-03-04T08:00:00.000Z'
    });
    expect((await harness.queries.getRequest('wr_0001')).currentApproverId).toBe('coord-north');
  });

  it('leaves pending requests alone when rerouting is off', async () => {
    const harness = createHarness({ memberships: [] });
    await harness.engine.create({ variant: 'ITEM_CLAIM', payload: claimPayload(25) }, student);
    harness.directory.upsertMembership(coordinator);

    const scheduler = new WorkflowScheduler(harness.engine, harness.queries, { reroutePending: false });
    const report = await scheduler.runOnce(new Date(START.getTime() + 49 * HOUR_MS));

    expect(report.rerouted).toEqual([]);
    expect(report.overdue).toEqual(['wr_0001']);
    expect((await harness.queries.getRequest('wr_0001')).status).toBe('PENDING');
  });

  it('starts and stops its timer', () => {
    const harness = createHarness();
    const disabled = new WorkflowScheduler(harness.engine, harness.queries, { enabled: false });
    disabled.start();
    expect(disabled.isRunning).toBe(false);

    const scheduler = new WorkflowScheduler(harness.engine, harness.queries, { intervalMs: 60_000 });
    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
  });
});
