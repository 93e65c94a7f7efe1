import { describe, expect, it } from 'vitest';
import { SlaTracker } from '../../src/domain/sla.js';
import type { RequestPriority, RequestStatus } from '../../src/domain/types.js';
import { HOUR_MS, START } from '../support/harness.js';

function subject(requestId: string, priority: RequestPriority, status: RequestStatus = 'IN_PROGRESS', createdAt = START) {
  return { requestId, priority, status, createdAt: createdAt.toISOString() };
}

function at(hours: number, extraMs = 0): Date {
  return new Date(START.getTime() + hours * HOUR_MS + extraMs);
}

describe('SlaTracker', () => {
  const sla = new SlaTracker();

  it('derives the deadline from the priority window', () => {
    expect(sla.deadline(subject('wr_1', 'URGENT')).toISOString()).toBe('2026-03-02T13:00:00.000Z');
    expect(sla.deadline(subject('wr_1', 'NORMAL')).toISOString()).toBe('2026-03-04T09:00:00.000Z');
    expect(sla.deadline(subject('wr_1', 'LOW')).toISOString()).toBe('2026-03-05T09:00:00.000Z');
  });

  it('classifies against the last quarter of the window', () => {
    const request = subject('wr_1', 'NORMAL');
    expect(sla.classify(request, at(30))).toBe('ON_TRACK');
    expect(sla.classify(request, at(36))).toBe('ON_TRACK');
    expect(sla.classify(request, at(36, 1))).toBe('APPROACHING');
    expect(sla.classify(request, at(48))).toBe('APPROACHING');
    expect(sla.classify(request, at(48, 1))).toBe('OVERDUE');
  });

  it('marks an urgent request overdue right after four hours', () => {
    expect(sla.classify(subject('wr_1', 'URGENT'), at(4))).toBe('APPROACHING');
    expect(sla.classify(subject('wr_1', 'URGENT'), at(4, 1))).toBe('OVERDUE');
    expect(sla.classify(subject('wr_1', 'URGENT', 'COMPLETED'), at(4, 1))).toBe('ON_TRACK');
  });

  it('treats terminal requests as on track however late', () => {
    for (const status of ['REJECTED', 'CANCELLED', 'COMPLETED'] as const) {
      expect(sla.classify(subject('wr_1', 'URGENT', status), at(100))).toBe('ON_TRACK');
    }
    expect(sla.classify(subject('wr_1', 'URGENT', 'APPROVED'), at(100))).toBe('OVERDUE');
    expect(sla.classify(subject('wr_1', 'URGENT', 'PENDING'), at(100))).toBe('OVERDUE');
  });

  it('orders sweep results by deadline, then id', () => {
    const requests = [
      subject('wr_c', 'NORMAL'),
      subject('wr_b', 'URGENT'),
      subject('wr_a', 'URGENT'),
      subject('wr_d', 'HIGH'),
      subject('wr_e', 'LOW')
    ];
    expect(sla.sweep(requests, at(47))).toEqual({
      overdue: ['wr_a', 'wr_b', 'wr_d'],
      approaching: ['wr_c']
    });
  });

  it('uses configured windows', () => {
    const tight = new SlaTracker({ windowHours: { URGENT: 1, HIGH: 2, NORMAL: 4, LOW: 8 }, approachingFraction: 0.5 });
    expect(tight.classify(subject('wr_1', 'NORMAL'), at(2, 1))).toBe('APPROACHING');
    expect(tight.classify(subject('wr_1', 'NORMAL'), at(1))).toBe('ON_TRACK');
  });
});
