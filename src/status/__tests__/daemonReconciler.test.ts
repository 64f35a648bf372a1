import { describe, it, expect } from 'vitest';
import { type BalancerConfig, parseBalancerConfig } from '../../config/balancerConfig';
import { reconcile } from '../daemonReconciler';

function config(document: Record<string, unknown> = {}): BalancerConfig {
  const parsed = parseBalancerConfig(document);
  if (!parsed) throw new Error('invalid test config');
  return parsed;
}

const now = new Date('2026-02-05T12:30:00.000Z');
const startedAt = new Date('2026-02-05T10:00:00.000Z');

describe('reconcile', () => {
  it('reports manual mode when the daemon is switched off, running or not', () => {
    const manual = config({ service: { daemon: false } });
    for (const running of [true, false]) {
      const status = reconcile(running, manual, startedAt, now);
      expect(status.operationMode).toBe('manual');
      expect(status.nextCycleAt).toBeUndefined();
      expect(status.isProcessRunning).toBe(running);
    }
  });

  it('puts disabled balancing before every other mode', () => {
    const disabled = config({ balancing: { enable: false }, service: { daemon: false } });
    expect(reconcile(true, disabled, startedAt, now).operationMode).toBe('balancing_disabled');
  });

  it('reports a stopped daemon', () => {
    const status = reconcile(false, config(), startedAt, now);
    expect(status.operationMode).toBe('daemon_stopped');
    expect(status.nextCycleAt).toBeUndefined();
  });

  it('falls back to manual without a configuration', () => {
    expect(reconcile(true, undefined, startedAt, now)).toEqual({
      isProcessRunning: true,
      operationMode: 'manual',
      isDue: false,
      scheduleIntervalSeconds: 0,
      startedAt,
    });
  });

  it('counts down to the next whole interval since the container start', () => {
    expect(reconcile(true, config(), startedAt, now)).toEqual({
      isProcessRunning: true,
      operationMode: 'daemon_auto',
      nextCycleAt: new Date('2026-02-05T13:00:00.000Z'),
      secondsUntilNextCycle: 1800,
      isDue: false,
      scheduleIntervalSeconds: 3600,
      startedAt,
    });
  });

  it('uses minute schedules', () => {
    const everyTen = config({ service: { schedule: { interval: 10, format: 'minutes' } } });
    const status = reconcile(true, everyTen, startedAt, new Date('2026-02-05T10:25:00.000Z'));
    expect(status.nextCycleAt).toEqual(new Date('2026-02-05T10:30:00.000Z'));
    expect(status.secondsUntilNextCycle).toBe(300);
  });

  it('starts the countdown now when the start time is unknown or invalid', () => {
    for (const start of [undefined, null, new Date('invalid')]) {
      const status = reconcile(true, config(), start, now);
      expect(status.nextCycleAt).toEqual(new Date('2026-02-05T13:30:00.000Z'));
      expect(status.startedAt).toBeUndefined();
    }
  });

  it('schedules the following cycle when now falls exactly on a cycle', () => {
    const status = reconcile(true, config(), startedAt, new Date('2026-02-05T12:00:00.000Z'));
    expect(status.nextCycleAt).toEqual(new Date('2026-02-05T13:00:00.000Z'));
  });

  it('handles a start time ahead of the clock', () => {
    const status = reconcile(true, config(), new Date('2026-02-05T12:40:00.000Z'), now);
    expect(status.nextCycleAt).toEqual(new Date('2026-02-05T12:40:00.000Z'));
    expect(status.secondsUntilNextCycle).toBe(600);
  });

  it('never counts down into the past', () => {
    const schedules = [
      config({ service: { schedule: { interval: 1, format: 'minutes' } } }),
      config({ service: { schedule: { interval: 7, format: 'minutes' } } }),
      config({ service: { schedule: { interval: 3, format: 'hours' } } }),
    ];
    for (const schedule of schedules) {
      for (let offset = 0; offset < 24 * 3600; offset += 997) {
        const at = new Date(startedAt.getTime() + offset * 1000);
        const status = reconcile(true, schedule, startedAt, at);
        expect(status.nextCycleAt && status.nextCycleAt.getTime() >= at.getTime()).toBe(true);
        expect(status.secondsUntilNextCycle).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('reports manual without a countdown when the clock or interval is unusable', () => {
    const invalidNow = reconcile(true, config(), startedAt, new Date('not-a-date'));
    expect(invalidNow.operationMode).toBe('manual');
    expect(invalidNow.nextCycleAt).toBeUndefined();
    expect(invalidNow.secondsUntilNextCycle).toBeUndefined();
    expect(invalidNow.isDue).toBe(false);

    const unbounded = reconcile(true, config({ service: { schedule: { interval: 1e308, format: 'hours' } } }), startedAt, now);
    expect(unbounded.operationMode).toBe('manual');
    expect(unbounded.nextCycleAt).toBeUndefined();
    expect(unbounded.secondsUntilNextCycle).toBeUndefined();
  });

  it('is deterministic', () => {
    expect(reconcile(true, config(), startedAt, now)).toEqual(reconcile(true, config(), startedAt, now));
  });
});
