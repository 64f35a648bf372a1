import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseBalancerConfig } from '../../config/balancerConfig';
import {
  createDashboardStore,
  selectDaemonStatus,
  selectLastRunInfo,
  selectLogEvents,
  selectLogSummary,
  selectMigrations,
} from '../dashboardStore';

const now = new Date('2026-02-05T12:30:00.000Z');

const logText = [
  '2026-02-05T02:00:00.000000000Z 2026-02-05 02:00:00,000 - ProxLB - INFO - Balancing: Starting to migrate VM guest 100 from pve1 to pve2.',
  '2026-02-05T02:00:40.000000000Z 2026-02-05 02:00:40,000 - ProxLB - ERROR - Failed to connect to pve3',
  '2026-02-05T02:01:00.000000000Z 2026-02-05 02:01:00,000 - ProxLB - INFO - Daemon mode active: Next run in: 12 hours.',
].join('\n');

const rawTasks = [
  {
    upid: 'UPID:pve1:000A1B2C:0F3E4D5C:6983F9A0:qmigrate:100:root@pam:',
    node: 'pve1',
    type: 'qmigrate',
    id: '100',
    starttime: 1770256795,
    endtime: 1770256830,
    status: 'OK',
  },
];

describe('dashboard store', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('captures every source on refresh', async () => {
    const store = createDashboardStore();
    await store.getState().refresh(
      {
        logs: async () => logText,
        tasks: async () => rawTasks,
        config: async () => parseBalancerConfig({ service: { schedule: { interval: 1, format: 'hours' } } }),
        process: async () => ({ exists: true, running: true, status: 'running', startedAt: new Date('2026-02-05T10:00:00.000Z') }),
      },
      now,
    );

    const state = store.getState();
    expect(state.errors).toEqual({});
    expect(state.lastRefreshAt).toEqual(now);
    expect(state.logFetchedAt).toEqual(now);
    expect(state.parsedLog.events).toHaveLength(3);
    expect(state.tasks).toHaveLength(1);

    const migrations = selectMigrations(state);
    expect(migrations).toHaveLength(1);
    expect(migrations[0].source).toBe('both');
    expect(migrations[0].toNode).toBe('pve2');

    const status = selectDaemonStatus(state, now);
    expect(status.operationMode).toBe('daemon_auto');
    expect(status.nextCycleAt).toEqual(new Date('2026-02-05T13:00:00.000Z'));

    expect(selectLastRunInfo(state).migrationsInLastRun).toBe(1);
  });

  it('keeps the previous snapshot of a source that fails', async () => {
    const store = createDashboardStore();
    await store.getState().refresh({ logs: async () => logText }, now);

    const later = new Date('2026-02-05T12:31:00.000Z');
    await store.getState().refresh(
      {
        logs: async () => {
          throw new Error('docker unavailable');
        },
        tasks: () => {
          throw new Error('sync failure');
        },
      },
      later,
    );

    const state = store.getState();
    expect(state.parsedLog.events).toHaveLength(3);
    expect(state.logFetchedAt).toEqual(now);
    expect(state.lastRefreshAt).toEqual(later);
    expect(state.errors).toEqual({ logs: 'docker unavailable', tasks: 'sync failure' });
  });

  it('clears a source error once it recovers', async () => {
    const store = createDashboardStore();
    await store.getState().refresh({ logs: () => Promise.reject(new Error('down')) }, now);
    expect(store.getState().errors).toEqual({ logs: 'down' });

    await store.getState().refresh({ logs: async () => '' }, now);
    expect(store.getState().errors).toEqual({});
  });

  it('filters log events and their summary', () => {
    const store = createDashboardStore();
    store.getState().setLogs(logText, now);
    store.getState().setLogFilter({ level: 'ERROR' });

    const state = store.getState();
    expect(selectLogEvents(state).map(e => e.message)).toEqual(['Failed to connect to pve3']);
    expect(selectLogSummary(state).total).toBe(1);

    store.getState().setLogFilter({});
    expect(selectLogSummary(store.getState()).total).toBe(3);
  });

  it('reports manual mode before any configuration was loaded', () => {
    const store = createDashboardStore();
    expect(selectDaemonStatus(store.getState(), now).operationMode).toBe('manual');
  });

  it('applies the configured correlation window', () => {
    const store = createDashboardStore({ correlationWindowSeconds: 0 });
    store.getState().setLogs(
      '2026-02-05 02:00:40,000 - ProxLB - INFO - Balancing: Starting to migrate VM guest 100 from pve1 to pve2.',
      now,
    );
    store.getState().setTasks(rawTasks);
    expect(selectMigrations(store.getState()).map(m => m.source)).toEqual(['log', 'task']);
  });

  it('matches logged guest names to task VMIDs through the guest inventory', async () => {
    const store = createDashboardStore();
    await store.getState().refresh(
      {
        logs: async () =>
          '2026-02-05T02:00:00.000000000Z 2026-02-05 02:00:00,000 - ProxLB - INFO - Balancing: Starting to migrate VM guest web01 from pve1 to pve2.',
        tasks: async () => rawTasks,
        guests: async () => [{ vmid: 100, name: 'web01', node: 'pve2' }],
      },
      now,
    );

    const migrations = selectMigrations(store.getState());
    expect(migrations.map(m => [m.source, m.guestRef, m.status])).toEqual([['both', 'web01', 'completed']]);
  });

  it('clears captured data', () => {
    const store = createDashboardStore();
    store.getState().setLogs(logText, now);
    store.getState().setTasks(rawTasks);
    store.getState().setGuests([{ vmid: 100, name: 'web01', node: 'pve2' }]);
    store.getState().clearData();

    const state = store.getState();
    expect(state.parsedLog.events).toEqual([]);
    expect(state.tasks).toEqual([]);
    expect(state.guests).toEqual([]);
    expect(state.logText).toBe('');
  });
});
