import { createStore } from 'zustand/vanilla';
import type { BalancerConfig } from '../config/balancerConfig';
import { DefaultCorrelationWindowSeconds } from '../parser/constants';
import { parseLogOutput } from '../parser/logParser';
import { filterEvents, getLastRunInfo, summarizeEvents } from '../parser/logSummary';
import { toTaskRecords } from '../parser/proxmoxTasks';
import { correlate } from '../parser/taskCorrelator';
import { reconcile } from '../status/daemonReconciler';
import type {
  ClusterGuest,
  DaemonStatus,
  DryRunPlan,
  EventFilter,
  LastRunInfo,
  LogEvent,
  LogSummary,
  MigrationEvent,
  ParsedLog,
  ProcessStatus,
  TaskRecord,
} from '../types';

/**
 * Fetchers the dashboard polls. A source left out is not refreshed.
 */
export interface DashboardSources {
  logs?: () => Promise<string>;
  // raw GET /cluster/tasks payload
  tasks?: () => Promise<unknown>;
  config?: () => Promise<BalancerConfig | undefined>;
  process?: () => Promise<ProcessStatus>;
  // guest inventory, lets logged names match task VMIDs
  guests?: () => Promise<ClusterGuest[]>;
}

export type SourceName = keyof DashboardSources;

export interface DashboardState {
  // Captured snapshot
  logText: string;
  parsedLog: ParsedLog;
  logFetchedAt?: Date;
  tasks: TaskRecord[];
  guests: ClusterGuest[];
  config?: BalancerConfig;
  processStatus?: ProcessStatus;
  lastDryRun?: DryRunPlan;
  lastRefreshAt?: Date;
  errors: Partial<Record<SourceName, string>>;

  // View settings
  logFilter: EventFilter;
  correlationWindowSeconds: number;

  // Actions
  refresh: (sources: DashboardSources, now: Date) => Promise<void>;
  setLogs: (text: string, fetchedAt: Date) => void;
  setTasks: (raw: unknown) => void;
  setGuests: (guests: ClusterGuest[]) => void;
  setConfig: (config: BalancerConfig | undefined) => void;
  setProcessStatus: (status: ProcessStatus) => void;
  setDryRun: (plan: DryRunPlan) => void;
  setLogFilter: (filter: EventFilter) => void;
  clearData: () => void;
}

export interface DashboardStoreOptions {
  correlationWindowSeconds?: number;
}

const emptyParsedLog: ParsedLog = parseLogOutput('', new Date(0));

function reasonMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

function settle<T>(fetch: (() => Promise<T>) | undefined): Promise<PromiseSettledResult<T>> | undefined {
  if (!fetch) return undefined;
  // a fetcher that throws synchronously settles as rejected
  return Promise.allSettled([Promise.resolve().then(fetch)]).then(([result]) => result);
}

/**
 * Dashboard state: the last captured snapshot of every source.
 *
 * The store only holds captured data; everything shown is derived from it by
 * the selectors below, so one snapshot always renders the same way.
 */
export function createDashboardStore(options: DashboardStoreOptions = {}) {
  return createStore<DashboardState>()((set, get) => ({
    logText: '',
    parsedLog: emptyParsedLog,
    tasks: [],
    guests: [],
    errors: {},
    logFilter: {},
    correlationWindowSeconds: options.correlationWindowSeconds ?? DefaultCorrelationWindowSeconds,

    refresh: async (sources, now) => {
      const [logs, tasks, config, processStatus, guests] = await Promise.all([
        settle(sources.logs),
        settle(sources.tasks),
        settle(sources.config),
        settle(sources.process),
        settle(sources.guests),
      ]);

      const errors = { ...get().errors };
      const apply = <T>(source: SourceName, result: PromiseSettledResult<T> | undefined, capture: (value: T) => void) => {
        if (!result) return;
        if (result.status === 'fulfilled') {
          capture(result.value);
          delete errors[source];
        } else {
          errors[source] = reasonMessage(result.reason);
          console.error(`[balancer] Failed to refresh ${source}:`, errors[source]);
        }
      };

      apply('logs', logs, text => get().setLogs(text, now));
      apply('tasks', tasks, raw => get().setTasks(raw));
      apply('config', config, value => get().setConfig(value));
      apply('process', processStatus, value => get().setProcessStatus(value));
      apply('guests', guests, value => get().setGuests(value));

      set({ errors, lastRefreshAt: now });
    },

    setLogs: (text, fetchedAt) => {
      set({ logText: text, logFetchedAt: fetchedAt, parsedLog: parseLogOutput(text, fetchedAt) });
    },

    setTasks: raw => {
      set({ tasks: toTaskRecords(raw) });
    },

    setGuests: guests => {
      set({ guests });
    },

    setConfig: config => {
      set({ config });
    },

    setProcessStatus: status => {
      set({ processStatus: status });
    },

    setDryRun: plan => {
      set({ lastDryRun: plan });
    },

    setLogFilter: filter => {
      set({ logFilter: filter });
    },

    clearData: () => {
      set({
        logText: '',
        parsedLog: emptyParsedLog,
        logFetchedAt: undefined,
        tasks: [],
        guests: [],
        config: undefined,
        processStatus: undefined,
        lastDryRun: undefined,
        lastRefreshAt: undefined,
        errors: {},
      });
    },
  }));
}

export type DashboardStore = ReturnType<typeof createDashboardStore>;

// ── Selectors ──────────────────────────────────────────────────────────────

export function selectLogEvents(state: DashboardState): LogEvent[] {
  return filterEvents(state.parsedLog.events, state.logFilter);
}

export function selectLogSummary(state: DashboardState): LogSummary {
  return state.logFilter.level || state.logFilter.eventType
    ? summarizeEvents(selectLogEvents(state))
    : state.parsedLog.summary;
}

export function selectLastRunInfo(state: DashboardState): LastRunInfo {
  return getLastRunInfo(state.parsedLog.events);
}

export function selectMigrations(state: DashboardState): MigrationEvent[] {
  return correlate(state.parsedLog.events, state.tasks, {
    windowSeconds: state.correlationWindowSeconds,
    guests: state.guests,
  });
}

export function selectDaemonStatus(state: DashboardState, now: Date): DaemonStatus {
  return reconcile(
    state.processStatus?.running ?? false,
    state.config,
    state.processStatus?.startedAt,
    now,
  );
}
