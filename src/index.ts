export * from './types';
export { loadSettings, DefaultSettings } from './config';
export type { ConsoleSettings } from './config';
export * from './config/balancerConfig';
export { interpret, interpretLines, interpretLine, parseLogOutput, classifyMessage, LogStore } from './parser/logParser';
export { summarizeEvents, getLastRunInfo, filterEvents } from './parser/logSummary';
export { correlate } from './parser/taskCorrelator';
export { toTaskRecord, toTaskRecords, parseUpid, isMigrationTaskType } from './parser/proxmoxTasks';
export { parseDryRun, parseBestNode, summarizeRunOutput } from './parser/dryRunParser';
export { collectGuestRules } from './parser/guestRules';
export { reconcile } from './status/daemonReconciler';
export { ConfigStore } from './services/configStore';
export { BalancerService, defaultExec } from './services/balancerService';
export type { ExecFn, ExecResult, ExecOptions } from './services/balancerService';
export * from './store/dashboardStore';
export { describeDaemonStatus, formatBytes, formatCpu, describePlannedMigration } from './utils/displayUtils';
export { formatCountdown, formatDuration, formatTimestamp, getRelativeTime } from './utils/dateUtils';
