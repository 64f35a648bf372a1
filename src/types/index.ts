// Types for the PVE Balancer Console

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export type EventType =
  | 'rebalance_start'
  | 'rebalance_complete'
  | 'migration_start'
  | 'migration_complete'
  | 'migration_fail'
  | 'warning'
  | 'error'
  | 'generic';

export type GuestType = 'vm' | 'ct';

export interface NextRunInfo {
  value: number;
  unit: string;
}

/**
 * One interpreted balancer log line. Recomputed from the raw log on every fetch.
 */
export interface LogEvent {
  timestamp: Date;
  // true when the line carried no readable timestamp and fetch time was used
  timestampApproximate: boolean;
  level: LogLevel;
  eventType: EventType;
  message: string;
  rawLine: string;
  lineNumber: number;
  guestRef?: string;
  guestType?: GuestType;
  nodeFrom?: string;
  nodeTo?: string;
  nextRun?: NextRunInfo;
}

export interface LogParseStats {
  totalLines: number;
  blankLines: number;
  structuredLines: number;
  unstructuredLines: number;
  duplicateLines: number;
}

export interface MigrationCounts {
  total: number;
  started: number;
  completed: number;
  failed: number;
}

export interface LogSummary {
  total: number;
  byLevel: Record<LogLevel, number>;
  byEventType: Record<EventType, number>;
  migrations: MigrationCounts;
  approximateTimestamps: number;
}

export interface ParsedLog {
  events: LogEvent[];
  stats: LogParseStats;
  summary: LogSummary;
}

export interface LastRunInfo {
  lastRun?: Date;
  nextRun?: NextRunInfo;
  migrationsInLastRun: number;
}

export interface EventFilter {
  level?: LogLevel;
  eventType?: EventType;
}

/**
 * A task from the virtualization platform's own task history.
 */
export interface TaskRecord {
  taskId: string;
  type: string;
  node: string;
  description: string;
  startTime: Date;
  // absent while the task is still running
  endTime?: Date;
  // undefined = unknown (still running)
  success: boolean | undefined;
  isMigration: boolean;
  guestRef?: string;
  targetNode?: string;
  user?: string;
}

export type MigrationStatus = 'started' | 'completed' | 'failed';
export type MigrationSource = 'log' | 'task' | 'both';

export interface MigrationEvent {
  guestRef: string;
  fromNode?: string;
  toNode?: string;
  status: MigrationStatus;
  timestamp: Date;
  source: MigrationSource;
  message?: string;
  taskId?: string;
  // both sources named a node and disagreed
  nodeConflict?: boolean;
}

export interface CorrelateOptions {
  windowSeconds?: number;
  // guest inventory used to resolve logged names to task VMIDs
  guests?: readonly ClusterGuest[];
}

export type PlannedGuestType = 'vm' | 'container';

export interface PlannedMigration {
  guestName: string;
  guestType: PlannedGuestType;
  fromNode: string;
  toNode: string;
  memoryUsed: number | null;
  cpuUsed: number | null;
}

export interface DryRunPlan {
  analyzedGuestCount: number;
  nodeCount: number;
  plannedMigrations: PlannedMigration[];
  isBalanced: boolean;
  rawOutput: string[];
}

export interface RunOutputSummary {
  success: boolean;
  timedOut: boolean;
  dryRun: boolean;
  migrationLines: string[];
}

export type OperationMode = 'daemon_auto' | 'manual' | 'daemon_stopped' | 'balancing_disabled';

export interface DaemonStatus {
  isProcessRunning: boolean;
  operationMode: OperationMode;
  // only set for daemon_auto
  nextCycleAt?: Date;
  secondsUntilNextCycle?: number;
  isDue: boolean;
  scheduleIntervalSeconds: number;
  startedAt?: Date;
}

export interface ProcessStatus {
  exists: boolean;
  running: boolean;
  status: string;
  startedAt?: Date;
  error?: string;
}

export interface CommandResult {
  success: boolean;
  message?: string;
  error?: string;
}

export interface RunResult extends RunOutputSummary {
  output: string[];
  error?: string;
}

export interface BestNodeResult {
  success: boolean;
  bestNode?: string;
  output: string;
  error?: string;
}

/**
 * Guest as listed by the cluster resources endpoint (subset used for rules).
 */
export interface ClusterGuest {
  vmid: number;
  name?: string;
  node: string;
  tags?: string;
}

export interface RuleMember {
  vmid: number;
  name: string;
  node: string;
}

export interface GuestRules {
  affinity: Record<string, RuleMember[]>;
  antiAffinity: Record<string, RuleMember[]>;
  ignored: Array<RuleMember & { tag: string }>;
  pinned: Record<string, RuleMember[]>;
  pools: Record<string, unknown>;
}
