// Log levels
export const LogLevels = {
  Debug: 'DEBUG',
  Info: 'INFO',
  Warning: 'WARNING',
  Error: 'ERROR',
} as const;

// Interpreted event types
export const EventTypes = {
  RebalanceStart: 'rebalance_start',
  RebalanceComplete: 'rebalance_complete',
  MigrationStart: 'migration_start',
  MigrationComplete: 'migration_complete',
  MigrationFail: 'migration_fail',
  Warning: 'warning',
  Error: 'error',
  Generic: 'generic',
} as const;

export const MigrationEventTypes: Set<string> = new Set([
  EventTypes.MigrationStart,
  EventTypes.MigrationComplete,
  EventTypes.MigrationFail,
]);

// Daemon operation modes
export const OperationModes = {
  DaemonAuto: 'daemon_auto',
  Manual: 'manual',
  DaemonStopped: 'daemon_stopped',
  BalancingDisabled: 'balancing_disabled',
} as const;

// Proxmox task types that move a guest between nodes
export const MigrationTaskTypes: Set<string> = new Set(['qmigrate', 'vzmigrate', 'hamigrate']);

// Default slack between log emission and task bookkeeping
export const DefaultCorrelationWindowSeconds = 30;

export const ScheduleUnitSeconds = {
  minutes: 60,
  hours: 3600,
} as const;

// Balancer log line: "2026-02-05 02:57:29,093 - ProxLB - INFO - message"
export const BalancerLogLineRegex =
  /^(\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}(?:[,.]\d+)?)\s+-\s+ProxLB\s+-\s+([A-Za-z]+)\s+-\s+(.*)$/;

// Container runtime prefix: "2026-02-05T02:57:29.093456789Z rest"
export const ContainerLogPrefixRegex =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2}))\s+(.*)$/;

// Leading timestamp in an otherwise free-form line
export const LeadingTimestampRegex =
  /^\[?(\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}(?:[,.]\d+)?(?:Z|[+-]\d{2}:?\d{2})?)\]?\s*(?:-\s*)?(.*)$/;

// Explicit level tokens: "[ERROR] ...", "level=warning ...", "WARNING: ..."
export const BracketLevelRegex = /^\[(DEBUG|INFO|WARN|WARNING|ERROR|CRITICAL|FATAL)\]\s*(.*)$/i;
export const KeyValueLevelRegex = /\blevel=("?)(debug|info|warn|warning|error|critical|fatal)\1(?=\s|$)/i;
export const ColonLevelRegex = /^(DEBUG|INFO|WARN|WARNING|ERROR|CRITICAL|FATAL):\s+(.*)$/;

// "Balancing: Starting to migrate VM guest web01 from pve1 to pve2."
export const MigrationStartRegex =
  /Starting to migrate (VM|CT) guest (\S+) from (\S+?) to (\S+?)\.?$/i;

// Looser guest/node extraction for completion and failure lines
export const GuestNameRegex = /\bguest\s+['"]?([\w.-]+)/i;
export const GuestIdRegex = /\b(?:vm|ct|container)\s+['"]?([\w.-]+)/i;
export const FromToNodeRegex =
  /\bfrom\s+(?:node\s+)?['"]?([\w.-]+?)['"]?\s+to\s+(?:node\s+)?['"]?([\w.-]+?)['"]?(?=[\s.,;:]|$)/i;
export const FromNodeRegex = /\bfrom\s+(?:node\s+)?['"]?([\w.-]+?)['"]?(?=[\s.,;:]|$)/i;
export const TargetNodeRegex = /\b(?:to|target)\s+node\s+['"]?([\w.-]+?)['"]?(?=[\s.,;:]|$)/i;

// "Daemon mode active: Next run in: 12 hours."
export const DaemonNextRunRegex = /Daemon mode active: Next run in:?\s*(\d+)\s+(\w+?)\.?$/i;

// Proxmox UPID: UPID:node:pid:pstart:starttime:type:id:user:
export const UpidRegex =
  /^UPID:([^:]+):([0-9A-Fa-f]+):([0-9A-Fa-f]+):([0-9A-Fa-f]+):([^:]+):([^:]*):([^:]+):/;

// Guest tag prefixes understood by the balancer
export const TagPrefixes = {
  AntiAffinity: 'plb_anti_affinity_',
  Affinity: 'plb_affinity_',
  Ignore: 'plb_ignore_',
  Pin: 'plb_pin_',
} as const;
