/**
 * Merge balancer log migrations with the platform's task history.
 *
 * Neither source is complete on its own: logs may omit the target node or be
 * rotated away, tasks lack the balancer's narrative. Both are merged into one
 * migration timeline, most recent first.
 *
 * Matching rule: a migration log line belongs to a migration task when the
 * guest is the same (name or VMID) and the log time falls inside the task's
 * [start − ε, end + ε] window. A running task has an open end. The balancer
 * logs guest names while tasks carry VMIDs; a guest inventory bridges the two.
 */

import type {
  ClusterGuest,
  CorrelateOptions,
  LogEvent,
  MigrationEvent,
  MigrationStatus,
  TaskRecord,
} from '../types';
import { isValidDate } from '../utils/dateUtils';
import { DefaultCorrelationWindowSeconds, EventTypes, MigrationEventTypes } from './constants';
import { guestNumericId, isSameGuest, normalizeGuestRef, roundToMinute } from './utils';

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Correlate migration log events with migration tasks.
 * Never drops an unmatched record from either side and never throws.
 */
export function correlate(
  logEvents: readonly LogEvent[],
  taskRecords?: readonly TaskRecord[] | null,
  options: CorrelateOptions = {},
): MigrationEvent[] {
  const windowMs = Math.max(0, options.windowSeconds ?? DefaultCorrelationWindowSeconds) * 1000;

  const tasks = (taskRecords ?? []).filter(t => t.isMigration && isValidDate(t.startTime));
  const logs = logEvents.filter(e => MigrationEventTypes.has(e.eventType));
  const directory = guestDirectory(options.guests ?? []);

  // Assign each log line to at most one task
  const matchesByTask = new Map<number, LogMatch[]>();
  const unmatchedLogs: LogEvent[] = [];

  for (const log of logs) {
    const match = findBestTask(log, tasks, windowMs, directory);
    if (match) {
      const list = matchesByTask.get(match.taskIndex) ?? [];
      list.push(match);
      matchesByTask.set(match.taskIndex, list);
    } else {
      unmatchedLogs.push(log);
    }
  }

  const timeline = new Timeline();

  tasks.forEach((task, index) => {
    const matches = matchesByTask.get(index);
    timeline.add(matches ? mergeTaskWithLogs(task, matches) : fromTask(task));
  });

  for (const log of unmatchedLogs) {
    timeline.add(fromLog(log));
  }

  return timeline.sorted();
}

/**
 * Migration status implied by a log event type
 */
export function statusFromEventType(eventType: string): MigrationStatus {
  switch (eventType) {
    case EventTypes.MigrationFail:
      return 'failed';
    case EventTypes.MigrationComplete:
      return 'completed';
    default:
      return 'started';
  }
}

/**
 * Migration status implied by a task outcome
 */
export function statusFromTask(task: TaskRecord): MigrationStatus {
  if (task.success === true) return 'completed';
  if (task.success === false) return 'failed';
  return 'started';
}

// ── Matching ───────────────────────────────────────────────────────────────

interface LogMatch {
  taskIndex: number;
  log: LogEvent;
  // inside the task's own [start, end] window, without the ε slack
  tight: boolean;
  distanceMs: number;
}

/**
 * Guest name → VMID. Names shared by several guests are left out.
 */
function guestDirectory(guests: readonly ClusterGuest[]): Map<string, number> {
  const directory = new Map<string, number>();
  const ambiguous = new Set<string>();
  for (const guest of guests) {
    if (!guest.name) continue;
    const name = normalizeGuestRef(guest.name);
    const known = directory.get(name);
    if (known !== undefined && known !== guest.vmid) ambiguous.add(name);
    directory.set(name, guest.vmid);
  }
  for (const name of ambiguous) directory.delete(name);
  return directory;
}

function matchesGuest(logRef: string, taskRef: string, directory: ReadonlyMap<string, number>): boolean {
  if (isSameGuest(logRef, taskRef)) return true;
  const vmid = directory.get(normalizeGuestRef(logRef));
  return vmid !== undefined && vmid === guestNumericId(taskRef);
}

function findBestTask(
  log: LogEvent,
  tasks: readonly TaskRecord[],
  windowMs: number,
  directory: ReadonlyMap<string, number>,
): LogMatch | undefined {
  if (!log.guestRef) return undefined;
  const t = log.timestamp.getTime();

  let best: LogMatch | undefined;
  let bestWidth = Infinity;

  for (let taskIndex = 0; taskIndex < tasks.length; taskIndex++) {
    const task = tasks[taskIndex];
    if (!task.guestRef || !matchesGuest(log.guestRef, task.guestRef, directory)) continue;

    const start = task.startTime.getTime();
    const end = task.endTime && isValidDate(task.endTime) ? task.endTime.getTime() : Infinity;
    if (t < start - windowMs || t > end + windowMs) continue;

    const tight = t >= start && t <= end;
    const distanceMs = Math.abs(t - start);
    const width = end - start;

    const better =
      !best ||
      (tight && !best.tight) ||
      (tight === best.tight && (width < bestWidth || (width === bestWidth && distanceMs < best.distanceMs)));

    if (better) {
      best = { taskIndex, log, tight, distanceMs };
      bestWidth = width;
    }
  }

  return best;
}

// ── Event construction ─────────────────────────────────────────────────────

const StatusRank: Record<MigrationStatus, number> = {
  started: 0,
  completed: 1,
  failed: 2,
};

function fromTask(task: TaskRecord): MigrationEvent {
  const event: MigrationEvent = {
    guestRef: task.guestRef || task.description || task.taskId,
    fromNode: task.node || undefined,
    status: statusFromTask(task),
    timestamp: task.startTime,
    source: 'task',
    taskId: task.taskId,
  };
  if (task.targetNode) event.toNode = task.targetNode;
  if (task.description) event.message = task.description;
  return event;
}

function fromLog(log: LogEvent): MigrationEvent {
  const event: MigrationEvent = {
    guestRef: log.guestRef ?? 'unknown',
    status: statusFromEventType(log.eventType),
    timestamp: log.timestamp,
    source: 'log',
    message: log.message,
  };
  if (log.nodeFrom) event.fromNode = log.nodeFrom;
  if (log.nodeTo) event.toNode = log.nodeTo;
  return event;
}

/**
 * Collapse a task and every log line matched to it into one event.
 *
 * Node fields: the task wins, the log fills gaps. When both carry different
 * values the tighter timestamp match decides and the event is flagged.
 * Status and message: the most advanced log line wins. A log that only saw
 * the start takes the outcome the task recorded.
 */
function mergeTaskWithLogs(task: TaskRecord, matches: readonly LogMatch[]): MigrationEvent {
  let narrative = matches[0];
  for (const match of matches) {
    const rank = StatusRank[statusFromEventType(match.log.eventType)];
    const current = StatusRank[statusFromEventType(narrative.log.eventType)];
    if (rank > current || (rank === current && match.log.timestamp > narrative.log.timestamp)) {
      narrative = match;
    }
  }

  const nodeSource = matches.find(m => m.log.nodeFrom || m.log.nodeTo) ?? narrative;
  const from = pickNode(task.node, nodeSource.log.nodeFrom, nodeSource.tight);
  const to = pickNode(task.targetNode, nodeSource.log.nodeTo, nodeSource.tight);

  const logStatus = statusFromEventType(narrative.log.eventType);

  const event: MigrationEvent = {
    guestRef: matches.find(m => m.log.guestRef)?.log.guestRef ?? task.guestRef ?? task.taskId,
    status: logStatus === 'started' ? statusFromTask(task) : logStatus,
    timestamp: narrative.log.timestamp,
    source: 'both',
    message: narrative.log.message,
    taskId: task.taskId,
  };
  if (from.value) event.fromNode = from.value;
  if (to.value) event.toNode = to.value;
  if (from.conflict || to.conflict) event.nodeConflict = true;
  return event;
}

function pickNode(
  taskValue: string | undefined,
  logValue: string | undefined,
  tight: boolean,
): { value?: string; conflict: boolean } {
  if (taskValue && logValue && taskValue.toLowerCase() !== logValue.toLowerCase()) {
    return { value: tight ? taskValue : logValue, conflict: true };
  }
  return { value: taskValue || logValue, conflict: false };
}

// ── Ordering and deduplication ─────────────────────────────────────────────

/**
 * Ordered, deduplicated collection of migration events.
 *
 * Duplicates share source, guest, nodes and minute; the kept entry takes the
 * more advanced status of the two.
 */
class Timeline {
  private entries: MigrationEvent[] = [];
  private byKey = new Map<string, MigrationEvent>();

  add(event: MigrationEvent): void {
    const key = [
      event.source,
      normalizeGuestRef(event.guestRef),
      event.fromNode ?? '',
      event.toNode ?? '',
      roundToMinute(event.timestamp),
    ].join('|');

    const existing = this.byKey.get(key);
    if (existing) {
      if (StatusRank[event.status] > StatusRank[existing.status]) {
        existing.status = event.status;
        existing.message = event.message ?? existing.message;
      }
      return;
    }

    this.byKey.set(key, event);
    this.entries.push(event);
  }

  sorted(): MigrationEvent[] {
    return this.entries
      .map((event, index) => ({ event, index }))
      .sort((a, b) => {
        const byTime = b.event.timestamp.getTime() - a.event.timestamp.getTime();
        if (byTime !== 0) return byTime;
        const byRichness = sourceRank(a.event) - sourceRank(b.event);
        if (byRichness !== 0) return byRichness;
        return a.index - b.index;
      })
      .map(({ event }) => event);
  }
}

function sourceRank(event: MigrationEvent): number {
  return event.source === 'log' ? 1 : 0;
}
