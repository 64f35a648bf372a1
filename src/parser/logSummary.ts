import type { EventFilter, LastRunInfo, LogEvent, LogSummary } from '../types';
import { EventTypes } from './constants';

/**
 * Totals by level, event type and migration outcome
 */
export function summarizeEvents(events: readonly LogEvent[]): LogSummary {
  const summary: LogSummary = {
    total: events.length,
    byLevel: { DEBUG: 0, INFO: 0, WARNING: 0, ERROR: 0 },
    byEventType: {
      rebalance_start: 0,
      rebalance_complete: 0,
      migration_start: 0,
      migration_complete: 0,
      migration_fail: 0,
      warning: 0,
      error: 0,
      generic: 0,
    },
    migrations: { total: 0, started: 0, completed: 0, failed: 0 },
    approximateTimestamps: 0,
  };

  for (const event of events) {
    summary.byLevel[event.level]++;
    summary.byEventType[event.eventType]++;
    if (event.timestampApproximate) summary.approximateTimestamps++;

    switch (event.eventType) {
      case EventTypes.MigrationStart:
        summary.migrations.started++;
        summary.migrations.total++;
        break;
      case EventTypes.MigrationComplete:
        summary.migrations.completed++;
        summary.migrations.total++;
        break;
      case EventTypes.MigrationFail:
        summary.migrations.failed++;
        summary.migrations.total++;
        break;
    }
  }

  return summary;
}

/**
 * Information about the last completed daemon cycle.
 *
 * A cycle ends with the daemon's "Next run in" heartbeat; migrations counted are
 * those started between the last heartbeat and the one before it. Without any
 * heartbeat every started migration is counted.
 */
export function getLastRunInfo(events: readonly LogEvent[]): LastRunInfo {
  const heartbeats: number[] = [];
  events.forEach((event, index) => {
    if (event.nextRun) heartbeats.push(index);
  });

  const last = heartbeats[heartbeats.length - 1];
  const previous = heartbeats.length > 1 ? heartbeats[heartbeats.length - 2] : -1;
  const end = last ?? events.length;

  let migrationsInLastRun = 0;
  for (let i = previous + 1; i < end; i++) {
    if (events[i].eventType === EventTypes.MigrationStart) migrationsInLastRun++;
  }

  if (last === undefined) {
    return { migrationsInLastRun };
  }
  const heartbeat = events[last];
  return {
    lastRun: heartbeat.timestamp,
    nextRun: heartbeat.nextRun,
    migrationsInLastRun,
  };
}

/**
 * Log viewer filter by level and/or event type
 */
export function filterEvents(events: readonly LogEvent[], filter: EventFilter): LogEvent[] {
  return events.filter(
    event =>
      (!filter.level || event.level === filter.level) &&
      (!filter.eventType || event.eventType === filter.eventType),
  );
}
