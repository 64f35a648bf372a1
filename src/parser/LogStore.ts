import type { LogEvent, LogParseStats, ParsedLog } from '../types';
import { summarizeEvents } from './logSummary';

/**
 * LogStore accumulates interpreted events and line statistics during one log fetch
 */
export class LogStore {
  private events: LogEvent[] = [];
  private stats: LogParseStats = {
    totalLines: 0,
    blankLines: 0,
    structuredLines: 0,
    unstructuredLines: 0,
    duplicateLines: 0,
  };
  private processedLines: Set<string> = new Set();

  /**
   * Check if an identical line was seen earlier in this fetch
   */
  isLineProcessed(line: string): boolean {
    return this.processedLines.has(line);
  }

  /**
   * Mark a line as seen
   */
  markLineProcessed(line: string): void {
    this.processedLines.add(line);
  }

  /**
   * Append an event to the timeline
   */
  addEvent(event: LogEvent): void {
    this.events.push(event);
  }

  /**
   * Increment a stat counter
   */
  incrementStat(key: keyof LogParseStats): void {
    this.stats[key]++;
  }

  getStats(): LogParseStats {
    return this.stats;
  }

  /**
   * Get the complete parse result
   */
  getResult(): ParsedLog {
    return {
      events: this.events,
      stats: { ...this.stats },
      summary: summarizeEvents(this.events),
    };
  }
}
