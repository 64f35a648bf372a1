import type { DryRunPlan, PlannedGuestType, PlannedMigration, RunOutputSummary } from '../types';
import { isRecord, toFiniteNumber } from './utils';

/**
 * Yield every balanced {...} slice of text, in order of its opening brace.
 *
 * Brace depth is counted outside JSON string literals only, so braces inside
 * guest names or messages do not end the object early. A slice is yielded for
 * each opening brace whose depth returns to zero; unbalanced starts yield nothing.
 */
export function* balancedObjects(text: string): Generator<string> {
  let start = text.indexOf('{');
  while (start !== -1) {
    const end = findObjectEnd(text, start);
    if (end !== -1) {
      yield text.slice(start, end + 1);
    }
    start = text.indexOf('{', start + 1);
  }
}

/**
 * Index of the brace closing the object opened at `start`, or -1
 */
export function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * First embedded JSON object that carries a "guests" section
 */
export function extractPlanDocument(text: string): Record<string, unknown> | undefined {
  for (const candidate of balancedObjects(text)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    if (isRecord(parsed) && isRecord(parsed.guests)) {
      return parsed;
    }
  }
  return undefined;
}

function plannedGuestType(value: unknown): PlannedGuestType {
  if (typeof value !== 'string') return 'vm';
  switch (value.toLowerCase()) {
    case 'ct':
    case 'lxc':
    case 'container':
      return 'container';
    default:
      return 'vm';
  }
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Planned move for one guest entry, or undefined when the guest stays put
 * or either node field is missing.
 */
export function toPlannedMigration(key: string, entry: unknown): PlannedMigration | undefined {
  if (!isRecord(entry)) return undefined;
  const fromNode = nonEmptyString(entry.node_current);
  const toNode = nonEmptyString(entry.node_target);
  if (!fromNode || !toNode || fromNode === toNode) return undefined;

  return {
    guestName: nonEmptyString(entry.name) ?? key,
    guestType: plannedGuestType(entry.type),
    fromNode,
    toNode,
    memoryUsed: toFiniteNumber(entry.memory_used),
    cpuUsed: toFiniteNumber(entry.cpu_used),
  };
}

/**
 * Parse the output of a simulate-only balancer run into a migration plan.
 *
 * The balancer prints its cluster state as one JSON object somewhere inside
 * ordinary log output. When no such object can be found, or it has no
 * "guests" section, the plan is empty: an under-reported plan is preferred to
 * a made-up one.
 */
export function parseDryRun(rawOutput: readonly string[]): DryRunPlan {
  const output = [...rawOutput];
  const document = extractPlanDocument(output.join('\n'));

  if (!document || !isRecord(document.guests)) {
    return {
      analyzedGuestCount: 0,
      nodeCount: 0,
      plannedMigrations: [],
      isBalanced: true,
      rawOutput: output,
    };
  }

  const guests = Object.entries(document.guests);
  const plannedMigrations: PlannedMigration[] = [];
  for (const [key, entry] of guests) {
    const migration = toPlannedMigration(key, entry);
    if (migration) plannedMigrations.push(migration);
  }

  return {
    analyzedGuestCount: guests.length,
    nodeCount: isRecord(document.nodes) ? Object.keys(document.nodes).length : 0,
    plannedMigrations,
    isBalanced: plannedMigrations.length === 0,
    rawOutput: output,
  };
}

const LogLinePrefix = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}/;

/**
 * Answer of a best-node query: the last output line that is not a log line.
 * Undefined when there is no output or the answer reports an error.
 */
export function parseBestNode(output: string): string | undefined {
  const lines = output
    .split('\n')
    .map(l => l.trim())
    .filter(l => l);
  if (lines.length === 0) return undefined;

  let answer = lines[lines.length - 1];
  for (let i = lines.length - 1; i >= 0; i--) {
    if (!lines[i].includes(' - ProxLB - ') && !LogLinePrefix.test(lines[i])) {
      answer = lines[i];
      break;
    }
  }

  return /error/i.test(answer) ? undefined : answer;
}

/**
 * Outcome of a one-shot (real or simulated) balancer run
 */
export function summarizeRunOutput(
  lines: readonly string[],
  dryRun: boolean,
  exitedCleanly: boolean,
): RunOutputSummary {
  const output = lines.filter(l => l.trim());
  const text = output.join('\n');
  const timedOut = /timed out/i.test(text);

  return {
    success: !timedOut && (exitedCleanly || text.includes('ProxLB')),
    timedOut,
    dryRun,
    migrationLines: output.filter(l => /migrate|balancing:/i.test(l)),
  };
}
