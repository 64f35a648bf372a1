import type { EventType, GuestType, LogEvent, LogLevel, ParsedLog } from '../types';
import { LogStore } from './LogStore';
import {
  BalancerLogLineRegex,
  BracketLevelRegex,
  ColonLevelRegex,
  ContainerLogPrefixRegex,
  DaemonNextRunRegex,
  EventTypes,
  FromNodeRegex,
  FromToNodeRegex,
  GuestIdRegex,
  GuestNameRegex,
  KeyValueLevelRegex,
  LeadingTimestampRegex,
  LogLevels,
  MigrationEventTypes,
  MigrationStartRegex,
  TargetNodeRegex,
} from './constants';
import { parseTimestamp } from './utils';

interface ClassificationRule {
  type: EventType;
  // keywords is the message with guest and node names blanked out
  test: (message: string, level: LogLevel, keywords: string) => boolean;
}

const MigrationWord = /\bmigrat\w*/i;
const FailWord = /\b(?:fail(?:ed|ure|s)?|abort(?:ed)?|error)\b/i;
const CompleteWord = /\b(?:complete[ds]?|finished|succeeded|successful(?:ly)?|done)\b/i;
const StartWord = /\b(?:start(?:ing|ed|s)?|begin(?:ning|s)?|initiat\w*)\b/i;
const BalanceWord = /\b(?:re)?balanc\w*/i;
const AlreadyBalanced = /\bno (?:re)?balancing (?:is )?(?:needed|required)\b|\bcluster is (?:already )?balanced\b/i;

/**
 * Ordered classification rules; the first matching rule decides the event type.
 */
export const ClassificationRules: readonly ClassificationRule[] = [
  {
    type: EventTypes.MigrationStart,
    test: msg => MigrationStartRegex.test(msg),
  },
  {
    type: EventTypes.MigrationFail,
    test: (_msg, _level, words) => MigrationWord.test(words) && FailWord.test(words),
  },
  {
    type: EventTypes.MigrationComplete,
    test: (_msg, _level, words) => MigrationWord.test(words) && CompleteWord.test(words),
  },
  {
    type: EventTypes.MigrationStart,
    test: (_msg, _level, words) => MigrationWord.test(words) && StartWord.test(words),
  },
  {
    type: EventTypes.RebalanceComplete,
    test: msg =>
      DaemonNextRunRegex.test(msg) ||
      AlreadyBalanced.test(msg) ||
      (BalanceWord.test(msg) && CompleteWord.test(msg)),
  },
  {
    type: EventTypes.RebalanceStart,
    test: msg => BalanceWord.test(msg) && StartWord.test(msg),
  },
  {
    type: EventTypes.Error,
    test: (msg, level) => level === LogLevels.Error || /\b(?:error|exception|traceback)\b/i.test(msg),
  },
  {
    type: EventTypes.Warning,
    test: (msg, level) => level === LogLevels.Warning || /\bwarn(?:ing)?\b/i.test(msg),
  },
];

/**
 * Message text with the guest and node references removed, so that a guest
 * called "error-page" does not read as a failure
 */
export function keywordText(message: string): string {
  const { guestRef, nodeFrom, nodeTo } = extractMigrationDetails(message);
  let text = message;
  for (const token of [guestRef, nodeFrom, nodeTo]) {
    if (token) text = text.split(token).join(' ');
  }
  return text;
}

/**
 * Classify a message with the ordered rule list
 */
export function classifyMessage(message: string, level: LogLevel): EventType {
  const keywords = keywordText(message);
  for (const rule of ClassificationRules) {
    if (rule.test(message, level, keywords)) return rule.type;
  }
  return EventTypes.Generic;
}

/**
 * Map a level token to a LogLevel; undefined when the token is not a level
 */
export function normalizeLevel(token: string | undefined): LogLevel | undefined {
  switch (token?.toUpperCase()) {
    case 'DEBUG':
      return LogLevels.Debug;
    case 'INFO':
      return LogLevels.Info;
    case 'WARN':
    case 'WARNING':
      return LogLevels.Warning;
    case 'ERROR':
    case 'CRITICAL':
    case 'FATAL':
      return LogLevels.Error;
    default:
      return undefined;
  }
}

/**
 * Guess a level from message content when the line has no level token
 */
export function inferLevel(message: string): LogLevel {
  if (/\b(?:error|exception|traceback|failed|failure)\b/i.test(message)) return LogLevels.Error;
  if (/\bwarn(?:ing)?\b/i.test(message)) return LogLevels.Warning;
  return LogLevels.Info;
}

interface SplitLine {
  timestamp?: string;
  level?: LogLevel;
  message: string;
  structured: boolean;
}

/**
 * Separate timestamp, level token and message of one raw line
 */
export function splitLine(line: string): SplitLine {
  let rest = line.trim();
  let runtimeTimestamp: string | undefined;

  const prefix = rest.match(ContainerLogPrefixRegex);
  if (prefix) {
    runtimeTimestamp = prefix[1];
    rest = prefix[2];
  }

  const balancer = rest.match(BalancerLogLineRegex);
  if (balancer) {
    return {
      // the runtime stamp is UTC; the header is in the container's local zone
      timestamp: runtimeTimestamp ?? balancer[1],
      level: normalizeLevel(balancer[2]),
      message: balancer[3].trim(),
      structured: true,
    };
  }

  let timestamp = runtimeTimestamp;
  const leading = rest.match(LeadingTimestampRegex);
  if (leading) {
    timestamp = leading[1];
    rest = leading[2];
  }

  let level: LogLevel | undefined;
  const bracket = rest.match(BracketLevelRegex) ?? rest.match(ColonLevelRegex);
  if (bracket) {
    level = normalizeLevel(bracket[1]);
    rest = bracket[2];
  } else {
    const kv = rest.match(KeyValueLevelRegex);
    if (kv) level = normalizeLevel(kv[2]);
  }

  return { timestamp, level, message: rest.trim(), structured: false };
}

interface MigrationDetails {
  guestRef?: string;
  guestType?: GuestType;
  nodeFrom?: string;
  nodeTo?: string;
}

function stripTrailingDots(s: string): string {
  return s.replace(/\.+$/, '');
}

/**
 * Pull guest and node references out of a migration message
 */
export function extractMigrationDetails(message: string): MigrationDetails {
  const start = message.match(MigrationStartRegex);
  if (start) {
    return {
      guestType: start[1].toLowerCase() === 'ct' ? 'ct' : 'vm',
      guestRef: stripTrailingDots(start[2]),
      nodeFrom: start[3],
      nodeTo: start[4],
    };
  }

  const details: MigrationDetails = {};
  const guest = message.match(GuestNameRegex) ?? message.match(GuestIdRegex);
  if (guest) {
    details.guestRef = stripTrailingDots(guest[1]);
  }
  if (/\b(?:ct|container|lxc)\b/i.test(message)) {
    details.guestType = 'ct';
  } else if (/\b(?:vm|qemu)\b/i.test(message)) {
    details.guestType = 'vm';
  }

  const fromTo = message.match(FromToNodeRegex);
  if (fromTo) {
    details.nodeFrom = fromTo[1];
    details.nodeTo = fromTo[2];
  } else {
    const from = message.match(FromNodeRegex);
    if (from) details.nodeFrom = from[1];
    const target = message.match(TargetNodeRegex);
    if (target) details.nodeTo = target[1];
  }
  return details;
}

/**
 * Interpret one raw line. Never throws; unknown shapes become generic INFO events.
 */
export function interpretLine(line: string, lineNumber: number, fetchedAt: Date): LogEvent {
  const rawLine = line.replace(/\r$/, '');
  const split = splitLine(rawLine);
  const level = split.level ?? inferLevel(split.message);
  const eventType = classifyMessage(split.message, level);
  const parsed = parseTimestamp(split.timestamp);

  const event: LogEvent = {
    timestamp: parsed ?? new Date(fetchedAt.getTime()),
    timestampApproximate: !parsed,
    level,
    eventType,
    message: split.message,
    rawLine,
    lineNumber,
  };

  if (MigrationEventTypes.has(eventType)) {
    Object.assign(event, extractMigrationDetails(split.message));
  }

  const nextRun = split.message.match(DaemonNextRunRegex);
  if (nextRun) {
    event.nextRun = { value: parseInt(nextRun[1], 10), unit: nextRun[2].toLowerCase() };
  }

  return event;
}

/**
 * Lazily interpret a (possibly unbounded) sequence of raw lines, skipping blank ones.
 * Line numbers are 1-based positions in the input.
 */
export function* interpretLines(lines: Iterable<string>, fetchedAt: Date): Generator<LogEvent> {
  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;
    if (!line.trim()) continue;
    yield interpretLine(line, lineNumber, fetchedAt);
  }
}

/**
 * Interpret a batch of raw log lines, preserving order
 */
export function interpret(lines: Iterable<string>, fetchedAt: Date): LogEvent[] {
  return Array.from(interpretLines(lines, fetchedAt));
}

/**
 * Parse a raw log dump (as returned by the container runtime) with line statistics
 */
export function parseLogOutput(content: string, fetchedAt: Date): ParsedLog {
  const store = new LogStore();
  const lines = content.split('\n');

  for (const line of lines) {
    store.incrementStat('totalLines');

    if (!line.trim()) {
      store.incrementStat('blankLines');
      continue;
    }

    if (store.isLineProcessed(line)) {
      store.incrementStat('duplicateLines');
    }
    store.markLineProcessed(line);

    store.incrementStat(splitLine(line).structured ? 'structuredLines' : 'unstructuredLines');
    store.addEvent(interpretLine(line, store.getStats().totalLines, fetchedAt));
  }

  return store.getResult();
}

export { LogStore };
