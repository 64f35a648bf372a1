import type { BalancerConfig } from '../config/balancerConfig';
import { scheduleIntervalSeconds } from '../config/balancerConfig';
import { OperationModes } from '../parser/constants';
import type { DaemonStatus } from '../types';
import { isValidDate } from '../utils/dateUtils';

/**
 * Reconcile process state and configuration into the daemon's operating mode.
 *
 * Priority: balancing disabled → manual (daemon off or no config) → daemon
 * stopped → daemon running with a countdown to its next cycle.
 *
 * The daemon runs a cycle at start and then every interval, so the next cycle
 * is the first multiple of the interval after the container start that lies
 * in the future. Without a start time the countdown starts now. When no
 * countdown can be computed (unreadable clock, unbounded interval) the daemon
 * is reported as manual.
 */
export function reconcile(
  isProcessRunning: boolean,
  config: BalancerConfig | undefined,
  lastStartedAt: Date | null | undefined,
  now: Date,
): DaemonStatus {
  const intervalSeconds = config ? scheduleIntervalSeconds(config) : 0;
  const startedAt = isValidDate(lastStartedAt) ? lastStartedAt : undefined;

  const status: DaemonStatus = {
    isProcessRunning,
    operationMode: OperationModes.Manual,
    isDue: false,
    scheduleIntervalSeconds: intervalSeconds,
  };
  if (startedAt) status.startedAt = startedAt;

  if (!config) return status;

  if (!config.balancing.enable) {
    status.operationMode = OperationModes.BalancingDisabled;
    return status;
  }
  if (!config.service.daemon) {
    return status;
  }
  if (!isProcessRunning) {
    status.operationMode = OperationModes.DaemonStopped;
    return status;
  }

  const intervalMs = intervalSeconds * 1000;
  if (!isValidDate(now) || !Number.isFinite(intervalMs) || intervalMs <= 0) {
    return status;
  }

  status.operationMode = OperationModes.DaemonAuto;
  const nowMs = now.getTime();
  const anchor = startedAt ? startedAt.getTime() : nowMs;

  const cyclesPassed = Math.floor((nowMs - anchor) / intervalMs);
  let next = anchor + (cyclesPassed + 1) * intervalMs;
  if (next <= nowMs) {
    next = nowMs;
    status.isDue = true;
  }

  status.nextCycleAt = new Date(next);
  status.secondsUntilNextCycle = Math.max(0, Math.round((next - nowMs) / 1000));
  return status;
}
