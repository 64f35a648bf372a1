import { OperationModes } from '../parser/constants';
import type { DaemonStatus, PlannedMigration } from '../types';
import { formatCountdown } from './dateUtils';

export interface StatusCardText {
  label: string;
  value: string;
}

/**
 * Label/value pair of the daemon status card
 */
export function describeDaemonStatus(status: DaemonStatus): StatusCardText {
  switch (status.operationMode) {
    case OperationModes.DaemonAuto:
      return {
        label: 'Next Rebalance',
        value:
          status.isDue || !status.secondsUntilNextCycle
            ? 'Running...'
            : formatCountdown(status.secondsUntilNextCycle),
      };
    case OperationModes.DaemonStopped:
      return { label: 'Status', value: 'Stopped' };
    case OperationModes.BalancingDisabled:
      return { label: 'Balancing', value: 'Disabled' };
    case OperationModes.Manual:
      return { label: 'Mode', value: 'Manual' };
  }
}

const ByteUnits = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human-readable byte size with one decimal ("1 GB", "1.5 MB"); "N/A" when unknown
 */
export function formatBytes(bytes: number | null): string {
  if (bytes === null || !Number.isFinite(bytes) || bytes < 0) return 'N/A';
  if (bytes === 0) return '0 B';
  const i = Math.max(0, Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), ByteUnits.length - 1));
  return `${parseFloat((bytes / Math.pow(1024, i)).toFixed(1))} ${ByteUnits[i]}`;
}

/**
 * CPU usage fraction as a percentage ("12.5%"); "N/A" when unknown
 */
export function formatCpu(fraction: number | null): string {
  if (fraction === null || !Number.isFinite(fraction)) return 'N/A';
  return `${(fraction * 100).toFixed(1)}%`;
}

/**
 * One row of the dry-run plan table
 */
export function describePlannedMigration(migration: PlannedMigration): string {
  const kind = migration.guestType === 'container' ? 'CT' : 'VM';
  return `${kind} ${migration.guestName}: ${migration.fromNode} → ${migration.toNode} (mem ${formatBytes(migration.memoryUsed)}, cpu ${formatCpu(migration.cpuUsed)})`;
}
