import type { TaskRecord } from '../types';
import { MigrationTaskTypes, UpidRegex } from './constants';
import { isRecord } from './utils';

export interface UpidInfo {
  node: string;
  pid: number;
  startTime: Date;
  type: string;
  id: string;
  user: string;
}

/**
 * Decode a Proxmox UPID ("UPID:pve1:000A1B2C:0F3E4D5C:65C0A1B2:qmigrate:100:root@pam:")
 */
export function parseUpid(upid: string): UpidInfo | undefined {
  const match = upid.match(UpidRegex);
  if (!match) return undefined;
  const [, node, pid, , starttime, type, id, user] = match;
  return {
    node,
    pid: parseInt(pid, 16),
    startTime: new Date(parseInt(starttime, 16) * 1000),
    type,
    id,
    user,
  };
}

export function isMigrationTaskType(type: string): boolean {
  return MigrationTaskTypes.has(type.toLowerCase());
}

function describeTask(type: string, id: string): string {
  switch (type) {
    case 'qmigrate':
      return `VM ${id} - Migrate`;
    case 'vzmigrate':
      return `CT ${id} - Migrate`;
    case 'hamigrate':
      return `HA ${id} - Migrate`;
    default:
      return id ? `${type} ${id}` : type;
  }
}

function epochSeconds(value: unknown): Date | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) return undefined;
  return new Date(value * 1000);
}

/**
 * Convert one raw GET /cluster/tasks entry into a TaskRecord; undefined when unusable.
 *
 * A task without an end time is still running and its outcome is unknown.
 * Finished tasks succeed on "OK" or "WARNINGS: n".
 */
export function toTaskRecord(raw: unknown): TaskRecord | undefined {
  if (!isRecord(raw)) return undefined;
  const upid = typeof raw.upid === 'string' ? parseUpid(raw.upid) : undefined;
  const type = typeof raw.type === 'string' ? raw.type : upid?.type;
  const node = typeof raw.node === 'string' ? raw.node : upid?.node;
  const startTime = epochSeconds(raw.starttime) ?? upid?.startTime;
  if (!type || !node || !startTime) return undefined;

  const rawId = typeof raw.id === 'string' || typeof raw.id === 'number' ? String(raw.id) : upid?.id;
  const id = rawId ?? '';
  const endTime = epochSeconds(raw.endtime);

  let success: boolean | undefined;
  if (endTime) {
    const status = typeof raw.status === 'string' ? raw.status : '';
    success = status === 'OK' || status.startsWith('WARNINGS');
  }

  const record: TaskRecord = {
    taskId: typeof raw.upid === 'string' ? raw.upid : `${node}:${type}:${id}:${startTime.getTime()}`,
    type,
    node,
    description: describeTask(type, id),
    startTime,
    success,
    isMigration: isMigrationTaskType(type),
  };
  if (endTime) record.endTime = endTime;
  if (id) record.guestRef = id;
  const user = typeof raw.user === 'string' ? raw.user : upid?.user;
  if (user) record.user = user;
  return record;
}

/**
 * Convert a raw task list, skipping entries that cannot be read
 */
export function toTaskRecords(raw: unknown): TaskRecord[] {
  if (!Array.isArray(raw)) return [];
  const records: TaskRecord[] = [];
  for (const item of raw) {
    const record = toTaskRecord(item);
    if (record) records.push(record);
  }
  return records;
}
