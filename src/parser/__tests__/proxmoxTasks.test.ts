import { describe, it, expect } from 'vitest';
import { isMigrationTaskType, parseUpid, toTaskRecord, toTaskRecords } from '../proxmoxTasks';

const upid = 'UPID:pve1:000A1B2C:0F3E4D5C:6983F9A0:qmigrate:100:root@pam:';

describe('parseUpid', () => {
  it('decodes node, pid, start time, type, id and user', () => {
    expect(parseUpid(upid)).toEqual({
      node: 'pve1',
      pid: 662316,
      startTime: new Date('2026-02-05T02:00:00.000Z'),
      type: 'qmigrate',
      id: '100',
      user: 'root@pam',
    });
  });

  it('rejects anything else', () => {
    expect(parseUpid('not-a-upid')).toBeUndefined();
    expect(parseUpid('UPID:pve1:zz')).toBeUndefined();
  });
});

describe('isMigrationTaskType', () => {
  it('recognizes VM, CT and HA migrations', () => {
    expect(isMigrationTaskType('qmigrate')).toBe(true);
    expect(isMigrationTaskType('vzmigrate')).toBe(true);
    expect(isMigrationTaskType('HAMIGRATE')).toBe(true);
    expect(isMigrationTaskType('vzdump')).toBe(false);
  });
});

describe('toTaskRecord', () => {
  it('maps a finished cluster task', () => {
    const record = toTaskRecord({
      upid,
      node: 'pve1',
      type: 'qmigrate',
      id: '100',
      starttime: 1770256800,
      endtime: 1770256840,
      status: 'OK',
      user: 'root@pam',
    });

    expect(record).toEqual({
      taskId: upid,
      type: 'qmigrate',
      node: 'pve1',
      description: 'VM 100 - Migrate',
      startTime: new Date('2026-02-05T02:00:00.000Z'),
      endTime: new Date('2026-02-05T02:00:40.000Z'),
      success: true,
      isMigration: true,
      guestRef: '100',
      user: 'root@pam',
    });
  });

  it('recovers missing fields from the UPID and leaves a running task undecided', () => {
    const record = toTaskRecord({ upid });
    expect(record?.type).toBe('qmigrate');
    expect(record?.node).toBe('pve1');
    expect(record?.guestRef).toBe('100');
    expect(record?.startTime).toEqual(new Date('2026-02-05T02:00:00.000Z'));
    expect(record?.endTime).toBeUndefined();
    expect(record?.success).toBeUndefined();
  });

  it('treats warnings as success and anything else as failure', () => {
    const base = { upid, starttime: 1770256800, endtime: 1770256840 };
    expect(toTaskRecord({ ...base, status: 'WARNINGS: 2' })?.success).toBe(true);
    expect(toTaskRecord({ ...base, status: 'migration aborted' })?.success).toBe(false);
  });

  it('builds an id for tasks without UPID or guest', () => {
    const record = toTaskRecord({ node: 'pve1', type: 'vzdump', starttime: 1770256800, endtime: 1770256900, status: 'OK' });
    expect(record?.taskId).toBe('pve1:vzdump::1770256800000');
    expect(record?.description).toBe('vzdump');
    expect(record?.isMigration).toBe(false);
    expect(record?.guestRef).toBeUndefined();
  });

  it('rejects unusable entries', () => {
    expect(toTaskRecord(null)).toBeUndefined();
    expect(toTaskRecord({})).toBeUndefined();
    expect(toTaskRecord({ type: 'qmigrate' })).toBeUndefined();
  });
});

describe('toTaskRecords', () => {
  it('skips invalid entries', () => {
    expect(toTaskRecords([{ upid }, null, {}])).toHaveLength(1);
    expect(toTaskRecords('oops')).toEqual([]);
  });
});
