import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { ConfigStore } from '../configStore';

const sample = `proxmox_api:
  hosts:
    - 10.0.0.1
  user: root@pam
  pass: test-secret
proxmox_cluster:
  maintenance_nodes: []
balancing:
  enable: true
  method: memory
  custom_flag: keep-me
service:
  daemon: true
  schedule:
    interval: 12
    format: hours
`;

describe('ConfigStore', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'balancer-config-'));
    path = join(dir, 'proxlb.yaml');
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('loads and validates the configuration', async () => {
    await writeFile(path, sample);
    const config = await new ConfigStore(path).load();

    expect(config?.service.schedule).toEqual({ interval: 12, format: 'hours' });
    expect(config?.proxmox_api.user).toBe('root@pam');
  });

  it('returns undefined for a missing file without logging an error', async () => {
    const store = new ConfigStore(join(dir, 'missing.yaml'));
    expect(await store.load()).toBeUndefined();
    expect(console.error).not.toHaveBeenCalled();
  });

  it('returns undefined for invalid YAML', async () => {
    await writeFile(path, 'balancing: [unclosed');
    expect(await new ConfigStore(path).loadDocument()).toBeUndefined();
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('returns undefined for a YAML document that is not a mapping', async () => {
    await writeFile(path, '- just\n- a list\n');
    expect(await new ConfigStore(path).loadDocument()).toBeUndefined();
  });

  it('toggles maintenance nodes and keeps unknown keys', async () => {
    await writeFile(path, sample);
    const store = new ConfigStore(path);

    expect(await store.setMaintenanceNode('pve2', 'add')).toEqual({ success: true, maintenanceNodes: ['pve2'] });
    const saved = yaml.load(await readFile(path, 'utf-8'));
    expect(saved).toMatchObject({
      proxmox_cluster: { maintenance_nodes: ['pve2'] },
      balancing: { custom_flag: 'keep-me' },
    });

    expect(await store.setMaintenanceNode('pve2', 'remove')).toEqual({ success: true, maintenanceNodes: [] });
  });

  it('fails maintenance changes without a configuration', async () => {
    const store = new ConfigStore(join(dir, 'missing.yaml'));
    expect(await store.setMaintenanceNode('pve2', 'add')).toEqual({ success: false, error: 'Configuration not found' });
  });

  it('validates and applies balancing settings', async () => {
    await writeFile(path, sample);
    const store = new ConfigStore(path);

    const rejected = await store.updateBalancingSettings({ method: 'magic' });
    expect(rejected.success).toBe(false);

    expect((await store.updateBalancingSettings({ method: 'cpu', balanciness: 8 })).success).toBe(true);
    const config = await store.load();
    expect(config?.balancing.method).toBe('cpu');
    expect(config?.balancing.balanciness).toBe(8);
  });

  it('keeps the stored password when the edited document carries the mask', async () => {
    await writeFile(path, sample);
    const store = new ConfigStore(path);

    const result = await store.update({ proxmox_api: { user: 'root@pam', pass: '********' } });
    expect(result).toEqual({ success: true, message: 'Configuration updated' });
    expect(await store.loadDocument()).toEqual({ proxmox_api: { user: 'root@pam', pass: 'test-secret' } });
  });

  it('reports write failures', async () => {
    const store = new ConfigStore(join(dir, 'no-such-dir', 'proxlb.yaml'));
    const result = await store.save({ balancing: { enable: true } });
    expect(result.success).toBe(false);
    expect(result.error).toContain('ENOENT');
  });
});
