import { describe, it, expect } from 'vitest';
import { parseBalancerConfig } from '../../config/balancerConfig';
import { collectGuestRules, splitTags } from '../guestRules';

describe('splitTags', () => {
  it('splits on semicolons, commas and spaces', () => {
    expect(splitTags('plb_affinity_web; backup,prod')).toEqual(['plb_affinity_web', 'backup', 'prod']);
    expect(splitTags(undefined)).toEqual([]);
    expect(splitTags('')).toEqual([]);
  });
});

describe('collectGuestRules', () => {
  it('groups guests by balancer tags', () => {
    const rules = collectGuestRules([
      { vmid: 100, name: 'web01', node: 'pve1', tags: 'plb_affinity_web;plb_pin_pve1' },
      { vmid: 101, name: 'web02', node: 'pve2', tags: 'plb_affinity_web' },
      { vmid: 102, name: 'db01', node: 'pve1', tags: 'plb_anti_affinity_db' },
      { vmid: 103, node: 'pve3', tags: 'plb_ignore_dev' },
      { vmid: 104, name: 'plain', node: 'pve3' },
    ]);

    expect(rules.affinity).toEqual({
      web: [
        { vmid: 100, name: 'web01', node: 'pve1' },
        { vmid: 101, name: 'web02', node: 'pve2' },
      ],
    });
    expect(rules.antiAffinity).toEqual({ db: [{ vmid: 102, name: 'db01', node: 'pve1' }] });
    expect(rules.pinned).toEqual({ pve1: [{ vmid: 100, name: 'web01', node: 'pve1' }] });
    expect(rules.ignored).toEqual([{ vmid: 103, name: 'VM 103', node: 'pve3', tag: 'plb_ignore_dev' }]);
    expect(rules.pools).toEqual({});
  });

  it('takes pools from the balancing section', () => {
    const config = parseBalancerConfig({ balancing: { pools: { prod: { type: 'affinity' } } } });
    expect(collectGuestRules([], config).pools).toEqual({ prod: { type: 'affinity' } });
  });
});
