import type { BalancerConfig } from '../config/balancerConfig';
import type { ClusterGuest, GuestRules, RuleMember } from '../types';
import { TagPrefixes } from './constants';

/**
 * Split a Proxmox tag string ("plb_affinity_web;backup") into tags
 */
export function splitTags(tags: string | undefined): string[] {
  if (!tags) return [];
  return tags
    .split(/[;,\s]+/)
    .map(t => t.trim())
    .filter(t => t);
}

function addToGroup(groups: Record<string, RuleMember[]>, group: string, member: RuleMember): void {
  (groups[group] ??= []).push(member);
}

/**
 * Group guests by the balancer's placement tags.
 *
 * plb_affinity_<group> and plb_anti_affinity_<group> build the (anti-)affinity
 * groups, plb_pin_<node> pins a guest to a node and plb_ignore_* excludes it.
 * Pools come from the balancing section of the configuration.
 */
export function collectGuestRules(
  guests: readonly ClusterGuest[],
  config?: BalancerConfig,
): GuestRules {
  const rules: GuestRules = {
    affinity: {},
    antiAffinity: {},
    ignored: [],
    pinned: {},
    pools: config?.balancing.pools ?? {},
  };

  for (const guest of guests) {
    const member: RuleMember = {
      vmid: guest.vmid,
      name: guest.name || `VM ${guest.vmid}`,
      node: guest.node,
    };

    for (const tag of splitTags(guest.tags)) {
      if (tag.startsWith(TagPrefixes.AntiAffinity)) {
        addToGroup(rules.antiAffinity, tag.slice(TagPrefixes.AntiAffinity.length), member);
      } else if (tag.startsWith(TagPrefixes.Affinity)) {
        addToGroup(rules.affinity, tag.slice(TagPrefixes.Affinity.length), member);
      } else if (tag.startsWith(TagPrefixes.Ignore)) {
        rules.ignored.push({ ...member, tag });
      } else if (tag.startsWith(TagPrefixes.Pin)) {
        addToGroup(rules.pinned, tag.slice(TagPrefixes.Pin.length), member);
      }
    }
  }

  return rules;
}
