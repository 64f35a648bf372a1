import { z } from 'zod';
import { ScheduleUnitSeconds } from '../parser/constants';
import { isRecord } from '../parser/utils';

/**
 * A missing or non-mapping section parses as an empty mapping, so every field
 * inside it falls back to its own default.
 */
function section<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (isRecord(value) ? value : {}), schema);
}

const stringList = z.array(z.string()).catch([]);

export const ScheduleFormat = z.enum(['hours', 'minutes']);
export type ScheduleFormat = z.infer<typeof ScheduleFormat>;

export const BalancingMethod = z.enum(['memory', 'cpu', 'disk']);
export type BalancingMethod = z.infer<typeof BalancingMethod>;

export const BalancingMode = z.enum(['used', 'assigned', 'psi']);
export type BalancingMode = z.infer<typeof BalancingMode>;

/** Interval between daemon cycles; zero or negative values fall back to 1 */
export const Schedule = section(
  z.object({
    interval: z.number().positive().catch(1),
    format: ScheduleFormat.catch('hours'),
  }),
);

export const ProxmoxApiSection = section(
  z.object({
    hosts: stringList,
    user: z.string().optional().catch(undefined),
    ssl_verification: z.boolean().catch(true),
    timeout: z.number().positive().catch(10),
  }),
);

export const ProxmoxClusterSection = section(
  z.object({
    maintenance_nodes: stringList,
    ignore_nodes: stringList,
    overprovisioning: z.boolean().catch(false),
  }),
);

export const BalancingSection = section(
  z.object({
    enable: z.boolean().catch(true),
    enforce_affinity: z.boolean().catch(false),
    parallel: z.boolean().catch(false),
    live: z.boolean().catch(true),
    with_local_disks: z.boolean().catch(true),
    balance_types: z.array(z.enum(['vm', 'ct'])).catch(['vm', 'ct']),
    max_job_validation: z.number().positive().catch(1800),
    balanciness: z.number().nonnegative().catch(5),
    method: BalancingMethod.catch('memory'),
    mode: BalancingMode.catch('used'),
    memory_threshold: z.number().optional().catch(undefined),
    pools: z.record(z.unknown()).catch({}),
  }),
);

export const ServiceSection = section(
  z.object({
    daemon: z.boolean().catch(true),
    schedule: Schedule,
    delay: section(
      z.object({
        enable: z.boolean().catch(false),
        time: z.number().nonnegative().catch(1),
        format: ScheduleFormat.catch('hours'),
      }),
    ),
    log_level: z.enum(['DEBUG', 'INFO', 'WARNING', 'CRITICAL']).catch('INFO'),
  }),
);

/**
 * Validated view of the balancer's proxlb.yaml.
 * Malformed or missing fields take the balancer's own defaults.
 */
export const BalancerConfig = z.object({
  proxmox_api: ProxmoxApiSection,
  proxmox_cluster: ProxmoxClusterSection,
  balancing: BalancingSection,
  service: ServiceSection,
});
export type BalancerConfig = z.infer<typeof BalancerConfig>;

/**
 * Validate a loaded YAML document. Undefined when the document is not a mapping.
 */
export function parseBalancerConfig(document: unknown): BalancerConfig | undefined {
  if (!isRecord(document)) return undefined;
  const result = BalancerConfig.safeParse(document);
  if (!result.success) {
    console.warn('[balancer] Invalid balancer configuration:', result.error.message);
    return undefined;
  }
  return result.data;
}

/**
 * Seconds between two daemon cycles
 */
export function scheduleIntervalSeconds(config: BalancerConfig): number {
  const { interval, format } = config.service.schedule;
  return interval * ScheduleUnitSeconds[format];
}

// ── Raw document edits ─────────────────────────────────────────────────────
// Edits work on the raw YAML document so keys the schema does not know
// survive a load/save round trip.

export type RawConfigDocument = Record<string, unknown>;

export type MaintenanceAction = 'add' | 'remove';

function rawSection(document: RawConfigDocument, key: string): Record<string, unknown> {
  const value = document[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Add a node to, or remove it from, the balancer's maintenance list.
 * Returns a new document; the input is not modified.
 */
export function setMaintenanceNode(
  document: RawConfigDocument,
  node: string,
  action: MaintenanceAction,
): RawConfigDocument {
  const cluster = rawSection(document, 'proxmox_cluster');
  const current = Array.isArray(cluster.maintenance_nodes)
    ? cluster.maintenance_nodes.filter((n): n is string => typeof n === 'string')
    : [];

  let maintenanceNodes = current;
  if (action === 'add' && !current.includes(node)) {
    maintenanceNodes = [...current, node];
  } else if (action === 'remove') {
    maintenanceNodes = current.filter(n => n !== node);
  }

  return { ...document, proxmox_cluster: { ...cluster, maintenance_nodes: maintenanceNodes } };
}

export const BalancingSettings = z
  .object({
    enable: z.boolean(),
    method: BalancingMethod,
    mode: BalancingMode,
    balanciness: z.number().int().nonnegative(),
    memory_threshold: z.number().int().min(0).max(100),
  })
  .partial();
export type BalancingSettings = z.infer<typeof BalancingSettings>;

/**
 * Apply the dashboard's balancing settings form; fields left undefined are kept.
 */
export function applyBalancingSettings(
  document: RawConfigDocument,
  settings: BalancingSettings,
): RawConfigDocument {
  const balancing = rawSection(document, 'balancing');
  for (const [key, value] of Object.entries(settings)) {
    if (value !== undefined) balancing[key] = value;
  }
  return { ...document, balancing };
}

export const MaskedSecret = '********';
const SecretKeys = ['pass', 'token_secret'];

/**
 * Copy of the document with API credentials replaced by a mask, for display
 */
export function maskSecrets(document: RawConfigDocument): RawConfigDocument {
  const api = rawSection(document, 'proxmox_api');
  for (const key of SecretKeys) {
    if (key in api) api[key] = MaskedSecret;
  }
  return isRecord(document.proxmox_api) ? { ...document, proxmox_api: api } : { ...document };
}

/**
 * Put back credentials that an edited document still carries masked
 */
export function restoreMaskedSecrets(
  edited: RawConfigDocument,
  current: RawConfigDocument | undefined,
): RawConfigDocument {
  if (!current || !isRecord(edited.proxmox_api)) return edited;
  const api = rawSection(edited, 'proxmox_api');
  const currentApi = rawSection(current, 'proxmox_api');
  for (const key of SecretKeys) {
    if (api[key] === MaskedSecret && key in currentApi) api[key] = currentApi[key];
  }
  return { ...edited, proxmox_api: api };
}
