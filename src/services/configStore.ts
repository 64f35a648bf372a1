import { readFile, writeFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import {
  type BalancerConfig,
  BalancingSettings,
  type MaintenanceAction,
  type RawConfigDocument,
  applyBalancingSettings,
  parseBalancerConfig,
  restoreMaskedSecrets,
  setMaintenanceNode,
} from '../config/balancerConfig';
import { isRecord } from '../parser/utils';
import type { CommandResult } from '../types';

export interface MaintenanceResult extends CommandResult {
  maintenanceNodes?: string[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Reads and writes the balancer's proxlb.yaml.
 *
 * Reads return undefined when the file is missing or unreadable; writes return
 * a CommandResult. Nothing here throws for an I/O or YAML problem.
 */
export class ConfigStore {
  constructor(readonly path: string) {}

  /**
   * Raw YAML document, with keys unknown to the schema preserved
   */
  async loadDocument(): Promise<RawConfigDocument | undefined> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        console.error(`[balancer] Error reading config ${this.path}:`, errorMessage(error));
      }
      return undefined;
    }

    try {
      const document: unknown = yaml.load(content);
      if (!isRecord(document)) {
        console.warn(`[balancer] Config ${this.path} is not a YAML mapping`);
        return undefined;
      }
      return document;
    } catch (error) {
      console.error(`[balancer] Error parsing config ${this.path}:`, errorMessage(error));
      return undefined;
    }
  }

  async load(): Promise<BalancerConfig | undefined> {
    return parseBalancerConfig(await this.loadDocument());
  }

  async save(document: RawConfigDocument): Promise<CommandResult> {
    try {
      const content = yaml.dump(document, { noRefs: true, sortKeys: false });
      await writeFile(this.path, content, 'utf-8');
      return { success: true, message: 'Configuration updated' };
    } catch (error) {
      console.error(`[balancer] Error saving config ${this.path}:`, errorMessage(error));
      return { success: false, error: errorMessage(error) };
    }
  }

  /**
   * Save a document edited in the dashboard; masked credentials keep their stored value
   */
  async update(edited: RawConfigDocument): Promise<CommandResult> {
    const current = await this.loadDocument();
    return this.save(restoreMaskedSecrets(edited, current));
  }

  async setMaintenanceNode(node: string, action: MaintenanceAction): Promise<MaintenanceResult> {
    const document = await this.loadDocument();
    if (!document) return { success: false, error: 'Configuration not found' };

    const updated = setMaintenanceNode(document, node, action);
    const result = await this.save(updated);
    if (!result.success) return result;

    const maintenanceNodes = parseBalancerConfig(updated)?.proxmox_cluster.maintenance_nodes ?? [];
    return { success: true, maintenanceNodes };
  }

  /**
   * Apply the balancing settings form; the input is validated first
   */
  async updateBalancingSettings(settings: unknown): Promise<CommandResult> {
    const parsed = BalancingSettings.safeParse(settings);
    if (!parsed.success) {
      return { success: false, error: `Invalid balancing settings: ${parsed.error.message}` };
    }

    const document = await this.loadDocument();
    if (!document) return { success: false, error: 'Configuration not found' };

    return this.save(applyBalancingSettings(document, parsed.data));
  }
}
