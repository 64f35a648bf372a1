import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ConsoleSettings } from '../config';
import { DefaultSettings } from '../config';
import { parseBestNode, parseDryRun, summarizeRunOutput } from '../parser/dryRunParser';
import { isRecord, parseTimestamp } from '../parser/utils';
import type { BestNodeResult, CommandResult, DryRunPlan, ProcessStatus, RunResult } from '../types';

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  timeoutMs: number;
}

/** Runs a command; resolves with its exit code and output, never rejects for a non-zero exit */
export type ExecFn = (command: string, args: string[], options: ExecOptions) => Promise<ExecResult>;

const execFileAsync = promisify(execFile);

function outputOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Buffer) return value.toString('utf-8');
  return '';
}

/** Default exec function that shells out to real commands */
export async function defaultExec(command: string, args: string[], options: ExecOptions): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: options.timeoutMs,
      maxBuffer: 16 * 1024 * 1024,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    if (!isRecord(error)) {
      return { exitCode: 1, stdout: '', stderr: String(error) };
    }
    if (error.killed === true && error.signal) {
      return { exitCode: 1, stdout: outputOf(error.stdout), stderr: 'Command timed out' };
    }
    const stderr = outputOf(error.stderr) || (typeof error.message === 'string' ? error.message : '');
    return {
      exitCode: typeof error.code === 'number' ? error.code : 1,
      stdout: outputOf(error.stdout),
      stderr,
    };
  }
}

// Timeouts per operation
const Timeouts = {
  inspect: 10_000,
  control: 120_000,
  dryRun: 120_000,
  run: 600_000,
  bestNode: 60_000,
  version: 30_000,
} as const;

const ConfigMountPath = '/etc/proxlb/proxlb.yaml';

const InspectFormat =
  '{"running": {{.State.Running}}, "status": "{{.State.Status}}", "started": "{{.State.StartedAt}}"}';

function splitOutputLines(output: string): string[] {
  return output
    .trim()
    .split('\n')
    .filter(l => l.trim());
}

/**
 * Controls the balancer container through the docker CLI.
 *
 * Every operation resolves with a result object; failures are reported in
 * `error` and logged, never thrown.
 */
export class BalancerService {
  private exec: ExecFn;
  private settings: ConsoleSettings;

  constructor(settings: Partial<ConsoleSettings> = {}, exec?: ExecFn) {
    this.settings = { ...DefaultSettings, ...settings };
    this.exec = exec ?? defaultExec;
  }

  get containerName(): string {
    return this.settings.containerName;
  }

  private docker(args: string[], timeoutMs: number): Promise<ExecResult> {
    return this.exec('docker', args, { timeoutMs }).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[balancer] docker ${args[0]} failed:`, message);
      return { exitCode: 1, stdout: '', stderr: message };
    });
  }

  private oneShotArgs(...flags: string[]): string[] {
    return [
      'run',
      '--rm',
      '-v',
      `${this.settings.configPath}:${ConfigMountPath}:ro`,
      this.settings.image,
      '-c',
      ConfigMountPath,
      ...flags,
    ];
  }

  /**
   * Container state from `docker inspect`
   */
  async getStatus(): Promise<ProcessStatus> {
    const result = await this.docker(['inspect', '--format', InspectFormat, this.containerName], Timeouts.inspect);
    if (result.exitCode !== 0) {
      return { exists: false, running: false, status: 'not found' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout.trim());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[balancer] Failed to parse container status:', message);
      return { exists: false, running: false, status: 'error', error: `Failed to parse container status: ${message}` };
    }
    if (!isRecord(parsed)) {
      return { exists: false, running: false, status: 'error', error: 'Failed to parse container status' };
    }

    const status: ProcessStatus = {
      exists: true,
      running: parsed.running === true,
      status: typeof parsed.status === 'string' ? parsed.status : 'unknown',
    };
    const startedAt = typeof parsed.started === 'string' ? parseTimestamp(parsed.started) : undefined;
    // docker reports 0001-01-01T00:00:00Z for a container that never started
    if (startedAt && startedAt.getTime() > 0) status.startedAt = startedAt;
    return status;
  }

  /**
   * Start the container, creating it when it does not exist
   */
  async start(): Promise<CommandResult> {
    const status = await this.getStatus();
    if (status.running) {
      return { success: true, message: 'Already running' };
    }

    const args = status.exists
      ? ['start', this.containerName]
      : [
          'run',
          '-d',
          '--name',
          this.containerName,
          '--restart',
          'unless-stopped',
          '-v',
          `${this.settings.configPath}:${ConfigMountPath}:ro`,
          this.settings.image,
        ];
    const result = await this.docker(args, Timeouts.control);
    return this.commandResult('start', result, 'Started successfully');
  }

  async stop(): Promise<CommandResult> {
    const result = await this.docker(['stop', this.containerName], Timeouts.control);
    return this.commandResult('stop', result, 'Stopped successfully');
  }

  async restart(): Promise<CommandResult> {
    const result = await this.docker(['restart', this.containerName], Timeouts.control);
    return this.commandResult('restart', result, 'Restarted successfully');
  }

  private commandResult(action: string, result: ExecResult, message: string): CommandResult {
    if (result.exitCode === 0) return { success: true, message };
    console.error(`[balancer] Failed to ${action} ${this.containerName}:`, result.stderr.trim());
    return { success: false, error: result.stderr.trim() || 'Unknown error' };
  }

  /**
   * One balancing pass outside the daemon; with dryRun nothing is migrated
   */
  async runOnce(dryRun = false): Promise<RunResult> {
    const args = dryRun ? this.oneShotArgs('-d') : this.oneShotArgs();
    const result = await this.docker(args, dryRun ? Timeouts.dryRun : Timeouts.run);
    const output = splitOutputLines(result.stdout + result.stderr);
    const summary = summarizeRunOutput(output, dryRun, result.exitCode === 0);

    const run: RunResult = { ...summary, output };
    if (summary.timedOut) {
      run.error = 'Operation timed out. Check logs for details.';
    } else if (!summary.success) {
      run.error = result.stderr.trim() || 'Unknown error';
    }
    if (run.error) console.error(`[balancer] ${dryRun ? 'Dry run' : 'Balancing run'} failed:`, run.error);
    return run;
  }

  /**
   * Simulated run parsed into a migration plan; an empty plan when the run failed
   */
  async dryRun(): Promise<DryRunPlan> {
    const run = await this.runOnce(true);
    return parseDryRun(run.output);
  }

  /**
   * Node the balancer would place a new guest on
   */
  async getBestNode(): Promise<BestNodeResult> {
    const result = await this.docker(this.oneShotArgs('-b'), Timeouts.bestNode);
    const output = (result.stdout + result.stderr).trim();
    const bestNode = parseBestNode(output);
    if (bestNode) return { success: true, bestNode, output };
    return { success: false, output, error: result.stderr.trim() || output || 'Failed to get best node' };
  }

  /**
   * Last `lines` lines of the container log, stdout and stderr combined
   */
  async getLogs(lines: number = this.settings.logLines): Promise<string> {
    const result = await this.docker(['logs', '--timestamps', '--tail', String(lines), this.containerName], Timeouts.control);
    return result.stdout + result.stderr;
  }

  async getVersion(): Promise<string> {
    const result = await this.docker(['run', '--rm', this.settings.image, '--version'], Timeouts.version);
    return result.exitCode === 0 ? result.stdout.trim() : 'unknown';
  }
}
