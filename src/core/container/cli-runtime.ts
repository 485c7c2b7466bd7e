/**
 * Shared CLI driver for Docker-compatible engines.
 *
 * Docker and Podman accept the same verbs and flags for everything the
 * lifecycle needs; adapters override only the hooks where they differ
 * (mount suffixes, extra create flags, version template).
 */

import type {
  ContainerInfo,
  ContainerStats,
  CreateContainerOptions,
  DriverResult,
  ExecFn,
  ManagedContainerSummary,
  RuntimeDriver,
  RuntimeName,
  VolumeMount,
} from './runtime.js';
import { defaultExec, describeExecError, driverError, driverOk } from './runtime.js';
import { parseInspectOutput, parsePortList, parsePsOutput, parseStatsOutput } from './cli-output.js';
import { LABEL_AGENT_ID } from './constants.js';
import { createLogger, type Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface CliRuntimeOptions {
  /** Injectable exec function for testing. Defaults to promisified execFile. */
  exec?: ExecFn;
  /** Path to the engine binary. Defaults to the engine name. */
  binaryPath?: string;
  /** Per-command timeout. Defaults to 30 seconds. */
  commandTimeoutMs?: number;
}

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

type ExecOutcome = { ok: true; stdout: string; stderr: string } | { ok: false; error: string };

// ---------------------------------------------------------------------------
// CliRuntimeDriver
// ---------------------------------------------------------------------------

export abstract class CliRuntimeDriver implements RuntimeDriver {
  abstract readonly name: RuntimeName;
  abstract readonly hostAlias: string;

  protected readonly exec: ExecFn;
  protected readonly binaryPath: string;
  protected readonly commandTimeoutMs: number;
  protected readonly logger: Logger;

  constructor(defaultBinary: RuntimeName, options?: CliRuntimeOptions) {
    this.exec = options?.exec ?? defaultExec;
    this.binaryPath = options?.binaryPath ?? defaultBinary;
    this.commandTimeoutMs = options?.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.logger = createLogger('runtime').child(defaultBinary);
  }

  // -----------------------------------------------------------------------
  // Adapter hooks
  // -----------------------------------------------------------------------

  /** Go template for the version number. */
  protected abstract readonly versionTemplate: string;

  /** Human-readable engine label used in `version()`. */
  protected abstract readonly displayName: string;

  /** Render one `-v` value. */
  protected formatVolume(volume: VolumeMount): string {
    const suffix = volume.readonly ? ':ro' : '';
    return `${volume.source}:${volume.target}${suffix}`;
  }

  /** Flags inserted right after `create --name <name>`. */
  protected extraCreateArgs(): string[] {
    return [];
  }

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    const result = await this.run('info');
    return result.ok;
  }

  async version(): Promise<DriverResult<string>> {
    const result = await this.run('version', '--format', this.versionTemplate);
    if (!result.ok) return driverError(result.error);
    return driverOk(`${this.displayName} ${result.stdout.trim()}`);
  }

  // -----------------------------------------------------------------------
  // Networks
  // -----------------------------------------------------------------------

  async ensureNetwork(name: string): Promise<DriverResult<void>> {
    const existing = await this.run('network', 'inspect', name);
    if (existing.ok) return driverOk(undefined);

    const created = await this.run('network', 'create', '--driver', 'bridge', name);
    if (!created.ok) return driverError(created.error);
    this.logger.info('network created', { network: name });
    return driverOk(undefined);
  }

  // -----------------------------------------------------------------------
  // Container lifecycle
  // -----------------------------------------------------------------------

  async create(options: CreateContainerOptions): Promise<DriverResult<string>> {
    const result = await this.run(...this.buildCreateArgs(options));
    if (!result.ok) return driverError(result.error);

    const id = result.stdout.trim().split('\n').pop()?.trim() ?? '';
    if (id === '') return driverError('create returned no container id');
    return driverOk(id);
  }

  async start(id: string): Promise<DriverResult<void>> {
    return this.runVoid('start', id);
  }

  async stop(id: string, graceSeconds: number): Promise<DriverResult<void>> {
    return this.runVoid('stop', '-t', String(graceSeconds), id);
  }

  async remove(id: string, graceSeconds: number): Promise<DriverResult<void>> {
    const info = await this.inspect(id);
    if (info.ok && info.value.running) {
      const stopped = await this.stop(id, graceSeconds);
      if (!stopped.ok) {
        // rm -f below kills it anyway
        this.logger.warn('stop before remove failed', { container: id, error: stopped.error });
      }
    }
    return this.runVoid('rm', '-f', id);
  }

  async inspect(id: string): Promise<DriverResult<ContainerInfo>> {
    const result = await this.run('inspect', '--format', '{{json .}}', id);
    if (!result.ok) return driverError(result.error);

    const info = parseInspectOutput(result.stdout);
    if (!info) return driverError(`unparsable inspect output for ${id}`);
    return driverOk(info);
  }

  // -----------------------------------------------------------------------
  // Diagnostics
  // -----------------------------------------------------------------------

  async logs(id: string, lines: number): Promise<string | null> {
    const result = await this.run('logs', '--tail', String(lines), '--timestamps', id);
    if (!result.ok) return null;
    return result.stdout + result.stderr;
  }

  async stats(id: string): Promise<ContainerStats | null> {
    const result = await this.run('stats', '--no-stream', '--format', '{{json .}}', id);
    if (!result.ok) return null;

    const stats = parseStatsOutput(result.stdout);
    if (!stats) {
      this.logger.warn('unparsable stats output', { container: id });
    }
    return stats;
  }

  async listManaged(): Promise<DriverResult<ManagedContainerSummary[]>> {
    const result = await this.run(
      'ps',
      '-a',
      '--filter',
      `label=${LABEL_AGENT_ID}`,
      '--format',
      '{{json .}}',
    );
    if (!result.ok) return driverError(result.error);

    const rows = parsePsOutput(result.stdout);
    if (!rows) return driverError('unparsable ps output');
    return driverOk(rows);
  }

  async listPortBindings(): Promise<DriverResult<number[]>> {
    const result = await this.run('ps', '--format', '{{.Ports}}');
    if (!result.ok) return driverError(result.error);
    return driverOk(parsePortList(result.stdout));
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  protected buildCreateArgs(options: CreateContainerOptions): string[] {
    const args: string[] = ['create', '--name', options.name, ...this.extraCreateArgs()];

    args.push('--network', options.network);
    args.push('-p', `${options.hostPort}:${options.containerPort}/tcp`);
    args.push('--memory', options.memoryLimit);
    args.push('--cpus', String(options.cpuLimit));
    args.push('--restart', options.restartPolicy);

    for (const [key, value] of Object.entries(options.labels)) {
      args.push('--label', `${key}=${value}`);
    }

    for (const [key, value] of Object.entries(options.env)) {
      args.push('-e', `${key}=${value}`);
    }

    for (const volume of options.volumes) {
      args.push('-v', this.formatVolume(volume));
    }

    args.push(options.image);
    return args;
  }

  private async runVoid(...args: string[]): Promise<DriverResult<void>> {
    const result = await this.run(...args);
    return result.ok ? driverOk(undefined) : driverError(result.error);
  }

  /** Run one CLI command. Never throws. */
  protected async run(...args: string[]): Promise<ExecOutcome> {
    const startedAt = Date.now();
    try {
      const { stdout, stderr } = await this.exec(this.binaryPath, args, {
        timeoutMs: this.commandTimeoutMs,
      });
      this.logger.debug('command ok', {
        verb: args[0],
        duration_ms: Date.now() - startedAt,
      });
      return { ok: true, stdout, stderr };
    } catch (err) {
      const error = describeExecError(err, this.binaryPath, this.commandTimeoutMs);
      this.logger.debug('command failed', {
        verb: args[0],
        duration_ms: Date.now() - startedAt,
        ok: false,
        error,
      });
      return { ok: false, error };
    }
  }
}
