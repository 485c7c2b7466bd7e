/**
 * Runtime driver interface and supporting types for agentdock.
 *
 * The driver is the only module that talks to the container engine. Every
 * operation shells out to the engine CLI with an explicit timeout and
 * reports failure as a value; nothing thrown by the subprocess escapes.
 */

import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';
import { errorMessage } from '../logger.js';

const execFileAsync = promisify(execFileCb);

// ---------------------------------------------------------------------------
// Runtime name
// ---------------------------------------------------------------------------

/**
 * Supported container engines.
 *
 * - `'docker'`: reference implementation.
 * - `'podman'`: daemonless, SELinux-relabelled bind mounts.
 */
export type RuntimeName = 'docker' | 'podman';

// ---------------------------------------------------------------------------
// Result shape
// ---------------------------------------------------------------------------

/** Outcome of a driver call. `error` carries the engine's diagnostic. */
export type DriverResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function driverOk<T>(value: T): DriverResult<T> {
  return { ok: true, value };
}

export function driverError<T>(error: string): DriverResult<T> {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Exec
// ---------------------------------------------------------------------------

export interface ExecOptions {
  /** Kill the subprocess after this many milliseconds. */
  timeoutMs: number;
}

/**
 * Injectable exec function for shelling out to the engine binary.
 * Rejects on non-zero exit, timeout, or a missing binary.
 */
export type ExecFn = (
  file: string,
  args: readonly string[],
  options: ExecOptions,
) => Promise<{ stdout: string; stderr: string }>;

/** Default exec implementation, wraps child_process.execFile. */
export const defaultExec: ExecFn = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    encoding: 'utf-8',
    timeout: options.timeoutMs,
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

/**
 * Turn a rejected exec into a one-line diagnostic. Prefers the engine's
 * stderr over the generic "Command failed" message.
 */
export function describeExecError(err: unknown, file: string, timeoutMs: number): string {
  if (typeof err === 'object' && err !== null) {
    if ('code' in err && err.code === 'ENOENT') {
      return `${file}: command not found`;
    }
    if ('killed' in err && err.killed === true) {
      return `${file} timed out after ${timeoutMs}ms`;
    }
    if ('stderr' in err && typeof err.stderr === 'string' && err.stderr.trim() !== '') {
      return err.stderr.trim();
    }
  }
  return errorMessage(err);
}

// ---------------------------------------------------------------------------
// Create options
// ---------------------------------------------------------------------------

/**
 * A bind mount from the host filesystem into the container.
 *
 * Podman appends `:Z` for SELinux relabelling; Docker uses plain
 * bind-mount semantics.
 */
export interface VolumeMount {
  /** Absolute path on the host. */
  source: string;
  /** Absolute path inside the container. */
  target: string;
  readonly: boolean;
}

/** Everything the driver needs to create (not start) one container. */
export interface CreateContainerOptions {
  name: string;
  image: string;
  env: Record<string, string>;
  network: string;
  hostPort: number;
  containerPort: number;
  /** Engine memory syntax, e.g. `"512m"`. */
  memoryLimit: string;
  /** Fractional CPUs, e.g. `0.5`. */
  cpuLimit: number;
  restartPolicy: string;
  volumes: VolumeMount[];
  labels: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Inspection results
// ---------------------------------------------------------------------------

export interface PortBinding {
  containerPort: number;
  protocol: string;
  hostIp: string;
  hostPort: number;
}

/** Snapshot of one container as reported by `inspect`. */
export interface ContainerInfo {
  id: string;
  name: string;
  /** Engine status string: `created`, `running`, `exited`, ... */
  status: string;
  running: boolean;
  ports: PortBinding[];
  labels: Record<string, string>;
}

/** Resource usage from a single `stats --no-stream` sample. Sizes in bytes. */
export interface ContainerStats {
  cpuPercent: number;
  memoryUsageBytes: number;
  memoryLimitBytes: number;
  memoryPercent: number;
  networkRxBytes: number;
  networkTxBytes: number;
  blockReadBytes: number;
  blockWriteBytes: number;
  pids: number;
}

/** One row of the managed-container listing. */
export interface ManagedContainerSummary {
  id: string;
  name: string;
  status: string;
  agentId: string;
  agentName: string | null;
  userId: string | null;
  createdAt: string | null;
  /** Engine-formatted port description, e.g. `0.0.0.0:9001->8000/tcp`. */
  ports: string;
}

// ---------------------------------------------------------------------------
// Runtime driver interface
// ---------------------------------------------------------------------------

/**
 * Abstraction over a container engine CLI.
 *
 * - **Docker**: adds `--add-host host.docker.internal:host-gateway` so the
 *   container can reach host services.
 * - **Podman**: `:Z` suffix on bind mounts; the host is reachable as
 *   `host.containers.internal` without extra flags.
 */
export interface RuntimeDriver {
  readonly name: RuntimeName;

  /** Hostname a container uses to reach services on the host. */
  readonly hostAlias: string;

  // -- Availability ---------------------------------------------------------

  isAvailable(): Promise<boolean>;

  /** Engine version string, e.g. `"Docker 27.5.1"`. */
  version(): Promise<DriverResult<string>>;

  // -- Networks -------------------------------------------------------------

  /** Create the bridge network if it does not exist. */
  ensureNetwork(name: string): Promise<DriverResult<void>>;

  // -- Container lifecycle --------------------------------------------------

  /** Create a container without starting it. Returns the container id. */
  create(options: CreateContainerOptions): Promise<DriverResult<string>>;

  start(id: string): Promise<DriverResult<void>>;

  stop(id: string, graceSeconds: number): Promise<DriverResult<void>>;

  /** Stop the container if it is running, then force-remove it. */
  remove(id: string, graceSeconds: number): Promise<DriverResult<void>>;

  inspect(id: string): Promise<DriverResult<ContainerInfo>>;

  // -- Diagnostics ----------------------------------------------------------

  /** Last `lines` log lines with timestamps, or `null` on failure. */
  logs(id: string, lines: number): Promise<string | null>;

  stats(id: string): Promise<ContainerStats | null>;

  /** All containers carrying the agent ownership label. */
  listManaged(): Promise<DriverResult<ManagedContainerSummary[]>>;

  /** Host ports bound by running containers, ascending and unique. */
  listPortBindings(): Promise<DriverResult<number[]>>;
}
