/**
 * Health check system for agentdock.
 *
 * Provides individual check functions and a runner that evaluates the host
 * prerequisites of the container core. Each check returns a structured
 * result with pass/fail status, a detail message, and a fix suggestion on
 * failure. Used by `agentdock doctor`.
 *
 * All external I/O is injected via {@link HealthCheckDeps} for testability.
 */

import type { RuntimeDriver } from './container/runtime.js';
import type { PortRange } from './container/port-allocator.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Result of a single health check. */
export interface HealthCheckResult {
  /** Machine-readable check identifier. */
  name: string;
  /** Human-readable check label for display. */
  label: string;
  status: 'pass' | 'fail' | 'warn';
  /** Detail message (version string, error reason, etc.). */
  detail: string;
  /** Actionable fix suggestion (only present on failure or warning). */
  fix?: string;
}

/** Injectable module resolver for checking library availability. */
export type ResolveModuleFn = (module: string) => string;

/** Injectable dependencies for the health check runner. */
export interface HealthCheckDeps {
  nodeVersion: string;
  /** Drivers to probe, configured engine first. */
  drivers: RuntimeDriver[];
  resolveModule: ResolveModuleFn;
  knowledgeRoot: string;
  isWritable: (path: string) => boolean;
  portRange: PortRange;
}

const MIN_NODE_MAJOR = 20;

// ---------------------------------------------------------------------------
// Individual checks
// ---------------------------------------------------------------------------

/** Check that the Node.js version is >= 20. */
export function checkNodeVersion(versionString: string): HealthCheckResult {
  const match = versionString.match(/^v?(\d+)\.(\d+)\.(\d+)/);
  if (!match) {
    return {
      name: 'node-version',
      label: 'Node.js',
      status: 'fail',
      detail: `Unrecognized version: ${versionString}`,
      fix: `Install Node.js ${MIN_NODE_MAJOR} or later: https://nodejs.org/`,
    };
  }

  const [, major, minor, patch] = match;
  const version = `v${major}.${minor}.${patch}`;
  if (Number(major) >= MIN_NODE_MAJOR) {
    return { name: 'node-version', label: 'Node.js', status: 'pass', detail: version };
  }

  return {
    name: 'node-version',
    label: 'Node.js',
    status: 'fail',
    detail: `${version} (requires >= ${MIN_NODE_MAJOR})`,
    fix: `Upgrade to Node.js ${MIN_NODE_MAJOR} or later: https://nodejs.org/`,
  };
}

/** Check that at least one container runtime answers. Reports the first. */
export async function checkContainerRuntime(drivers: RuntimeDriver[]): Promise<HealthCheckResult> {
  for (const driver of drivers) {
    if (!(await driver.isAvailable())) continue;
    const version = await driver.version();
    return {
      name: 'container-runtime',
      label: 'Container runtime',
      status: 'pass',
      detail: `${driver.name} (${version.ok ? version.value : 'version unknown'})`,
    };
  }

  return {
    name: 'container-runtime',
    label: 'Container runtime',
    status: 'fail',
    detail: 'No container runtime found',
    fix: 'Install Docker (docker.com) or Podman (podman.io) and make sure the engine is running',
  };
}

/** Check that SQLite (better-sqlite3) is available. */
export function checkSqlite(resolve: ResolveModuleFn): HealthCheckResult {
  try {
    resolve('better-sqlite3');
    return { name: 'sqlite', label: 'SQLite (better-sqlite3)', status: 'pass', detail: 'Available' };
  } catch {
    return {
      name: 'sqlite',
      label: 'SQLite (better-sqlite3)',
      status: 'fail',
      detail: 'Not found',
      fix: 'Reinstall dependencies: npm install',
    };
  }
}

/** Check that the knowledge root can be written. */
export function checkKnowledgeRoot(
  root: string,
  isWritable: (path: string) => boolean,
): HealthCheckResult {
  if (isWritable(root)) {
    return { name: 'knowledge-root', label: 'Knowledge directory', status: 'pass', detail: root };
  }

  return {
    name: 'knowledge-root',
    label: 'Knowledge directory',
    status: 'fail',
    detail: `Not writable: ${root}`,
    fix: `Fix permissions or set KNOWLEDGE_BASE_DIR: mkdir -p ${root}`,
  };
}

/** Count the host ports in the range that running containers do not hold. */
export async function checkPortRange(
  driver: RuntimeDriver | null,
  range: PortRange,
): Promise<HealthCheckResult> {
  const size = range.end - range.start + 1;
  const label = 'Host port range';

  if (!driver) {
    return {
      name: 'port-range',
      label,
      status: 'warn',
      detail: `${range.start}-${range.end} (not checked, no runtime)`,
    };
  }

  const bindings = await driver.listPortBindings();
  if (!bindings.ok) {
    return {
      name: 'port-range',
      label,
      status: 'warn',
      detail: `Cannot list port bindings: ${bindings.error}`,
    };
  }

  const used = bindings.value.filter((p) => p >= range.start && p <= range.end).length;
  const free = size - used;
  if (free > 0) {
    return {
      name: 'port-range',
      label,
      status: 'pass',
      detail: `${free} of ${size} free (${range.start}-${range.end})`,
    };
  }

  return {
    name: 'port-range',
    label,
    status: 'warn',
    detail: `All ${size} ports in ${range.start}-${range.end} are bound`,
    fix: 'Widen [ports] in config.toml or AGENT_PORT_RANGE_START/END',
  };
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/** Run all health checks and return results. */
export async function runAllChecks(deps: HealthCheckDeps): Promise<HealthCheckResult[]> {
  const results: HealthCheckResult[] = [];

  results.push(checkNodeVersion(deps.nodeVersion));

  const runtime = await checkContainerRuntime(deps.drivers);
  results.push(runtime);

  results.push(checkSqlite(deps.resolveModule));
  results.push(checkKnowledgeRoot(deps.knowledgeRoot, deps.isWritable));

  let available: RuntimeDriver | null = null;
  for (const driver of deps.drivers) {
    if (await driver.isAvailable()) {
      available = driver;
      break;
    }
  }
  results.push(await checkPortRange(available, deps.portRange));

  return results;
}
