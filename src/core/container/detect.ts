/**
 * Container runtime detection.
 *
 * Probes the host for available container engines at startup. The service
 * only ever probes the configured engine; `doctor` probes both to show what
 * else is installed. A configured preference always wins over the fallback
 * order (Podman, then Docker).
 */

import type { RuntimeDriver, RuntimeName } from './runtime.js';
import { DockerRuntime } from './docker-runtime.js';
import { PodmanRuntime } from './podman-runtime.js';
import type { CliRuntimeOptions } from './cli-runtime.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Information about a single available runtime. */
export interface RuntimeInfo {
  driver: RuntimeDriver;
  version: string;
}

/** Result of runtime detection. */
export interface DetectionResult {
  /** The runtime selected by preference or fallback order. */
  selected: RuntimeInfo;
  /** All runtimes that were found to be available. */
  available: RuntimeInfo[];
}

export interface DetectionOptions {
  /** Drivers to probe. */
  drivers: RuntimeDriver[];
  /** Configured engine; wins over the fallback order. */
  preference?: RuntimeName;
}

// ---------------------------------------------------------------------------
// Fallback order
// ---------------------------------------------------------------------------

const PRIORITY: readonly RuntimeName[] = ['podman', 'docker'];

// ---------------------------------------------------------------------------
// Driver factory
// ---------------------------------------------------------------------------

export function createDriver(name: RuntimeName, options?: CliRuntimeOptions): RuntimeDriver {
  switch (name) {
    case 'docker':
      return new DockerRuntime(options);
    case 'podman':
      return new PodmanRuntime(options);
  }
}

// ---------------------------------------------------------------------------
// Probe a single runtime
// ---------------------------------------------------------------------------

async function probeDriver(driver: RuntimeDriver): Promise<RuntimeInfo | null> {
  if (!(await driver.isAvailable())) return null;
  const version = await driver.version();
  return { driver, version: version.ok ? version.value : 'unknown' };
}

// ---------------------------------------------------------------------------
// detectRuntime
// ---------------------------------------------------------------------------

/**
 * Probe all drivers in parallel and select one. Returns null when none
 * responds, which the lifecycle manager reports as RUNTIME_UNAVAILABLE.
 */
export async function detectRuntime(options: DetectionOptions): Promise<DetectionResult | null> {
  const { drivers, preference } = options;

  const probes = await Promise.all(drivers.map((d) => probeDriver(d)));
  const available = probes.filter((info): info is RuntimeInfo => info !== null);

  if (available.length === 0) return null;

  if (preference) {
    const preferred = available.find((info) => info.driver.name === preference);
    if (preferred) {
      return { selected: preferred, available };
    }
  }

  for (const name of PRIORITY) {
    const match = available.find((info) => info.driver.name === name);
    if (match) {
      return { selected: match, available };
    }
  }

  return { selected: available[0], available };
}
