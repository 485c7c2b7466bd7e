/**
 * Production entry point for agentdock.
 *
 * Wires real dependencies (filesystem, process, container runtimes)
 * into CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   node dist/main.js doctor
 *   node dist/main.js agents list
 *   node dist/main.js container start <id>
 */

import { accessSync, realpathSync, constants as fsConstants } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { createRequire } from 'node:module';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { resolveHome } from './types/config.js';
import type { AgentDockConfig } from './types/config.js';
import { initialize } from './core/config-loader.js';
import { configuredDriver, createCore } from './core/bootstrap.js';
import { createDriver } from './core/container/detect.js';
import type { RuntimeDriver } from './core/container/runtime.js';
import { configureLogging } from './core/logger.js';

// ---------------------------------------------------------------------------
// Filesystem helpers
// ---------------------------------------------------------------------------

function isWritable(path: string): boolean {
  try {
    accessSync(path, fsConstants.W_OK);
    return true;
  } catch {
    return false;
  }
}

const esmRequire = createRequire(import.meta.url);

function resolveModule(name: string): string {
  return esmRequire.resolve(name);
}

/** Configured engine first, then the other one. */
function doctorDrivers(config: AgentDockConfig): RuntimeDriver[] {
  const other = config.runtime.engine === 'docker' ? 'podman' : 'docker';
  return [
    configuredDriver(config),
    createDriver(other, { commandTimeoutMs: config.runtime.command_timeout_ms }),
  ];
}

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(): wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const { command: parsedCommand, positionals, flags, options } = parseArgs(argv);
  const home = resolveHome();
  const debug = flags['debug'] === true;

  if (debug) {
    configureLogging({ level: 'debug' });
  }

  // Translate flags to pseudo-commands for runCommand compatibility
  let command = parsedCommand;
  if (!command && flags['version']) {
    command = '--version';
  } else if (!command && flags['help']) {
    command = '--help';
  }

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    home,
    nodeVersion: process.version,
    initialize: (h: string) => {
      const init = initialize(h);
      if (!debug) {
        configureLogging({ level: init.config.logging.level });
      }
      return init;
    },
    drivers: doctorDrivers,
    resolveModule,
    isWritable,
    openCore: (init) => createCore(init),
  };

  return runCommand(command, deps, positionals, options, flags);
}

// ---------------------------------------------------------------------------
// Entry point: run when executed directly
// ---------------------------------------------------------------------------

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

/* c8 ignore next 5 */
if (isEntryPoint()) {
  main().then((code) => {
    process.exitCode = code;
  });
}
