/**
 * agentdock CLI entry point.
 *
 * Provides the `agentdock` command with subcommands:
 *   - `doctor`      Check host prerequisites.
 *   - `agents`      List, create and delete agents.
 *   - `container`   Drive one agent's container (create/start/stop/delete,
 *                   status, logs, stats).
 *   - `containers`  List every container agentdock manages.
 *   - `reconcile`   Align persisted statuses with the runtime.
 *   - `query`       Ask an agent a question.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { VERSION } from './index.js';
import type { AgentDockConfig } from './types/config.js';
import type { LifecycleFailure } from './types/errors.js';
import type { InitResult } from './core/config-loader.js';
import type { CoreContext } from './core/bootstrap.js';
import type { RuntimeDriver } from './core/container/runtime.js';
import type { OperationResult } from './core/container/lifecycle-manager.js';
import { runAllChecks, type ResolveModuleFn } from './core/health-checks.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
  /** Resolved AGENTDOCK_HOME path. */
  home: string;
  /** Node.js version string (e.g. "v20.11.1"). */
  nodeVersion: string;
  /** Create the home tree and load configuration. */
  initialize: (home: string) => InitResult;
  /** Drivers `doctor` probes, configured engine first. */
  drivers: (config: AgentDockConfig) => RuntimeDriver[];
  /** Resolve a Node.js module path (for health checks). */
  resolveModule: ResolveModuleFn;
  /** Check if a path is writable. */
  isWritable: (path: string) => boolean;
  /** Build the container core for commands that need it. */
  openCore: (init: InitResult) => Promise<CoreContext>;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  /** Non-flag arguments after the command. */
  positionals: string[];
  /** Boolean `--flag` switches. */
  flags: Record<string, boolean>;
  /** `--option value` pairs. */
  options: Record<string, string>;
}

/** Options that take a value; every other `--x` is a boolean flag. */
const VALUE_OPTIONS: ReadonlySet<string> = new Set(['name', 'type', 'description', 'user', 'lines']);

/**
 * Parse process.argv: `[node, script, command?, ...rest]`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (VALUE_OPTIONS.has(key) && next !== undefined && !next.startsWith('--')) {
        options[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: agentdock <command>

Commands:
  doctor                               Check dependencies and configuration
  agents list                          List agents
  agents create --name <n> --type <t>  Register an agent
        [--description <d>] [--user <id>] [--auto-start]
  agents delete <id>                   Delete an agent and its container
  container create|start|stop|delete <id>
  container status|stats|health <id>
  container logs <id> [--lines <n>]
  containers                           List managed containers
  reconcile                            Align agent statuses with the runtime
  query <id> <text...>                 Ask an agent a question

Options:
  --version    Show version number
  --help       Show this help message
  --debug      Verbose logging`;

/**
 * Dispatch a command string to the appropriate handler.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(
  command: string,
  deps: CliDeps,
  positionals: string[] = [],
  options: Record<string, string> = {},
  flags: Record<string, boolean> = {},
): Promise<number> {
  if (command === '--version') {
    deps.stdout(VERSION);
    return 0;
  }

  if (command === '' || command === '--help') {
    deps.stdout(USAGE);
    return 0;
  }

  switch (command) {
    case 'doctor':
      return doctor(deps);
    case 'agents':
      return withCore(deps, (core) => agents(deps, core, positionals, options, flags));
    case 'container':
      return withCore(deps, (core) => container(deps, core, positionals, options));
    case 'containers':
      return withCore(deps, (core) => containers(deps, core));
    case 'reconcile':
      return withCore(deps, (core) => reconcile(deps, core));
    case 'query':
      return withCore(deps, (core) => query(deps, core, positionals));
    default:
      deps.stderr(`Unknown command: "${command}"\n`);
      deps.stdout(USAGE);
      return 1;
  }
}

async function withCore(deps: CliDeps, run: (core: CoreContext) => Promise<number>): Promise<number> {
  const core = await deps.openCore(deps.initialize(deps.home));
  try {
    return await run(core);
  } finally {
    core.close();
  }
}

function reportFailure(deps: CliDeps, error: LifecycleFailure): number {
  deps.stderr(`Error [${error.code}]: ${error.message}`);
  return 1;
}

// ---------------------------------------------------------------------------
// doctor
// ---------------------------------------------------------------------------

/**
 * Check all prerequisites and report status.
 *
 * Delegates to the health-checks module for individual checks, then
 * displays results with fix suggestions for any failures.
 */
export async function doctor(deps: CliDeps): Promise<number> {
  const { config, knowledgeRoot } = deps.initialize(deps.home);

  const results = await runAllChecks({
    nodeVersion: deps.nodeVersion,
    drivers: deps.drivers(config),
    resolveModule: deps.resolveModule,
    knowledgeRoot,
    isWritable: deps.isWritable,
    portRange: config.ports,
  });

  for (const result of results) {
    if (result.status === 'pass') {
      deps.stdout(`  PASS  ${result.label}: ${result.detail}`);
    } else {
      deps.stderr(`  ${result.status === 'warn' ? 'WARN' : 'FAIL'}  ${result.label}: ${result.detail}`);
      if (result.fix) {
        deps.stderr(`        Fix: ${result.fix}`);
      }
    }
  }

  const passed = results.filter((r) => r.status === 'pass').length;
  const failed = results.some((r) => r.status === 'fail');
  deps.stdout(`\n${passed}/${results.length} checks passed`);

  return failed ? 1 : 0;
}

// ---------------------------------------------------------------------------
// agents
// ---------------------------------------------------------------------------

export async function agents(
  deps: CliDeps,
  core: CoreContext,
  positionals: string[],
  options: Record<string, string>,
  flags: Record<string, boolean>,
): Promise<number> {
  const [subcommand = '', id] = positionals;

  switch (subcommand) {
    case 'list': {
      const list = core.service.listAgents();
      if (list.length === 0) {
        deps.stdout('No agents');
        return 0;
      }
      for (const agent of list) {
        const port = agent.hostPort !== null ? `  :${agent.hostPort}` : '';
        deps.stdout(`${agent.id}  ${agent.name}  ${agent.type}  ${agent.containerStatus}${port}`);
      }
      return 0;
    }

    case 'create': {
      const input: Record<string, unknown> = {
        name: options['name'] ?? '',
        type: options['type'] ?? '',
      };
      if (options['description'] !== undefined) input['description'] = options['description'];
      if (options['user'] !== undefined) input['userId'] = options['user'];
      if (flags['auto-start']) input['containerConfig'] = { autoStart: true };

      const result = await core.service.createAgent(input);
      if (!result.ok) return reportFailure(deps, result.error);
      deps.stdout(`Created agent ${result.agent.id} (container: ${result.agent.containerStatus})`);
      return 0;
    }

    case 'delete': {
      if (!id) {
        deps.stderr('Usage: agentdock agents delete <id>');
        return 1;
      }
      if (!(await core.service.deleteAgent(id))) {
        deps.stderr(`Agent ${id} not found`);
        return 1;
      }
      deps.stdout(`Deleted agent ${id}`);
      return 0;
    }

    default:
      deps.stderr(subcommand ? `Unknown agents subcommand: "${subcommand}"` : 'Missing agents subcommand');
      deps.stdout(USAGE);
      return 1;
  }
}

// ---------------------------------------------------------------------------
// container
// ---------------------------------------------------------------------------

const TRANSITIONS: Record<
  string,
  { run: (core: CoreContext, id: string) => Promise<OperationResult>; done: string }
> = {
  create: { run: (core, id) => core.manager.createContainer(id), done: 'created' },
  start: { run: (core, id) => core.manager.startContainer(id), done: 'started' },
  stop: { run: (core, id) => core.manager.stopContainer(id), done: 'stopped' },
  delete: { run: (core, id) => core.manager.deleteContainer(id), done: 'deleted' },
};

function formatMiB(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)} MiB`;
}

export async function container(
  deps: CliDeps,
  core: CoreContext,
  positionals: string[],
  options: Record<string, string>,
): Promise<number> {
  const [action = '', id] = positionals;
  if (!id) {
    deps.stderr('Usage: agentdock container <action> <id>');
    return 1;
  }

  const transition = TRANSITIONS[action];
  if (transition) {
    const result = await transition.run(core, id);
    if (!result.ok) return reportFailure(deps, result.error);
    deps.stdout(`Container ${transition.done} for agent ${id}`);
    return 0;
  }

  switch (action) {
    case 'status': {
      const result = await core.manager.getStatus(id);
      if (!result.ok) return reportFailure(deps, result.error);
      const report = result.value;
      deps.stdout(`Agent:     ${report.agentId}`);
      deps.stdout(`Status:    ${report.status}`);
      deps.stdout(`Container: ${report.containerId ?? '-'}${report.containerName ? ` (${report.containerName})` : ''}`);
      deps.stdout(`Host port: ${report.hostPort ?? '-'}`);
      deps.stdout(`Runtime:   ${report.runtime ? report.runtime.status : 'not found'}`);
      return 0;
    }

    case 'health': {
      const timeoutMs = core.config.proxy.health_timeout_ms;
      if (!(await core.proxy.waitForHealthy(id, timeoutMs))) {
        deps.stderr(`Agent ${id} did not become healthy within ${timeoutMs}ms`);
        return 1;
      }
      deps.stdout(`Agent ${id} is healthy`);
      return 0;
    }

    case 'logs': {
      const lines = options['lines'] !== undefined ? Number(options['lines']) : undefined;
      const logs = await core.manager.getLogs(id, lines);
      if (logs === null) {
        deps.stderr(`No logs available for agent ${id}`);
        return 1;
      }
      deps.stdout(logs);
      return 0;
    }

    case 'stats': {
      const stats = await core.manager.getStats(id);
      if (stats === null) {
        deps.stderr(`No stats available for agent ${id}`);
        return 1;
      }
      deps.stdout(`CPU:     ${stats.cpuPercent.toFixed(2)}%`);
      deps.stdout(
        `Memory:  ${formatMiB(stats.memoryUsageBytes)} / ${formatMiB(stats.memoryLimitBytes)} (${stats.memoryPercent.toFixed(2)}%)`,
      );
      deps.stdout(`Network: ${stats.networkRxBytes} B in, ${stats.networkTxBytes} B out`);
      deps.stdout(`PIDs:    ${stats.pids}`);
      return 0;
    }

    default:
      deps.stderr(`Unknown container action: "${action}"`);
      deps.stdout(USAGE);
      return 1;
  }
}

// ---------------------------------------------------------------------------
// containers / reconcile
// ---------------------------------------------------------------------------

export async function containers(deps: CliDeps, core: CoreContext): Promise<number> {
  const result = await core.manager.listManaged();
  if (!result.ok) return reportFailure(deps, result.error);

  if (result.value.length === 0) {
    deps.stdout('No managed containers');
    return 0;
  }
  for (const row of result.value) {
    const ports = row.ports !== '' ? `  ${row.ports}` : '';
    deps.stdout(`${row.name}  ${row.status}  agent=${row.agentId}${ports}`);
  }
  return 0;
}

export async function reconcile(deps: CliDeps, core: CoreContext): Promise<number> {
  const result = await core.manager.reconcile();
  if (!result.ok) return reportFailure(deps, result.error);

  const { checked, changes, orphans } = result.value;
  deps.stdout(`Checked ${checked} agent(s), ${changes.length} change(s)`);
  for (const change of changes) {
    const note = change.cleared ? ' (container gone)' : '';
    deps.stdout(`  ${change.agentId}: ${change.from} -> ${change.to}${note}`);
  }
  for (const orphan of orphans) {
    deps.stderr(`  orphan container ${orphan.name} (agent ${orphan.agentId} not found)`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// query
// ---------------------------------------------------------------------------

export async function query(deps: CliDeps, core: CoreContext, positionals: string[]): Promise<number> {
  const [id, ...words] = positionals;
  if (!id || words.length === 0) {
    deps.stderr('Usage: agentdock query <id> <text...>');
    return 1;
  }

  const answer = await core.service.query(id, words.join(' '));
  if (answer === null) {
    deps.stderr(`Agent ${id} did not answer`);
    return 1;
  }
  deps.stdout(answer);
  return 0;
}
