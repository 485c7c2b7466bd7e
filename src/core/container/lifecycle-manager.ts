/**
 * Container lifecycle manager for agentdock.
 *
 * Owns the per-agent container state machine
 * (`none → stopped → running → stopped …`, with `failed` on create/start
 * errors) and keeps the persisted Agent record in step with the runtime.
 *
 * Every transition for one agent runs under that agent's lock; different
 * agents never wait on each other. Internal steps throw
 * {@link LifecycleError}; the public methods convert to result values, so
 * callers never see a thrown error.
 *
 * Uses the {@link RuntimeDriver} abstraction so the same logic works with
 * Docker and Podman. A `null` driver means no engine was detected at
 * startup and every operation reports RUNTIME_UNAVAILABLE.
 */

import type { Agent, ContainerStatus } from '../../types/agent.js';
import type { ContainersConfig } from '../../types/config.js';
import type { LifecycleFailure } from '../../types/errors.js';
import { ErrorCode } from '../../types/errors.js';
import type { AgentStore } from '../agent-store.js';
import { KeyedLock } from '../keyed-lock.js';
import { LifecycleError, failure, toFailure } from '../lifecycle-error.js';
import { createLogger, type Logger } from '../logger.js';
import { buildContainerSpec, type KnowledgeSettings } from './container-spec.js';
import { NetworkManager } from './network-manager.js';
import { PortAllocator, type PortRange } from './port-allocator.js';
import type {
  ContainerInfo,
  ContainerStats,
  ManagedContainerSummary,
  RuntimeDriver,
} from './runtime.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OperationResult = { ok: true } | { ok: false; error: LifecycleFailure };

/** Result carrying a value, same failure shape as {@link OperationResult}. */
export type ValueResult<T> = { ok: true; value: T } | { ok: false; error: LifecycleFailure };

export interface LifecycleManagerOptions {
  /** Detected runtime, or null when none is available. */
  driver: RuntimeDriver | null;
  store: AgentStore;
  containers: ContainersConfig;
  ports: PortRange;
  knowledge: KnowledgeSettings;
  /** Overrides for tests. Built from `driver` when omitted. */
  portAllocator?: PortAllocator;
  network?: NetworkManager;
  /** Random source for container name suffixes. */
  random?: () => number;
  now?: () => Date;
  logger?: Logger;
}

/** Persisted view plus what the runtime reports right now. */
export interface ContainerStatusReport {
  agentId: string;
  status: ContainerStatus;
  containerId: string | null;
  containerName: string | null;
  hostPort: number | null;
  /** `null` when nothing is attached or the runtime cannot find it. */
  runtime: ContainerInfo | null;
}

export interface ReconcileChange {
  agentId: string;
  from: ContainerStatus;
  to: ContainerStatus;
  /** True when the container was gone and the id was cleared. */
  cleared: boolean;
}

export interface ReconcileSummary {
  /** Agents with an attached container that were compared. */
  checked: number;
  changes: ReconcileChange[];
  /** Managed containers whose agent record no longer exists. */
  orphans: ManagedContainerSummary[];
}

export const DEFAULT_LOG_LINES = 100;
export const MAX_LOG_LINES = 1000;

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

interface RuntimeBundle {
  driver: RuntimeDriver;
  ports: PortAllocator;
  network: NetworkManager;
}

/** Engine states that map onto persisted statuses. Others are left alone. */
function statusFromRuntime(engineStatus: string): ContainerStatus | null {
  switch (engineStatus) {
    case 'running':
      return 'running';
    case 'created':
    case 'configured':
    case 'exited':
    case 'stopped':
      return 'stopped';
    default:
      return null;
  }
}

/** `ps` prints 12-character ids; `create` returns the full id. */
function sameContainer(a: string, b: string): boolean {
  return a.startsWith(b) || b.startsWith(a);
}

function clampLines(lines: number): number {
  if (!Number.isFinite(lines)) return DEFAULT_LOG_LINES;
  return Math.min(MAX_LOG_LINES, Math.max(1, Math.floor(lines)));
}

// ---------------------------------------------------------------------------
// ContainerLifecycleManager
// ---------------------------------------------------------------------------

export class ContainerLifecycleManager {
  private readonly runtime: RuntimeBundle | null;
  private readonly store: AgentStore;
  private readonly containers: ContainersConfig;
  private readonly knowledge: KnowledgeSettings;
  private readonly lock = new KeyedLock();
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: LifecycleManagerOptions) {
    const { driver } = options;
    this.runtime = driver
      ? {
          driver,
          ports: options.portAllocator ?? new PortAllocator({ driver, range: options.ports }),
          network: options.network ?? new NetworkManager(driver, options.containers.network),
        }
      : null;
    this.store = options.store;
    this.containers = options.containers;
    this.knowledge = options.knowledge;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('lifecycle');
  }

  /** Whether a runtime was detected. */
  get isRuntimeAvailable(): boolean {
    return this.runtime !== null;
  }

  /** The detected runtime driver, if any. */
  get driver(): RuntimeDriver | null {
    return this.runtime?.driver ?? null;
  }

  // -----------------------------------------------------------------------
  // Transitions
  // -----------------------------------------------------------------------

  /**
   * Create the agent's container (and start it when `autoStart` is set).
   * A no-op success when a container is already attached.
   */
  async createContainer(agentId: string): Promise<OperationResult> {
    return this.transition('create', agentId, async (rt) => {
      const agent = this.load(agentId);
      if (agent.containerId !== null) {
        this.logger.debug('container already attached', {
          agent: agentId,
          container: agent.containerId,
        });
        return;
      }

      const created = await this.createLocked(rt, agent);
      if (created.containerConfig.autoStart === true) {
        await this.startLocked(rt, created);
      }
    });
  }

  /** Start the attached container. Issues `start` even when already running. */
  async startContainer(agentId: string): Promise<OperationResult> {
    return this.transition('start', agentId, async (rt) => {
      await this.startLocked(rt, this.load(agentId));
    });
  }

  /** Stop the attached container. On failure the persisted state is unchanged. */
  async stopContainer(agentId: string): Promise<OperationResult> {
    return this.transition('stop', agentId, async (rt) => {
      const agent = this.load(agentId);
      const containerId = this.requireContainer(agent);

      const stopped = await rt.driver.stop(containerId, this.containers.stop_grace_seconds);
      if (!stopped.ok) {
        throw new LifecycleError(
          ErrorCode.RUNTIME_OPERATION_FAILED,
          `Failed to stop container ${containerId}: ${stopped.error}`,
        );
      }
      this.persist(agent, { containerStatus: 'stopped' });
    });
  }

  /**
   * Stop (when running) and remove the attached container, then detach it
   * from the record. A failed stop is logged and removal proceeds; a failed
   * removal leaves the record untouched.
   */
  async deleteContainer(agentId: string): Promise<OperationResult> {
    return this.transition('delete', agentId, async (rt) => {
      const agent = this.load(agentId);
      const containerId = this.requireContainer(agent);
      const grace = this.containers.stop_grace_seconds;

      if (agent.containerStatus === 'running') {
        const stopped = await rt.driver.stop(containerId, grace);
        if (!stopped.ok) {
          this.logger.warn('stop before remove failed', {
            agent: agentId,
            container: containerId,
            error: stopped.error,
          });
        }
      }

      const removed = await rt.driver.remove(containerId, grace);
      if (!removed.ok) {
        throw new LifecycleError(
          ErrorCode.RUNTIME_OPERATION_FAILED,
          `Failed to remove container ${containerId}: ${removed.error}`,
        );
      }

      this.persist(agent, {
        containerId: null,
        containerName: null,
        hostPort: null,
        containerStatus: 'none',
      });
    });
  }

  // -----------------------------------------------------------------------
  // Diagnostics
  // -----------------------------------------------------------------------

  /**
   * Last `lines` log lines (clamped to 1..1000). Null when the runtime,
   * agent or container is missing or the engine call fails.
   */
  async getLogs(agentId: string, lines: number = DEFAULT_LOG_LINES): Promise<string | null> {
    const containerId = this.attachedContainer(agentId);
    if (!this.runtime || containerId === null) return null;
    return this.runtime.driver.logs(containerId, clampLines(lines));
  }

  async getStats(agentId: string): Promise<ContainerStats | null> {
    const containerId = this.attachedContainer(agentId);
    if (!this.runtime || containerId === null) return null;
    return this.runtime.driver.stats(containerId);
  }

  /** Persisted status plus the runtime's view of the attached container. */
  async getStatus(agentId: string): Promise<ValueResult<ContainerStatusReport>> {
    if (!this.runtime) return this.unavailable();
    const agent = this.store.get(agentId);
    if (!agent) {
      return { ok: false, error: failure(ErrorCode.AGENT_NOT_FOUND, `Agent ${agentId} not found`) };
    }

    let runtime: ContainerInfo | null = null;
    if (agent.containerId !== null) {
      const info = await this.runtime.driver.inspect(agent.containerId);
      runtime = info.ok ? info.value : null;
    }

    return {
      ok: true,
      value: {
        agentId,
        status: agent.containerStatus,
        containerId: agent.containerId,
        containerName: agent.containerName,
        hostPort: agent.hostPort,
        runtime,
      },
    };
  }

  /** All containers carrying the agentdock ownership label. */
  async listManaged(): Promise<ValueResult<ManagedContainerSummary[]>> {
    if (!this.runtime) return this.unavailable();
    const listed = await this.runtime.driver.listManaged();
    if (!listed.ok) {
      return {
        ok: false,
        error: failure(ErrorCode.RUNTIME_OPERATION_FAILED, `Failed to list containers: ${listed.error}`),
      };
    }
    return { ok: true, value: listed.value };
  }

  /**
   * Align persisted status with the runtime for every agent that has a
   * container attached. Containers that vanished are detached; managed
   * containers without an agent record are reported, not removed.
   */
  async reconcile(): Promise<ValueResult<ReconcileSummary>> {
    const rt = this.runtime;
    if (!rt) return this.unavailable();
    const listed = await this.listManaged();
    if (!listed.ok) return listed;

    const rows = listed.value;
    const agents = this.store.list();
    const known = new Set(agents.map((a) => a.id));
    const changes: ReconcileChange[] = [];
    let checked = 0;

    for (const candidate of agents) {
      if (candidate.containerId === null) continue;
      checked++;

      const change = await this.lock.inLock(candidate.id, async () => {
        // Re-read under the lock; a transition may have finished meanwhile.
        const agent = this.store.get(candidate.id);
        if (!agent || agent.containerId === null) return null;
        const containerId = agent.containerId;

        // The listing predates the lock; a container created since then is
        // absent from it, so only a failed inspect means the container is gone.
        let runtimeStatus = rows.find((r) => sameContainer(r.id, containerId))?.status ?? null;
        if (runtimeStatus === null) {
          const inspected = await rt.driver.inspect(containerId);
          if (inspected.ok) runtimeStatus = inspected.value.status;
        }
        if (runtimeStatus === null) {
          this.persist(agent, {
            containerId: null,
            containerName: null,
            hostPort: null,
            containerStatus: 'none',
          });
          return { agentId: agent.id, from: agent.containerStatus, to: 'none' as const, cleared: true };
        }

        const next = statusFromRuntime(runtimeStatus);
        if (next === null || next === agent.containerStatus) return null;
        this.persist(agent, { containerStatus: next });
        return { agentId: agent.id, from: agent.containerStatus, to: next, cleared: false };
      });

      if (change) {
        changes.push(change);
        this.logger.info('status reconciled', {
          agent: change.agentId,
          from: change.from,
          to: change.to,
          cleared: change.cleared,
        });
      }
    }

    const orphans = rows.filter((r) => !known.has(r.agentId));
    if (orphans.length > 0) {
      this.logger.warn('managed containers without an agent', {
        containers: orphans.map((o) => o.name),
      });
    }

    return { ok: true, value: { checked, changes, orphans } };
  }

  // -----------------------------------------------------------------------
  // Locked steps
  // -----------------------------------------------------------------------

  private async createLocked(rt: RuntimeBundle, agent: Agent): Promise<Agent> {
    const network = await rt.network.ensure();
    if (!network.ok) {
      this.persist(agent, { containerStatus: 'failed' });
      throw new LifecycleError(
        ErrorCode.RUNTIME_OPERATION_FAILED,
        `Failed to prepare network ${rt.network.networkName}: ${network.error}`,
      );
    }

    const hostPort = await rt.ports.allocate();
    const spec = buildContainerSpec({
      agent,
      hostPort,
      hostAlias: rt.driver.hostAlias,
      defaults: this.containers,
      knowledge: this.knowledge,
      random: this.random,
    });

    const created = await rt.driver.create(spec);
    if (!created.ok) {
      this.persist(agent, { containerStatus: 'failed' });
      throw new LifecycleError(
        ErrorCode.RUNTIME_OPERATION_FAILED,
        `Failed to create container for agent ${agent.id}: ${created.error}`,
      );
    }

    this.logger.info('container created', {
      agent: agent.id,
      container: created.value,
      name: spec.name,
      image: spec.image,
      host_port: hostPort,
      env_keys: Object.keys(spec.env),
    });

    return this.persist(agent, {
      containerId: created.value,
      containerName: spec.name,
      hostPort,
      containerStatus: 'stopped',
    });
  }

  private async startLocked(rt: RuntimeBundle, agent: Agent): Promise<void> {
    const containerId = this.requireContainer(agent);

    const started = await rt.driver.start(containerId);
    if (!started.ok) {
      this.persist(agent, { containerStatus: 'failed' });
      throw new LifecycleError(
        ErrorCode.RUNTIME_OPERATION_FAILED,
        `Failed to start container ${containerId}: ${started.error}`,
      );
    }
    this.persist(agent, { containerStatus: 'running' });
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  /**
   * Run one transition under the agent's lock and convert whatever it
   * throws into a failure value.
   */
  private async transition(
    operation: string,
    agentId: string,
    step: (rt: RuntimeBundle) => Promise<void>,
  ): Promise<OperationResult> {
    const rt = this.runtime;
    if (!rt) return this.unavailable();

    const startedAt = Date.now();
    return this.lock.inLock(agentId, async () => {
      try {
        await step(rt);
        this.logger.debug(`${operation} ok`, {
          agent: agentId,
          ok: true,
          duration_ms: Date.now() - startedAt,
        });
        return { ok: true };
      } catch (err) {
        const error = toFailure(err);
        this.logger.warn(`${operation} failed`, {
          agent: agentId,
          ok: false,
          error_code: error.code,
          error: error.message,
          duration_ms: Date.now() - startedAt,
        });
        return { ok: false, error };
      }
    });
  }

  private unavailable(): { ok: false; error: LifecycleFailure } {
    return {
      ok: false,
      error: failure(ErrorCode.RUNTIME_UNAVAILABLE, 'No container runtime is available'),
    };
  }

  private load(agentId: string): Agent {
    const agent = this.store.get(agentId);
    if (!agent) {
      throw new LifecycleError(ErrorCode.AGENT_NOT_FOUND, `Agent ${agentId} not found`);
    }
    return agent;
  }

  private requireContainer(agent: Agent): string {
    if (agent.containerId === null) {
      throw new LifecycleError(
        ErrorCode.NO_CONTAINER_ATTACHED,
        `Agent ${agent.id} has no container`,
      );
    }
    return agent.containerId;
  }

  private attachedContainer(agentId: string): string | null {
    return this.store.get(agentId)?.containerId ?? null;
  }

  private persist(agent: Agent, changes: Partial<Agent>): Agent {
    const next: Agent = { ...agent, ...changes, updatedAt: this.now().toISOString() };
    this.store.save(next);
    return next;
  }
}
