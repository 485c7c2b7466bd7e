/**
 * Mock runtime driver for testing.
 *
 * Implements the {@link RuntimeDriver} interface with in-memory state,
 * enabling unit tests for the port allocator, lifecycle manager and request
 * proxy without a real container engine.
 *
 * Every call is recorded in {@link MockRuntimeDriver.calls} in order.
 * Supports failure simulation per operation, hung commands, and host ports
 * bound by containers agentdock does not own.
 */

import type {
  ContainerInfo,
  ContainerStats,
  CreateContainerOptions,
  DriverResult,
  ManagedContainerSummary,
  RuntimeDriver,
  RuntimeName,
} from './runtime.js';
import { driverError, driverOk } from './runtime.js';
import { LABEL_AGENT_ID, LABEL_AGENT_NAME, LABEL_USER_ID } from './constants.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export type MockOperation =
  | 'ensureNetwork'
  | 'create'
  | 'start'
  | 'stop'
  | 'remove'
  | 'inspect'
  | 'logs'
  | 'stats'
  | 'listManaged'
  | 'listPortBindings';

export interface MockCall {
  op: MockOperation;
  /** Container id or network name the call targeted. */
  target?: string;
  /** Captured options for `create`. */
  options?: CreateContainerOptions;
}

/** Container state the mock tracks. */
export interface MockContainer {
  id: string;
  name: string;
  status: 'created' | 'running' | 'exited';
  hostPort: number;
  containerPort: number;
  labels: Record<string, string>;
  env: Record<string, string>;
  createdAt: string;
}

// ---------------------------------------------------------------------------
// MockRuntimeDriver
// ---------------------------------------------------------------------------

export class MockRuntimeDriver implements RuntimeDriver {
  readonly name: RuntimeName;
  readonly hostAlias: string;

  /** Every driver call in order. */
  readonly calls: MockCall[] = [];

  private readonly containers = new Map<string, MockContainer>();
  private readonly networks = new Set<string>();
  private readonly failures = new Map<MockOperation, string[]>();
  private readonly hangs = new Set<MockOperation>();
  private readonly queuedIds: string[] = [];
  private externalPorts: number[] = [];
  private available = true;
  private idCounter = 0;
  private logText = '2024-01-01T00:00:00.000000000Z agent ready\n';

  constructor(name: RuntimeName = 'docker') {
    this.name = name;
    this.hostAlias = name === 'podman' ? 'host.containers.internal' : 'host.docker.internal';
  }

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async version(): Promise<DriverResult<string>> {
    return this.available ? driverOk(`Mock ${this.name} 1.0.0`) : driverError('engine not running');
  }

  // -----------------------------------------------------------------------
  // Networks
  // -----------------------------------------------------------------------

  async ensureNetwork(name: string): Promise<DriverResult<void>> {
    const blocked = await this.enter({ op: 'ensureNetwork', target: name });
    if (blocked) return driverError(blocked);
    this.networks.add(name);
    return driverOk(undefined);
  }

  // -----------------------------------------------------------------------
  // Container lifecycle
  // -----------------------------------------------------------------------

  async create(options: CreateContainerOptions): Promise<DriverResult<string>> {
    const blocked = await this.enter({ op: 'create', target: options.name, options });
    if (blocked) return driverError(blocked);

    this.idCounter += 1;
    const id = this.queuedIds.shift() ?? `mock-${this.idCounter}`;
    this.containers.set(id, {
      id,
      name: options.name,
      status: 'created',
      hostPort: options.hostPort,
      containerPort: options.containerPort,
      labels: { ...options.labels },
      env: { ...options.env },
      createdAt: new Date().toISOString(),
    });
    return driverOk(id);
  }

  async start(id: string): Promise<DriverResult<void>> {
    const blocked = await this.enter({ op: 'start', target: id });
    if (blocked) return driverError(blocked);
    const container = this.containers.get(id);
    if (!container) return driverError(`No such container: ${id}`);
    container.status = 'running';
    return driverOk(undefined);
  }

  async stop(id: string, _graceSeconds: number): Promise<DriverResult<void>> {
    const blocked = await this.enter({ op: 'stop', target: id });
    if (blocked) return driverError(blocked);
    const container = this.containers.get(id);
    if (!container) return driverError(`No such container: ${id}`);
    container.status = 'exited';
    return driverOk(undefined);
  }

  async remove(id: string, _graceSeconds: number): Promise<DriverResult<void>> {
    const blocked = await this.enter({ op: 'remove', target: id });
    if (blocked) return driverError(blocked);
    if (!this.containers.delete(id)) return driverError(`No such container: ${id}`);
    return driverOk(undefined);
  }

  async inspect(id: string): Promise<DriverResult<ContainerInfo>> {
    const blocked = await this.enter({ op: 'inspect', target: id });
    if (blocked) return driverError(blocked);
    const container = this.containers.get(id);
    if (!container) return driverError(`No such container: ${id}`);
    return driverOk({
      id: container.id,
      name: container.name,
      status: container.status,
      running: container.status === 'running',
      ports:
        container.status === 'running'
          ? [
              {
                containerPort: container.containerPort,
                protocol: 'tcp',
                hostIp: '0.0.0.0',
                hostPort: container.hostPort,
              },
            ]
          : [],
      labels: { ...container.labels },
    });
  }

  // -----------------------------------------------------------------------
  // Diagnostics
  // -----------------------------------------------------------------------

  async logs(id: string, lines: number): Promise<string | null> {
    const blocked = await this.enter({ op: 'logs', target: id });
    if (blocked || !this.containers.has(id)) return null;
    return this.logText.split('\n').filter(Boolean).slice(-lines).join('\n');
  }

  async stats(id: string): Promise<ContainerStats | null> {
    const blocked = await this.enter({ op: 'stats', target: id });
    const container = this.containers.get(id);
    if (blocked || !container) return null;
    const running = container.status === 'running';
    return {
      cpuPercent: running ? 1.5 : 0,
      memoryUsageBytes: running ? 64 * 1024 * 1024 : 0,
      memoryLimitBytes: 512 * 1024 * 1024,
      memoryPercent: running ? 12.5 : 0,
      networkRxBytes: 0,
      networkTxBytes: 0,
      blockReadBytes: 0,
      blockWriteBytes: 0,
      pids: running ? 3 : 0,
    };
  }

  async listManaged(): Promise<DriverResult<ManagedContainerSummary[]>> {
    const blocked = await this.enter({ op: 'listManaged' });
    if (blocked) return driverError(blocked);

    const rows: ManagedContainerSummary[] = [];
    for (const c of this.containers.values()) {
      const agentId = c.labels[LABEL_AGENT_ID];
      if (agentId === undefined) continue;
      rows.push({
        id: c.id,
        name: c.name,
        status: c.status,
        agentId,
        agentName: c.labels[LABEL_AGENT_NAME] ?? null,
        userId: c.labels[LABEL_USER_ID] ?? null,
        createdAt: c.createdAt,
        ports: c.status === 'running' ? `0.0.0.0:${c.hostPort}->${c.containerPort}/tcp` : '',
      });
    }
    return driverOk(rows);
  }

  async listPortBindings(): Promise<DriverResult<number[]>> {
    const blocked = await this.enter({ op: 'listPortBindings' });
    if (blocked) return driverError(blocked);

    const ports = new Set(this.externalPorts);
    for (const c of this.containers.values()) {
      if (c.status === 'running') ports.add(c.hostPort);
    }
    return driverOk([...ports].sort((a, b) => a - b));
  }

  // -----------------------------------------------------------------------
  // Failure simulation
  // -----------------------------------------------------------------------

  /** Make the next call of `op` fail with `error`. Calls queue up. */
  failNext(op: MockOperation, error = `simulated ${op} failure`): void {
    const queue = this.failures.get(op) ?? [];
    queue.push(error);
    this.failures.set(op, queue);
  }

  /** Make every call of `op` hang forever until {@link reset}. */
  hang(op: MockOperation): void {
    this.hangs.add(op);
  }

  setAvailable(value: boolean): void {
    this.available = value;
  }

  // -----------------------------------------------------------------------
  // Seeding
  // -----------------------------------------------------------------------

  /** Id returned by the next successful `create` instead of `mock-<n>`. */
  queueCreateId(id: string): void {
    this.queuedIds.push(id);
  }

  /** Host ports held by containers outside agentdock's control. */
  setExternalPortBindings(ports: number[]): void {
    this.externalPorts = [...ports];
  }

  /** Put a container into the engine without going through `create`. */
  seedContainer(container: Partial<MockContainer> & { id: string }): void {
    this.containers.set(container.id, {
      name: container.id,
      status: 'created',
      hostPort: 9000,
      containerPort: 8000,
      labels: {},
      env: {},
      createdAt: new Date().toISOString(),
      ...container,
    });
  }

  /** Simulate a container disappearing behind the manager's back. */
  forget(id: string): void {
    this.containers.delete(id);
  }

  setLogs(text: string): void {
    this.logText = text;
  }

  // -----------------------------------------------------------------------
  // Inspection helpers (test-only)
  // -----------------------------------------------------------------------

  getContainer(id: string): MockContainer | undefined {
    return this.containers.get(id);
  }

  /** Operation names in call order, e.g. `['stop', 'remove']`. */
  operations(): MockOperation[] {
    return this.calls.map((c) => c.op);
  }

  hasNetwork(name: string): boolean {
    return this.networks.has(name);
  }

  /** Clear all internal state. */
  reset(): void {
    this.calls.length = 0;
    this.containers.clear();
    this.networks.clear();
    this.failures.clear();
    this.hangs.clear();
    this.queuedIds.length = 0;
    this.externalPorts = [];
    this.available = true;
    this.idCounter = 0;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /** Record the call; resolve to a failure message if one is queued. */
  private async enter(call: MockCall): Promise<string | null> {
    this.calls.push(call);
    if (this.hangs.has(call.op)) {
      return new Promise<string | null>(() => {
        // Intentionally never resolves.
      });
    }
    const queue = this.failures.get(call.op);
    const error = queue?.shift();
    return error ?? null;
  }
}
