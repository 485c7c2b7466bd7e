import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ContainerLifecycleManager } from './lifecycle-manager.js';
import { MockRuntimeDriver } from './mock-runtime.js';
import { LABEL_AGENT_ID } from './constants.js';
import { MemoryAgentStore } from '../../testing/memory-agent-store.js';
import { createAgent } from '../../testing/factories.js';
import { DEFAULT_CONFIG } from '../../types/config.js';
import { ErrorCode } from '../../types/errors.js';
import type { Agent } from '../../types/agent.js';
import type { RuntimeDriver } from './runtime.js';
import { configureLogging, resetLogging, type LogEntry } from '../logger.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FIXED_NOW = '2024-06-01T00:00:00.000Z';

function createManager(driver: RuntimeDriver | null, store: MemoryAgentStore) {
  return new ContainerLifecycleManager({
    driver,
    store,
    containers: DEFAULT_CONFIG.containers,
    ports: { start: 9000, end: 9010 },
    knowledge: { root: '/kb', vectorDbUrl: 'postgresql://localhost:5432/vectors' },
    random: () => 0,
    now: () => new Date(FIXED_NOW),
  });
}

function attached(overrides: Partial<Agent> = {}): Agent {
  return createAgent({
    id: 'agent-a',
    containerId: 'c-1',
    containerName: 'agentdock-agent-helperbot-aaaaaa',
    containerStatus: 'stopped',
    hostPort: 9000,
    ...overrides,
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ContainerLifecycleManager', () => {
  let driver: MockRuntimeDriver;
  let store: MemoryAgentStore;
  let manager: ContainerLifecycleManager;
  let logs: LogEntry[];

  beforeEach(() => {
    logs = [];
    configureLogging({ level: 'debug', sink: (entry) => logs.push(entry) });
    driver = new MockRuntimeDriver();
    store = new MemoryAgentStore();
    manager = createManager(driver, store);
  });

  afterEach(() => {
    resetLogging();
    vi.restoreAllMocks();
  });

  // -----------------------------------------------------------------------
  // create
  // -----------------------------------------------------------------------

  describe('createContainer', () => {
    it('creates a stopped container and records it on the agent', async () => {
      store.save(createAgent({ id: 'agent-a', name: 'Helper Bot' }));

      const result = await manager.createContainer('agent-a');

      expect(result).toEqual({ ok: true });
      expect(driver.operations()).toEqual(['ensureNetwork', 'listPortBindings', 'create']);
      expect(store.get('agent-a')).toMatchObject({
        containerId: 'mock-1',
        containerName: 'agentdock-agent-helperbot-aaaaaa',
        containerStatus: 'stopped',
        hostPort: 9000,
        updatedAt: FIXED_NOW,
      });
      expect(driver.hasNetwork('agentdock_network')).toBe(true);
    });

    it('passes the assembled spec to the runtime', async () => {
      store.save(createAgent({ id: 'agent-a', containerConfig: { envVars: { FOO: 'bar' } } }));

      await manager.createContainer('agent-a');

      const options = driver.calls.find((c) => c.op === 'create')?.options;
      expect(options?.image).toBe('agentdock/agent:latest');
      expect(options?.hostPort).toBe(9000);
      expect(options?.containerPort).toBe(8000);
      expect(options?.env['FOO']).toBe('bar');
      expect(options?.env['AGENT_ID']).toBe('agent-a');
      expect(options?.labels[LABEL_AGENT_ID]).toBe('agent-a');
    });

    it('skips ports bound by other containers', async () => {
      driver.setExternalPortBindings([9000, 9001]);
      store.save(createAgent({ id: 'agent-a' }));

      await manager.createContainer('agent-a');

      expect(store.get('agent-a')?.hostPort).toBe(9002);
    });

    it('marks the agent failed with no container when create fails', async () => {
      store.save(createAgent({ id: 'agent-a' }));
      driver.failNext('create', 'image not found');

      const result = await manager.createContainer('agent-a');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.RUNTIME_OPERATION_FAILED);
        expect(result.error.message).toContain('image not found');
      }
      expect(store.get('agent-a')).toMatchObject({
        containerId: null,
        containerStatus: 'failed',
      });
    });

    it('marks the agent failed when the network cannot be prepared', async () => {
      store.save(createAgent({ id: 'agent-a' }));
      driver.failNext('ensureNetwork', 'permission denied');

      const result = await manager.createContainer('agent-a');

      expect(result.ok).toBe(false);
      expect(driver.operations()).toEqual(['ensureNetwork']);
      expect(store.get('agent-a')?.containerStatus).toBe('failed');
    });

    it('is a no-op when a container is already attached', async () => {
      store.save(attached());

      const result = await manager.createContainer('agent-a');

      expect(result).toEqual({ ok: true });
      expect(driver.calls).toEqual([]);
      expect(store.get('agent-a')?.containerId).toBe('c-1');
    });

    it('starts the container right away when autoStart is set', async () => {
      store.save(createAgent({ id: 'agent-a', containerConfig: { autoStart: true } }));
      driver.queueCreateId('stub-id');

      const result = await manager.createContainer('agent-a');

      expect(result).toEqual({ ok: true });
      expect(store.get('agent-a')).toMatchObject({
        containerId: 'stub-id',
        containerStatus: 'running',
      });
      const ops = driver.operations();
      expect(ops.filter((op) => op === 'create')).toHaveLength(1);
      expect(ops.filter((op) => op === 'start')).toHaveLength(1);
    });

    it('keeps the container but marks failed when autoStart cannot start it', async () => {
      store.save(createAgent({ id: 'agent-a', containerConfig: { autoStart: true } }));
      driver.queueCreateId('stub-id');
      driver.failNext('start');

      const result = await manager.createContainer('agent-a');

      expect(result.ok).toBe(false);
      expect(store.get('agent-a')).toMatchObject({
        containerId: 'stub-id',
        containerStatus: 'failed',
      });
    });

    it('creates only one container for concurrent calls on the same agent', async () => {
      store.save(createAgent({ id: 'agent-a' }));

      const [first, second] = await Promise.all([
        manager.createContainer('agent-a'),
        manager.createContainer('agent-a'),
      ]);

      expect(first).toEqual({ ok: true });
      expect(second).toEqual({ ok: true });
      expect(driver.operations().filter((op) => op === 'create')).toHaveLength(1);
    });

    it('reports an unknown agent', async () => {
      const result = await manager.createContainer('missing');

      expect(result).toEqual({
        ok: false,
        error: expect.objectContaining({ code: ErrorCode.AGENT_NOT_FOUND }),
      });
      expect(driver.calls).toEqual([]);
    });

    it('logs the failure with its error code', async () => {
      store.save(createAgent({ id: 'agent-a' }));
      driver.failNext('create');

      await manager.createContainer('agent-a');

      const entry = logs.find((l) => l.msg === 'create failed');
      expect(entry?.level).toBe('warn');
      expect(entry?.agent).toBe('agent-a');
      expect(entry?.error_code).toBe(ErrorCode.RUNTIME_OPERATION_FAILED);
      expect(entry?.ok).toBe(false);
    });
  });

  // -----------------------------------------------------------------------
  // start / stop
  // -----------------------------------------------------------------------

  describe('startContainer', () => {
    it('starts the container and records running', async () => {
      driver.seedContainer({ id: 'c-1' });
      store.save(attached());

      expect(await manager.startContainer('agent-a')).toEqual({ ok: true });
      expect(store.get('agent-a')?.containerStatus).toBe('running');
      expect(driver.getContainer('c-1')?.status).toBe('running');
    });

    it('issues start again when already running', async () => {
      driver.seedContainer({ id: 'c-1', status: 'running' });
      store.save(attached({ containerStatus: 'running' }));

      await manager.startContainer('agent-a');
      await manager.startContainer('agent-a');

      expect(driver.operations()).toEqual(['start', 'start']);
      expect(store.get('agent-a')?.containerStatus).toBe('running');
    });

    it('marks failed when the runtime refuses', async () => {
      driver.seedContainer({ id: 'c-1' });
      store.save(attached());
      driver.failNext('start', 'port is already allocated');

      const result = await manager.startContainer('agent-a');

      expect(result.ok).toBe(false);
      expect(store.get('agent-a')).toMatchObject({ containerId: 'c-1', containerStatus: 'failed' });
    });

    it('requires an attached container', async () => {
      store.save(createAgent({ id: 'agent-a' }));

      const result = await manager.startContainer('agent-a');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(ErrorCode.NO_CONTAINER_ATTACHED);
      expect(driver.calls).toEqual([]);
    });
  });

  describe('stopContainer', () => {
    it('stops the container and records stopped', async () => {
      driver.seedContainer({ id: 'c-1', status: 'running' });
      store.save(attached({ containerStatus: 'running' }));

      expect(await manager.stopContainer('agent-a')).toEqual({ ok: true });
      expect(store.get('agent-a')?.containerStatus).toBe('stopped');
    });

    it('makes no runtime call without a container', async () => {
      store.save(createAgent({ id: 'agent-a' }));

      const result = await manager.stopContainer('agent-a');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(ErrorCode.NO_CONTAINER_ATTACHED);
      expect(driver.calls).toEqual([]);
    });

    it('leaves the persisted status alone when stop fails', async () => {
      driver.seedContainer({ id: 'c-1', status: 'running' });
      store.save(attached({ containerStatus: 'running' }));
      driver.failNext('stop');

      const result = await manager.stopContainer('agent-a');

      expect(result.ok).toBe(false);
      expect(store.get('agent-a')?.containerStatus).toBe('running');
    });
  });

  // -----------------------------------------------------------------------
  // delete
  // -----------------------------------------------------------------------

  describe('deleteContainer', () => {
    it('stops then removes a running container and detaches it', async () => {
      driver.seedContainer({ id: 'c-1', status: 'running' });
      store.save(attached({ containerStatus: 'running' }));

      const result = await manager.deleteContainer('agent-a');

      expect(result).toEqual({ ok: true });
      expect(driver.operations()).toEqual(['stop', 'remove']);
      expect(store.get('agent-a')).toMatchObject({
        containerId: null,
        containerName: null,
        hostPort: null,
        containerStatus: 'none',
      });
    });

    it('removes a stopped container without stopping it', async () => {
      driver.seedContainer({ id: 'c-1', status: 'exited' });
      store.save(attached());

      await manager.deleteContainer('agent-a');

      expect(driver.operations()).toEqual(['remove']);
    });

    it('still removes when the preliminary stop fails', async () => {
      driver.seedContainer({ id: 'c-1', status: 'running' });
      store.save(attached({ containerStatus: 'running' }));
      driver.failNext('stop');

      const result = await manager.deleteContainer('agent-a');

      expect(result).toEqual({ ok: true });
      expect(driver.operations()).toEqual(['stop', 'remove']);
      expect(store.get('agent-a')?.containerId).toBeNull();
    });

    it('leaves the record untouched when removal fails', async () => {
      driver.seedContainer({ id: 'c-1', status: 'exited' });
      store.save(attached());
      driver.failNext('remove', 'device busy');

      const result = await manager.deleteContainer('agent-a');

      expect(result.ok).toBe(false);
      expect(store.get('agent-a')).toMatchObject({ containerId: 'c-1', containerStatus: 'stopped' });
    });
  });

  // -----------------------------------------------------------------------
  // No runtime
  // -----------------------------------------------------------------------

  describe('without a runtime', () => {
    it('reports RUNTIME_UNAVAILABLE and never touches the store', async () => {
      const offline = createManager(null, store);
      store.save(attached());
      const savesBefore = store.saves;

      const results = [
        await offline.createContainer('agent-a'),
        await offline.startContainer('agent-a'),
        await offline.stopContainer('agent-a'),
        await offline.deleteContainer('agent-a'),
      ];

      for (const result of results) {
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe(ErrorCode.RUNTIME_UNAVAILABLE);
      }
      expect(store.saves).toBe(savesBefore);
      expect(offline.isRuntimeAvailable).toBe(false);
      expect(await offline.getLogs('agent-a')).toBeNull();
      expect(await offline.getStats('agent-a')).toBeNull();
    });
  });

  // -----------------------------------------------------------------------
  // Diagnostics
  // -----------------------------------------------------------------------

  describe('getLogs', () => {
    beforeEach(() => {
      driver.seedContainer({ id: 'c-1', status: 'running' });
      store.save(attached({ containerStatus: 'running' }));
    });

    it('defaults to 100 lines', async () => {
      const spy = vi.spyOn(driver, 'logs');
      await manager.getLogs('agent-a');
      expect(spy).toHaveBeenCalledWith('c-1', 100);
    });

    it('clamps the line count into 1..1000', async () => {
      const spy = vi.spyOn(driver, 'logs');
      await manager.getLogs('agent-a', 5000);
      await manager.getLogs('agent-a', 0);
      expect(spy).toHaveBeenNthCalledWith(1, 'c-1', 1000);
      expect(spy).toHaveBeenNthCalledWith(2, 'c-1', 1);
    });

    it('returns the runtime output', async () => {
      driver.setLogs('line one\nline two\n');
      expect(await manager.getLogs('agent-a', 1)).toBe('line two');
    });

    it('returns null without a container', async () => {
      store.save(createAgent({ id: 'agent-b' }));
      expect(await manager.getLogs('agent-b')).toBeNull();
      expect(await manager.getLogs('missing')).toBeNull();
    });
  });

  describe('getStats', () => {
    it('returns the runtime snapshot', async () => {
      driver.seedContainer({ id: 'c-1', status: 'running' });
      store.save(attached({ containerStatus: 'running' }));

      const stats = await manager.getStats('agent-a');

      expect(stats?.pids).toBe(3);
      expect(stats?.memoryPercent).toBe(12.5);
    });
  });

  describe('getStatus', () => {
    it('combines the record with the runtime view', async () => {
      driver.seedContainer({ id: 'c-1', status: 'running', hostPort: 9000 });
      store.save(attached({ containerStatus: 'running' }));

      const result = await manager.getStatus('agent-a');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.status).toBe('running');
        expect(result.value.hostPort).toBe(9000);
        expect(result.value.runtime?.running).toBe(true);
      }
    });

    it('reports a null runtime view when the container is gone', async () => {
      store.save(attached());

      const result = await manager.getStatus('agent-a');

      expect(result.ok && result.value.runtime).toBeNull();
    });
  });

  // -----------------------------------------------------------------------
  // reconcile
  // -----------------------------------------------------------------------

  describe('reconcile', () => {
    it('aligns statuses, clears vanished containers and reports orphans', async () => {
      driver.seedContainer({ id: 'c-1', status: 'exited', labels: { [LABEL_AGENT_ID]: 'agent-a' } });
      driver.seedContainer({ id: 'c-3', status: 'running', labels: { [LABEL_AGENT_ID]: 'agent-c' } });
      driver.seedContainer({ id: 'c-9', status: 'running', labels: { [LABEL_AGENT_ID]: 'ghost' } });
      store.save(attached({ containerStatus: 'running' }));
      store.save(attached({ id: 'agent-b', containerId: 'c-2', containerStatus: 'running' }));
      store.save(attached({ id: 'agent-c', containerId: 'c-3', containerStatus: 'running' }));
      store.save(createAgent({ id: 'agent-d' }));

      const result = await manager.reconcile();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.checked).toBe(3);
      expect(result.value.changes).toEqual([
        { agentId: 'agent-a', from: 'running', to: 'stopped', cleared: false },
        { agentId: 'agent-b', from: 'running', to: 'none', cleared: true },
      ]);
      expect(result.value.orphans.map((o) => o.id)).toEqual(['c-9']);
      expect(store.get('agent-a')?.containerStatus).toBe('stopped');
      expect(store.get('agent-b')).toMatchObject({ containerId: null, containerStatus: 'none' });
      expect(store.get('agent-c')?.containerStatus).toBe('running');
    });

    it('matches the short ids that ps prints', async () => {
      driver.seedContainer({ id: 'abc123', status: 'running', labels: { [LABEL_AGENT_ID]: 'agent-a' } });
      store.save(attached({ containerId: 'abc123def456', containerStatus: 'stopped' }));

      const result = await manager.reconcile();

      expect(result.ok && result.value.changes).toEqual([
        { agentId: 'agent-a', from: 'stopped', to: 'running', cleared: false },
      ]);
    });

    it('keeps a container created while the listing was in flight', async () => {
      store.save(createAgent({ id: 'agent-a', name: 'Helper Bot' }));
      const list = driver.listManaged.bind(driver);
      let markListed: () => void = () => {};
      const listed = new Promise<void>((resolve) => {
        markListed = resolve;
      });
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      vi.spyOn(driver, 'listManaged').mockImplementation(async () => {
        const rows = await list();
        markListed();
        await gate;
        return rows;
      });

      const reconciling = manager.reconcile();
      await listed;
      expect(await manager.createContainer('agent-a')).toEqual({ ok: true });
      release();
      const result = await reconciling;

      expect(result.ok && result.value.changes).toEqual([]);
      expect(store.get('agent-a')).toMatchObject({ containerId: 'mock-1', containerStatus: 'stopped' });
      expect(driver.getContainer('mock-1')).toBeDefined();
    });

    it('fails without changing anything when the runtime cannot list', async () => {
      store.save(attached({ containerStatus: 'running' }));
      driver.failNext('listManaged');

      const result = await manager.reconcile();

      expect(result.ok).toBe(false);
      expect(store.get('agent-a')?.containerStatus).toBe('running');
    });
  });
});
