import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RequestProxy } from './request-proxy.js';
import { AgentHttpClient } from './agent-client.js';
import { ContainerLifecycleManager } from './lifecycle-manager.js';
import { MockRuntimeDriver } from './mock-runtime.js';
import { MemoryAgentStore } from '../../testing/memory-agent-store.js';
import { startFakeAgentServer, type FakeAgentServer } from '../../testing/agent-server.js';
import { createAgent } from '../../testing/factories.js';
import { DEFAULT_CONFIG } from '../../types/config.js';
import { ErrorCode } from '../../types/errors.js';
import type { Agent } from '../../types/agent.js';
import type { RuntimeDriver } from './runtime.js';
import { configureLogging, resetLogging } from '../logger.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function runningAgent(overrides: Partial<Agent> = {}): Agent {
  return createAgent({
    id: 'agent-a',
    containerId: 'c-1',
    containerStatus: 'running',
    hostPort: 9000,
    ...overrides,
  });
}

function createProxy(driver: RuntimeDriver | null, store: MemoryAgentStore, timeoutMs = 1_000) {
  const manager = new ContainerLifecycleManager({
    driver,
    store,
    containers: DEFAULT_CONFIG.containers,
    ports: { start: 9000, end: 9010 },
    knowledge: { root: '/kb', vectorDbUrl: 'postgresql://localhost:5432/vectors' },
  });
  return new RequestProxy({
    manager,
    store,
    containerPort: 8000,
    client: new AgentHttpClient({ timeoutMs }),
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('RequestProxy', () => {
  let driver: MockRuntimeDriver;
  let store: MemoryAgentStore;
  let server: FakeAgentServer | undefined;

  beforeEach(() => {
    configureLogging({ level: 'error', sink: () => {} });
    driver = new MockRuntimeDriver();
    store = new MemoryAgentStore();
  });

  afterEach(async () => {
    await server?.close();
    server = undefined;
    resetLogging();
    vi.restoreAllMocks();
  });

  async function serve(routes: Parameters<typeof startFakeAgentServer>[0]): Promise<number> {
    server = await startFakeAgentServer(routes);
    driver.seedContainer({ id: 'c-1', status: 'running', hostPort: server.port, containerPort: 8000 });
    return server.port;
  }

  // -----------------------------------------------------------------------
  // Routing
  // -----------------------------------------------------------------------

  describe('query', () => {
    it('answers from the primary /chat route', async () => {
      await serve({ 'POST /chat': () => ({ json: { content: 'from chat' } }) });
      store.save(runningAgent());
      const proxy = createProxy(driver, store);

      const result = await proxy.query('agent-a', 'hello');

      expect(result).toEqual({ ok: true, text: 'from chat' });
      expect(server?.requests.map((r) => r.path)).toEqual(['/chat']);
      expect(server?.requests[0]?.body).toEqual({ content: 'hello' });
    });

    it('falls back to /query when /chat times out', async () => {
      await serve({
        'POST /chat': () => 'hang',
        'POST /query': () => ({ json: { response: 'hello' } }),
      });
      store.save(runningAgent());
      const proxy = createProxy(driver, store, 100);

      const result = await proxy.query('agent-a', 'what is up');

      expect(result).toEqual({ ok: true, text: 'hello' });
      expect(server?.requests.map((r) => r.path)).toEqual(['/chat', '/query']);
      expect(server?.requests[1]?.body).toEqual({ query: 'what is up' });
    });

    it('falls back when /chat answers with an error body', async () => {
      await serve({
        'POST /chat': () => ({ json: { error: 'model offline' } }),
        'POST /query': () => ({ json: { response: 'legacy answer' } }),
      });
      store.save(runningAgent());

      const result = await createProxy(driver, store).query('agent-a', 'hi');

      expect(result).toEqual({ ok: true, text: 'legacy answer' });
    });

    it('accepts the legacy field on the primary route', async () => {
      await serve({ 'POST /chat': () => ({ json: { response: 'old shape' } }) });
      store.save(runningAgent());

      const result = await createProxy(driver, store).query('agent-a', 'hi');

      expect(result).toEqual({ ok: true, text: 'old shape' });
    });

    it('reports PROXY_UNREACHABLE when every route fails', async () => {
      await serve({
        'POST /chat': () => ({ status: 500, json: {} }),
        'POST /query': () => ({ status: 502, json: {} }),
      });
      store.save(runningAgent());

      const result = await createProxy(driver, store).query('agent-a', 'hi');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.PROXY_UNREACHABLE);
        expect(result.error.message).toContain('/query: HTTP 502');
      }
    });
  });

  // -----------------------------------------------------------------------
  // Preconditions
  // -----------------------------------------------------------------------

  describe('preconditions', () => {
    it('reports an unknown agent', async () => {
      const result = await createProxy(driver, store).query('missing', 'hi');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(ErrorCode.AGENT_NOT_FOUND);
    });

    it('makes no network or runtime call without a container', async () => {
      store.save(createAgent({ id: 'agent-a' }));
      const client = new AgentHttpClient();
      const post = vi.spyOn(client, 'postJson');
      const proxy = new RequestProxy({
        manager: new ContainerLifecycleManager({
          driver,
          store,
          containers: DEFAULT_CONFIG.containers,
          ports: { start: 9000, end: 9010 },
          knowledge: { root: '/kb', vectorDbUrl: '' },
        }),
        store,
        containerPort: 8000,
        client,
      });

      const result = await proxy.query('agent-a', 'hi');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(ErrorCode.NO_CONTAINER_ATTACHED);
      expect(post).not.toHaveBeenCalled();
      expect(driver.calls).toEqual([]);
    });

    it('starts a stopped container before querying', async () => {
      server = await startFakeAgentServer({ 'POST /chat': () => ({ json: { content: 'awake' } }) });
      driver.seedContainer({ id: 'c-1', status: 'exited', hostPort: server.port, containerPort: 8000 });
      store.save(runningAgent({ containerStatus: 'stopped' }));

      const result = await createProxy(driver, store).query('agent-a', 'hi');

      expect(result).toEqual({ ok: true, text: 'awake' });
      expect(driver.operations()).toEqual(['start', 'inspect']);
      expect(store.get('agent-a')?.containerStatus).toBe('running');
    });

    it('propagates a start failure', async () => {
      driver.seedContainer({ id: 'c-1', status: 'exited' });
      store.save(runningAgent({ containerStatus: 'stopped' }));
      driver.failNext('start');

      const result = await createProxy(driver, store).query('agent-a', 'hi');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(ErrorCode.RUNTIME_OPERATION_FAILED);
    });

    it('does not trust a running record when the runtime says otherwise', async () => {
      driver.seedContainer({ id: 'c-1', status: 'exited' });
      store.save(runningAgent());

      const result = await createProxy(driver, store).query('agent-a', 'hi');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.PROXY_UNREACHABLE);
        expect(result.error.message).toContain('exited');
      }
    });

    it('reports RUNTIME_UNAVAILABLE without a runtime', async () => {
      store.save(runningAgent());

      const result = await createProxy(null, store).query('agent-a', 'hi');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(ErrorCode.RUNTIME_UNAVAILABLE);
    });
  });

  // -----------------------------------------------------------------------
  // Health
  // -----------------------------------------------------------------------

  describe('waitForHealthy', () => {
    it('returns true once /health answers', async () => {
      await serve({ 'GET /health': () => ({ json: { status: 'ok' } }) });
      store.save(runningAgent());

      expect(await createProxy(driver, store).waitForHealthy('agent-a', 2_000)).toBe(true);
    });

    it('gives up at the deadline', async () => {
      await serve({ 'GET /health': () => ({ status: 503 }) });
      store.save(runningAgent());

      expect(await createProxy(driver, store).waitForHealthy('agent-a', 300)).toBe(false);
    });

    it('returns false without a container', async () => {
      store.save(createAgent({ id: 'agent-a' }));

      expect(await createProxy(driver, store).waitForHealthy('agent-a', 1_000)).toBe(false);
    });
  });
});
