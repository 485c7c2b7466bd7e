import { describe, it, expect, afterEach } from 'vitest';
import { AgentHttpClient } from './agent-client.js';
import { startFakeAgentServer, type FakeAgentServer } from '../../testing/agent-server.js';

describe('AgentHttpClient', () => {
  let server: FakeAgentServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('posts JSON and returns the parsed body', async () => {
    server = await startFakeAgentServer({
      'POST /chat': () => ({ json: { content: 'hi there' } }),
    });
    const client = new AgentHttpClient({ timeoutMs: 1_000 });

    const result = await client.postJson(server.port, '/chat', { content: 'hello' });

    expect(result).toEqual({ ok: true, status: 200, body: { content: 'hi there' } });
    expect(server.requests).toEqual([{ method: 'POST', path: '/chat', body: { content: 'hello' } }]);
  });

  it('reports non-2xx responses as errors', async () => {
    server = await startFakeAgentServer({
      'POST /chat': () => ({ status: 503, raw: 'busy' }),
    });
    const client = new AgentHttpClient({ timeoutMs: 1_000 });

    const result = await client.postJson(server.port, '/chat', {});

    expect(result).toEqual({ ok: false, error: 'HTTP 503 from /chat: busy' });
  });

  it('reports a non-JSON body as an error', async () => {
    server = await startFakeAgentServer({
      'POST /chat': () => ({ raw: '<html>' }),
    });
    const client = new AgentHttpClient({ timeoutMs: 1_000 });

    expect(await client.postJson(server.port, '/chat', {})).toEqual({
      ok: false,
      error: 'non-JSON response from /chat',
    });
  });

  it('times out instead of waiting forever', async () => {
    server = await startFakeAgentServer({ 'POST /chat': () => 'hang' });
    const client = new AgentHttpClient({ timeoutMs: 50 });

    const result = await client.postJson(server.port, '/chat', {});

    expect(result).toEqual({ ok: false, error: 'POST /chat timed out after 50ms' });
  });

  it('reports a refused connection without throwing', async () => {
    server = await startFakeAgentServer({});
    const port = server.port;
    await server.close();
    server = undefined;
    const client = new AgentHttpClient({ timeoutMs: 1_000 });

    const result = await client.postJson(port, '/chat', {});

    expect(result.ok).toBe(false);
  });

  it('checks health', async () => {
    server = await startFakeAgentServer({ 'GET /health': () => ({ json: { status: 'ok' } }) });
    const client = new AgentHttpClient({ timeoutMs: 1_000 });

    expect(await client.health(server.port)).toBe(true);
  });

  it('treats a failing health endpoint as unhealthy', async () => {
    server = await startFakeAgentServer({ 'GET /health': () => ({ status: 500 }) });
    const client = new AgentHttpClient({ timeoutMs: 1_000 });

    expect(await client.health(server.port)).toBe(false);
  });
});
