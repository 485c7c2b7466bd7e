/**
 * Request proxy: delivers a user query to an agent's running container and
 * returns the text it answers with.
 *
 * The container speaks one of two contracts, tried in order as
 * {@link FALLBACK_RULES}. The host port is always re-derived from the
 * runtime, never trusted from the persisted record.
 */

import type { LifecycleFailure } from '../../types/errors.js';
import { ErrorCode } from '../../types/errors.js';
import type { AgentStore } from '../agent-store.js';
import { failure } from '../lifecycle-error.js';
import { createLogger, type Logger } from '../logger.js';
import { AgentHttpClient } from './agent-client.js';
import type { ContainerLifecycleManager } from './lifecycle-manager.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One way of asking the container a question. */
export interface FallbackRule {
  path: string;
  body: (text: string) => Record<string, string>;
  /** Response field holding the answer. */
  field: string;
}

export const FALLBACK_RULES: readonly FallbackRule[] = [
  { path: '/chat', body: (text) => ({ content: text }), field: 'content' },
  { path: '/query', body: (text) => ({ query: text }), field: 'response' },
];

export type QueryResult = { ok: true; text: string } | { ok: false; error: LifecycleFailure };

export interface RequestProxyOptions {
  manager: ContainerLifecycleManager;
  store: AgentStore;
  /** Port the agent server listens on inside the container. */
  containerPort: number;
  client?: AgentHttpClient;
  rules?: readonly FallbackRule[];
  logger?: Logger;
}

type PortResult = { ok: true; port: number } | { ok: false; error: LifecycleFailure };

type RuleOutcome = { ok: true; text: string } | { ok: false; error: string };

const HEALTH_POLL_START_MS = 250;
const HEALTH_POLL_MAX_MS = 2_000;

// ---------------------------------------------------------------------------
// RequestProxy
// ---------------------------------------------------------------------------

export class RequestProxy {
  private readonly manager: ContainerLifecycleManager;
  private readonly store: AgentStore;
  private readonly containerPort: number;
  private readonly client: AgentHttpClient;
  private readonly rules: readonly FallbackRule[];
  private readonly logger: Logger;

  constructor(options: RequestProxyOptions) {
    this.manager = options.manager;
    this.store = options.store;
    this.containerPort = options.containerPort;
    this.client = options.client ?? new AgentHttpClient();
    this.rules = options.rules ?? FALLBACK_RULES;
    this.logger = options.logger ?? createLogger('proxy');
  }

  /**
   * Ask the agent `text`. Starts the container first when the record says
   * it is not running. Never throws.
   */
  async query(agentId: string, text: string): Promise<QueryResult> {
    const agent = this.store.get(agentId);
    if (!agent) {
      return { ok: false, error: failure(ErrorCode.AGENT_NOT_FOUND, `Agent ${agentId} not found`) };
    }
    if (agent.containerId === null) {
      return {
        ok: false,
        error: failure(ErrorCode.NO_CONTAINER_ATTACHED, `Agent ${agentId} has no container`),
      };
    }

    if (agent.containerStatus !== 'running') {
      const started = await this.manager.startContainer(agentId);
      if (!started.ok) return started;
    }

    const resolved = await this.resolvePort(agentId, agent.containerId);
    if (!resolved.ok) return resolved;

    const startedAt = Date.now();
    let lastError = 'no fallback rules configured';
    for (const rule of this.rules) {
      const outcome = await this.tryRule(resolved.port, rule, text);
      if (outcome.ok) {
        this.logger.info('query answered', {
          agent: agentId,
          path: rule.path,
          ok: true,
          duration_ms: Date.now() - startedAt,
        });
        return outcome;
      }
      lastError = `${rule.path}: ${outcome.error}`;
      this.logger.warn('query route failed', { agent: agentId, path: rule.path, error: outcome.error });
    }

    this.logger.warn('agent unreachable', {
      agent: agentId,
      ok: false,
      error_code: ErrorCode.PROXY_UNREACHABLE,
      duration_ms: Date.now() - startedAt,
    });
    return {
      ok: false,
      error: failure(ErrorCode.PROXY_UNREACHABLE, `Agent ${agentId} did not answer (${lastError})`),
    };
  }

  /**
   * Poll the container's `/health` endpoint with backoff until it answers
   * or `timeoutMs` passes.
   */
  async waitForHealthy(agentId: string, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    let interval = HEALTH_POLL_START_MS;

    while (Date.now() < deadline) {
      const containerId = this.store.get(agentId)?.containerId ?? null;
      if (containerId === null) return false;

      const resolved = await this.resolvePort(agentId, containerId);
      if (resolved.ok && (await this.client.health(resolved.port))) {
        this.logger.info('agent healthy', { agent: agentId });
        return true;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      await new Promise((r) => setTimeout(r, Math.min(interval, remaining)));
      interval = Math.min(interval * 1.5, HEALTH_POLL_MAX_MS);
    }

    this.logger.warn('agent not healthy before deadline', { agent: agentId, timeout_ms: timeoutMs });
    return false;
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  /** Host port published for the container port, per the runtime. */
  private async resolvePort(agentId: string, containerId: string): Promise<PortResult> {
    const driver = this.manager.driver;
    if (!driver) {
      return {
        ok: false,
        error: failure(ErrorCode.RUNTIME_UNAVAILABLE, 'No container runtime is available'),
      };
    }

    const info = await driver.inspect(containerId);
    if (!info.ok) {
      return {
        ok: false,
        error: failure(ErrorCode.PROXY_UNREACHABLE, `Cannot inspect container: ${info.error}`),
      };
    }
    if (!info.value.running) {
      return {
        ok: false,
        error: failure(
          ErrorCode.PROXY_UNREACHABLE,
          `Container for agent ${agentId} is ${info.value.status}, not running`,
        ),
      };
    }

    const binding = info.value.ports.find((p) => p.containerPort === this.containerPort);
    if (!binding) {
      return {
        ok: false,
        error: failure(
          ErrorCode.PROXY_UNREACHABLE,
          `Container for agent ${agentId} publishes no host port for ${this.containerPort}`,
        ),
      };
    }
    return { ok: true, port: binding.hostPort };
  }

  private async tryRule(port: number, rule: FallbackRule, text: string): Promise<RuleOutcome> {
    const response = await this.client.postJson(port, rule.path, rule.body(text));
    if (!response.ok) return response;

    const { body } = response;
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return { ok: false, error: 'response is not a JSON object' };
    }
    if ('error' in body && typeof body.error === 'string') {
      return { ok: false, error: body.error };
    }

    const fields = [rule.field, ...this.rules.map((r) => r.field).filter((f) => f !== rule.field)];
    for (const field of fields) {
      const value: unknown = Object.getOwnPropertyDescriptor(body, field)?.value;
      if (typeof value === 'string') return { ok: true, text: value };
    }
    return { ok: false, error: `response has none of ${fields.join(', ')}` };
  }
}
