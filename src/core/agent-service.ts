/**
 * Agent service: the create-agent and delete-agent flows around the
 * container core.
 *
 * Creating an agent validates the input against
 * {@link AGENT_INPUT_JSON_SCHEMA}, persists the record, prepares the
 * knowledge directory for RAG agents and, with `autoStart`, brings up the
 * container. Container problems never fail agent creation or deletion;
 * they show up in the record's status and in the logs. A knowledge
 * directory that cannot be created fails creation before anything is
 * saved; one that cannot be removed is logged and the record is purged.
 */

import { randomUUID } from 'node:crypto';
import { mkdirSync, rmSync } from 'node:fs';
import _Ajv, { type ValidateFunction } from 'ajv';
import type { Agent, AgentInput } from '../types/agent.js';
import { AGENT_INPUT_JSON_SCHEMA } from '../types/agent-schema.js';
import type { LifecycleFailure } from '../types/errors.js';
import { ErrorCode } from '../types/errors.js';
import type { AgentStore } from './agent-store.js';
import { failure } from './lifecycle-error.js';
import { createLogger, errorMessage, type Logger } from './logger.js';
import { knowledgeDir } from './container/container-spec.js';
import type { ContainerLifecycleManager } from './container/lifecycle-manager.js';
import type { RequestProxy } from './container/request-proxy.js';

// ajv ESM interop: the CJS module object carries the class on `default`.
const Ajv = _Ajv.default;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CreateAgentResult = { ok: true; agent: Agent } | { ok: false; error: LifecycleFailure };

/** Filesystem operations on knowledge directories. */
export interface KnowledgeFs {
  mkdir: (path: string) => void;
  remove: (path: string) => void;
}

const nodeKnowledgeFs: KnowledgeFs = {
  mkdir: (path) => mkdirSync(path, { recursive: true }),
  remove: (path) => rmSync(path, { recursive: true, force: true }),
};

export interface AgentServiceOptions {
  store: AgentStore;
  manager: ContainerLifecycleManager;
  proxy: RequestProxy;
  /** Host directory holding per-agent knowledge directories. */
  knowledgeRoot: string;
  fs?: KnowledgeFs;
  generateId?: () => string;
  now?: () => Date;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// AgentService
// ---------------------------------------------------------------------------

export class AgentService {
  private readonly store: AgentStore;
  private readonly manager: ContainerLifecycleManager;
  private readonly proxy: RequestProxy;
  private readonly knowledgeRoot: string;
  private readonly fs: KnowledgeFs;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly validateInput: ValidateFunction<AgentInput>;

  constructor(options: AgentServiceOptions) {
    this.store = options.store;
    this.manager = options.manager;
    this.proxy = options.proxy;
    this.knowledgeRoot = options.knowledgeRoot;
    this.fs = options.fs ?? nodeKnowledgeFs;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('agents');

    const ajv = new Ajv({ allErrors: true });
    this.validateInput = ajv.compile<AgentInput>(AGENT_INPUT_JSON_SCHEMA);
  }

  /** Validate, persist, and (with `autoStart`) bring up a container. */
  async createAgent(input: unknown): Promise<CreateAgentResult> {
    if (!this.validateInput(input)) {
      const detail = (this.validateInput.errors ?? [])
        .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
        .join('; ');
      return { ok: false, error: failure(ErrorCode.INVALID_AGENT, `Invalid agent: ${detail}`) };
    }

    const id = this.generateId();
    if (input.type === 'rag') {
      const dir = knowledgeDir(this.knowledgeRoot, id);
      try {
        this.fs.mkdir(dir);
      } catch (err) {
        this.logger.error('knowledge directory creation failed', {
          agent: id,
          path: dir,
          error_code: ErrorCode.STORAGE_FAILED,
          error: errorMessage(err),
        });
        return {
          ok: false,
          error: failure(
            ErrorCode.STORAGE_FAILED,
            `Cannot create knowledge directory ${dir}: ${errorMessage(err)}`,
          ),
        };
      }
      this.logger.debug('knowledge directory ready', { agent: id, path: dir });
    }

    const timestamp = this.now().toISOString();
    const agent: Agent = {
      id,
      name: input.name,
      description: input.description ?? null,
      userId: input.userId ?? null,
      type: input.type,
      containerId: null,
      containerName: null,
      containerStatus: 'none',
      containerConfig: { ...input.containerConfig },
      hostPort: null,
      config: { ...input.config },
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.store.save(agent);
    this.logger.info('agent created', { agent: agent.id, type: agent.type });

    if (agent.containerConfig.autoStart === true) {
      const created = await this.manager.createContainer(agent.id);
      if (!created.ok) {
        this.logger.warn('auto-start failed', {
          agent: agent.id,
          error_code: created.error.code,
          error: created.error.message,
        });
      }
    }

    return { ok: true, agent: this.store.get(agent.id) ?? agent };
  }

  /**
   * Tear down the container (best effort), remove the knowledge directory
   * and purge the record. False for an unknown agent.
   */
  async deleteAgent(agentId: string): Promise<boolean> {
    const agent = this.store.get(agentId);
    if (!agent) {
      this.logger.warn('agent not found for deletion', { agent: agentId });
      return false;
    }

    if (agent.containerId !== null) {
      const deleted = await this.manager.deleteContainer(agentId);
      if (!deleted.ok) {
        this.logger.warn('container teardown failed, deleting agent anyway', {
          agent: agentId,
          container: agent.containerId,
          error_code: deleted.error.code,
          error: deleted.error.message,
        });
      }
    }

    const dir = knowledgeDir(this.knowledgeRoot, agentId);
    try {
      this.fs.remove(dir);
    } catch (err) {
      this.logger.warn('knowledge directory removal failed, deleting agent anyway', {
        agent: agentId,
        path: dir,
        error_code: ErrorCode.STORAGE_FAILED,
        error: errorMessage(err),
      });
    }
    this.store.delete(agentId);
    this.logger.info('agent deleted', { agent: agentId });
    return true;
  }

  getAgent(agentId: string): Agent | null {
    return this.store.get(agentId);
  }

  listAgents(): Agent[] {
    return this.store.list();
  }

  /** The agent's answer, or null when it could not be reached. */
  async query(agentId: string, text: string): Promise<string | null> {
    const result = await this.proxy.query(agentId, text);
    return result.ok ? result.text : null;
  }
}
