/**
 * Wires the container core from an initialized home directory: agent
 * store, runtime detection, lifecycle manager, request proxy and agent
 * service.
 */

import type { InitResult } from './config-loader.js';
import type { AgentDockConfig } from '../types/config.js';
import { ErrorCode } from '../types/errors.js';
import { AgentService } from './agent-service.js';
import { AGENT_MIGRATIONS, AGENTS_FEATURE, SqliteAgentStore, type AgentStore } from './agent-store.js';
import { createLogger } from './logger.js';
import { SqliteManager } from './sqlite-manager.js';
import { AgentHttpClient } from './container/agent-client.js';
import { createDriver, detectRuntime, type RuntimeInfo } from './container/detect.js';
import { ContainerLifecycleManager } from './container/lifecycle-manager.js';
import { RequestProxy } from './container/request-proxy.js';
import type { RuntimeDriver } from './container/runtime.js';

const logger = createLogger('bootstrap');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CoreContext {
  config: AgentDockConfig;
  knowledgeRoot: string;
  /** Detected runtime, or null when none answered. */
  runtime: RuntimeInfo | null;
  store: AgentStore;
  manager: ContainerLifecycleManager;
  proxy: RequestProxy;
  service: AgentService;
  /** Close the database. */
  close(): void;
}

export interface CoreOptions {
  /** Drivers to probe. Defaults to the configured engine only. */
  drivers?: RuntimeDriver[];
  /** Keep the agent database in memory (tests). */
  useMemoryDatabase?: boolean;
}

// ---------------------------------------------------------------------------
// createCore
// ---------------------------------------------------------------------------

export function configuredDriver(config: AgentDockConfig): RuntimeDriver {
  return createDriver(config.runtime.engine, {
    commandTimeoutMs: config.runtime.command_timeout_ms,
  });
}

export async function createCore(init: InitResult, options: CoreOptions = {}): Promise<CoreContext> {
  const { config, dirs, knowledgeRoot } = init;

  const sqlite = new SqliteManager({ baseDir: dirs.data, useMemory: options.useMemoryDatabase });
  sqlite.registerMigrations(AGENTS_FEATURE, AGENT_MIGRATIONS);
  const store = new SqliteAgentStore(sqlite.getDatabase(AGENTS_FEATURE));

  const detection = await detectRuntime({
    drivers: options.drivers ?? [configuredDriver(config)],
    preference: config.runtime.engine,
  });
  const runtime = detection?.selected ?? null;
  if (runtime) {
    logger.debug('runtime detected', { runtime: runtime.driver.name, version: runtime.version });
  } else {
    logger.warn('no container runtime available, container operations are disabled', {
      engine: config.runtime.engine,
      error_code: ErrorCode.RUNTIME_UNAVAILABLE,
    });
  }

  const manager = new ContainerLifecycleManager({
    driver: runtime?.driver ?? null,
    store,
    containers: config.containers,
    ports: config.ports,
    knowledge: { root: knowledgeRoot, vectorDbUrl: config.knowledge.vector_db_url },
  });
  const proxy = new RequestProxy({
    manager,
    store,
    containerPort: config.containers.container_port,
    client: new AgentHttpClient({ timeoutMs: config.proxy.timeout_ms }),
  });
  const service = new AgentService({ store, manager, proxy, knowledgeRoot });

  return {
    config,
    knowledgeRoot,
    runtime,
    store,
    manager,
    proxy,
    service,
    close: () => sqlite.shutdown(),
  };
}
