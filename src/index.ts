/**
 * agentdock public API.
 */

export const VERSION = '0.1.0';

export type { Agent, AgentInput, AgentType, ContainerStatus } from './types/agent.js';
export type { AgentDockConfig } from './types/config.js';
export { ErrorCode } from './types/errors.js';
export type { LifecycleFailure } from './types/errors.js';
export { initialize, loadConfig } from './core/config-loader.js';
export type { InitResult } from './core/config-loader.js';
export { createCore } from './core/bootstrap.js';
export type { CoreContext, CoreOptions } from './core/bootstrap.js';
export { AgentService } from './core/agent-service.js';
export { SqliteAgentStore } from './core/agent-store.js';
export type { AgentStore } from './core/agent-store.js';
export { ContainerLifecycleManager } from './core/container/lifecycle-manager.js';
export type {
  OperationResult,
  ValueResult,
  ContainerStatusReport,
  ReconcileSummary,
} from './core/container/lifecycle-manager.js';
export { RequestProxy } from './core/container/request-proxy.js';
export type { QueryResult } from './core/container/request-proxy.js';
export { DockerRuntime } from './core/container/docker-runtime.js';
export { PodmanRuntime } from './core/container/podman-runtime.js';
export type { RuntimeDriver } from './core/container/runtime.js';
export { configureLogging, createLogger } from './core/logger.js';
