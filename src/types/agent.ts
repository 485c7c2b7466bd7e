/**
 * Agent record types.
 *
 * The agent record is owned by the surrounding CRUD layer; the container
 * core reads it and mutates the container-related fields only.
 */

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

/** Kinds of agent. Only `rag` agents get a knowledge mount and vector DB env. */
export type AgentType = 'rag' | 'chat' | 'function' | 'custom';

export const AGENT_TYPES: readonly AgentType[] = ['rag', 'chat', 'function', 'custom'];

/**
 * Container lifecycle state.
 *
 * - `none`   : no container has been created (or it was deleted).
 * - `stopped`: container exists but is not running.
 * - `running`: container was started successfully.
 * - `failed` : the last create or start attempt failed.
 */
export type ContainerStatus = 'none' | 'stopped' | 'running' | 'failed';

export const CONTAINER_STATUSES: readonly ContainerStatus[] = [
  'none',
  'stopped',
  'running',
  'failed',
];

// ---------------------------------------------------------------------------
// Configuration blocks
// ---------------------------------------------------------------------------

/** Per-agent container settings. Missing fields fall back to process defaults. */
export interface ContainerConfig {
  image?: string;
  /** Runtime memory limit (e.g. `"512m"`). */
  memoryLimit?: string;
  /** Fractional CPU count (e.g. `0.5`). */
  cpuLimit?: number;
  envVars?: Record<string, string>;
  /** Start the container immediately after creating it. */
  autoStart?: boolean;
}

/** Knowledge-base settings stored under `config.knowledge_base`. */
export interface KnowledgeBaseConfig {
  recreate?: boolean;
  chunk_size?: number;
  chunk_overlap?: number;
}

// ---------------------------------------------------------------------------
// Agent
// ---------------------------------------------------------------------------

export interface Agent {
  id: string;
  name: string;
  description: string | null;
  userId: string | null;
  type: AgentType;
  containerId: string | null;
  containerName: string | null;
  containerStatus: ContainerStatus;
  containerConfig: ContainerConfig;
  /** Host port recorded at creation. The proxy re-derives it by inspection. */
  hostPort: number | null;
  /** Free-form, type-specific settings (`knowledge_base`, `llm_*`, ...). */
  config: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

/** Input accepted when registering a new agent. */
export interface AgentInput {
  name: string;
  type: AgentType;
  description?: string;
  userId?: string;
  containerConfig?: ContainerConfig;
  config?: Record<string, unknown>;
}
