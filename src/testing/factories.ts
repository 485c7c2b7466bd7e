/**
 * Test factories for agentdock records.
 *
 * Each factory returns a valid default object. Every call returns a fresh
 * object, no shared references between invocations.
 */

import type { Agent, AgentInput } from '../types/agent.js';
import type { AgentDockConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';

let agentCounter = 0;

/** A persisted agent with no container attached. */
export function createAgent(overrides: Partial<Agent> = {}): Agent {
  agentCounter += 1;
  const now = new Date('2024-05-01T10:00:00.000Z').toISOString();
  return {
    id: `agent-${agentCounter}`,
    name: 'Helper Bot',
    description: null,
    userId: null,
    type: 'chat',
    containerId: null,
    containerName: null,
    containerStatus: 'none',
    hostPort: null,
    createdAt: now,
    updatedAt: now,
    ...overrides,
    containerConfig: { ...overrides.containerConfig },
    config: { ...overrides.config },
  };
}

export function createAgentInput(overrides: Partial<AgentInput> = {}): AgentInput {
  return {
    name: 'Helper Bot',
    type: 'chat',
    ...overrides,
  };
}

/** Deep copy of the defaults with per-section overrides. */
export function createConfig(
  overrides: { [K in keyof AgentDockConfig]?: Partial<AgentDockConfig[K]> } = {},
): AgentDockConfig {
  return {
    runtime: { ...DEFAULT_CONFIG.runtime, ...overrides.runtime },
    containers: { ...DEFAULT_CONFIG.containers, ...overrides.containers },
    ports: { ...DEFAULT_CONFIG.ports, ...overrides.ports },
    knowledge: { ...DEFAULT_CONFIG.knowledge, ...overrides.knowledge },
    proxy: { ...DEFAULT_CONFIG.proxy, ...overrides.proxy },
    logging: { ...DEFAULT_CONFIG.logging, ...overrides.logging },
  };
}
