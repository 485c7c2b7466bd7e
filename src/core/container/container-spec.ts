/**
 * Assembles the create options for one agent's container: name, env,
 * mounts, labels and resource limits.
 */

import path from 'node:path';
import type { Agent, KnowledgeBaseConfig } from '../../types/agent.js';
import type { ContainersConfig } from '../../types/config.js';
import type { CreateContainerOptions, VolumeMount } from './runtime.js';
import {
  CONTAINER_KNOWLEDGE_PATH,
  CONTAINER_NAME_PREFIX,
  LABEL_AGENT_ID,
  LABEL_AGENT_NAME,
  LABEL_MANAGED,
  LABEL_USER_ID,
} from './constants.js';

const SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const SUFFIX_LENGTH = 6;

const DEFAULT_CHUNK_SIZE = 1000;
const DEFAULT_CHUNK_OVERLAP = 200;

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

/** Lower-case, keep only `[a-z0-9_.-]`; empty becomes `agent`. */
export function sanitizeName(name: string): string {
  const cleaned = name.toLowerCase().replace(/[^a-z0-9_.-]/g, '');
  return cleaned === '' ? 'agent' : cleaned;
}

/** `agentdock-agent-<sanitized>-<6 random [a-z0-9]>`. */
export function generateContainerName(agentName: string, random: () => number = Math.random): string {
  let suffix = '';
  for (let i = 0; i < SUFFIX_LENGTH; i++) {
    const index = Math.min(Math.floor(random() * SUFFIX_ALPHABET.length), SUFFIX_ALPHABET.length - 1);
    suffix += SUFFIX_ALPHABET[index];
  }
  return `${CONTAINER_NAME_PREFIX}-${sanitizeName(agentName)}-${suffix}`;
}

/** Vector table for a RAG agent, derived from its id alone. */
export function vectorTableName(agentId: string): string {
  return `agent_${agentId.replace(/-/g, '_')}`;
}

/** Point a host-loopback URL at the container's view of the host. */
export function rewriteLoopback(url: string, hostAlias: string): string {
  return url.replace(/(\/\/(?:[^@/]*@)?)(localhost|127\.0\.0\.1)(?=[:/?#]|$)/, `$1${hostAlias}`);
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export interface KnowledgeSettings {
  /** Host directory holding one sub-directory per agent. */
  root: string;
  /** Vector database URL as seen from the host. */
  vectorDbUrl: string;
}

function knowledgeBaseConfig(agent: Agent): KnowledgeBaseConfig {
  const raw = agent.config['knowledge_base'];
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return {};
  const kb: KnowledgeBaseConfig = {};
  if ('recreate' in raw && typeof raw.recreate === 'boolean') kb.recreate = raw.recreate;
  if ('chunk_size' in raw && typeof raw.chunk_size === 'number') kb.chunk_size = raw.chunk_size;
  if ('chunk_overlap' in raw && typeof raw.chunk_overlap === 'number') {
    kb.chunk_overlap = raw.chunk_overlap;
  }
  return kb;
}

/** `llm_*` config keys as upper-cased env vars. Non-scalar values are skipped. */
function llmEnv(config: Record<string, unknown>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(config)) {
    if (!key.startsWith('llm_')) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      env[key.toUpperCase()] = String(value);
    }
  }
  return env;
}

/** Host directory mounted into a RAG agent's container. */
export function knowledgeDir(root: string, agentId: string): string {
  return path.join(root, agentId);
}

/**
 * Env in increasing precedence: user env vars, agent identity, RAG
 * settings, `LLM_*`.
 */
export function buildAgentEnv(
  agent: Agent,
  containerPort: number,
  knowledge: KnowledgeSettings,
  hostAlias: string,
): Record<string, string> {
  const env: Record<string, string> = { ...agent.containerConfig.envVars };

  env['AGENT_ID'] = agent.id;
  env['AGENT_NAME'] = agent.name;
  env['AGENT_TYPE'] = agent.type;
  env['PORT'] = String(containerPort);

  if (agent.type === 'rag') {
    const kb = knowledgeBaseConfig(agent);
    env['KNOWLEDGE_PATH'] = CONTAINER_KNOWLEDGE_PATH;
    env['VECTOR_DB_URL'] = rewriteLoopback(knowledge.vectorDbUrl, hostAlias);
    env['VECTOR_DB_TABLE'] = vectorTableName(agent.id);
    env['KB_RECREATE'] = kb.recreate === true ? 'true' : 'false';
    env['KB_CHUNK_SIZE'] = String(kb.chunk_size ?? DEFAULT_CHUNK_SIZE);
    env['KB_CHUNK_OVERLAP'] = String(kb.chunk_overlap ?? DEFAULT_CHUNK_OVERLAP);
  }

  return { ...env, ...llmEnv(agent.config) };
}

// ---------------------------------------------------------------------------
// Full spec
// ---------------------------------------------------------------------------

export interface ContainerSpecInput {
  agent: Agent;
  hostPort: number;
  hostAlias: string;
  defaults: ContainersConfig;
  knowledge: KnowledgeSettings;
  random?: () => number;
}

export function buildContainerSpec(input: ContainerSpecInput): CreateContainerOptions {
  const { agent, defaults, knowledge, hostAlias } = input;
  const cc = agent.containerConfig;

  const labels: Record<string, string> = {
    [LABEL_MANAGED]: 'true',
    [LABEL_AGENT_ID]: agent.id,
    [LABEL_AGENT_NAME]: agent.name,
  };
  if (agent.userId !== null) {
    labels[LABEL_USER_ID] = agent.userId;
  }

  const volumes: VolumeMount[] =
    agent.type === 'rag'
      ? [
          {
            source: knowledgeDir(knowledge.root, agent.id),
            target: CONTAINER_KNOWLEDGE_PATH,
            readonly: true,
          },
        ]
      : [];

  return {
    name: generateContainerName(agent.name, input.random),
    image: cc.image ?? defaults.image,
    env: buildAgentEnv(agent, defaults.container_port, knowledge, hostAlias),
    network: defaults.network,
    hostPort: input.hostPort,
    containerPort: defaults.container_port,
    memoryLimit: cc.memoryLimit ?? defaults.memory_limit,
    cpuLimit: cc.cpuLimit ?? defaults.cpu_limit,
    restartPolicy: defaults.restart_policy,
    volumes,
    labels,
  };
}
