/**
 * TOML-based configuration loader for agentdock.
 *
 * Reads `config.toml` from `$AGENTDOCK_HOME`, parses it with smol-toml,
 * layers the deployment environment variables on top, validates the result
 * with `parseConfig`, and returns a fully typed `AgentDockConfig`.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseConfig, ensureDirectoryStructure } from '../types/config.js';
import type { AgentDockConfig, DirectoryStructure } from '../types/config.js';

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

type Table = Record<string, unknown>;

/** `ENV_VAR → [section, key, kind]`. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, string, string, 'string' | 'port']> = [
  ['AGENT_IMAGE', 'containers', 'image', 'string'],
  ['AGENT_NETWORK', 'containers', 'network', 'string'],
  ['AGENT_PORT_RANGE_START', 'ports', 'start', 'port'],
  ['AGENT_PORT_RANGE_END', 'ports', 'end', 'port'],
  ['KNOWLEDGE_BASE_DIR', 'knowledge', 'root', 'string'],
  ['VECTOR_DB_URL', 'knowledge', 'vector_db_url', 'string'],
  ['AGENTDOCK_LOG_LEVEL', 'logging', 'level', 'string'],
];

function table(value: unknown): Table {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

/**
 * Copy of `raw` with non-empty environment overrides applied. Sections that
 * are not tables are left for `parseConfig` to reject.
 */
export function applyEnvOverrides(raw: Table, env: NodeJS.ProcessEnv): Table {
  const result: Table = { ...raw };

  for (const [name, sectionName, key, kind] of ENV_OVERRIDES) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    let parsed: string | number = value;
    if (kind === 'port') {
      if (!/^\d+$/.test(value.trim())) {
        throw new Error(`${name} must be an integer, got "${value}"`);
      }
      parsed = Number(value);
    }

    const current = result[sectionName];
    const isTable = typeof current === 'object' && current !== null && !Array.isArray(current);
    if (current !== undefined && !isTable) continue;
    result[sectionName] = { ...table(current), [key]: parsed };
  }

  return result;
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate `config.toml` from an agentdock home directory.
 *
 * A missing or empty file means defaults (plus environment overrides).
 * Throws on invalid TOML syntax or schema validation errors.
 */
export function loadConfig(home: string, env: NodeJS.ProcessEnv = process.env): AgentDockConfig {
  const configPath = join(home, 'config.toml');

  let raw: Table = {};
  if (existsSync(configPath)) {
    const content = readFileSync(configPath, 'utf-8');
    if (content.trim().length > 0) {
      raw = parseTOML(content);
    }
  }

  return parseConfig(applyEnvOverrides(raw, env));
}

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

/** Result of `initialize()`: everything needed at startup. */
export interface InitResult {
  config: AgentDockConfig;
  dirs: DirectoryStructure;
  /** Effective host directory for per-agent knowledge bases. */
  knowledgeRoot: string;
}

/**
 * Initialize an agentdock home directory.
 *
 * 1. Ensures the directory structure exists (idempotent).
 * 2. Loads `config.toml` (or applies defaults) plus environment overrides.
 * 3. Resolves the knowledge root (`knowledge.root`, else `data/knowledge`).
 */
export function initialize(home: string, env: NodeJS.ProcessEnv = process.env): InitResult {
  const dirs = ensureDirectoryStructure(home);
  const config = loadConfig(home, env);
  const knowledgeRoot = config.knowledge.root !== '' ? config.knowledge.root : dirs.knowledge;

  return { config, dirs, knowledgeRoot };
}
