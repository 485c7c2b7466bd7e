/**
 * Persistence for Agent records.
 *
 * The lifecycle core depends only on {@link AgentStore}; every call commits
 * immediately. {@link SqliteAgentStore} backs it with better-sqlite3, with
 * JSON columns for the free-form container and agent config.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './sqlite-manager.js';
import type { Agent, AgentType, ContainerConfig, ContainerStatus } from '../types/agent.js';
import { AGENT_TYPES, CONTAINER_STATUSES } from '../types/agent.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface AgentStore {
  get(id: string): Agent | null;
  /** Insert or replace the whole record. */
  save(agent: Agent): void;
  /** Returns false when no record was deleted. */
  delete(id: string): boolean;
  /** All agents, oldest first. */
  list(): Agent[];
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const AGENTS_FEATURE = 'agents';

export const AGENT_MIGRATIONS: Migration[] = [
  {
    version: 1,
    up(db) {
      db.exec(`
        CREATE TABLE agents (
          id               TEXT PRIMARY KEY,
          name             TEXT NOT NULL,
          description      TEXT,
          user_id          TEXT,
          type             TEXT NOT NULL,
          container_id     TEXT,
          container_name   TEXT,
          container_status TEXT NOT NULL DEFAULT 'none',
          container_config TEXT NOT NULL DEFAULT '{}',
          host_port        INTEGER,
          config           TEXT NOT NULL DEFAULT '{}',
          created_at       TEXT NOT NULL,
          updated_at       TEXT NOT NULL
        );
        CREATE INDEX idx_agents_user_id ON agents (user_id);
      `);
    },
  },
];

// ---------------------------------------------------------------------------
// Row decoding
// ---------------------------------------------------------------------------

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null;
}

function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`agents.${column} is not text`);
  }
  return value;
}

function nullableText(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

function parseJsonObject(raw: unknown): Record<string, unknown> {
  if (typeof raw !== 'string') return {};
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

function isAgentType(value: string): value is AgentType {
  return AGENT_TYPES.some((t) => t === value);
}

function isContainerStatus(value: string): value is ContainerStatus {
  return CONTAINER_STATUSES.some((s) => s === value);
}

function toContainerConfig(raw: Record<string, unknown>): ContainerConfig {
  const cc: ContainerConfig = {};
  if (typeof raw['image'] === 'string') cc.image = raw['image'];
  if (typeof raw['memoryLimit'] === 'string') cc.memoryLimit = raw['memoryLimit'];
  if (typeof raw['cpuLimit'] === 'number') cc.cpuLimit = raw['cpuLimit'];
  if (typeof raw['autoStart'] === 'boolean') cc.autoStart = raw['autoStart'];
  const envVars = raw['envVars'];
  if (typeof envVars === 'object' && envVars !== null && !Array.isArray(envVars)) {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(envVars)) {
      if (typeof value === 'string') env[key] = value;
    }
    cc.envVars = env;
  }
  return cc;
}

function rowToAgent(row: Row): Agent {
  const type = text(row, 'type');
  const status = text(row, 'container_status');
  if (!isAgentType(type)) throw new Error(`agents.type has unknown value "${type}"`);
  if (!isContainerStatus(status)) {
    throw new Error(`agents.container_status has unknown value "${status}"`);
  }
  const hostPort = row['host_port'];

  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    description: nullableText(row, 'description'),
    userId: nullableText(row, 'user_id'),
    type,
    containerId: nullableText(row, 'container_id'),
    containerName: nullableText(row, 'container_name'),
    containerStatus: status,
    containerConfig: toContainerConfig(parseJsonObject(row['container_config'])),
    hostPort: typeof hostPort === 'number' ? hostPort : null,
    config: parseJsonObject(row['config']),
    createdAt: text(row, 'created_at'),
    updatedAt: text(row, 'updated_at'),
  };
}

// ---------------------------------------------------------------------------
// SqliteAgentStore
// ---------------------------------------------------------------------------

export class SqliteAgentStore implements AgentStore {
  private readonly db: Database.Database;

  /** `db` must already have {@link AGENT_MIGRATIONS} applied. */
  constructor(db: Database.Database) {
    this.db = db;
  }

  get(id: string): Agent | null {
    const row: unknown = this.db.prepare('SELECT * FROM agents WHERE id = ?').get(id);
    return isRow(row) ? rowToAgent(row) : null;
  }

  save(agent: Agent): void {
    this.db
      .prepare(
        `INSERT INTO agents (
           id, name, description, user_id, type, container_id, container_name,
           container_status, container_config, host_port, config, created_at, updated_at
         ) VALUES (
           @id, @name, @description, @userId, @type, @containerId, @containerName,
           @containerStatus, @containerConfig, @hostPort, @config, @createdAt, @updatedAt
         )
         ON CONFLICT(id) DO UPDATE SET
           name = excluded.name,
           description = excluded.description,
           user_id = excluded.user_id,
           type = excluded.type,
           container_id = excluded.container_id,
           container_name = excluded.container_name,
           container_status = excluded.container_status,
           container_config = excluded.container_config,
           host_port = excluded.host_port,
           config = excluded.config,
           updated_at = excluded.updated_at`,
      )
      .run({
        id: agent.id,
        name: agent.name,
        description: agent.description,
        userId: agent.userId,
        type: agent.type,
        containerId: agent.containerId,
        containerName: agent.containerName,
        containerStatus: agent.containerStatus,
        containerConfig: JSON.stringify(agent.containerConfig),
        hostPort: agent.hostPort,
        config: JSON.stringify(agent.config),
        createdAt: agent.createdAt,
        updatedAt: agent.updatedAt,
      });
  }

  delete(id: string): boolean {
    return this.db.prepare('DELETE FROM agents WHERE id = ?').run(id).changes > 0;
  }

  list(): Agent[] {
    const rows: unknown[] = this.db.prepare('SELECT * FROM agents ORDER BY created_at, id').all();
    return rows.filter(isRow).map(rowToAgent);
  }
}
