/**
 * SQLite connection manager for agentdock.
 *
 * Manages one SQLite database per feature at `data/{feature}.sqlite`
 * (today only `agents`). Supports ordered migrations tracked via
 * `PRAGMA user_version`. Connection handles are reused and all closed on
 * shutdown.
 */

import Database from 'better-sqlite3';
import { join } from 'node:path';
import { mkdirSync } from 'node:fs';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Migration {
  version: number;
  up(db: Database.Database): void;
}

export interface SqliteManagerOptions {
  /** Directory for database files (e.g. `$AGENTDOCK_HOME/data`). */
  baseDir: string;
  /** Use in-memory databases for testing. */
  useMemory?: boolean;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Feature names become file names: alphanumeric, hyphens, underscores. */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/;

function validateFeature(value: string): void {
  if (!VALID_NAME_PATTERN.test(value)) {
    throw new Error(`Invalid feature name: "${value}". Only [a-zA-Z0-9_-] allowed.`);
  }
}

// ---------------------------------------------------------------------------
// SqliteManager
// ---------------------------------------------------------------------------

export class SqliteManager {
  private readonly baseDir: string;
  private readonly useMemory: boolean;
  private readonly connections: Map<string, Database.Database> = new Map();
  private readonly migrations: Map<string, Migration[]> = new Map();

  constructor(opts: SqliteManagerOptions) {
    this.baseDir = opts.baseDir;
    this.useMemory = opts.useMemory ?? false;
  }

  /** Filesystem path for a feature database. Does NOT validate the name. */
  resolvePath(feature: string): string {
    return join(this.baseDir, `${feature}.sqlite`);
  }

  /**
   * Register migrations for a feature. Migrations are sorted by version
   * and applied in order when the database is first opened.
   */
  registerMigrations(feature: string, migrations: Migration[]): void {
    const sorted = [...migrations].sort((a, b) => a.version - b.version);
    this.migrations.set(feature, sorted);
  }

  /**
   * Get (or open) the database for a feature. Returns the same handle on
   * every call until {@link shutdown}.
   */
  getDatabase(feature: string): Database.Database {
    validateFeature(feature);

    const existing = this.connections.get(feature);
    if (existing) {
      return existing;
    }

    const db = this.openDatabase(feature);
    this.connections.set(feature, db);
    this.applyMigrations(db, feature);

    return db;
  }

  /** Close all open connections. Safe to call multiple times. */
  shutdown(): void {
    for (const [key, db] of this.connections) {
      if (db.open) {
        db.close();
      }
      this.connections.delete(key);
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private openDatabase(feature: string): Database.Database {
    if (this.useMemory) {
      return new Database(':memory:');
    }

    mkdirSync(this.baseDir, { recursive: true });
    const db = new Database(this.resolvePath(feature));
    db.pragma('journal_mode = WAL');
    return db;
  }

  private applyMigrations(db: Database.Database, feature: string): void {
    const featureMigrations = this.migrations.get(feature);
    if (!featureMigrations || featureMigrations.length === 0) {
      return;
    }

    const raw: unknown = db.pragma('user_version', { simple: true });
    const currentVersion = typeof raw === 'number' ? raw : 0;

    for (const migration of featureMigrations) {
      if (migration.version <= currentVersion) {
        continue;
      }

      db.transaction(() => {
        migration.up(db);
        db.pragma(`user_version = ${migration.version}`);
      })();
    }
  }
}
