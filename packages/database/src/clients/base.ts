/**
 * Base database client with connection management
 *
 * Relative database paths resolve against the repository's data/ directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import Database from 'better-sqlite3';

import { ConnectionError, DatabaseNotFoundError, QueryError } from '../errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Configuration for database client connections
 */
export interface DatabaseClientConfig {
  /** Path to the database file (relative to data directory or absolute) */
  dbPath: string;
  /** Whether to open in read-only mode (default: true) */
  readonly?: boolean;
  /** Timeout in milliseconds for database operations */
  timeoutMs?: number;
  /** Create the file (and its directory) when missing; requires readonly: false */
  create?: boolean;
}

/**
 * Base class for SQLite database clients
 */
export abstract class BaseDatabaseClient {
  protected db: Database.Database | null = null;
  protected readonly config: Required<DatabaseClientConfig>;

  constructor(config: DatabaseClientConfig) {
    this.config = {
      dbPath: config.dbPath,
      readonly: config.readonly ?? true,
      timeoutMs: config.timeoutMs ?? 5000,
      create: config.create ?? false,
    };
  }

  /**
   * Get the default data directory path
   */
  protected getDataDir(): string {
    // Navigate from packages/database/src/clients/ to data/
    return path.resolve(__dirname, '../../../../data');
  }

  /**
   * Resolve the full database path
   */
  protected getFullDbPath(): string {
    if (path.isAbsolute(this.config.dbPath)) {
      return this.config.dbPath;
    }
    return path.join(this.getDataDir(), this.config.dbPath);
  }

  /**
   * Ensure database connection is established (lazy initialization)
   */
  protected ensureConnected(): Database.Database {
    if (this.db) {
      return this.db;
    }

    const fullPath = this.getFullDbPath();

    const canCreate = this.config.create && !this.config.readonly;
    if (!fs.existsSync(fullPath)) {
      if (!canCreate) {
        throw new DatabaseNotFoundError(fullPath);
      }
      fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    }

    let db: Database.Database;
    try {
      db = new Database(fullPath, {
        readonly: this.config.readonly,
        timeout: this.config.timeoutMs,
      });

      if (!this.config.readonly) {
        db.pragma('journal_mode = WAL');
      }
    } catch (err) {
      throw new ConnectionError(fullPath, err instanceof Error ? err : undefined);
    }

    this.initialize(db);
    this.db = db;
    return db;
  }

  /**
   * Prepare a statement on the lazily opened connection
   * @throws QueryError if SQLite rejects the statement (e.g. a missing table)
   */
  protected prepare(sql: string): Database.Statement {
    const db = this.ensureConnected();
    try {
      return db.prepare(sql);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new QueryError(`${reason} (${this.getFullDbPath()})`, sql);
    }
  }

  /**
   * Hook for subclasses that own their schema; runs once per connection
   */
  protected initialize(_db: Database.Database): void {}

  /**
   * Close the database connection
   */
  public close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Get the configured database path
   */
  public get dbPath(): string {
    return this.config.dbPath;
  }

  /**
   * Check if the database is currently connected
   */
  public get isConnected(): boolean {
    return this.db !== null;
  }
}
