/**
 * Database - SQLite database initialization and schema management
 *
 * Provides a wrapper around better-sqlite3 with:
 * - Automatic schema creation
 * - Version-tracked migrations
 * - Cross-platform data directory resolution
 *
 * Storage location (in order of precedence):
 * 1. Provided directory parameter
 * 2. DISCHARGE_DATA_DIR environment variable
 * 3. XDG_DATA_HOME/hv-discharge (Linux/Pi)
 * 4. APPDATA/hv-discharge (Windows)
 * 5. ~/Library/Application Support/hv-discharge (macOS)
 */

import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import os from 'os';

const CURRENT_SCHEMA_VERSION = 1;
const DATABASE_FILENAME = 'discharges.db';
const APP_DIRECTORY = 'hv-discharge';

export interface Database {
  /** Get the underlying better-sqlite3 instance (for advanced operations) */
  readonly sqlite: BetterSqlite3.Database;

  /** Get the current schema version */
  getSchemaVersion(): number;

  /** Close the database connection */
  close(): void;
}

/**
 * Determine the default data directory based on platform and environment
 */
function getDefaultDataDirectory(): string {
  // 1. Environment variable override
  if (process.env.DISCHARGE_DATA_DIR) {
    return process.env.DISCHARGE_DATA_DIR;
  }

  // 2. XDG_DATA_HOME (Linux/Pi)
  if (process.env.XDG_DATA_HOME) {
    return path.join(process.env.XDG_DATA_HOME, APP_DIRECTORY);
  }

  // 3. Platform-specific defaults
  const homedir = os.homedir();

  switch (os.platform()) {
    case 'win32':
      return path.join(process.env.APPDATA || path.join(homedir, 'AppData', 'Roaming'), APP_DIRECTORY);

    case 'darwin':
      return path.join(homedir, 'Library', 'Application Support', APP_DIRECTORY);

    case 'linux':
    default:
      // XDG default
      return path.join(homedir, '.local', 'share', APP_DIRECTORY);
  }
}

/**
 * Create the database schema (version 1)
 */
function createSchemaV1(db: BetterSqlite3.Database): void {
  // Meta table for storing key-value pairs (including schema version)
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `);

  // One row per discharge session
  db.exec(`
    CREATE TABLE IF NOT EXISTS discharges (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL UNIQUE,
      registration_number TEXT NOT NULL,
      operator TEXT NOT NULL,
      location TEXT NOT NULL,
      profile_name TEXT NOT NULL,
      profile TEXT NOT NULL,
      mode TEXT NOT NULL,
      start_time INTEGER NOT NULL,
      end_time INTEGER,
      total_energy_wh REAL,
      discharge_comment TEXT,
      outcome TEXT,
      timeline TEXT
    )
  `);

  // Sampled measurements, append-only
  db.exec(`
    CREATE TABLE IF NOT EXISTS data_points (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      discharge_id INTEGER NOT NULL REFERENCES discharges(id) ON DELETE CASCADE,
      timestamp INTEGER NOT NULL,
      elapsed_ms INTEGER NOT NULL,
      voltage REAL NOT NULL,
      current REAL NOT NULL,
      power REAL NOT NULL,
      cumulative_energy REAL NOT NULL,
      step_index INTEGER NOT NULL
    )
  `);

  // Create indexes for common queries
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_discharges_registration ON discharges(registration_number);
    CREATE INDEX IF NOT EXISTS idx_data_points_discharge ON data_points(discharge_id, elapsed_ms);
  `);
}

/**
 * Run migrations to bring database to current schema version
 */
function runMigrations(db: BetterSqlite3.Database, currentVersion: number): void {
  if (currentVersion < 1) {
    createSchemaV1(db);
  }
}

function readSchemaVersion(sqlite: BetterSqlite3.Database): number {
  const tableCheck = sqlite
    .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type='table' AND name='meta'`)
    .get();
  if (!tableCheck) return 0;

  const row = sqlite
    .prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?')
    .get('schema_version');
  return row ? parseInt(row.value, 10) : 0;
}

/**
 * Create a database connection and ensure schema is up to date
 *
 * @param dataDir - Directory for the database file; defaults to the platform location
 */
export function createDatabase(dataDir?: string): Database {
  const directory = dataDir || getDefaultDataDirectory();
  const dbPath = path.join(directory, DATABASE_FILENAME);

  // Ensure directory exists
  mkdirSync(directory, { recursive: true });

  // Open database with WAL mode for better concurrent access
  const sqlite = new BetterSqlite3(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  const currentVersion = readSchemaVersion(sqlite);

  // Run migrations if needed
  if (currentVersion < CURRENT_SCHEMA_VERSION) {
    sqlite.transaction(() => {
      runMigrations(sqlite, currentVersion);
      sqlite
        .prepare(`INSERT OR REPLACE INTO meta (key, value) VALUES ('schema_version', ?)`)
        .run(String(CURRENT_SCHEMA_VERSION));
    })();

    console.log(`[Database] Migrated from version ${currentVersion} to ${CURRENT_SCHEMA_VERSION}`);
  }

  return {
    sqlite,

    getSchemaVersion(): number {
      return readSchemaVersion(sqlite);
    },

    close(): void {
      sqlite.close();
    },
  };
}
