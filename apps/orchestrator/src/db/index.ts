import Database from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config.js';
import { dbLogger } from '../lib/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

let db: Database.Database | null = null;

const BUSY_RETRY_MAX_ATTEMPTS = 5;
const BUSY_RETRY_BASE_DELAY_MS = 50;
const BUSY_TIMEOUT_MS = 5000;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDb() first.');
  }
  return db;
}

/**
 * Create tables and run migrations on an open database.
 * Safe to call repeatedly; also used by tests on in-memory databases.
 */
export function applySchema(database: Database.Database): void {
  const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
  database.exec(schema);
  runMigrations(database);
}

export function initDb(path: string = config.database.path): Database.Database {
  if (path !== ':memory:') {
    const dbDir = dirname(path);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  db = new Database(path);

  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  db.pragma('journal_mode = WAL');

  applySchema(db);

  dbLogger.info({ path }, 'Database initialized');
  return db;
}

/**
 * Each migration is idempotent and checks whether it still needs to run.
 */
function runMigrations(database: Database.Database): void {
  // Migration 1: deployment type column; rows created before it have NULL and read as software
  const deploymentColumns = database.prepare('PRAGMA table_info(deployments)').all() as { name: string }[];
  const hasType = deploymentColumns.some(col => col.name === 'type');
  if (!hasType) {
    database.exec('ALTER TABLE deployments ADD COLUMN type TEXT');
    dbLogger.info('Migration: Added type column to deployments table');
  }
  const hasConfiguration = deploymentColumns.some(col => col.name === 'configuration');
  if (!hasConfiguration) {
    database.exec('ALTER TABLE deployments ADD COLUMN configuration BLOB');
    dbLogger.info('Migration: Added configuration column to deployments table');
  }
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Run a function within a database transaction; rolled back if it throws.
 */
export function runInTransaction<T>(fn: () => T, database: Database.Database = getDb()): T {
  return database.transaction(fn)();
}

function isBusyError(error: unknown): boolean {
  if (error instanceof Error) {
    return error.message.includes('SQLITE_BUSY') || error.message.includes('database is locked');
  }
  return false;
}

/**
 * Run a database operation, retrying SQLITE_BUSY with exponential backoff.
 */
export async function withBusyRetry<T>(
  fn: () => T | Promise<T>,
  maxAttempts: number = BUSY_RETRY_MAX_ATTEMPTS
): Promise<T> {
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (isBusyError(error) && attempt < maxAttempts) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const delay = BUSY_RETRY_BASE_DELAY_MS * Math.pow(2, attempt - 1) + Math.random() * 50;
        dbLogger.warn({ attempt, maxAttempts, delay }, 'Database busy, retrying');
        await new Promise(resolve => setTimeout(resolve, delay));
      } else {
        throw error;
      }
    }
  }

  throw lastError || new Error('Database operation failed after retries');
}
