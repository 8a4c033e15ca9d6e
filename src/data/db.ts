/**
 * SQLite Database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { getConfig } from '@/core/config';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

function resolveDbPath(path: string): string {
  if (path === IN_MEMORY) return path;
  const absolute = isAbsolute(path) ? path : join(process.cwd(), path);
  const dir = dirname(absolute);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return absolute;
}

/** Opens a database at `path` (or `:memory:`) with migrations applied. */
export function openDatabase(path: string): Database.Database {
  const dbPath = resolveDbPath(path);
  const isNew = dbPath === IN_MEMORY || !existsSync(dbPath);

  logger.info({ dbPath, isNew }, 'Opening database');

  const database = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    database.pragma('journal_mode = WAL');
  }
  runMigrations(database);
  return database;
}

function runMigrations(database: Database.Database): void {
  const migrationsDir = join(process.cwd(), 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, 'Migrations directory not found');
    return;
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    database.exec(readFileSync(join(migrationsDir, file), 'utf-8'));
  }
}

export const MARKET_TABLES = ['instruments', 'price_bars', 'consensus_signals'] as const;

export type MarketTable = (typeof MARKET_TABLES)[number];

/** Row count of every market table. */
export function tableCounts(database: Database.Database): Record<MarketTable, number> {
  const count = (table: MarketTable): number => {
    const row: unknown = database.prepare(`SELECT COUNT(*) AS n FROM ${table}`).get();
    return typeof row === 'object' && row !== null && 'n' in row && typeof row.n === 'number' ? row.n : 0;
  };
  return {
    instruments: count('instruments'),
    price_bars: count('price_bars'),
    consensus_signals: count('consensus_signals'),
  };
}

export function getDatabase(): Database.Database {
  if (!db) {
    db = openDatabase(getConfig().backtest.databasePath);
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
