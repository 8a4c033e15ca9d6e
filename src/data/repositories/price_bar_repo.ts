/**
 * Price-bar repository
 * Append-only: a stored (symbol, date) row is never rewritten.
 */

import type Database from 'better-sqlite3';
import { getDatabase } from '../db';
import { RecordValidationError } from '@/core/errors';
import { normalizeBar } from '@/market/price_limits';
import type { DayStatus, PriceBar } from '@/types/market';
import { validatePriceBar } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('price_bar_repo');

interface PriceBarRow {
  symbol: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  amount: number;
  prevClose: number;
  status: DayStatus;
  suspensionReason: string | null;
}

const SELECT_COLUMNS = `
  symbol, date, open, high, low, close, volume, amount,
  prev_close as prevClose, status, suspension_reason as suspensionReason
`;

/**
 * Validates and inserts bars. Returns the number of new rows; bars whose key
 * already exists are skipped.
 */
export function savePriceBars(
  bars: PriceBar[],
  decimals: number = 2,
  db: Database.Database = getDatabase()
): number {
  if (bars.length === 0) return 0;

  const stmt = db.prepare(`
    INSERT INTO price_bars (symbol, date, open, high, low, close, volume, amount, prev_close, status, suspension_reason)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(symbol, date) DO NOTHING
  `);

  const validated = bars.map((bar) => {
    const result = validatePriceBar(normalizeBar(bar, decimals));
    if (!result.valid) {
      throw new RecordValidationError('price_bar', result.errors);
    }
    return result.data;
  });

  const insertMany = db.transaction((records: PriceBar[]) => {
    let inserted = 0;
    for (const b of records) {
      const info = stmt.run(
        b.symbol,
        b.date,
        b.open,
        b.high,
        b.low,
        b.close,
        b.volume,
        b.amount,
        b.prevClose,
        b.status,
        b.suspensionReason
      );
      inserted += info.changes;
    }
    return inserted;
  });

  const inserted = insertMany(validated);
  if (inserted < validated.length) {
    logger.warn({ skipped: validated.length - inserted }, 'Existing price bars left unchanged');
  }
  logger.debug({ count: inserted }, 'Saved price bars');
  return inserted;
}

export function getPriceBar(
  symbol: string,
  date: string,
  db: Database.Database = getDatabase()
): PriceBar | null {
  const stmt = db.prepare<[string, string], PriceBarRow>(`
    SELECT ${SELECT_COLUMNS}
    FROM price_bars
    WHERE symbol = ? AND date = ?
  `);
  return stmt.get(symbol, date) ?? null;
}

export interface PriceBarQuery {
  symbols?: string[];
  startDate?: string | null;
  endDate?: string | null;
}

export function loadPriceBars(
  query: PriceBarQuery = {},
  db: Database.Database = getDatabase()
): PriceBar[] {
  const clauses: string[] = [];
  const params: string[] = [];
  if (query.symbols && query.symbols.length > 0) {
    clauses.push(`symbol IN (${query.symbols.map(() => '?').join(', ')})`);
    params.push(...query.symbols);
  }
  if (query.startDate) {
    clauses.push('date >= ?');
    params.push(query.startDate);
  }
  if (query.endDate) {
    clauses.push('date <= ?');
    params.push(query.endDate);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

  const stmt = db.prepare<string[], PriceBarRow>(`
    SELECT ${SELECT_COLUMNS}
    FROM price_bars
    ${where}
    ORDER BY symbol ASC, date ASC
  `);
  return stmt.all(...params);
}

export function countPriceBars(db: Database.Database = getDatabase()): number {
  const row = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM price_bars').get();
  return row?.count ?? 0;
}
