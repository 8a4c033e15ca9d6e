/**
 * Market Data Import
 * Loads instruments.json, price_bars.json and signals.json from a directory
 * into the market database. Existing (symbol, date) rows are left untouched.
 *
 * Usage: npx tsx scripts/import_market_data.ts <dir>
 */

import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { closeDatabase, getDatabase } from '../src/data/db';
import { saveInstruments, type InstrumentSnapshot } from '../src/data/repositories/instrument_repo';
import { savePriceBars } from '../src/data/repositories/price_bar_repo';
import { saveSignals } from '../src/data/repositories/signal_repo';
import { getConfig } from '../src/core/config';
import type { ConsensusSignal } from '../src/types/consensus';
import type { PriceBar } from '../src/types/market';
import { createChildLogger } from '../src/utils/logger';

dotenv.config();

const logger = createChildLogger('import_market_data');

function readArray<T>(path: string): T[] {
  if (!existsSync(path)) {
    logger.warn({ path }, 'File not found, skipping');
    return [];
  }
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`${path} must contain a JSON array`);
  }
  // Records are schema-validated by the repositories before insert.
  return parsed;
}

function main(): void {
  const dir = process.argv[2];
  if (!dir) {
    console.error('Usage: npx tsx scripts/import_market_data.ts <dir>');
    process.exit(2);
  }
  const source = resolve(process.cwd(), dir);
  const db = getDatabase();
  const decimals = getConfig().marketRules.priceDecimals;

  const instruments = saveInstruments(readArray<InstrumentSnapshot>(join(source, 'instruments.json')), db);
  const bars = savePriceBars(readArray<PriceBar>(join(source, 'price_bars.json')), decimals, db);
  const signals = saveSignals(readArray<ConsensusSignal>(join(source, 'signals.json')), db);

  logger.info({ source, instruments, bars, signals }, 'Import complete');
  closeDatabase();
}

try {
  main();
} catch (err) {
  console.error('Import failed:', err);
  closeDatabase();
  process.exit(1);
}
