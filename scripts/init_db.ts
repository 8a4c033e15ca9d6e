/**
 * Database Initialization Script
 * Creates the market database at the configured path (MARKET_DB_PATH or
 * config/backtest.json), applies migrations and reports table sizes.
 *
 * Usage: npx tsx scripts/init_db.ts
 */

import dotenv from 'dotenv';
import { closeDatabase, getDatabase, tableCounts } from '../src/data/db';

dotenv.config();

try {
  const db = getDatabase();
  console.log(`Market database ready at ${db.name}`);
  for (const [table, rows] of Object.entries(tableCounts(db))) {
    console.log(`  ${table.padEnd(20)} ${rows} rows`);
  }
  closeDatabase();
} catch (error) {
  console.error('Database initialization failed:', error);
  process.exit(1);
}
