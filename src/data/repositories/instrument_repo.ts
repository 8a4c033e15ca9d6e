/**
 * Instrument repository: classification snapshots by effective date
 */

import type Database from 'better-sqlite3';
import { getDatabase } from '../db';
import { RecordValidationError } from '@/core/errors';
import type { Board, Instrument, ListingStatus } from '@/types/market';
import { validateInstrument } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('instrument_repo');

export interface InstrumentSnapshot {
  effectiveDate: string;
  instrument: Instrument;
}

interface InstrumentRow {
  symbol: string;
  effectiveDate: string;
  name: string;
  board: Board;
  specialTreatment: number;
  listingStatus: ListingStatus;
}

export function saveInstruments(
  snapshots: InstrumentSnapshot[],
  db: Database.Database = getDatabase()
): number {
  if (snapshots.length === 0) return 0;

  const stmt = db.prepare(`
    INSERT INTO instruments (symbol, effective_date, name, board, special_treatment, listing_status)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(symbol, effective_date) DO NOTHING
  `);

  for (const snapshot of snapshots) {
    const result = validateInstrument(snapshot.instrument);
    if (!result.valid) {
      throw new RecordValidationError('instrument', result.errors);
    }
  }

  const insertMany = db.transaction((records: InstrumentSnapshot[]) => {
    let inserted = 0;
    for (const { effectiveDate, instrument: i } of records) {
      inserted += stmt.run(
        i.symbol,
        effectiveDate,
        i.name,
        i.board,
        i.specialTreatment ? 1 : 0,
        i.listingStatus
      ).changes;
    }
    return inserted;
  });

  const inserted = insertMany(snapshots);
  logger.debug({ count: inserted }, 'Saved instruments');
  return inserted;
}

export function loadInstruments(db: Database.Database = getDatabase()): InstrumentSnapshot[] {
  const rows = db
    .prepare<[], InstrumentRow>(`
      SELECT symbol, effective_date as effectiveDate, name, board,
             special_treatment as specialTreatment, listing_status as listingStatus
      FROM instruments
      ORDER BY symbol ASC, effective_date ASC
    `)
    .all();

  return rows.map((row) => ({
    effectiveDate: row.effectiveDate,
    instrument: {
      symbol: row.symbol,
      name: row.name,
      board: row.board,
      specialTreatment: row.specialTreatment === 1,
      listingStatus: row.listingStatus,
    },
  }));
}
