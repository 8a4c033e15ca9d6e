/**
 * Consensus signal repository
 * Absent sub-signals are stored as NULL columns; the technical family is
 * present only when all four of its columns are.
 */

import type Database from 'better-sqlite3';
import { getDatabase } from '../db';
import { RecordValidationError } from '@/core/errors';
import {
  absent,
  present,
  type ConsensusSignal,
  type Presence,
  type TechnicalInputs,
} from '@/types/consensus';
import { validateConsensusSignal } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('signal_repo');

interface SignalRow {
  symbol: string;
  date: string;
  techClose: number | null;
  techHigh52w: number | null;
  techMaShort: number | null;
  techMaLong: number | null;
  northboundNetInflow: number | null;
  marginNetBuy: number | null;
  analystBuyCount: number | null;
  sectorHeatRank: number | null;
  discussionVolume: number | null;
}

function valueOrNull<T>(presence: Presence<T>): T | null {
  return presence.status === 'present' ? presence.value : null;
}

function fromNullable<T>(value: T | null): Presence<T> {
  return value === null ? absent() : present(value);
}

export function toSignalRow(signal: ConsensusSignal): SignalRow {
  const technical = valueOrNull(signal.technical);
  return {
    symbol: signal.symbol,
    date: signal.date,
    techClose: technical?.close ?? null,
    techHigh52w: technical?.high52Week ?? null,
    techMaShort: technical?.maShort ?? null,
    techMaLong: technical?.maLong ?? null,
    northboundNetInflow: valueOrNull(signal.capitalFlow.northboundNetInflow),
    marginNetBuy: valueOrNull(signal.capitalFlow.marginNetBuy),
    analystBuyCount: valueOrNull(signal.logic.analystBuyCount),
    sectorHeatRank: valueOrNull(signal.logic.sectorHeatRank),
    discussionVolume: valueOrNull(signal.sentiment)?.discussionVolume ?? null,
  };
}

export function fromSignalRow(row: SignalRow): ConsensusSignal {
  const { techClose, techHigh52w, techMaShort, techMaLong } = row;
  const technical: Presence<TechnicalInputs> =
    techClose !== null && techHigh52w !== null && techMaShort !== null && techMaLong !== null
      ? present({ close: techClose, high52Week: techHigh52w, maShort: techMaShort, maLong: techMaLong })
      : absent();

  return {
    symbol: row.symbol,
    date: row.date,
    technical,
    capitalFlow: {
      northboundNetInflow: fromNullable(row.northboundNetInflow),
      marginNetBuy: fromNullable(row.marginNetBuy),
    },
    logic: {
      analystBuyCount: fromNullable(row.analystBuyCount),
      sectorHeatRank: fromNullable(row.sectorHeatRank),
    },
    sentiment:
      row.discussionVolume === null ? absent() : present({ discussionVolume: row.discussionVolume }),
  };
}

export function saveSignals(signals: ConsensusSignal[], db: Database.Database = getDatabase()): number {
  if (signals.length === 0) return 0;

  for (const signal of signals) {
    const result = validateConsensusSignal(signal);
    if (!result.valid) {
      throw new RecordValidationError('consensus_signal', result.errors);
    }
  }

  const stmt = db.prepare(`
    INSERT INTO consensus_signals (
      symbol, date, tech_close, tech_high_52w, tech_ma_short, tech_ma_long,
      northbound_net_inflow, margin_net_buy, analyst_buy_count, sector_heat_rank, discussion_volume
    )
    VALUES (
      @symbol, @date, @techClose, @techHigh52w, @techMaShort, @techMaLong,
      @northboundNetInflow, @marginNetBuy, @analystBuyCount, @sectorHeatRank, @discussionVolume
    )
    ON CONFLICT(symbol, date) DO NOTHING
  `);

  const insertMany = db.transaction((records: ConsensusSignal[]) => {
    let inserted = 0;
    for (const signal of records) {
      inserted += stmt.run(toSignalRow(signal)).changes;
    }
    return inserted;
  });

  const inserted = insertMany(signals);
  logger.debug({ count: inserted }, 'Saved consensus signals');
  return inserted;
}

export function loadSignals(
  startDate: string | null = null,
  endDate: string | null = null,
  db: Database.Database = getDatabase()
): ConsensusSignal[] {
  const rows = db
    .prepare<[string | null, string | null, string | null, string | null], SignalRow>(`
      SELECT symbol, date,
             tech_close as techClose, tech_high_52w as techHigh52w,
             tech_ma_short as techMaShort, tech_ma_long as techMaLong,
             northbound_net_inflow as northboundNetInflow, margin_net_buy as marginNetBuy,
             analyst_buy_count as analystBuyCount, sector_heat_rank as sectorHeatRank,
             discussion_volume as discussionVolume
      FROM consensus_signals
      WHERE (? IS NULL OR date >= ?) AND (? IS NULL OR date <= ?)
      ORDER BY symbol ASC, date ASC
    `)
    .all(startDate, startDate, endDate, endDate);

  return rows.map(fromSignalRow);
}
