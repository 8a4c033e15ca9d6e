/**
 * Signal Store: consensus inputs per (symbol, date). A missing record reads
 * as a signal with every family absent.
 */

import { normalizeSymbol } from '@/core/symbol';
import { emptySignal, type ConsensusSignal, type SignalFeed } from '@/types/consensus';

export class SignalStore implements SignalFeed {
  private readonly records = new Map<string, ConsensusSignal>();

  add(signal: ConsensusSignal): boolean {
    const symbol = normalizeSymbol(signal.symbol);
    const key = `${symbol}|${signal.date}`;
    if (this.records.has(key)) return false;
    this.records.set(key, { ...signal, symbol });
    return true;
  }

  addMany(signals: Iterable<ConsensusSignal>): number {
    let added = 0;
    for (const signal of signals) {
      if (this.add(signal)) added++;
    }
    return added;
  }

  has(symbol: string, date: string): boolean {
    return this.records.has(`${normalizeSymbol(symbol)}|${date}`);
  }

  getSignals(symbol: string, date: string): ConsensusSignal {
    return this.records.get(`${normalizeSymbol(symbol)}|${date}`) ?? emptySignal(normalizeSymbol(symbol), date);
  }
}
