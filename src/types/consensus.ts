/**
 * Consensus signal families. Every input is a tagged variant so that an
 * absent value can never be mistaken for a raw zero.
 */

export type Presence<T> = { status: 'present'; value: T } | { status: 'absent' };

export type ConsensusFamily = 'technical' | 'capitalFlow' | 'logic' | 'sentiment';

export const CONSENSUS_FAMILIES: readonly ConsensusFamily[] = [
  'technical',
  'capitalFlow',
  'logic',
  'sentiment',
];

export interface TechnicalInputs {
  close: number;
  high52Week: number;
  maShort: number;
  maLong: number;
}

export interface CapitalFlowInputs {
  /** Net northbound (Stock Connect) buying, in CNY. */
  northboundNetInflow: Presence<number>;
  /** Margin financing bought minus repaid, in CNY. */
  marginNetBuy: Presence<number>;
}

export interface LogicInputs {
  analystBuyCount: Presence<number>;
  /** 1 = hottest sector of the day. */
  sectorHeatRank: Presence<number>;
}

export interface SentimentInputs {
  discussionVolume: number;
}

export interface ConsensusSignal {
  symbol: string;
  date: string;
  technical: Presence<TechnicalInputs>;
  capitalFlow: CapitalFlowInputs;
  logic: LogicInputs;
  sentiment: Presence<SentimentInputs>;
}

export interface ConsensusSubScores {
  technical: number;
  capitalFlow: number;
  logic: number;
  sentiment: number;
}

export interface ConsensusScore {
  symbol: string;
  date: string;
  subScores: ConsensusSubScores;
  total: number;
  missingFamilies: ConsensusFamily[];
  completeness: number;
}

/** Signal Feed: never throws on missing data. */
export interface SignalFeed {
  getSignals(symbol: string, date: string): ConsensusSignal;
}

export function present<T>(value: T): Presence<T> {
  return { status: 'present', value };
}

export function absent<T>(): Presence<T> {
  return { status: 'absent' };
}

export function emptySignal(symbol: string, date: string): ConsensusSignal {
  return {
    symbol,
    date,
    technical: absent(),
    capitalFlow: { northboundNetInflow: absent(), marginNetBuy: absent() },
    logic: { analystBuyCount: absent(), sectorHeatRank: absent() },
    sentiment: absent(),
  };
}
