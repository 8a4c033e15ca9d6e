/**
 * Consensus Scoring Engine
 *
 * Four independent families, each a step function of thresholded inputs:
 *   technical 0-20, capital flow 0-30, logic 0-30, sentiment 0-20.
 * An absent family scores exactly 0 and still counts in the denominator of
 * completeness; nothing is imputed from peers.
 */

import { createChildLogger } from '@/utils/logger';
import {
  CONSENSUS_FAMILIES,
  type CapitalFlowInputs,
  type ConsensusFamily,
  type ConsensusScore,
  type ConsensusSignal,
  type LogicInputs,
  type Presence,
  type SentimentInputs,
  type SignalFeed,
  type TechnicalInputs,
} from '@/types/consensus';
import { DEFAULT_CONSENSUS_THRESHOLDS, type ConsensusThresholds } from './consensus_config';
import { rankScores } from './filter';

const logger = createChildLogger('consensus');

const pointsIf = <T>(input: Presence<T>, points: number, test: (value: T) => boolean): number =>
  input.status === 'present' && test(input.value) ? points : 0;

export function scoreTechnical(input: Presence<TechnicalInputs>, t: ConsensusThresholds): number {
  const nearHigh = pointsIf(input, 10, (v) => v.close >= v.high52Week * (1 - t.nearHighPct));
  const goldenCross = pointsIf(input, 10, (v) => v.maShort > v.maLong);
  return nearHigh + goldenCross;
}

export function scoreCapitalFlow(input: CapitalFlowInputs, t: ConsensusThresholds): number {
  return (
    pointsIf(input.northboundNetInflow, 15, (v) => v > t.northboundNetInflowMin) +
    pointsIf(input.marginNetBuy, 15, (v) => v > t.marginNetBuyMin)
  );
}

export function scoreLogic(input: LogicInputs, t: ConsensusThresholds): number {
  return (
    pointsIf(input.analystBuyCount, 15, (v) => v >= t.analystBuyCountMin) +
    pointsIf(input.sectorHeatRank, 15, (v) => v >= 1 && v <= t.sectorHeatTopN)
  );
}

export function scoreSentiment(input: Presence<SentimentInputs>, t: ConsensusThresholds): number {
  if (input.status === 'absent') return 0;
  const volume = input.value.discussionVolume;
  if (volume > t.discussionVolumeHigh) return 20;
  if (volume > t.discussionVolumeLow) return 10;
  return 0;
}

/**
 * A family counts as present when at least one of its inputs is present.
 */
export function isFamilyPresent(signal: ConsensusSignal, family: ConsensusFamily): boolean {
  switch (family) {
    case 'technical':
      return signal.technical.status === 'present';
    case 'capitalFlow':
      return (
        signal.capitalFlow.northboundNetInflow.status === 'present' ||
        signal.capitalFlow.marginNetBuy.status === 'present'
      );
    case 'logic':
      return (
        signal.logic.analystBuyCount.status === 'present' ||
        signal.logic.sectorHeatRank.status === 'present'
      );
    case 'sentiment':
      return signal.sentiment.status === 'present';
  }
}

export function scoreSignal(
  signal: ConsensusSignal,
  thresholds: ConsensusThresholds = DEFAULT_CONSENSUS_THRESHOLDS
): ConsensusScore {
  const subScores = {
    technical: scoreTechnical(signal.technical, thresholds),
    capitalFlow: scoreCapitalFlow(signal.capitalFlow, thresholds),
    logic: scoreLogic(signal.logic, thresholds),
    sentiment: scoreSentiment(signal.sentiment, thresholds),
  };
  const missingFamilies = CONSENSUS_FAMILIES.filter((family) => !isFamilyPresent(signal, family));

  return {
    symbol: signal.symbol,
    date: signal.date,
    subScores,
    total: subScores.technical + subScores.capitalFlow + subScores.logic + subScores.sentiment,
    missingFamilies,
    completeness: 1 - missingFamilies.length / CONSENSUS_FAMILIES.length,
  };
}

export class ConsensusScorer {
  constructor(
    private readonly signals: SignalFeed,
    private readonly thresholds: ConsensusThresholds = DEFAULT_CONSENSUS_THRESHOLDS
  ) {}

  score(symbol: string, date: string): ConsensusScore {
    return scoreSignal(this.signals.getSignals(symbol, date), this.thresholds);
  }

  /**
   * Scores every symbol for `date`. Symbols are independent, so evaluation
   * order does not matter; the result is re-sorted deterministically.
   */
  scoreUniverse(universe: readonly string[], date: string): ConsensusScore[] {
    const scores = universe.map((symbol) => this.score(symbol, date));
    const incomplete = scores.filter((s) => s.completeness < 1).length;
    logger.debug({ date, symbols: scores.length, incomplete }, 'Scored universe');
    return rankScores(scores);
  }

  filter(
    universe: readonly string[],
    date: string,
    minScore: number,
    minCompleteness: number
  ): ConsensusScore[] {
    return this.scoreUniverse(universe, date).filter(
      (s) => s.total >= minScore && s.completeness >= minCompleteness
    );
  }
}
