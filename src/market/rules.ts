/**
 * Market rule tables
 * One validator, parameterized by the rule set of the market being simulated.
 */

import type { Board, Instrument } from '@/types/market';

export interface PriceBandRatios {
  main: number;
  scienceInnovation: number;
  growthEnterprise: number;
  specialTreatment: number;
}

export interface MarketRuleSet {
  name: string;
  /** Buys must be a whole multiple of this many shares. */
  lotSize: number;
  /** Calendar days a lot must age before it can be sold (1 = T+1). */
  settlementDays: number;
  /** Minimum price increment expressed as decimal places. */
  priceDecimals: number;
  bandRatios: PriceBandRatios;
}

export const A_SHARE_RULES: MarketRuleSet = {
  name: 'a-share',
  lotSize: 100,
  settlementDays: 1,
  priceDecimals: 2,
  bandRatios: {
    main: 0.1,
    scienceInnovation: 0.2,
    growthEnterprise: 0.2,
    specialTreatment: 0.05,
  },
};

const BOARD_RATIO_KEY: Record<Exclude<Board, 'main'>, keyof PriceBandRatios> = {
  'science-innovation': 'scienceInnovation',
  'growth-enterprise': 'growthEnterprise',
};

/**
 * Band ratio by precedence: board-specific band, then special treatment, then main.
 */
export function selectBandRatio(
  rules: MarketRuleSet,
  classification: Pick<Instrument, 'board' | 'specialTreatment'>
): number {
  if (classification.board !== 'main') {
    return rules.bandRatios[BOARD_RATIO_KEY[classification.board]];
  }
  if (classification.specialTreatment) {
    return rules.bandRatios.specialTreatment;
  }
  return rules.bandRatios.main;
}
