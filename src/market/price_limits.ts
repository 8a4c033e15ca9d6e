/**
 * Limit-up / limit-down derivation and day-status resolution
 */

import type { Instrument, PriceBar, PriceLimits } from '@/types/market';
import { A_SHARE_RULES, selectBandRatio, type MarketRuleSet } from './rules';
import { roundToTick } from './rounding';

export function computePriceLimits(
  prevClose: number,
  classification: Pick<Instrument, 'board' | 'specialTreatment'>,
  rules: MarketRuleSet = A_SHARE_RULES
): PriceLimits {
  const ratio = selectBandRatio(rules, classification);
  return {
    limitUp: roundToTick(prevClose * (1 + ratio), rules.priceDecimals),
    limitDown: roundToTick(prevClose * (1 - ratio), rules.priceDecimals),
    ratio,
  };
}

export function isHalted(bar: Pick<PriceBar, 'status'>): boolean {
  return bar.status === 'suspended' || bar.status === 'data-missing';
}

/**
 * Re-labels a 'normal' bar whose close touches a band edge. Touching counts:
 * close >= limitUp is limit-up, close <= limitDown is limit-down.
 * Statuses other than 'normal' are trusted as delivered.
 */
export function resolveDayStatus(
  bar: PriceBar,
  classification: Pick<Instrument, 'board' | 'specialTreatment'>,
  rules: MarketRuleSet = A_SHARE_RULES
): PriceBar {
  if (bar.status !== 'normal' || bar.prevClose <= 0) return bar;

  const limits = computePriceLimits(bar.prevClose, classification, rules);
  const close = roundToTick(bar.close, rules.priceDecimals);
  if (close >= limits.limitUp) return { ...bar, status: 'limit-up' };
  if (close <= limits.limitDown) return { ...bar, status: 'limit-down' };
  return bar;
}

/**
 * Enforces the halted-bar invariant: OHLC all equal the previous close and
 * nothing traded. Prices are rounded to the tick.
 */
export function normalizeBar(bar: PriceBar, decimals: number = A_SHARE_RULES.priceDecimals): PriceBar {
  const prevClose = roundToTick(bar.prevClose, decimals);
  if (isHalted(bar)) {
    return {
      ...bar,
      open: prevClose,
      high: prevClose,
      low: prevClose,
      close: prevClose,
      prevClose,
      volume: 0,
      amount: 0,
    };
  }
  return {
    ...bar,
    open: roundToTick(bar.open, decimals),
    high: roundToTick(bar.high, decimals),
    low: roundToTick(bar.low, decimals),
    close: roundToTick(bar.close, decimals),
    prevClose,
  };
}

/**
 * Synthesizes a data-missing bar for `date` from the last known bar.
 */
export function carryForwardBar(lastKnown: PriceBar, date: string): PriceBar {
  const price = lastKnown.close;
  return {
    symbol: lastKnown.symbol,
    date,
    open: price,
    high: price,
    low: price,
    close: price,
    volume: 0,
    amount: 0,
    prevClose: price,
    status: 'data-missing',
    suspensionReason: null,
  };
}
