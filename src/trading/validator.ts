/**
 * Trading-rule validator
 *
 * Checks run in a fixed order and stop at the first failure so that the
 * rejection reason for a given order is reproducible:
 *   1. suspension  2. price band  3. lot size  4. settlement
 * Cash sufficiency is not a rule; the engine checks it at execution time.
 */

import { calendarDaysBetween } from '@/core/time';
import { isHalted, resolveDayStatus } from '@/market/price_limits';
import { A_SHARE_RULES, type MarketRuleSet } from '@/market/rules';
import type { Instrument, PriceBar } from '@/types/market';
import type { Lot, Order, RejectionReason, ValidationResult } from '@/types/trading';

const ACCEPTED: ValidationResult = { accepted: true };

function reject(reason: RejectionReason, message: string): ValidationResult {
  return { accepted: false, reason, message };
}

export class TradingRuleValidator {
  constructor(readonly rules: MarketRuleSet = A_SHARE_RULES) {}

  validate(
    order: Order,
    instrument: Instrument,
    priceBar: PriceBar | null,
    holdingLots: readonly Lot[],
    currentDate: string
  ): ValidationResult {
    if (instrument.listingStatus !== 'active') {
      return reject('suspended', `${order.symbol} is ${instrument.listingStatus} on ${currentDate}`);
    }
    if (priceBar === null || isHalted(priceBar)) {
      const why = priceBar?.suspensionReason ? ` (${priceBar.suspensionReason})` : '';
      return reject('suspended', `${order.symbol} is not trading on ${currentDate}${why}`);
    }

    const bar = resolveDayStatus(priceBar, instrument, this.rules);
    if (order.side === 'buy' && bar.status === 'limit-up') {
      return reject('limit-band', `${order.symbol} is limit-up at ${bar.close}; buys are blocked`);
    }
    if (order.side === 'sell' && bar.status === 'limit-down') {
      return reject('limit-band', `${order.symbol} is limit-down at ${bar.close}; sells are blocked`);
    }

    if (!Number.isInteger(order.quantity) || order.quantity <= 0) {
      return reject('lot-size', `Quantity must be a positive whole number of shares, got ${order.quantity}`);
    }
    if (order.side === 'buy' && order.quantity % this.rules.lotSize !== 0) {
      return reject(
        'lot-size',
        `Buy quantity ${order.quantity} is not a multiple of ${this.rules.lotSize} shares`
      );
    }

    if (order.side === 'sell') {
      const sellable = this.sellableQuantity(order.symbol, holdingLots, currentDate);
      if (sellable < order.quantity) {
        return reject(
          'settlement',
          `Only ${sellable} shares of ${order.symbol} are settled on ${currentDate}; ${order.quantity} requested`
        );
      }
    }

    return ACCEPTED;
  }

  /**
   * Shares of `symbol` whose lots have aged at least `settlementDays`.
   */
  sellableQuantity(symbol: string, lots: readonly Lot[], currentDate: string): number {
    return lots
      .filter((lot) => lot.symbol === symbol && this.isSettled(lot, currentDate))
      .reduce((sum, lot) => sum + lot.quantity, 0);
  }

  isSettled(lot: Pick<Lot, 'acquisitionDate'>, currentDate: string): boolean {
    return calendarDaysBetween(lot.acquisitionDate, currentDate) >= this.rules.settlementDays;
  }
}
