/**
 * Transaction cost model
 * Every item is rounded to the price tick before aggregation so rounding
 * does not compound across trades.
 */

import { venueOf } from '@/core/symbol';
import { roundToTick } from '@/market/rounding';
import type { Venue } from '@/types/market';
import type { CostBreakdown, Order, OrderSide } from '@/types/trading';

export interface CostConfig {
  commissionRate: number;
  minCommission: number;
  /** Charged on sells only. */
  stampDutyRate: number;
  transferFeeRate: number;
  /** Venues that levy the transfer fee. */
  transferFeeVenues: Venue[];
  /** Applied against the trader on both sides. */
  slippageRate: number;
  priceDecimals: number;
}

export const DEFAULT_COST_CONFIG: CostConfig = {
  commissionRate: 0.0003,
  minCommission: 5,
  stampDutyRate: 0.0005,
  transferFeeRate: 0.00001,
  transferFeeVenues: ['SH'],
  slippageRate: 0.001,
  priceDecimals: 2,
};

export interface PricedOrder extends CostBreakdown {
  notional: number;
}

/**
 * Prices a fill. Slippage is its own cost item at `slippageRate` of notional;
 * the fill price stays the bar price, so commission, stamp duty and transfer
 * fee are charged on the unslipped notional.
 */
export class CostModel {
  constructor(private readonly config: CostConfig = DEFAULT_COST_CONFIG) {}

  priceOrder(order: Pick<Order, 'symbol' | 'side' | 'quantity'>, fillPrice: number): PricedOrder {
    const round = (value: number) => roundToTick(value, this.config.priceDecimals);
    const notional = round(order.quantity * fillPrice);

    const commission = round(Math.max(notional * this.config.commissionRate, this.config.minCommission));
    const stampDuty = order.side === 'sell' ? round(notional * this.config.stampDutyRate) : 0;
    const venue = venueOf(order.symbol);
    const transferFee =
      venue !== null && this.config.transferFeeVenues.includes(venue)
        ? round(notional * this.config.transferFeeRate)
        : 0;
    const slippage = round(notional * this.config.slippageRate);

    return {
      notional,
      commission,
      stampDuty,
      transferFee,
      slippage,
      totalCost: round(commission + stampDuty + transferFee + slippage),
    };
  }
}

/**
 * Cash effect of a fill: buys pay notional plus costs, sells receive notional less costs.
 */
export function netCashDelta(side: OrderSide, priced: PricedOrder): number {
  const delta =
    side === 'buy' ? -(priced.notional + priced.totalCost) : priced.notional - priced.totalCost;
  return roundToTick(delta, 2);
}

export function toCostBreakdown(priced: PricedOrder): CostBreakdown {
  return {
    commission: priced.commission,
    stampDuty: priced.stampDuty,
    transferFee: priced.transferFee,
    slippage: priced.slippage,
    totalCost: priced.totalCost,
  };
}
