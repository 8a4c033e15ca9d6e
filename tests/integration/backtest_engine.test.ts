import { describe, expect, it } from 'vitest';
import { BacktestEngine } from '@/backtest/engine';
import { BacktestAbortedError } from '@/backtest/errors';
import type { DecisionPolicy } from '@/backtest/types';
import { CausalityViolationError } from '@/core/errors';
import { present } from '@/types/consensus';
import type { Order } from '@/types/trading';
import { buildMarket, makeBar } from '../helpers/market';
import { ScriptedPolicy } from '../helpers/policies';

const D1 = '2024-01-02';
const D2 = '2024-01-03';
const D3 = '2024-01-04';

describe('BacktestEngine', () => {
  describe('T+1 round trip', () => {
    const market = () =>
      buildMarket(
        [{ symbol: '600000.SH' }],
        [makeBar('600000.SH', D1, 100, 101), makeBar('600000.SH', D2, 101, 105)]
      );

    it('settles cash exactly and blocks the same-day sell', async () => {
      const engine = new BacktestEngine(market(), {
        startDate: D1,
        endDate: D2,
        universe: ['600000.SH'],
        initialCapital: 1_000_000,
      });
      const policy = new ScriptedPolicy({
        [D1]: [
          { symbol: '600000.SH', side: 'buy', quantity: 100 },
          { symbol: '600000.SH', side: 'sell', quantity: 100 },
        ],
        [D2]: [{ symbol: '600000.SH', side: 'sell', quantity: 100 }],
      });

      const result = await engine.run(policy);

      expect(result.valid).toBe(true);
      expect(result.outcomes.map((o) => o.status)).toEqual(['filled', 'rejected', 'filled']);
      expect(result.outcomes[1]).toMatchObject({ status: 'rejected', reason: 'settlement' });

      const [buy, sell] = result.trades;
      expect(buy).toMatchObject({
        side: 'buy',
        fillPrice: 101,
        notional: 10100,
        costs: { commission: 5, stampDuty: 0, transferFee: 0.1, slippage: 10.1, totalCost: 15.2 },
        netCashDelta: -10115.2,
        realizedPnl: null,
      });
      expect(sell).toMatchObject({
        side: 'sell',
        fillPrice: 105,
        notional: 10500,
        costs: { commission: 5, stampDuty: 5.25, transferFee: 0.11, slippage: 10.5, totalCost: 20.86 },
        netCashDelta: 10479.14,
        realizedPnl: 363.94,
      });

      expect(result.equity).toHaveLength(2);
      expect(result.equity[0]).toMatchObject({
        date: D1,
        cash: 989884.8,
        positionsValue: 10100,
        totalValue: 999984.8,
      });
      expect(result.equity[1]).toMatchObject({
        date: D2,
        cash: 1000363.94,
        positionsValue: 0,
        totalValue: 1000363.94,
      });
      expect(result.metrics.winRate).toBe(1);
      expect(result.metrics.realizedPnl).toBe(363.94);
      expect(result.summary.rejections).toEqual({ settlement: 1 });
      expect(result.summary.costs.total).toBe(36.06);
    });

    it('fails a repeat sell once earlier orders in the batch used the settled shares', async () => {
      const engine = new BacktestEngine(market(), {
        startDate: D1,
        endDate: D2,
        universe: ['600000.SH'],
      });
      const result = await engine.run(
        new ScriptedPolicy({
          [D1]: [{ symbol: '600000.SH', side: 'buy', quantity: 100 }],
          [D2]: [
            { symbol: '600000.SH', side: 'sell', quantity: 100 },
            { symbol: '600000.SH', side: 'sell', quantity: 100 },
          ],
        })
      );

      expect(result.outcomes.map((o) => (o.status === 'filled' ? 'filled' : `${o.status}/${o.reason}`))).toEqual([
        'filled',
        'filled',
        'failed/insufficient-lots',
      ]);
      expect(result.summary.failures).toEqual({ 'insufficient-lots': 1 });
      expect(result.summary.rejections).toEqual({});
      expect(result.equity[1].cash).toBe(1000363.94);
    });

    it('still rejects a sell of shares bought earlier the same day', async () => {
      const engine = new BacktestEngine(market(), {
        startDate: D1,
        endDate: D2,
        universe: ['600000.SH'],
      });
      const result = await engine.run(
        new ScriptedPolicy({
          [D1]: [{ symbol: '600000.SH', side: 'buy', quantity: 100 }],
          [D2]: [
            { symbol: '600000.SH', side: 'buy', quantity: 100 },
            { symbol: '600000.SH', side: 'sell', quantity: 200 },
          ],
        })
      );

      expect(result.outcomes[2]).toMatchObject({ status: 'rejected', reason: 'settlement' });
    });

    it('fills at the open when configured', async () => {
      const engine = new BacktestEngine(market(), {
        startDate: D1,
        endDate: D1,
        universe: ['600000.SH'],
        fillPriceField: 'open',
      });
      const result = await engine.run(
        new ScriptedPolicy({ [D1]: [{ symbol: '600000.SH', side: 'buy', quantity: 100 }] })
      );
      expect(result.trades[0].fillPrice).toBe(100);
    });
  });

  it('rejects a buy on a science-innovation stock at its +20% limit', async () => {
    const market = buildMarket(
      [{ symbol: '688001.SH', board: 'science-innovation' }],
      [makeBar('688001.SH', D1, 50, 60)]
    );
    const engine = new BacktestEngine(market, { startDate: D1, endDate: D1, universe: ['688001.SH'] });
    const result = await engine.run(
      new ScriptedPolicy({ [D1]: [{ symbol: '688001.SH', side: 'buy', quantity: 100 }] })
    );

    expect(result.outcomes).toEqual([
      expect.objectContaining({ status: 'rejected', reason: 'limit-band' }),
    ]);
    expect(result.trades).toEqual([]);
    expect(result.equity[0].totalValue).toBe(1_000_000);
  });

  it('values halted holdings at the carried-forward price and rejects their orders', async () => {
    const market = buildMarket(
      [{ symbol: '600000.SH' }, { symbol: '000001.SZ' }],
      [
        makeBar('600000.SH', D1, 10, 10),
        makeBar('000001.SZ', D1, 8, 8),
        makeBar('000001.SZ', D2, 8, 8.1),
        makeBar('600000.SH', D3, 10, 10, { status: 'suspended', suspensionReason: 'asset restructuring' }),
        makeBar('000001.SZ', D3, 8.1, 8.2),
      ]
    );
    const engine = new BacktestEngine(market, {
      startDate: D1,
      endDate: D3,
      universe: ['600000.SH', '000001.SZ'],
    });
    const result = await engine.run(
      new ScriptedPolicy({
        [D1]: [{ symbol: '600000.SH', side: 'buy', quantity: 100 }],
        [D2]: [{ symbol: '600000.SH', side: 'sell', quantity: 100 }],
        [D3]: [{ symbol: '600000.SH', side: 'sell', quantity: 100 }],
      })
    );

    expect(result.outcomes.map((o) => (o.status === 'filled' ? 'filled' : o.reason))).toEqual([
      'filled',
      'suspended',
      'suspended',
    ]);
    expect(result.equity.map((p) => [p.cash, p.positionsValue, p.totalValue])).toEqual([
      [998993.99, 1000, 999993.99],
      [998993.99, 1000, 999993.99],
      [998993.99, 1000, 999993.99],
    ]);
  });

  it('records an insufficient-funds failure and continues the day', async () => {
    const market = buildMarket(
      [{ symbol: '600000.SH' }, { symbol: '000001.SZ' }],
      [makeBar('600000.SH', D1, 100, 101), makeBar('000001.SZ', D1, 8, 8)]
    );
    const engine = new BacktestEngine(market, {
      startDate: D1,
      endDate: D1,
      universe: ['600000.SH', '000001.SZ'],
      initialCapital: 10_000,
    });
    const result = await engine.run(
      new ScriptedPolicy({
        [D1]: [
          { symbol: '600000.SH', side: 'buy', quantity: 100 },
          { symbol: '000001.SZ', side: 'buy', quantity: 100 },
        ],
      })
    );

    expect(result.outcomes[0]).toMatchObject({ status: 'failed', reason: 'insufficient-funds' });
    expect(result.outcomes[1].status).toBe('filled');
    expect(result.summary.failures).toEqual({ 'insufficient-funds': 1 });
    // 800 notional + 5 commission + 0.80 slippage
    expect(result.equity[0].cash).toBe(9194.2);
  });

  it('fails buys that would open more positions than allowed', async () => {
    const market = buildMarket(
      [{ symbol: '600000.SH' }, { symbol: '000001.SZ' }],
      [makeBar('600000.SH', D1, 10, 10), makeBar('000001.SZ', D1, 8, 8)]
    );
    const engine = new BacktestEngine(market, {
      startDate: D1,
      endDate: D1,
      universe: ['600000.SH', '000001.SZ'],
      maxPositions: 1,
    });
    const result = await engine.run(
      new ScriptedPolicy({
        [D1]: [
          { symbol: '600000.SH', side: 'buy', quantity: 100 },
          { symbol: '600000.SH', side: 'buy', quantity: 100 },
          { symbol: '000001.SZ', side: 'buy', quantity: 100 },
        ],
      })
    );
    expect(result.outcomes.map((o) => o.status)).toEqual(['filled', 'filled', 'failed']);
    expect(result.outcomes[2]).toMatchObject({ reason: 'max-positions' });
  });

  it('rejects orders for instruments it does not know', async () => {
    const market = buildMarket([{ symbol: '600000.SH' }], [makeBar('600000.SH', D1, 10, 10)]);
    const engine = new BacktestEngine(market, { startDate: D1, endDate: D1, universe: ['600000.SH'] });
    const result = await engine.run(
      new ScriptedPolicy({ [D1]: [{ symbol: '600999.SH', side: 'buy', quantity: 100 }] })
    );
    expect(result.outcomes[0]).toMatchObject({ status: 'rejected', reason: 'suspended' });
  });

  it('replays only dates with bars inside the range and accepts async policies', async () => {
    const market = buildMarket(
      [{ symbol: '600000.SH' }],
      [
        makeBar('600000.SH', '2023-12-29', 10, 10),
        makeBar('600000.SH', D1, 10, 10),
        makeBar('600000.SH', D3, 10, 10),
        makeBar('600000.SH', '2024-01-05', 10, 10),
      ]
    );
    const seen: string[] = [];
    const policy: DecisionPolicy = {
      name: 'async-recorder',
      async proposeOrders(date: string): Promise<Order[]> {
        seen.push(date);
        return [];
      },
    };
    const engine = new BacktestEngine(market, { startDate: D1, endDate: D3, universe: ['600000.SH'] });
    expect(engine.tradingDays()).toEqual([D1, D3]);
    const result = await engine.run(policy);
    expect(seen).toEqual([D1, D3]);
    expect(result.equity.map((p) => p.date)).toEqual([D1, D3]);
  });

  it('passes ranked scores to the policy and keeps the history', async () => {
    const market = buildMarket(
      [{ symbol: '600000.SH' }, { symbol: '000001.SZ' }],
      [makeBar('600000.SH', D1, 10, 10), makeBar('000001.SZ', D1, 8, 8)]
    );
    market.signalStore.add({
      ...market.signalStore.getSignals('600000.SH', D1),
      sentiment: present({ discussionVolume: 50_000 }),
    });
    const received: string[][] = [];
    const engine = new BacktestEngine(market, {
      startDate: D1,
      endDate: D1,
      universe: ['000001.SZ', '600000.SH'],
    });
    const result = await engine.run({
      name: 'observer',
      proposeOrders: (_date, _portfolio, scores) => {
        received.push(scores.map((s) => s.symbol));
        return [];
      },
    });
    expect(received).toEqual([['600000.SH', '000001.SZ']]);
    expect(result.scoreHistory.map((s) => [s.symbol, s.total])).toEqual([
      ['600000.SH', 20],
      ['000001.SZ', 0],
    ]);
  });

  it('aborts with a partial, invalid result on look-ahead access', async () => {
    const market = buildMarket(
      [{ symbol: '600000.SH' }],
      [makeBar('600000.SH', D1, 10, 10), makeBar('600000.SH', D2, 10, 10.5), makeBar('600000.SH', D3, 10.5, 11)]
    );
    const engine = new BacktestEngine(market, { startDate: D1, endDate: D3, universe: ['600000.SH'] });
    const peeking: DecisionPolicy = {
      name: 'peeking',
      proposeOrders: (date) => {
        if (date === D2) engine.market.getPriceBar('600000.SH', D3);
        return [];
      },
    };

    const error = await engine.run(peeking).then(
      () => null,
      (err: unknown) => err
    );
    expect(error).toBeInstanceOf(BacktestAbortedError);
    if (!(error instanceof BacktestAbortedError)) return;
    expect(error.cause).toBeInstanceOf(CausalityViolationError);
    expect(error.partial.valid).toBe(false);
    expect(error.partial.summary.valid).toBe(false);
    expect(error.partial.equity.map((p) => p.date)).toEqual([D1]);
  });

  it('refuses to run twice', async () => {
    const market = buildMarket([{ symbol: '600000.SH' }], [makeBar('600000.SH', D1, 10, 10)]);
    const engine = new BacktestEngine(market, { startDate: D1, endDate: D1, universe: ['600000.SH'] });
    await engine.run(new ScriptedPolicy({}));
    await expect(engine.run(new ScriptedPolicy({}))).rejects.toThrow('run once');
  });
});
