/**
 * Backtest Simulation Engine
 *
 * Replays trading days in order. Each day:
 *   advance clock -> score universe -> ask policy -> validate -> execute
 *   sequentially -> mark to market -> append equity point
 *
 * Rule rejections and execution failures are recorded per order and the day
 * continues. Any thrown error (look-ahead access included) aborts the run
 * with a BacktestAbortedError carrying the partial, invalid result.
 */

import type { AppConfig } from '@/core/config';
import { isCausalityViolation } from '@/core/errors';
import { normalizeSymbol } from '@/core/symbol';
import { tradingDaysWithin } from '@/core/time';
import { A_SHARE_RULES } from '@/market/rules';
import { ConsensusScorer } from '@/scoring/consensus';
import { DEFAULT_CONSENSUS_THRESHOLDS } from '@/scoring/consensus_config';
import { DEFAULT_TECHNICAL_WINDOWS } from '@/scoring/technical';
import { CostModel, DEFAULT_COST_CONFIG } from '@/trading/costs';
import { PortfolioLedger, type LedgerResult } from '@/trading/ledger';
import { TradingRuleValidator } from '@/trading/validator';
import type { ConsensusScore } from '@/types/consensus';
import type {
  EquityPoint,
  ExecutionFailureReason,
  Lot,
  Order,
  OrderOutcome,
  PortfolioSnapshot,
  RejectionReason,
} from '@/types/trading';
import { createChildLogger } from '@/utils/logger';
import type { MarketData } from '@/data/market_data';
import { CausalMarketView } from './causal_view';
import { SimulationClock } from './clock';
import { BacktestAbortedError } from './errors';
import { calculateMetrics } from './metrics';
import { buildSummary } from './report';
import type { BacktestResult, BacktestSettings, DecisionPolicy } from './types';

const logger = createChildLogger('backtest_engine');

export type BacktestOptions = Pick<BacktestSettings, 'startDate' | 'endDate' | 'universe'> &
  Partial<Omit<BacktestSettings, 'startDate' | 'endDate' | 'universe'>>;

export function resolveSettings(options: BacktestOptions): BacktestSettings {
  return {
    startDate: options.startDate,
    endDate: options.endDate,
    universe: [...new Set(options.universe.map(normalizeSymbol))].sort(),
    initialCapital: options.initialCapital ?? 1_000_000,
    maxPositions: options.maxPositions ?? 0,
    fillPriceField: options.fillPriceField ?? 'close',
    riskFreeRate: options.riskFreeRate ?? 0.02,
    rules: options.rules ?? A_SHARE_RULES,
    costs: options.costs ?? DEFAULT_COST_CONFIG,
    thresholds: options.thresholds ?? DEFAULT_CONSENSUS_THRESHOLDS,
    deriveTechnical: options.deriveTechnical ?? false,
    technicalWindows: options.technicalWindows ?? DEFAULT_TECHNICAL_WINDOWS,
  };
}

/** Settings from the loaded configuration; `overrides` win. */
export function settingsFromConfig(
  config: AppConfig,
  overrides: Partial<BacktestSettings> & { startDate: string; endDate: string }
): BacktestSettings {
  return resolveSettings({
    universe: config.universe.symbols,
    initialCapital: config.backtest.initialCapital,
    maxPositions: config.backtest.maxPositions,
    fillPriceField: config.backtest.fillPriceField,
    riskFreeRate: config.backtest.riskFreeRate,
    rules: config.marketRules,
    costs: config.costs,
    thresholds: config.consensus,
    ...overrides,
  });
}

interface RunState {
  ledger: PortfolioLedger;
  equity: EquityPoint[];
  outcomes: OrderOutcome[];
  scoreHistory: ConsensusScore[];
  lastPrices: Map<string, number>;
}

export class BacktestEngine {
  readonly settings: BacktestSettings;
  readonly clock = new SimulationClock();
  /** Time-guarded market access; policies that need data beyond scores read it here. */
  readonly market: CausalMarketView;

  private readonly validator: TradingRuleValidator;
  private readonly costModel: CostModel;
  private readonly scorer: ConsensusScorer;
  private used = false;

  constructor(
    private readonly data: MarketData,
    options: BacktestOptions
  ) {
    this.settings = resolveSettings(options);
    this.market = new CausalMarketView(this.clock, data, {
      rules: this.settings.rules,
      deriveTechnical: this.settings.deriveTechnical,
      technicalWindows: this.settings.technicalWindows,
    });
    this.validator = new TradingRuleValidator(this.settings.rules);
    this.costModel = new CostModel(this.settings.costs);
    this.scorer = new ConsensusScorer(this.market, this.settings.thresholds);
  }

  /** Trading days of the run: dates with at least one stored bar inside the range. */
  tradingDays(): string[] {
    return tradingDaysWithin(this.data.prices.dates(), this.settings.startDate, this.settings.endDate);
  }

  async run(policy: DecisionPolicy): Promise<BacktestResult> {
    if (this.used) {
      throw new Error('BacktestEngine instances run once; create a new engine for another run');
    }
    this.used = true;

    const state: RunState = {
      ledger: new PortfolioLedger(this.settings.initialCapital),
      equity: [],
      outcomes: [],
      scoreHistory: [],
      lastPrices: new Map(),
    };
    const days = this.tradingDays();

    logger.info(
      {
        policy: policy.name,
        start: this.settings.startDate,
        end: this.settings.endDate,
        tradingDays: days.length,
        universe: this.settings.universe.length,
      },
      'Backtest started'
    );

    for (const date of days) {
      try {
        await this.simulateDay(date, policy, state);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(
          { date, causal: isCausalityViolation(error), err: error },
          'Backtest aborted'
        );
        const partial = this.buildResult(policy, state, false, reason);
        throw new BacktestAbortedError(`Backtest aborted on ${date}: ${reason}`, partial, error);
      }
    }

    const result = this.buildResult(policy, state, true, null);
    logger.info(
      {
        finalValue: result.metrics.finalValue,
        totalReturn: result.metrics.totalReturn,
        trades: result.trades.length,
        contentHash: result.summary.contentHash,
      },
      'Backtest complete'
    );
    return result;
  }

  private async simulateDay(date: string, policy: DecisionPolicy, state: RunState): Promise<void> {
    this.clock.advanceTo(date);

    const scores = this.scorer.scoreUniverse(this.settings.universe, date);
    state.scoreHistory.push(...scores);

    const snapshot = this.snapshot(date, state);
    const orders = await policy.proposeOrders(date, snapshot, scores);

    // Rules see the book as the day opened; shortfalls caused by earlier
    // orders in the batch surface as execution failures.
    const openingLots = new Map(
      state.ledger.heldSymbols().map((symbol) => [symbol, state.ledger.lotsFor(symbol)])
    );
    for (const order of orders) {
      state.outcomes.push(this.execute(order, date, state, openingLots));
    }

    const marked = this.snapshot(date, state);
    const previous = state.equity.at(-1)?.totalValue ?? this.settings.initialCapital;
    state.equity.push({
      date,
      cash: marked.cash,
      positionsValue: marked.positionsValue,
      totalValue: marked.totalValue,
      dailyReturn: previous > 0 ? marked.totalValue / previous - 1 : 0,
    });
  }

  private execute(
    proposed: Order,
    date: string,
    state: RunState,
    openingLots: ReadonlyMap<string, Lot[]>
  ): OrderOutcome {
    const symbol = normalizeSymbol(proposed.symbol);
    const order: Order = { ...proposed, symbol, date };

    const instrument = this.market.getInstrument(symbol, date);
    if (!instrument) {
      return this.rejected(order, 'suspended', `${symbol} is not a listed instrument on ${date}`);
    }

    const bar = this.market.effectiveBar(symbol, date);
    const verdict = this.validator.validate(order, instrument, bar, openingLots.get(symbol) ?? [], date);
    if (!verdict.accepted) {
      return this.rejected(order, verdict.reason, verdict.message);
    }
    if (bar === null) {
      return this.rejected(order, 'suspended', `${symbol} has no price on ${date}`);
    }

    const fillPrice = bar[this.settings.fillPriceField];
    const priced = this.costModel.priceOrder(order, fillPrice);
    const fill = { symbol, date, quantity: order.quantity, fillPrice, priced };

    let result: LedgerResult;
    if (order.side === 'buy') {
      const held = state.ledger.heldSymbols();
      const { maxPositions } = this.settings;
      if (maxPositions > 0 && !held.includes(symbol) && held.length >= maxPositions) {
        return this.failed(
          order,
          'max-positions',
          `Opening ${symbol} would exceed ${maxPositions} positions`
        );
      }
      result = state.ledger.applyBuy(fill);
    } else {
      result = state.ledger.applySell(fill, (lot: Lot) => this.validator.isSettled(lot, date));
    }

    if (!result.ok) {
      return this.failed(order, result.reason, result.message);
    }

    state.lastPrices.set(symbol, fillPrice);
    logger.debug(
      { date, symbol, side: order.side, quantity: order.quantity, fillPrice, cash: state.ledger.cash },
      'Order filled'
    );
    return { status: 'filled', order, trade: result.trade };
  }

  private snapshot(date: string, state: RunState): PortfolioSnapshot {
    const priceOf = (symbol: string): number => {
      const bar = this.market.effectiveBar(symbol, date);
      if (bar) {
        state.lastPrices.set(symbol, bar.close);
        return bar.close;
      }
      return state.lastPrices.get(symbol) ?? 0;
    };
    return state.ledger.snapshot(date, priceOf, (lot) => this.validator.isSettled(lot, date));
  }

  private rejected(order: Order, reason: RejectionReason, message: string): OrderOutcome {
    logger.info({ date: order.date, symbol: order.symbol, side: order.side, reason }, message);
    return { status: 'rejected', order, reason, message };
  }

  private failed(order: Order, reason: ExecutionFailureReason, message: string): OrderOutcome {
    logger.warn({ date: order.date, symbol: order.symbol, side: order.side, reason }, message);
    return { status: 'failed', order, reason, message };
  }

  private buildResult(
    policy: DecisionPolicy,
    state: RunState,
    valid: boolean,
    abortReason: string | null
  ): BacktestResult {
    const equity = state.equity.slice();
    const trades = state.ledger.trades.slice();
    const metrics = calculateMetrics(equity, trades, {
      initialCapital: this.settings.initialCapital,
      riskFreeRate: this.settings.riskFreeRate,
    });
    return {
      valid,
      settings: this.settings,
      equity,
      trades,
      outcomes: state.outcomes.slice(),
      scoreHistory: state.scoreHistory.slice(),
      metrics,
      summary: buildSummary({
        policy: policy.name,
        settings: this.settings,
        valid,
        equity,
        trades,
        outcomes: state.outcomes,
        metrics,
        abortReason,
      }),
    };
  }
}
