import { SimulationError } from '@/core/errors';
import type { BacktestResult } from './types';

/** Thrown by a run that had to stop; `partial.valid` is always false. */
export class BacktestAbortedError extends SimulationError {
  readonly partial: BacktestResult;

  constructor(message: string, partial: BacktestResult, cause: unknown) {
    super('BACKTEST_ABORTED', message, { cause, details: { lastDate: partial.equity.at(-1)?.date ?? null } });
    this.name = 'BacktestAbortedError';
    this.partial = partial;
  }
}
