/**
 * Technical signal derivation from causal price history
 * Used when the signal feed carries no technical record for a symbol.
 */

import { absent, present, type Presence, type TechnicalInputs } from '@/types/consensus';
import type { PriceBar } from '@/types/market';

export interface TechnicalWindows {
  shortMa: number;
  longMa: number;
  /** Trading days in the trailing high window (~52 weeks). */
  highLookback: number;
}

export const DEFAULT_TECHNICAL_WINDOWS: TechnicalWindows = {
  shortMa: 5,
  longMa: 20,
  highLookback: 250,
};

export function simpleMovingAverage(values: readonly number[], window: number): number | null {
  if (window <= 0 || values.length < window) return null;
  const slice = values.slice(values.length - window);
  return slice.reduce((sum, v) => sum + v, 0) / window;
}

/**
 * `history` must be ascending and end at the simulated current date.
 * Fewer bars than the long moving-average window means the family is absent.
 */
export function deriveTechnicalInputs(
  history: readonly PriceBar[],
  windows: TechnicalWindows = DEFAULT_TECHNICAL_WINDOWS
): Presence<TechnicalInputs> {
  const closes = history.map((bar) => bar.close);
  const maShort = simpleMovingAverage(closes, windows.shortMa);
  const maLong = simpleMovingAverage(closes, windows.longMa);
  if (maShort === null || maLong === null) return absent();

  const trailing = history.slice(Math.max(0, history.length - windows.highLookback));
  const high52Week = Math.max(...trailing.map((bar) => bar.high));

  return present({
    close: closes[closes.length - 1],
    high52Week,
    maShort,
    maLong,
  });
}
