import { describe, expect, it } from 'vitest';
import { deriveTechnicalInputs, simpleMovingAverage } from '@/scoring/technical';
import type { PriceBar } from '@/types/market';
import { makeBar } from '../helpers/market';

function series(closes: number[]): PriceBar[] {
  return closes.map((close, i) => {
    const day = String(i + 1).padStart(2, '0');
    return makeBar('600000.SH', `2024-01-${day}`, i === 0 ? close : closes[i - 1], close, {
      high: close,
      low: close,
    });
  });
}

describe('simpleMovingAverage', () => {
  it('averages the trailing window', () => {
    expect(simpleMovingAverage([1, 2, 3, 4, 5], 2)).toBe(4.5);
    expect(simpleMovingAverage([2, 4], 2)).toBe(3);
  });

  it('returns null when the window is not filled', () => {
    expect(simpleMovingAverage([1, 2], 3)).toBeNull();
    expect(simpleMovingAverage([1, 2], 0)).toBeNull();
  });
});

describe('deriveTechnicalInputs', () => {
  const windows = { shortMa: 2, longMa: 4, highLookback: 5 };

  it('is absent with less history than the long window', () => {
    expect(deriveTechnicalInputs(series([10, 11, 12]), windows)).toEqual({ status: 'absent' });
  });

  it('derives close, trailing high and both averages', () => {
    const result = deriveTechnicalInputs(series([20, 10, 11, 12, 13, 14]), windows);
    expect(result.status).toBe('present');
    if (result.status !== 'present') return;
    expect(result.value).toEqual({
      close: 14,
      high52Week: 14,
      maShort: 13.5,
      maLong: 12.5,
    });
  });

  it('keeps an older high inside the lookback', () => {
    const result = deriveTechnicalInputs(series([10, 20, 11, 12, 13]), windows);
    expect(result).toMatchObject({ status: 'present', value: { high52Week: 20, close: 13 } });
  });
});
