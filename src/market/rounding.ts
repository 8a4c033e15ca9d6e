/**
 * Price rounding to the minimum increment.
 * Rounds half away from zero; the small bias absorbs binary drift such as
 * 9.99 * 1.1 = 10.989000000000001.
 */

const DRIFT = 1e-9;

export function roundToTick(value: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * factor + DRIFT)) / factor;
  return rounded || 0;
}
