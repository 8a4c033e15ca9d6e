/**
 * Simulated clock. Only the engine advances it; every data accessor checks
 * requests against it.
 */

import { CausalityViolationError } from '@/core/errors';
import { compareDates } from '@/core/time';

export class SimulationClock {
  private current: string | null = null;

  get currentDate(): string | null {
    return this.current;
  }

  advanceTo(date: string): void {
    if (this.current !== null && compareDates(date, this.current) <= 0) {
      throw new RangeError(`Clock cannot move from ${this.current} to ${date}`);
    }
    this.current = date;
  }

  /** Throws when `requestedDate` lies after the simulated date, or before the clock has started. */
  assertVisible(source: string, requestedDate: string): void {
    if (this.current === null) {
      throw new CausalityViolationError(source, requestedDate, 'not-started');
    }
    if (compareDates(requestedDate, this.current) > 0) {
      throw new CausalityViolationError(source, requestedDate, this.current);
    }
  }
}
