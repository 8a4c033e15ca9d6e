/**
 * Typed errors for conditions that must abort work.
 * Rule violations and execution failures are returned as values instead.
 */

export type ErrorCode =
  | 'CAUSALITY_VIOLATION'
  | 'BACKTEST_ABORTED'
  | 'CONFIG_INVALID'
  | 'RECORD_INVALID';

export class SimulationError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SimulationError';
    this.code = code;
    this.details = options.details ?? {};
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Look-ahead access: data for `requestedDate` read while the clock is at `currentDate`. */
export class CausalityViolationError extends SimulationError {
  readonly requestedDate: string;
  readonly currentDate: string;

  constructor(source: string, requestedDate: string, currentDate: string) {
    super(
      'CAUSALITY_VIOLATION',
      `${source} requested data for ${requestedDate} while simulated date is ${currentDate}`,
      { details: { source, requestedDate, currentDate } }
    );
    this.name = 'CausalityViolationError';
    this.requestedDate = requestedDate;
    this.currentDate = currentDate;
  }
}

export class ConfigError extends SimulationError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFIG_INVALID', message, { details });
    this.name = 'ConfigError';
  }
}

export class RecordValidationError extends SimulationError {
  readonly errors: string[];

  constructor(recordType: string, errors: string[]) {
    super('RECORD_INVALID', `Invalid ${recordType} record: ${errors.join('; ')}`, {
      details: { recordType },
    });
    this.name = 'RecordValidationError';
    this.errors = errors;
  }
}

export function isCausalityViolation(error: unknown): error is CausalityViolationError {
  return error instanceof CausalityViolationError;
}
