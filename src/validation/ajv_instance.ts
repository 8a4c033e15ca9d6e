/**
 * Ajv validation instance with schema validators
 * Every record is checked against its schema before it is persisted.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema, type SchemaName } from './schema_loader';
import type { Instrument, PriceBar } from '@/types/market';
import type { ConsensusSignal } from '@/types/consensus';

// Draft 2020-12
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

const validators = new Map<SchemaName, ValidateFunction>();

function getValidator(name: SchemaName): ValidateFunction {
  let validator = validators.get(name);
  if (!validator) {
    validator = ajv.compile(loadSchema(name));
    validators.set(name, validator);
  }
  return validator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function describeErrors(validate: ValidateFunction): string[] {
  return (
    validate.errors?.map((e) => `${e.instancePath || 'root'}: ${e.message ?? 'invalid'}`) ?? [
      'Unknown validation error',
    ]
  );
}

function validateWith<T>(name: SchemaName, data: unknown, guard: (value: unknown) => value is T): ValidationResult<T> {
  const validate = getValidator(name);
  if (validate(data) && guard(data)) {
    return { valid: true, data, errors: null };
  }
  return { valid: false, data: null, errors: describeErrors(validate) };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// Shape checked by the schema; these only narrow the type.
function isPriceBarShape(value: unknown): value is PriceBar {
  return isObject(value) && typeof value.symbol === 'string' && typeof value.close === 'number';
}

function isInstrumentShape(value: unknown): value is Instrument {
  return isObject(value) && typeof value.symbol === 'string' && typeof value.board === 'string';
}

function isSignalShape(value: unknown): value is ConsensusSignal {
  return isObject(value) && typeof value.symbol === 'string' && isObject(value.capitalFlow);
}

export function validatePriceBar(data: unknown): ValidationResult<PriceBar> {
  return validateWith('price_bar.v1', data, isPriceBarShape);
}

export function validateInstrument(data: unknown): ValidationResult<Instrument> {
  return validateWith('instrument.v1', data, isInstrumentShape);
}

export function validateConsensusSignal(data: unknown): ValidationResult<ConsensusSignal> {
  return validateWith('consensus_signal.v1', data, isSignalShape);
}
