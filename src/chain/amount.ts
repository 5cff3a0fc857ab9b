import { DomainError } from '../errors/domain-error.js';

const DECIMAL_PATTERN = /^\d+$/;

/** Accepts non-negative integers as bigint, safe integer numbers, or decimal strings. */
export function parseAmount(value: unknown, field: string = 'amount'): bigint {
  if (typeof value === 'bigint') {
    if (value < 0n) {
      throw new DomainError('InvalidInput', `${field} must be non-negative`, { field });
    }
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new DomainError('InvalidInput', `${field} must be a non-negative integer`, { field });
    }
    return BigInt(value);
  }

  if (typeof value === 'string' && DECIMAL_PATTERN.test(value)) {
    return BigInt(value);
  }

  throw new DomainError('InvalidInput', `${field} must be a non-negative integer amount`, { field });
}
