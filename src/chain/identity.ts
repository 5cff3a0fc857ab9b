import { DomainError } from '../errors/domain-error.js';

/** Lower-cased `0x` address. Construct through {@link parseIdentity}. */
export type Identity = `0x${string}` & { readonly __brand: 'Identity' };

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const NORMALIZED_PATTERN = /^0x[0-9a-f]{40}$/;

function isNormalized(value: string): value is Identity {
  return NORMALIZED_PATTERN.test(value);
}

export function isIdentityString(value: unknown): value is string {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

export function parseIdentity(value: unknown, field: string = 'identity'): Identity {
  const normalized = isIdentityString(value) ? value.toLowerCase() : '';
  if (!isNormalized(normalized)) {
    throw new DomainError('InvalidInput', `${field} must be a 0x-prefixed 20-byte hex address`, {
      field,
    });
  }
  return normalized;
}

export const ZERO_IDENTITY: Identity = parseIdentity('0x0000000000000000000000000000000000000000');

/** Parses and additionally rejects the all-zero address. */
export function requireIdentity(value: unknown, field: string = 'identity'): Identity {
  const identity = parseIdentity(value, field);
  if (isZeroIdentity(identity)) {
    throw new DomainError('InvalidInput', `${field} must not be the zero address`, { field });
  }
  return identity;
}

export function isZeroIdentity(identity: Identity): boolean {
  return identity === ZERO_IDENTITY;
}

export function shortIdentity(identity: Identity): string {
  return identity.slice(0, 10) + '...';
}
