import { parseAmount } from '../chain/amount.js';
import { parseIdentity, requireIdentity, type Identity } from '../chain/identity.js';
import { SECONDS_PER_DAY } from '../chain/clock.js';
import { DEFAULT_COOLDOWN_SECONDS } from '../registry/types.js';
import { MAX_REFUND_TIMEOUT_SECONDS } from '../requests/types.js';

export interface Settings {
  port: number;
  redisUrl?: string;
  owner: Identity;
  auditor: Identity;
  custody: Identity;
  minimumFee: bigint;
  refundTimeoutSeconds: number;
  registryCooldownSeconds: number;
  feeExemptTargets: Identity[];
  eventHistoryLimit: number;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_PORT = 3000;
export const DEFAULT_MINIMUM_FEE = 5_000_000_000_000_000_000n;
export const DEFAULT_REFUND_TIMEOUT_SECONDS = 7 * SECONDS_PER_DAY;
export const DEFAULT_EVENT_HISTORY_LIMIT = 500;
export const DEFAULT_CUSTODY_ADDRESS = '0x000000000000000000000000000000000000005e';

export class SettingsError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = 'SettingsError';
  }
}

export function loadSettings(env: Env = process.env): Settings {
  const owner = readIdentity(env, 'OWNER_ADDRESS');
  if (!owner) {
    throw new SettingsError('OWNER_ADDRESS', 'is required');
  }

  return {
    port: readInteger(env, 'PORT', DEFAULT_PORT, 0, 65535),
    redisUrl: env.REDIS_URL || undefined,
    owner,
    auditor: readIdentity(env, 'AUDITOR_ADDRESS') ?? owner,
    custody: readIdentity(env, 'QUEUE_ADDRESS') ?? requireIdentity(DEFAULT_CUSTODY_ADDRESS),
    minimumFee: readAmount(env, 'MINIMUM_FEE', DEFAULT_MINIMUM_FEE),
    refundTimeoutSeconds: readInteger(env, 'REFUND_TIMEOUT_SECONDS', DEFAULT_REFUND_TIMEOUT_SECONDS, 0, MAX_REFUND_TIMEOUT_SECONDS),
    registryCooldownSeconds: readInteger(env, 'REGISTRY_COOLDOWN_SECONDS', DEFAULT_COOLDOWN_SECONDS, 0),
    feeExemptTargets: readIdentityList(env, 'FEE_EXEMPT_TARGETS'),
    eventHistoryLimit: readInteger(env, 'EVENT_HISTORY_LIMIT', DEFAULT_EVENT_HISTORY_LIMIT, 1),
  };
}

function readInteger(env: Env, name: string, fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new SettingsError(name, `must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function readAmount(env: Env, name: string, fallback: bigint): bigint {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  try {
    return parseAmount(raw, name);
  } catch (error) {
    throw new SettingsError(name, `must be a non-negative integer amount, got "${raw}"`);
  }
}

function readIdentity(env: Env, name: string): Identity | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;

  try {
    return requireIdentity(raw, name);
  } catch (error) {
    throw new SettingsError(name, `must be a non-zero 0x address, got "${raw}"`);
  }
}

function readIdentityList(env: Env, name: string): Identity[] {
  const raw = env[name];
  if (!raw) return [];

  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => {
      try {
        return parseIdentity(entry, name);
      } catch (error) {
        throw new SettingsError(name, `contains an invalid address "${entry}"`);
      }
    });
}
