import { ManualClock, SECONDS_PER_DAY } from '../src/chain/clock.js';
import { parseIdentity, type Identity } from '../src/chain/identity.js';
import { LedgerHost, type LedgerHostOptions } from '../src/runtime/ledger-host.js';

export function identity(suffix: string): Identity {
  return parseIdentity('0x' + suffix.padStart(40, '0'));
}

export const OWNER = identity('01');
export const AUDITOR = identity('0a');
export const ALICE = identity('a1');
export const BOB = identity('b1');
export const TARGET = identity('c1');
export const OTHER_TARGET = identity('c2');
export const CUSTODY = identity('5e');

export const MINIMUM_FEE = 5n;
export const REFUND_TIMEOUT = 7 * SECONDS_PER_DAY;
export const START_TIME = 1_700_000_000;

export function createHost(overrides: Partial<LedgerHostOptions> = {}): { host: LedgerHost; clock: ManualClock } {
  const clock = new ManualClock(START_TIME);
  const host = new LedgerHost({
    owner: OWNER,
    auditor: AUDITOR,
    custody: CUSTODY,
    minimumFee: MINIMUM_FEE,
    refundTimeoutSeconds: REFUND_TIMEOUT,
    registryCooldownSeconds: 60,
    feeExemptTargets: [],
    clock,
    ...overrides,
  });
  return { host, clock };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
