import { describe, expect, it } from 'vitest';
import {
  REQUEST_STATUSES,
  canTransition,
  getStatusMetadata,
  holdsEscrow,
  isRequestStatus,
  isTerminalStatus,
} from '../src/requests/states.js';
import { requireTransition, validateTransition } from '../src/requests/transitions.js';
import { captureError } from './helpers.js';

describe('request status machine', () => {
  it('only moves forward', () => {
    expect(canTransition('Pending', 'InProgress')).toBe(true);
    expect(canTransition('Pending', 'Completed')).toBe(true);
    expect(canTransition('Pending', 'Refunded')).toBe(true);
    expect(canTransition('InProgress', 'Completed')).toBe(true);

    expect(canTransition('InProgress', 'Pending')).toBe(false);
    expect(canTransition('InProgress', 'Refunded')).toBe(false);
    expect(canTransition('Refunded', 'Completed')).toBe(false);
    expect(canTransition('Completed', 'Refunded')).toBe(false);
  });

  it('marks completed and refunded as terminal', () => {
    expect(REQUEST_STATUSES.filter(isTerminalStatus)).toEqual(['Completed', 'Refunded']);
    expect(REQUEST_STATUSES.filter(holdsEscrow)).toEqual(['Pending', 'InProgress']);
    expect(getStatusMetadata('Refunded').canTransitionTo).toEqual([]);
  });

  it('recognizes status strings', () => {
    expect(isRequestStatus('InProgress')).toBe(true);
    expect(isRequestStatus('Cancelled')).toBe(false);
    expect(isRequestStatus(3)).toBe(false);
  });

  it('explains rejected transitions', () => {
    expect(validateTransition('Completed', 'Completed')).toEqual({
      allowed: false,
      reason: 'Cannot transition from terminal status Completed',
    });
    expect(validateTransition('InProgress', 'Refunded')).toEqual({
      allowed: false,
      reason: 'Invalid transition from InProgress to Refunded',
    });
    expect(validateTransition('Pending', 'Completed')).toEqual({ allowed: true });
  });

  it('throws InvalidState for a disallowed transition', () => {
    expect(captureError(() => requireTransition(4, 'Refunded', 'Completed'))).toMatchObject({
      code: 'InvalidState',
      detail: { requestId: 4, from: 'Refunded', to: 'Completed' },
    });
  });
});
