import { type RequestStatus, canTransition, isTerminalStatus } from './states.js';
import { DomainError } from '../errors/domain-error.js';

export interface TransitionResult {
  allowed: boolean;
  reason?: string;
}

export function validateTransition(from: RequestStatus, to: RequestStatus): TransitionResult {
  if (isTerminalStatus(from)) {
    return {
      allowed: false,
      reason: `Cannot transition from terminal status ${from}`,
    };
  }

  if (!canTransition(from, to)) {
    return {
      allowed: false,
      reason: `Invalid transition from ${from} to ${to}`,
    };
  }

  return { allowed: true };
}

export function requireTransition(requestId: number, from: RequestStatus, to: RequestStatus): void {
  const result = validateTransition(from, to);
  if (!result.allowed) {
    throw new DomainError('InvalidState', result.reason ?? `Invalid transition from ${from} to ${to}`, {
      requestId,
      from,
      to,
    });
  }
}
