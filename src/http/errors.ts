import type { Response } from 'express';
import { DomainError, type DomainErrorCode } from '../errors/domain-error.js';
import { logger } from '../observability/logger.js';

const STATUS_BY_CODE: Record<DomainErrorCode, number> = {
  InvalidInput: 400,
  InsufficientPayment: 402,
  InsufficientFunds: 402,
  Unauthorized: 403,
  NotFound: 404,
  OperationDisabled: 405,
  InvalidState: 409,
  TimeoutNotReached: 409,
  NoBalance: 409,
  ReentrantCall: 409,
  CooldownActive: 429,
  TransferFailed: 502,
  Paused: 503,
};

export function statusForCode(code: DomainErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function sendError(res: Response, phase: string, error: unknown): void {
  if (error instanceof DomainError) {
    const status = statusForCode(error.code);
    const log = status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(phase, 'Request rejected', {
      code: error.code,
      error: error.message,
    });
    res.status(status).json({
      error: error.code,
      message: error.message,
    });
    return;
  }

  logger.error(phase, 'Unexpected error', {
    error: error instanceof Error ? error.message : 'Unknown error',
  });
  res.status(500).json({ error: 'Internal', message: 'Internal server error' });
}
