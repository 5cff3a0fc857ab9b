export type DomainErrorCode =
  | 'InvalidInput'
  | 'InsufficientPayment'
  | 'InsufficientFunds'
  | 'NotFound'
  | 'InvalidState'
  | 'Unauthorized'
  | 'TimeoutNotReached'
  | 'TransferFailed'
  | 'NoBalance'
  | 'ReentrantCall'
  | 'Paused'
  | 'CooldownActive'
  | 'OperationDisabled';

export class DomainError extends Error {
  constructor(
    public readonly code: DomainErrorCode,
    message: string,
    public readonly detail?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export function isDomainError(error: unknown, code?: DomainErrorCode): error is DomainError {
  if (!(error instanceof DomainError)) return false;
  return code === undefined || error.code === code;
}
