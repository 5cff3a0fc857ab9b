export type FaultCode =
  | 'PAYOUT_FAILURE'
  | 'SNAPSHOT_WRITE_FAILURE'
  | 'EVENT_WRITE_FAILURE';

export type FaultTrigger = 'always' | 'never' | number;

export interface FaultConfig {
  enabled: boolean;
  triggers: Partial<Record<FaultCode, FaultTrigger>>;
}

export class FaultInjectionError extends Error {
  constructor(
    public readonly faultCode: FaultCode,
    message: string
  ) {
    super(message);
    this.name = 'FaultInjectionError';
  }
}
