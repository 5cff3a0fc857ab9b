import { SECONDS_PER_DAY } from '../chain/clock.js';
import type { Identity } from '../chain/identity.js';
import type { RequestStatus } from './states.js';

export interface AuditRequest {
  id: number;
  requester: Identity;
  targetAddress: Identity;
  payment: bigint;
  status: RequestStatus;
  requestedAt: number;
  /** 0 until completed. */
  completedAt: number;
  /** 0 until completed; opaque, never checked against the registry. */
  reportId: number;
}

export interface QueueConfig {
  owner: Identity;
  auditor: Identity;
  minimumFee: bigint;
  refundTimeoutSeconds: number;
  paused: boolean;
}

export interface QueueState {
  config: QueueConfig;
  /** Index `id - 1`. */
  requests: AuditRequest[];
  requesterIndex: Map<Identity, number[]>;
  feeExempt: Set<Identity>;
  collectedFees: bigint;
}

export interface BalanceReport {
  custodyBalance: bigint;
  collectedFees: bigint;
  outstandingEscrow: bigint;
  /** Negative when custody cannot cover every pending refund. */
  surplus: bigint;
}

/** Keeps `requestedAt + refundTimeoutSeconds` a safe integer. */
export const MAX_REFUND_TIMEOUT_SECONDS = 100 * 365 * SECONDS_PER_DAY;
