import type { Identity } from '../chain/identity.js';

export type LedgerEvent =
  | { type: 'RequestSubmitted'; requestId: number; requester: Identity; targetAddress: Identity; depositAmount: bigint }
  | { type: 'WorkStarted'; requestId: number }
  | { type: 'WorkCompleted'; requestId: number; reportId: number }
  | { type: 'RequestRefunded'; requestId: number; requester: Identity; amount: bigint }
  | { type: 'MinimumFeeUpdated'; previous: bigint; current: bigint }
  | { type: 'RefundTimeoutUpdated'; previous: number; current: number }
  | { type: 'AuditorUpdated'; previous: Identity; current: Identity }
  | { type: 'FeeExemptionGranted'; targetAddress: Identity }
  | { type: 'FundsWithdrawn'; to: Identity; amount: bigint }
  | { type: 'Paused'; by: Identity }
  | { type: 'Unpaused'; by: Identity }
  | { type: 'OwnershipTransferred'; component: 'queue' | 'registry'; previous: Identity; current: Identity }
  | { type: 'AuditSubmitted'; reportId: number; targetAddress: Identity; auditor: Identity; score: number }
  | { type: 'AuditorAuthorized'; auditor: Identity; name: string }
  | { type: 'AuditorRevoked'; auditor: Identity };

export type LedgerEventType = LedgerEvent['type'];

export interface EventBatch {
  emittedAt: number;
  events: LedgerEvent[];
}

/** Receives the events of each committed operation, in commit order. */
export interface EventSink {
  publish(batch: EventBatch): void;
}

export interface EventRecord {
  sequence: number;
  emittedAt: number;
  event: LedgerEvent;
}

/** Wire form: bigint fields become decimal strings. */
export type SerializedEventRecord = {
  sequence: number;
  emittedAt: number;
  event: Record<string, unknown> & { type: LedgerEventType };
};
