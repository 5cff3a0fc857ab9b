import type { Identity } from '../chain/identity.js';
import type { AuditRequest } from '../requests/types.js';

export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'REQUEST_IDS_SEQUENTIAL'
  | 'COMPLETED_HAS_REPORT_ID'
  | 'COMPLETION_FIELDS_ONLY_WHEN_COMPLETED'
  | 'REFUNDED_PAYMENT_CLEARED'
  | 'FEE_COUNTER_MATCHES_PAYMENTS'
  | 'REQUESTER_INDEX_CONSISTENT'
  | 'ROLES_NON_NULL'
  | 'CUSTODY_COVERS_ESCROW'
  | 'REPORT_IDS_SEQUENTIAL';

export interface InvariantContext {
  // Queue context
  requests?: readonly AuditRequest[];
  requesterIndex?: ReadonlyMap<Identity, readonly number[]>;
  collectedFees?: bigint;
  custodyBalance?: bigint;
  outstandingEscrow?: bigint;
  owner?: Identity;
  auditor?: Identity;

  // Registry context
  reportIds?: readonly number[];
}

export interface InvariantDefinition {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: (context: InvariantContext) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  description: string;
  severity: InvariantSeverity;
  timestamp: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
}
