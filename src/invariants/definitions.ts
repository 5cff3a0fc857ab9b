import type { InvariantDefinition, InvariantContext, InvariantID } from './types.js';
import { isZeroIdentity } from '../chain/identity.js';

const INVARIANTS: Record<InvariantID, InvariantDefinition> = {
  REQUEST_IDS_SEQUENTIAL: {
    id: 'REQUEST_IDS_SEQUENTIAL',
    description: 'Request ids run 1..count with no gaps or reuse',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.requests) return true;
      return ctx.requests.every((request, index) => request.id === index + 1);
    },
  },

  COMPLETED_HAS_REPORT_ID: {
    id: 'COMPLETED_HAS_REPORT_ID',
    description: 'Every completed request carries a non-zero report id and completion time',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.requests) return true;
      return ctx.requests
        .filter(r => r.status === 'Completed')
        .every(r => r.reportId > 0 && r.completedAt > 0);
    },
  },

  COMPLETION_FIELDS_ONLY_WHEN_COMPLETED: {
    id: 'COMPLETION_FIELDS_ONLY_WHEN_COMPLETED',
    description: 'reportId and completedAt stay zero until a request completes',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.requests) return true;
      return ctx.requests
        .filter(r => r.status !== 'Completed')
        .every(r => r.reportId === 0 && r.completedAt === 0);
    },
  },

  REFUNDED_PAYMENT_CLEARED: {
    id: 'REFUNDED_PAYMENT_CLEARED',
    description: 'Refunded requests hold no payment',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.requests) return true;
      return ctx.requests.filter(r => r.status === 'Refunded').every(r => r.payment === 0n);
    },
  },

  FEE_COUNTER_MATCHES_PAYMENTS: {
    id: 'FEE_COUNTER_MATCHES_PAYMENTS',
    description: 'Collected-fees counter equals the sum of payments still recorded on requests',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.requests || ctx.collectedFees === undefined) return true;
      const total = ctx.requests.reduce((sum, r) => sum + r.payment, 0n);
      return total === ctx.collectedFees;
    },
  },

  REQUESTER_INDEX_CONSISTENT: {
    id: 'REQUESTER_INDEX_CONSISTENT',
    description: 'Requester index lists every request exactly once under its requester',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.requests || !ctx.requesterIndex) return true;
      let indexed = 0;
      for (const [requester, ids] of ctx.requesterIndex.entries()) {
        for (const id of ids) {
          const request = ctx.requests[id - 1];
          if (!request || request.requester !== requester) return false;
          indexed++;
        }
      }
      return indexed === ctx.requests.length;
    },
  },

  ROLES_NON_NULL: {
    id: 'ROLES_NON_NULL',
    description: 'Owner and auditor are never the zero address',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.owner && isZeroIdentity(ctx.owner)) return false;
      if (ctx.auditor && isZeroIdentity(ctx.auditor)) return false;
      return true;
    },
  },

  // Reported, never enforced: withdrawFunds is allowed to sweep below what
  // pending refunds need.
  CUSTODY_COVERS_ESCROW: {
    id: 'CUSTODY_COVERS_ESCROW',
    description: 'Custody balance covers the deposits of pending and in-progress requests',
    severity: 'warn',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.custodyBalance === undefined || ctx.outstandingEscrow === undefined) return true;
      return ctx.custodyBalance >= ctx.outstandingEscrow;
    },
  },

  REPORT_IDS_SEQUENTIAL: {
    id: 'REPORT_IDS_SEQUENTIAL',
    description: 'Report ids run 1..count with no gaps or reuse',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (!ctx.reportIds) return true;
      return ctx.reportIds.every((id, index) => id === index + 1);
    },
  },
};

export const QUEUE_INVARIANTS: InvariantID[] = [
  'REQUEST_IDS_SEQUENTIAL',
  'COMPLETED_HAS_REPORT_ID',
  'COMPLETION_FIELDS_ONLY_WHEN_COMPLETED',
  'REFUNDED_PAYMENT_CLEARED',
  'FEE_COUNTER_MATCHES_PAYMENTS',
  'REQUESTER_INDEX_CONSISTENT',
  'ROLES_NON_NULL',
  'CUSTODY_COVERS_ESCROW',
];

export const REGISTRY_INVARIANTS: InvariantID[] = ['REPORT_IDS_SEQUENTIAL', 'ROLES_NON_NULL'];

export function getInvariant(id: InvariantID): InvariantDefinition {
  return INVARIANTS[id];
}

export function getAllInvariants(): InvariantDefinition[] {
  return Object.values(INVARIANTS);
}

export function getInvariantsByIds(ids: InvariantID[]): InvariantDefinition[] {
  return ids.map(id => INVARIANTS[id]);
}
