import type { Clock } from '../chain/clock.js';
import type { FundsLedger } from '../chain/funds.js';
import { requireIdentity, shortIdentity, type Identity } from '../chain/identity.js';
import { TransactionRunner, type Transaction } from '../chain/transaction.js';
import { DomainError, isDomainError } from '../errors/domain-error.js';
import type { EventSink } from '../events/types.js';
import { maybeInjectFault } from '../faults/injector.js';
import { enforceInvariants } from '../invariants/checker.js';
import { QUEUE_INVARIANTS } from '../invariants/definitions.js';
import type { InvariantViolation } from '../invariants/types.js';
import { logger } from '../observability/logger.js';
import { holdsEscrow } from './states.js';
import { requireTransition } from './transitions.js';
import {
  MAX_REFUND_TIMEOUT_SECONDS,
  type AuditRequest,
  type BalanceReport,
  type QueueConfig,
  type QueueState,
} from './types.js';

export interface AuditRequestQueueOptions {
  /** Identity under which deposits are held. */
  custody: Identity;
  owner: Identity;
  auditor?: Identity;
  minimumFee: bigint;
  refundTimeoutSeconds: number;
  feeExemptTargets?: Identity[];
  funds: FundsLedger;
  clock: Clock;
  events: EventSink;
}

/**
 * Escrowed audit requests. Requesters deposit a fee against a target
 * address; the configured auditor starts and completes the work; an
 * unclaimed request can be refunded once the refund window has passed.
 *
 * Every mutating method is one atomic step: on any failure the queue state
 * and native balances are restored and no event is published.
 */
export class AuditRequestQueue {
  private state: QueueState;
  private readonly custody: Identity;
  private readonly funds: FundsLedger;
  private readonly runner: TransactionRunner;
  private lastViolations: InvariantViolation[] = [];

  constructor(options: AuditRequestQueueOptions) {
    const owner = requireIdentity(options.owner, 'owner');
    this.custody = requireIdentity(options.custody, 'custody');
    this.funds = options.funds;
    this.state = {
      config: {
        owner,
        auditor: requireIdentity(options.auditor ?? owner, 'auditor'),
        minimumFee: options.minimumFee,
        refundTimeoutSeconds: options.refundTimeoutSeconds,
        paused: false,
      },
      requests: [],
      requesterIndex: new Map(),
      feeExempt: new Set(options.feeExemptTargets ?? []),
      collectedFees: 0n,
    };
    this.runner = new TransactionRunner({
      component: 'AuditRequestQueue',
      clock: options.clock,
      sink: options.events,
      participants: [
        {
          checkpoint: () => {
            const saved = structuredClone(this.state);
            return () => {
              this.state = saved;
            };
          },
        },
        this.funds,
      ],
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  submitRequest(caller: Identity, targetAddress: Identity, depositAmount: bigint): number {
    return this.execute('submitRequest', (tx) => {
      this.requireNotPaused();
      const target = requireIdentity(targetAddress, 'targetAddress');
      if (depositAmount < 0n) {
        throw new DomainError('InvalidInput', 'depositAmount must be non-negative');
      }

      const exempt = this.state.feeExempt.has(target);
      if (!exempt && depositAmount < this.state.config.minimumFee) {
        throw new DomainError('InsufficientPayment', 'Deposit is below the minimum audit fee', {
          depositAmount: depositAmount.toString(),
          minimumFee: this.state.config.minimumFee.toString(),
        });
      }

      if (depositAmount > 0n) {
        this.funds.transfer(caller, this.custody, depositAmount);
      }

      const id = this.state.requests.length + 1;
      this.state.requests.push({
        id,
        requester: caller,
        targetAddress: target,
        payment: depositAmount,
        status: 'Pending',
        requestedAt: tx.now,
        completedAt: 0,
        reportId: 0,
      });

      const index = this.state.requesterIndex.get(caller) ?? [];
      index.push(id);
      this.state.requesterIndex.set(caller, index);
      this.state.collectedFees += depositAmount;

      tx.emit({ type: 'RequestSubmitted', requestId: id, requester: caller, targetAddress: target, depositAmount });

      logger.info('request_submitted', 'Audit request submitted', {
        requestId: id,
        requester: shortIdentity(caller),
        targetAddress: target,
        depositAmount,
        feeExempt: exempt,
      });

      return id;
    });
  }

  startWork(caller: Identity, requestId: number): AuditRequest {
    return this.execute('startWork', (tx) => {
      this.requireNotPaused();
      this.requireAuditor(caller);
      const request = this.findRequest(requestId);
      requireTransition(requestId, request.status, 'InProgress');

      request.status = 'InProgress';
      tx.emit({ type: 'WorkStarted', requestId });

      logger.info('work_started', 'Auditor started work', { requestId });
      return { ...request };
    });
  }

  /** `reportId` is stored as given; it is not looked up in the report registry. */
  completeWork(caller: Identity, requestId: number, reportId: number): AuditRequest {
    return this.execute('completeWork', (tx) => {
      this.requireNotPaused();
      this.requireAuditor(caller);
      if (!Number.isSafeInteger(reportId) || reportId <= 0) {
        throw new DomainError('InvalidInput', 'reportId must be a positive integer', { reportId });
      }

      const request = this.findRequest(requestId);
      requireTransition(requestId, request.status, 'Completed');

      const previous = request.status;
      request.status = 'Completed';
      request.completedAt = tx.now;
      request.reportId = reportId;
      tx.emit({ type: 'WorkCompleted', requestId, reportId });

      logger.info('work_completed', 'Auditor completed work', {
        requestId,
        reportId,
        from: previous,
        settled: request.payment,
      });
      return { ...request };
    });
  }

  refundRequest(caller: Identity, requestId: number): AuditRequest {
    return this.execute('refundRequest', (tx) => {
      const request = this.findRequest(requestId);
      requireTransition(requestId, request.status, 'Refunded');

      const eligibleAt = request.requestedAt + this.state.config.refundTimeoutSeconds;
      if (tx.now < eligibleAt) {
        throw new DomainError('TimeoutNotReached', `Request ${requestId} is refundable from ${eligibleAt}`, {
          requestId,
          eligibleAt,
          now: tx.now,
        });
      }

      if (caller !== request.requester && caller !== this.state.config.owner) {
        throw new DomainError('Unauthorized', 'Only the requester or the owner can refund a request', {
          requestId,
        });
      }

      const amount = request.payment;
      request.status = 'Refunded';
      request.payment = 0n;
      if (amount > 0n) {
        this.state.collectedFees -= amount;
        this.payout(request.requester, amount, { requestId });
      }
      tx.emit({ type: 'RequestRefunded', requestId, requester: request.requester, amount });

      logger.info('request_refunded', 'Deposit returned to requester', {
        requestId,
        requester: shortIdentity(request.requester),
        amount,
      });
      return { ...request };
    });
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getRequest(requestId: number): AuditRequest {
    return { ...this.findRequest(requestId) };
  }

  getRequestCount(): number {
    return this.state.requests.length;
  }

  /**
   * Scans every id on each call; cost grows with the total number of
   * requests ever made.
   */
  *listPending(): Generator<number, void, undefined> {
    const count = this.state.requests.length;
    for (let id = 1; id <= count; id++) {
      const request = this.state.requests[id - 1];
      if (request && request.status === 'Pending') {
        yield id;
      }
    }
  }

  listByRequester(requester: Identity): number[] {
    return [...(this.state.requesterIndex.get(requester) ?? [])];
  }

  isFeeExempt(targetAddress: Identity): boolean {
    return this.state.feeExempt.has(targetAddress);
  }

  getConfig(): QueueConfig {
    return { ...this.state.config };
  }

  getCustodyIdentity(): Identity {
    return this.custody;
  }

  getBalance(): bigint {
    return this.funds.balanceOf(this.custody);
  }

  getCollectedFees(): bigint {
    return this.state.collectedFees;
  }

  getOutstandingEscrow(): bigint {
    return this.state.requests
      .filter(r => holdsEscrow(r.status))
      .reduce((sum, r) => sum + r.payment, 0n);
  }

  getBalanceReport(): BalanceReport {
    const custodyBalance = this.getBalance();
    const outstandingEscrow = this.getOutstandingEscrow();
    return {
      custodyBalance,
      collectedFees: this.state.collectedFees,
      outstandingEscrow,
      surplus: custodyBalance - outstandingEscrow,
    };
  }

  /** Non-fatal invariant violations observed at the last commit. */
  getLastViolations(): InvariantViolation[] {
    return [...this.lastViolations];
  }

  // ---------------------------------------------------------------------------
  // Administration (owner only)
  // ---------------------------------------------------------------------------

  setMinimumFee(caller: Identity, amount: bigint): QueueConfig {
    return this.execute('setMinimumFee', (tx) => {
      this.requireOwner(caller);
      if (amount < 0n) {
        throw new DomainError('InvalidInput', 'Minimum fee must be non-negative');
      }
      const previous = this.state.config.minimumFee;
      this.state.config.minimumFee = amount;
      tx.emit({ type: 'MinimumFeeUpdated', previous, current: amount });
      logger.info('minimum_fee_updated', 'Minimum fee updated', { previous, current: amount });
      return { ...this.state.config };
    });
  }

  setRefundTimeout(caller: Identity, seconds: number): QueueConfig {
    return this.execute('setRefundTimeout', (tx) => {
      this.requireOwner(caller);
      if (!Number.isSafeInteger(seconds) || seconds < 0 || seconds > MAX_REFUND_TIMEOUT_SECONDS) {
        throw new DomainError(
          'InvalidInput',
          `Refund timeout must be an integer between 0 and ${MAX_REFUND_TIMEOUT_SECONDS} seconds`,
          { seconds }
        );
      }
      const previous = this.state.config.refundTimeoutSeconds;
      this.state.config.refundTimeoutSeconds = seconds;
      tx.emit({ type: 'RefundTimeoutUpdated', previous, current: seconds });
      logger.info('refund_timeout_updated', 'Refund timeout updated', { previous, current: seconds });
      return { ...this.state.config };
    });
  }

  setAuditor(caller: Identity, auditor: Identity): QueueConfig {
    return this.execute('setAuditor', (tx) => {
      this.requireOwner(caller);
      const next = requireIdentity(auditor, 'auditor');
      const previous = this.state.config.auditor;
      this.state.config.auditor = next;
      tx.emit({ type: 'AuditorUpdated', previous, current: next });
      logger.info('auditor_updated', 'Auditor replaced', {
        previous: shortIdentity(previous),
        current: shortIdentity(next),
        inFlight: this.state.requests.filter(r => holdsEscrow(r.status)).length,
      });
      return { ...this.state.config };
    });
  }

  grantFeeExemption(caller: Identity, targetAddress: Identity): void {
    this.execute('grantFeeExemption', (tx) => {
      this.requireOwner(caller);
      const target = requireIdentity(targetAddress, 'targetAddress');
      this.state.feeExempt.add(target);
      tx.emit({ type: 'FeeExemptionGranted', targetAddress: target });
      logger.info('fee_exemption_granted', 'Target exempted from minimum fee', { targetAddress: target });
    });
  }

  /**
   * Sweeps the whole custody balance, regardless of what pending requests
   * may still need for refunds. A later refund can then fail with
   * TransferFailed.
   */
  withdrawFunds(caller: Identity, to: Identity): bigint {
    return this.execute('withdrawFunds', (tx) => {
      this.requireOwner(caller);
      const recipient = requireIdentity(to, 'to');
      if (recipient === this.custody) {
        throw new DomainError('InvalidInput', 'Cannot withdraw to the custody identity');
      }
      const amount = this.funds.balanceOf(this.custody);
      if (amount === 0n) {
        throw new DomainError('NoBalance', 'Nothing to withdraw');
      }

      const outstanding = this.getOutstandingEscrow();
      this.payout(recipient, amount, { withdrawal: true });
      tx.emit({ type: 'FundsWithdrawn', to: recipient, amount });

      if (outstanding > 0n) {
        logger.warn('withdraw_below_escrow', 'Withdrawal swept deposits that pending requests may reclaim', {
          amount,
          outstandingEscrow: outstanding,
        });
      }
      logger.info('funds_withdrawn', 'Custody balance withdrawn', { to: shortIdentity(recipient), amount });
      return amount;
    });
  }

  pause(caller: Identity): QueueConfig {
    return this.execute('pause', (tx) => {
      this.requireOwner(caller);
      if (this.state.config.paused) {
        throw new DomainError('InvalidState', 'Queue is already paused');
      }
      this.state.config.paused = true;
      tx.emit({ type: 'Paused', by: caller });
      logger.warn('queue_paused', 'Queue paused');
      return { ...this.state.config };
    });
  }

  unpause(caller: Identity): QueueConfig {
    return this.execute('unpause', (tx) => {
      this.requireOwner(caller);
      if (!this.state.config.paused) {
        throw new DomainError('InvalidState', 'Queue is not paused');
      }
      this.state.config.paused = false;
      tx.emit({ type: 'Unpaused', by: caller });
      logger.info('queue_unpaused', 'Queue unpaused');
      return { ...this.state.config };
    });
  }

  transferOwnership(caller: Identity, newOwner: Identity): QueueConfig {
    return this.execute('transferOwnership', (tx) => {
      this.requireOwner(caller);
      const next = requireIdentity(newOwner, 'newOwner');
      const previous = this.state.config.owner;
      this.state.config.owner = next;
      tx.emit({ type: 'OwnershipTransferred', component: 'queue', previous, current: next });
      logger.info('ownership_transferred', 'Queue ownership transferred', {
        previous: shortIdentity(previous),
        current: shortIdentity(next),
      });
      return { ...this.state.config };
    });
  }

  renounceOwnership(caller: Identity): never {
    this.requireOwner(caller);
    throw new DomainError('OperationDisabled', 'Ownership cannot be renounced');
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  exportState(): QueueState {
    return structuredClone(this.state);
  }

  importState(state: QueueState): void {
    this.state = structuredClone(state);
    logger.info('queue_restored', 'Queue state restored', {
      requestCount: this.state.requests.length,
      collectedFees: this.state.collectedFees,
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private execute<T>(operation: string, body: (tx: Transaction) => T): T {
    try {
      return this.runner.run(operation, body, () => {
        this.lastViolations = enforceInvariants(
          {
            requests: this.state.requests,
            requesterIndex: this.state.requesterIndex,
            collectedFees: this.state.collectedFees,
            custodyBalance: this.funds.balanceOf(this.custody),
            outstandingEscrow: this.getOutstandingEscrow(),
            owner: this.state.config.owner,
            auditor: this.state.config.auditor,
          },
          QUEUE_INVARIANTS
        );
      });
    } catch (error) {
      logger.warn('queue_operation_failed', `${operation} rejected`, {
        operation,
        code: isDomainError(error) ? error.code : undefined,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  private payout(to: Identity, amount: bigint, detail: Record<string, unknown>): void {
    try {
      maybeInjectFault('PAYOUT_FAILURE');
      this.funds.transfer(this.custody, to, amount);
    } catch (error) {
      logger.error('payout_failed', 'Outbound transfer failed', {
        ...detail,
        to: shortIdentity(to),
        amount,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw new DomainError('TransferFailed', 'Outbound payment could not be delivered', {
        ...detail,
        cause: isDomainError(error) ? error.code : error instanceof Error ? error.name : 'Unknown',
      });
    }
  }

  private findRequest(requestId: number): AuditRequest {
    const request = Number.isSafeInteger(requestId) ? this.state.requests[requestId - 1] : undefined;
    if (!request || requestId < 1) {
      throw new DomainError('NotFound', `Request ${requestId} does not exist`, { requestId });
    }
    return request;
  }

  private requireOwner(caller: Identity): void {
    if (caller !== this.state.config.owner) {
      throw new DomainError('Unauthorized', 'Caller is not the owner');
    }
  }

  private requireAuditor(caller: Identity): void {
    if (caller !== this.state.config.auditor) {
      throw new DomainError('Unauthorized', 'Caller is not the auditor');
    }
  }

  private requireNotPaused(): void {
    if (this.state.config.paused) {
      throw new DomainError('Paused', 'Queue is paused');
    }
  }
}
