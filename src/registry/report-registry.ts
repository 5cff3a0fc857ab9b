import type { Clock } from '../chain/clock.js';
import { requireIdentity, shortIdentity, type Identity } from '../chain/identity.js';
import { TransactionRunner, type Transaction } from '../chain/transaction.js';
import { DomainError, isDomainError } from '../errors/domain-error.js';
import type { EventSink } from '../events/types.js';
import { enforceInvariants } from '../invariants/checker.js';
import { REGISTRY_INVARIANTS } from '../invariants/definitions.js';
import { logger } from '../observability/logger.js';
import {
  DEFAULT_COOLDOWN_SECONDS,
  MAX_SCORE,
  MAX_TOTAL_ISSUES,
  type AuditAttributes,
  type AuditRecord,
  type AuditorInfo,
  type IssueCounts,
  type RegistryState,
  type RegistryStats,
} from './types.js';

export interface ReportRegistryOptions {
  owner: Identity;
  clock: Clock;
  events: EventSink;
  cooldownSeconds?: number;
}

const ISSUE_FIELDS: (keyof IssueCounts)[] = ['critical', 'high', 'medium', 'low', 'informational'];

/**
 * Append-only store of audit reports. Ids start at 1 and are never reused;
 * records cannot be changed once written.
 */
export class ReportRegistry {
  private state: RegistryState;
  private readonly cooldownSeconds: number;
  private readonly runner: TransactionRunner;

  constructor(options: ReportRegistryOptions) {
    this.state = {
      owner: requireIdentity(options.owner, 'owner'),
      records: [],
      byContract: new Map(),
      auditors: new Map(),
    };
    this.cooldownSeconds = options.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS;
    this.runner = new TransactionRunner({
      component: 'ReportRegistry',
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
      ],
    });
  }

  authorizeAuditor(caller: Identity, auditor: Identity, name: string): AuditorInfo {
    return this.execute('authorizeAuditor', (tx) => {
      this.requireOwner(caller);
      const identity = requireIdentity(auditor, 'auditor');
      const trimmed = typeof name === 'string' ? name.trim() : '';
      if (trimmed.length === 0) {
        throw new DomainError('InvalidInput', 'Auditor name is required');
      }

      const info: AuditorInfo = { identity, name: trimmed, authorized: true };
      this.state.auditors.set(identity, info);
      tx.emit({ type: 'AuditorAuthorized', auditor: identity, name: trimmed });
      logger.info('auditor_authorized', 'Auditor authorized', { auditor: shortIdentity(identity), name: trimmed });
      return { ...info };
    });
  }

  revokeAuditor(caller: Identity, auditor: Identity): void {
    this.execute('revokeAuditor', (tx) => {
      this.requireOwner(caller);
      const info = this.state.auditors.get(auditor);
      if (!info || !info.authorized) {
        throw new DomainError('NotFound', 'Auditor is not authorized', { auditor });
      }
      info.authorized = false;
      tx.emit({ type: 'AuditorRevoked', auditor });
      logger.info('auditor_revoked', 'Auditor revoked', { auditor: shortIdentity(auditor) });
    });
  }

  /** Same as {@link submitAudit}; the interface the request queue's auditor relies on. */
  createRecord(caller: Identity, attributes: AuditAttributes): number {
    return this.submitAudit(caller, attributes);
  }

  submitAudit(caller: Identity, attributes: AuditAttributes): number {
    return this.execute('submitAudit', (tx) => {
      if (!this.isAuditor(caller)) {
        throw new DomainError('Unauthorized', 'Caller is not an authorized auditor');
      }

      const target = requireIdentity(attributes.targetAddress, 'targetAddress');
      const ipfsHash = typeof attributes.ipfsHash === 'string' ? attributes.ipfsHash.trim() : '';
      if (ipfsHash.length === 0) {
        throw new DomainError('InvalidInput', 'ipfsHash is required');
      }
      if (!Number.isInteger(attributes.score) || attributes.score < 0 || attributes.score > MAX_SCORE) {
        throw new DomainError('InvalidInput', `score must be an integer between 0 and ${MAX_SCORE}`, {
          score: attributes.score,
        });
      }
      const issues = validateIssues(attributes.issues);

      const previous = this.latestFor(target);
      if (previous && tx.now < previous.timestamp + this.cooldownSeconds) {
        throw new DomainError('CooldownActive', 'Target was audited too recently', {
          targetAddress: target,
          retryAt: previous.timestamp + this.cooldownSeconds,
        });
      }

      const id = this.state.records.length + 1;
      const record: AuditRecord = {
        id,
        targetAddress: target,
        ipfsHash,
        score: attributes.score,
        issues,
        auditor: caller,
        timestamp: tx.now,
      };
      this.state.records.push(record);
      const ids = this.state.byContract.get(target) ?? [];
      ids.push(id);
      this.state.byContract.set(target, ids);

      tx.emit({ type: 'AuditSubmitted', reportId: id, targetAddress: target, auditor: caller, score: record.score });
      logger.info('audit_submitted', 'Audit report recorded', {
        reportId: id,
        targetAddress: target,
        score: record.score,
        auditor: shortIdentity(caller),
      });
      return id;
    });
  }

  getRecord(id: number): AuditRecord {
    return this.getAudit(id);
  }

  getAudit(id: number): AuditRecord {
    const record = Number.isSafeInteger(id) && id >= 1 ? this.state.records[id - 1] : undefined;
    if (!record) {
      throw new DomainError('NotFound', `Audit ${id} does not exist`, { reportId: id });
    }
    return cloneRecord(record);
  }

  getAuditsForContract(target: Identity): number[] {
    return [...(this.state.byContract.get(target) ?? [])];
  }

  getLatestAudit(target: Identity): AuditRecord {
    const latest = this.latestFor(target);
    if (!latest) {
      throw new DomainError('NotFound', 'Target has no audits', { targetAddress: target });
    }
    return cloneRecord(latest);
  }

  getAuditCount(): number {
    return this.state.records.length;
  }

  /** Counts reports, not distinct targets: a target audited twice counts twice. */
  getAuditedContractsCount(): number {
    return this.state.records.length;
  }

  isAuditor(identity: Identity): boolean {
    return this.state.auditors.get(identity)?.authorized === true;
  }

  getAuditor(identity: Identity): AuditorInfo {
    const info = this.state.auditors.get(identity);
    if (!info) {
      throw new DomainError('NotFound', 'Unknown auditor', { auditor: identity });
    }
    return { ...info };
  }

  getStats(): RegistryStats {
    return {
      auditCount: this.getAuditCount(),
      auditedContractsCount: this.getAuditedContractsCount(),
      auditorCount: [...this.state.auditors.values()].filter(a => a.authorized).length,
    };
  }

  getOwner(): Identity {
    return this.state.owner;
  }

  transferOwnership(caller: Identity, newOwner: Identity): void {
    this.execute('transferOwnership', (tx) => {
      this.requireOwner(caller);
      const next = requireIdentity(newOwner, 'newOwner');
      const previous = this.state.owner;
      this.state.owner = next;
      tx.emit({ type: 'OwnershipTransferred', component: 'registry', previous, current: next });
      logger.info('ownership_transferred', 'Registry ownership transferred', {
        previous: shortIdentity(previous),
        current: shortIdentity(next),
      });
    });
  }

  exportState(): RegistryState {
    return structuredClone(this.state);
  }

  importState(state: RegistryState): void {
    this.state = structuredClone(state);
    logger.info('registry_restored', 'Registry state restored', { auditCount: this.state.records.length });
  }

  private execute<T>(operation: string, body: (tx: Transaction) => T): T {
    try {
      return this.runner.run(operation, body, () => {
        enforceInvariants(
          {
            reportIds: this.state.records.map(r => r.id),
            owner: this.state.owner,
          },
          REGISTRY_INVARIANTS
        );
      });
    } catch (error) {
      logger.warn('registry_operation_failed', `${operation} rejected`, {
        operation,
        code: isDomainError(error) ? error.code : undefined,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  private latestFor(target: Identity): AuditRecord | undefined {
    const ids = this.state.byContract.get(target);
    if (!ids || ids.length === 0) return undefined;
    return this.state.records[ids[ids.length - 1] - 1];
  }

  private requireOwner(caller: Identity): void {
    if (caller !== this.state.owner) {
      throw new DomainError('Unauthorized', 'Caller is not the registry owner');
    }
  }
}

function validateIssues(issues: IssueCounts | undefined): IssueCounts {
  if (!issues) {
    throw new DomainError('InvalidInput', 'issues are required');
  }

  let total = 0;
  for (const field of ISSUE_FIELDS) {
    const count = issues[field];
    if (!Number.isInteger(count) || count < 0) {
      throw new DomainError('InvalidInput', `issues.${field} must be a non-negative integer`, { field });
    }
    total += count;
  }

  if (total > MAX_TOTAL_ISSUES) {
    throw new DomainError('InvalidInput', `Total issue count exceeds ${MAX_TOTAL_ISSUES}`, { total });
  }

  return {
    critical: issues.critical,
    high: issues.high,
    medium: issues.medium,
    low: issues.low,
    informational: issues.informational,
  };
}

function cloneRecord(record: AuditRecord): AuditRecord {
  return { ...record, issues: { ...record.issues } };
}
