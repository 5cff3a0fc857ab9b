import type { Identity } from '../chain/identity.js';

export interface IssueCounts {
  critical: number;
  high: number;
  medium: number;
  low: number;
  informational: number;
}

export interface AuditAttributes {
  targetAddress: Identity;
  /** Content identifier of the full report; stored, never fetched. */
  ipfsHash: string;
  /** 0-100, produced off-system. */
  score: number;
  issues: IssueCounts;
}

export interface AuditRecord extends AuditAttributes {
  id: number;
  auditor: Identity;
  timestamp: number;
}

export interface AuditorInfo {
  identity: Identity;
  name: string;
  authorized: boolean;
}

export interface RegistryState {
  owner: Identity;
  records: AuditRecord[];
  byContract: Map<Identity, number[]>;
  auditors: Map<Identity, AuditorInfo>;
}

export interface RegistryStats {
  auditCount: number;
  auditedContractsCount: number;
  auditorCount: number;
}

export const MAX_SCORE = 100;
export const MAX_TOTAL_ISSUES = 1000;
export const DEFAULT_COOLDOWN_SECONDS = 60;

export const DISCLAIMER =
  'Audit reports are automated assessments recorded as submitted by the auditor. ' +
  'They are not a guarantee of security, correctness or fitness for any purpose. ' +
  'Always perform your own review before interacting with an audited contract.';
