import { parseIdentity, type Identity } from '../chain/identity.js';
import type { BalanceSnapshot } from '../chain/funds.js';
import { isRequestStatus } from '../requests/states.js';
import type { AuditRequest, QueueState } from '../requests/types.js';
import type { AuditRecord, AuditorInfo, RegistryState } from '../registry/types.js';

export const SNAPSHOT_VERSION = 1;

export interface SerializedRequest {
  id: number;
  requester: string;
  targetAddress: string;
  payment: string;
  status: string;
  requestedAt: number;
  completedAt: number;
  reportId: number;
}

export interface SerializedQueueState {
  config: {
    owner: string;
    auditor: string;
    minimumFee: string;
    refundTimeoutSeconds: number;
    paused: boolean;
  };
  requests: SerializedRequest[];
  requesterIndex: Record<string, number[]>;
  feeExempt: string[];
  collectedFees: string;
}

export interface SerializedRegistryState {
  owner: string;
  records: AuditRecord[];
  byContract: Record<string, number[]>;
  auditors: AuditorInfo[];
}

export interface LedgerSnapshot {
  version: number;
  savedAt: string;
  queue: SerializedQueueState;
  registry: SerializedRegistryState;
  balances: BalanceSnapshot;
}

export class SnapshotFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotFormatError';
  }
}

export function serializeRequest(request: AuditRequest): SerializedRequest {
  return { ...request, payment: request.payment.toString() };
}

export function serializeQueueState(state: QueueState): SerializedQueueState {
  return {
    config: {
      ...state.config,
      minimumFee: state.config.minimumFee.toString(),
    },
    requests: state.requests.map(serializeRequest),
    requesterIndex: Object.fromEntries(state.requesterIndex),
    feeExempt: [...state.feeExempt],
    collectedFees: state.collectedFees.toString(),
  };
}

export function deserializeQueueState(data: SerializedQueueState): QueueState {
  const requests = data.requests.map((r): AuditRequest => {
    if (!isRequestStatus(r.status)) {
      throw new SnapshotFormatError(`Unknown request status "${r.status}" for request ${r.id}`);
    }
    return {
      id: r.id,
      requester: parseIdentity(r.requester, 'requester'),
      targetAddress: parseIdentity(r.targetAddress, 'targetAddress'),
      payment: BigInt(r.payment),
      status: r.status,
      requestedAt: r.requestedAt,
      completedAt: r.completedAt,
      reportId: r.reportId,
    };
  });

  return {
    config: {
      owner: parseIdentity(data.config.owner, 'owner'),
      auditor: parseIdentity(data.config.auditor, 'auditor'),
      minimumFee: BigInt(data.config.minimumFee),
      refundTimeoutSeconds: data.config.refundTimeoutSeconds,
      paused: data.config.paused,
    },
    requests,
    requesterIndex: toIdentityMap(data.requesterIndex),
    feeExempt: new Set(data.feeExempt.map(t => parseIdentity(t, 'feeExempt'))),
    collectedFees: BigInt(data.collectedFees),
  };
}

export function serializeRegistryState(state: RegistryState): SerializedRegistryState {
  return {
    owner: state.owner,
    records: state.records.map(r => ({ ...r, issues: { ...r.issues } })),
    byContract: Object.fromEntries(state.byContract),
    auditors: [...state.auditors.values()].map(a => ({ ...a })),
  };
}

export function deserializeRegistryState(data: SerializedRegistryState): RegistryState {
  const auditors = new Map<Identity, AuditorInfo>();
  for (const info of data.auditors) {
    const identity = parseIdentity(info.identity, 'auditor');
    auditors.set(identity, { identity, name: info.name, authorized: info.authorized });
  }

  return {
    owner: parseIdentity(data.owner, 'owner'),
    records: data.records.map(r => ({
      ...r,
      targetAddress: parseIdentity(r.targetAddress, 'targetAddress'),
      auditor: parseIdentity(r.auditor, 'auditor'),
      issues: { ...r.issues },
    })),
    byContract: toIdentityMap(data.byContract),
    auditors,
  };
}

export function parseSnapshot(raw: string): LedgerSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SnapshotFormatError(
      `Snapshot is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  if (!isRecord(parsed) || parsed.version !== SNAPSHOT_VERSION) {
    throw new SnapshotFormatError('Snapshot has an unsupported version');
  }

  const { savedAt, queue, registry, balances } = parsed;
  if (!isSerializedQueueState(queue)) {
    throw new SnapshotFormatError('Snapshot queue section is malformed');
  }
  if (!isSerializedRegistryState(registry)) {
    throw new SnapshotFormatError('Snapshot registry section is malformed');
  }
  if (!isStringRecord(balances)) {
    throw new SnapshotFormatError('Snapshot balances section is malformed');
  }

  return {
    version: SNAPSHOT_VERSION,
    savedAt: typeof savedAt === 'string' ? savedAt : '',
    queue,
    registry,
    balances,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(v => typeof v === 'string');
}

function isIdListRecord(value: unknown): value is Record<string, number[]> {
  return (
    isRecord(value) &&
    Object.values(value).every(ids => Array.isArray(ids) && ids.every(id => typeof id === 'number'))
  );
}

function isSerializedRequest(value: unknown): value is SerializedRequest {
  return (
    isRecord(value) &&
    typeof value.id === 'number' &&
    typeof value.requester === 'string' &&
    typeof value.targetAddress === 'string' &&
    typeof value.payment === 'string' &&
    typeof value.status === 'string' &&
    typeof value.requestedAt === 'number' &&
    typeof value.completedAt === 'number' &&
    typeof value.reportId === 'number'
  );
}

function isSerializedQueueState(value: unknown): value is SerializedQueueState {
  if (!isRecord(value) || !isRecord(value.config)) return false;
  const config = value.config;
  return (
    typeof config.owner === 'string' &&
    typeof config.auditor === 'string' &&
    typeof config.minimumFee === 'string' &&
    typeof config.refundTimeoutSeconds === 'number' &&
    typeof config.paused === 'boolean' &&
    Array.isArray(value.requests) &&
    value.requests.every(isSerializedRequest) &&
    isIdListRecord(value.requesterIndex) &&
    Array.isArray(value.feeExempt) &&
    value.feeExempt.every(t => typeof t === 'string') &&
    typeof value.collectedFees === 'string'
  );
}

function isIssueCounts(value: unknown): boolean {
  return (
    isRecord(value) &&
    ['critical', 'high', 'medium', 'low', 'informational'].every(field => typeof value[field] === 'number')
  );
}

function isAuditRecord(value: unknown): value is AuditRecord {
  return (
    isRecord(value) &&
    typeof value.id === 'number' &&
    typeof value.targetAddress === 'string' &&
    typeof value.ipfsHash === 'string' &&
    typeof value.score === 'number' &&
    isIssueCounts(value.issues) &&
    typeof value.auditor === 'string' &&
    typeof value.timestamp === 'number'
  );
}

function isAuditorInfo(value: unknown): value is AuditorInfo {
  return (
    isRecord(value) &&
    typeof value.identity === 'string' &&
    typeof value.name === 'string' &&
    typeof value.authorized === 'boolean'
  );
}

function isSerializedRegistryState(value: unknown): value is SerializedRegistryState {
  return (
    isRecord(value) &&
    typeof value.owner === 'string' &&
    Array.isArray(value.records) &&
    value.records.every(isAuditRecord) &&
    isIdListRecord(value.byContract) &&
    Array.isArray(value.auditors) &&
    value.auditors.every(isAuditorInfo)
  );
}

function toIdentityMap(record: Record<string, number[]>): Map<Identity, number[]> {
  const map = new Map<Identity, number[]>();
  for (const [key, ids] of Object.entries(record)) {
    map.set(parseIdentity(key), [...ids]);
  }
  return map;
}
