import type { QueueConfig, BalanceReport } from '../requests/types.js';

export { serializeRequest } from '../persistence/snapshot.js';

export function serializeConfig(config: QueueConfig, custody: string) {
  return {
    owner: config.owner,
    auditor: config.auditor,
    custody,
    minimumFee: config.minimumFee.toString(),
    refundTimeoutSeconds: config.refundTimeoutSeconds,
    paused: config.paused,
  };
}

export function serializeBalance(report: BalanceReport) {
  return {
    custodyBalance: report.custodyBalance.toString(),
    collectedFees: report.collectedFees.toString(),
    outstandingEscrow: report.outstandingEscrow.toString(),
    surplus: report.surplus.toString(),
  };
}
