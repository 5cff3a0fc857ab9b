import type { InvariantViolation, InvariantSeverity } from './types.js';

const SEVERITY_RANK: Record<InvariantSeverity, number> = {
  warn: 1,
  error: 2,
  fatal: 3,
};

export class InvariantViolationError extends Error {
  constructor(
    public readonly violations: InvariantViolation[]
  ) {
    super(`Invariant violations: ${violations.map(v => v.invariantId).join(', ')}`);
    this.name = 'InvariantViolationError';
  }

  getViolationsBySeverity(severity: InvariantSeverity): InvariantViolation[] {
    return this.violations.filter(v => v.severity === severity);
  }
}

export interface ViolationSummary {
  total: number;
  warn: number;
  error: number;
  fatal: number;
  worst: InvariantSeverity | null;
}

export function summarizeViolations(violations: InvariantViolation[]): ViolationSummary {
  let worst: InvariantSeverity | null = null;
  for (const v of violations) {
    if (worst === null || SEVERITY_RANK[v.severity] > SEVERITY_RANK[worst]) {
      worst = v.severity;
    }
  }

  return {
    total: violations.length,
    warn: violations.filter(v => v.severity === 'warn').length,
    error: violations.filter(v => v.severity === 'error').length,
    fatal: violations.filter(v => v.severity === 'fatal').length,
    worst,
  };
}
