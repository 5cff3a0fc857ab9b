import type { InvariantContext, InvariantCheckResult, InvariantViolation, InvariantID } from './types.js';
import { getInvariantsByIds, getAllInvariants } from './definitions.js';
import { logger } from '../observability/logger.js';
import { InvariantViolationError, summarizeViolations } from './violations.js';

function describeContext(context: InvariantContext): Record<string, unknown> {
  return {
    requestCount: context.requests?.length,
    reportCount: context.reportIds?.length,
    collectedFees: context.collectedFees,
    custodyBalance: context.custodyBalance,
    outstandingEscrow: context.outstandingEscrow,
  };
}

export function checkInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[]
): InvariantCheckResult {
  const invariants = invariantIds 
    ? getInvariantsByIds(invariantIds)
    : getAllInvariants();

  const violations: InvariantViolation[] = [];

  for (const invariant of invariants) {
    try {
      const passed = invariant.evaluate(context);
      
      if (!passed) {
        violations.push({
          invariantId: invariant.id,
          description: invariant.description,
          severity: invariant.severity,
          timestamp: new Date().toISOString(),
        });
        
        logger.warn('invariant_violation', `Invariant violated: ${invariant.id}`, {
          invariantId: invariant.id,
          severity: invariant.severity,
          description: invariant.description,
          context: describeContext(context),
        });
      }
    } catch (error) {
      logger.error('invariant_check_error', 'Error evaluating invariant', {
        invariantId: invariant.id,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  return {
    passed: violations.length === 0,
    violations,
  };
}

/** Throws on fatal violations; weaker ones are only logged. */
export function enforceInvariants(
  context: InvariantContext,
  invariantIds?: InvariantID[]
): InvariantViolation[] {
  const result = checkInvariants(context, invariantIds);
  
  if (!result.passed) {
    const summary = summarizeViolations(result.violations);
    
    logger.error('invariant_enforcement', 'Invariant violations detected', {
      summary,
      violations: result.violations.map(v => ({
        id: v.invariantId,
        severity: v.severity,
        description: v.description,
      })),
    });
    
    const fatalViolations = result.violations.filter(v => v.severity === 'fatal');
    if (fatalViolations.length > 0) {
      throw new InvariantViolationError(fatalViolations);
    }
  }

  return result.violations;
}
