import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { parseIdentity, requireIdentity, type Identity } from '../chain/identity.js';
import { DomainError } from '../errors/domain-error.js';
import { generateOperationId, logger } from '../observability/logger.js';
import { sendError } from './errors.js';

export const CALLER_HEADER = 'x-caller';

/** The gateway in front of this service authenticates callers and sets the header. */
export function getCaller(req: Request): Identity {
  const header = req.header(CALLER_HEADER);
  if (!header) {
    throw new DomainError('Unauthorized', `${CALLER_HEADER} header is required`);
  }
  return requireIdentity(header, CALLER_HEADER);
}

export function parseRouteId(value: string | undefined, field: string): number {
  const id = Number(value);
  if (!Number.isSafeInteger(id)) {
    throw new DomainError('InvalidInput', `${field} must be an integer`, { field });
  }
  return id;
}

export function parseRouteIdentity(value: string | undefined, field: string): Identity {
  return parseIdentity(value, field);
}

export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const operationId = generateOperationId();
  logger.setContext({
    operationId,
    caller: req.header(CALLER_HEADER),
    route: `${req.method} ${req.path}`,
  });
  res.setHeader('x-operation-id', operationId);
  res.on('finish', () => {
    logger.clearContext();
  });
  next();
}

export function route(
  phase: string,
  handler: (req: Request, res: Response) => Promise<void> | void
): RequestHandler {
  return (req, res) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch((error: unknown) => {
        sendError(res, phase, error);
      });
  };
}
