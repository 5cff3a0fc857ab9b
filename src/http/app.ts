import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { DomainError } from '../errors/domain-error.js';
import type { LedgerService } from '../runtime/ledger-service.js';
import { requestContext } from './context.js';
import { sendError } from './errors.js';
import { adminRouter } from './routes/admin.js';
import { opsRouter } from './routes/ops.js';
import { registryRouter } from './routes/registry.js';
import { requestsRouter } from './routes/requests.js';

export function createApp(service: LedgerService): Express {
  const app = express();

  app.use(express.json());
  app.use(requestContext);

  app.use(opsRouter(service));
  app.use(requestsRouter(service));
  app.use(adminRouter(service));
  app.use(registryRouter(service));

  app.use((_req, res) => {
    res.status(404).json({ error: 'NotFound', message: 'Route not found' });
  });

  // Express only treats a middleware with four parameters as an error handler.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      sendError(res, 'parse_body', new DomainError('InvalidInput', 'Request body is not valid JSON'));
      return;
    }
    sendError(res, 'unhandled_error', error);
  });

  return app;
}

function isBodyParseError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
}
