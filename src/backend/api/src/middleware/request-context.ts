/**
 * Request Context
 *
 * Correlation id and request-scoped logger attached to every request, plus
 * the wrapper route handlers are written against.
 *
 * @tested tests/e2e/compliance-workflow.e2e.test.ts
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '@supplier-compliance/shared';
import type { AuthenticatedRequest, AuthenticatedUser } from './auth.js';
import { createErrorResponse } from './error-handler.js';

export interface RequestContext {
  correlationId: string;
  requestId: string;
  startTime: number;
  logger: Logger;
}

export interface ContextualRequest extends Request {
  context?: RequestContext;
}

export type ApiRequest = AuthenticatedRequest & ContextualRequest;

/**
 * Adds the correlation id (taken from X-Correlation-ID when present) and
 * echoes it on the response
 */
export function addRequestContext(logger: Logger) {
  return (req: ContextualRequest, res: Response, next: NextFunction): void => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
    const requestId = uuidv4();

    req.context = {
      correlationId,
      requestId,
      startTime: Date.now(),
      logger: logger.child(correlationId),
    };
    res.setHeader('X-Correlation-ID', correlationId);
    res.setHeader('X-Request-ID', requestId);
    next();
  };
}

/**
 * What an authenticated handler works with
 */
export interface RequestScope {
  user: AuthenticatedUser;
  correlationId: string;
  logger: Logger;
}

export type ScopedHandler = (req: ApiRequest, res: Response, scope: RequestScope) => Promise<void>;

/**
 * Adapts an async handler: resolves the caller and forwards rejections to
 * the error handler
 */
export function route(handler: ScopedHandler, fallbackLogger: Logger): RequestHandler {
  return (req: ApiRequest, res: Response, next: NextFunction): void => {
    const correlationId = req.context?.correlationId ?? uuidv4();
    const user = req.user;
    if (!user) {
      res.status(401).json(createErrorResponse('Unauthorized', 'Authentication required', correlationId));
      return;
    }

    const logger = req.context?.logger ?? fallbackLogger.child(correlationId);
    handler(req, res, { user, correlationId, logger }).catch(next);
  };
}
