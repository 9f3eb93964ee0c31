/**
 * Error Responses
 *
 * Standard error body and the mapping from engine error kinds to HTTP
 * status codes.
 *
 * @tested tests/property/error-taxonomy.property.test.ts
 */

import { Request, Response, NextFunction } from 'express';
import {
  ErrorKind,
  isComplianceError,
  ValidationError,
  type FieldErrorDetail,
  type Logger,
} from '@supplier-compliance/shared';
import type { ContextualRequest } from './request-context.js';

/**
 * API Error response format
 */
export interface ApiErrorResponse {
  error: string;
  message: string;
  correlationId?: string;
  details?: FieldErrorDetail[];
}

export function createErrorResponse(
  error: string,
  message: string,
  correlationId?: string,
  details?: FieldErrorDetail[]
): ApiErrorResponse {
  return {
    error,
    message,
    correlationId,
    details,
  };
}

export const STATUS_BY_KIND: Readonly<Record<ErrorKind, number>> = {
  not_found: 404,
  invalid_transition: 409,
  conflict: 409,
  validation_error: 400,
  external_service_error: 502,
};

export const ERROR_NAME_BY_KIND: Readonly<Record<ErrorKind, string>> = {
  not_found: 'NotFound',
  invalid_transition: 'InvalidTransition',
  conflict: 'Conflict',
  validation_error: 'ValidationError',
  external_service_error: 'ExternalServiceError',
};

/**
 * HTTP status and body for any thrown value
 */
export function toErrorResponse(
  error: unknown,
  correlationId?: string
): { status: number; body: ApiErrorResponse } {
  if (isComplianceError(error)) {
    return {
      status: STATUS_BY_KIND[error.kind],
      body: createErrorResponse(
        ERROR_NAME_BY_KIND[error.kind],
        error.message,
        correlationId,
        error instanceof ValidationError && error.details.length > 0 ? error.details : undefined
      ),
    };
  }

  // express.json() raises SyntaxError for malformed bodies
  if (error instanceof SyntaxError) {
    return {
      status: 400,
      body: createErrorResponse('ValidationError', 'Request body is not valid JSON', correlationId),
    };
  }

  return {
    status: 500,
    body: createErrorResponse('InternalError', 'An unexpected error occurred', correlationId),
  };
}

/**
 * Global error handler. Engine errors are logged at warn level, provider
 * failures and unknown errors at error level.
 */
export function errorHandler(logger: Logger) {
  return (err: unknown, req: ContextualRequest, res: Response, _next: NextFunction): void => {
    const correlationId = req.context?.correlationId;
    const requestLogger = req.context?.logger ?? logger;
    const { status, body } = toErrorResponse(err, correlationId);
    const metadata = { method: req.method, path: req.path, status };

    if (isComplianceError(err) && err.kind !== ErrorKind.EXTERNAL_SERVICE) {
      requestLogger.warn(`Request failed: ${err.message}`, { ...metadata, code: err.code });
    } else if (status === 400) {
      requestLogger.warn('Malformed request body', metadata);
    } else {
      requestLogger.error('Request failed', err instanceof Error ? err : new Error(String(err)), metadata);
    }

    res.status(status).json(body);
  };
}

/**
 * 404 for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse('NotFound', `No route for ${req.method} ${req.path}`));
}
