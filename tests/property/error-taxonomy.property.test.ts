/**
 * Error taxonomy and HTTP mapping
 *
 * @file src/backend/shared/src/models/errors.ts
 * @file src/backend/api/src/middleware/error-handler.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  ComplianceError,
  ConflictError,
  ErrorCode,
  ErrorKind,
  ExternalServiceError,
  InvalidTransitionError,
  isComplianceError,
  isErrorKind,
  NotFoundError,
  parseWithSchema,
  ValidationError,
} from '@supplier-compliance/shared';
import { STATUS_BY_KIND, toErrorResponse } from '../../src/backend/api/src/middleware/error-handler.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const sampleErrors: Array<[ComplianceError, ErrorKind, number]> = [
  [new NotFoundError(ErrorCode.REQUIREMENT_NOT_FOUND, 'Requirement', 'req-1'), ErrorKind.NOT_FOUND, 404],
  [new InvalidTransitionError('Requirement', 'pending', 'approved'), ErrorKind.INVALID_TRANSITION, 409],
  [new ConflictError(ErrorCode.SUPPLIER_ALREADY_INVITED, 'Already invited'), ErrorKind.CONFLICT, 409],
  [new ValidationError(ErrorCode.INVALID_INPUT, 'Bad input'), ErrorKind.VALIDATION, 400],
  [new ExternalServiceError('CheckFix', 'Provider down'), ErrorKind.EXTERNAL_SERVICE, 502],
];

describe('Error taxonomy', () => {
  it('each error class carries its kind', () => {
    for (const [error, kind] of sampleErrors) {
      expect(error.kind).toBe(kind);
      expect(isComplianceError(error)).toBe(true);
      expect(isErrorKind(error, kind)).toBe(true);
      expect(error).toBeInstanceOf(Error);
    }
    expect(isComplianceError(new Error('plain'))).toBe(false);
    expect(isErrorKind('not an error', ErrorKind.NOT_FOUND)).toBe(false);
  });

  it('NotFoundError names the resource', () => {
    const error = new NotFoundError(ErrorCode.RELATIONSHIP_NOT_FOUND, 'Relationship', 'rel-9');
    expect(error.message).toBe('Relationship rel-9 not found');
    expect(error).toMatchObject({ resourceType: 'Relationship', resourceId: 'rel-9', name: 'NotFoundError' });
  });

  it('InvalidTransitionError describes the pair or the blocked operation', () => {
    expect(new InvalidTransitionError('Relationship', 'pending', 'suspended').message).toBe(
      'Relationship cannot transition from pending to suspended'
    );
    const blocked = new InvalidTransitionError('Requirement', 'approved', undefined, ErrorCode.CANNOT_REVIEW);
    expect(blocked.message).toBe('Requirement in status approved does not allow this operation');
    expect(blocked.code).toBe(ErrorCode.CANNOT_REVIEW);
    expect(blocked.to).toBeUndefined();
  });

  it('ExternalServiceError defaults to the provider error code and keeps the cause', () => {
    const cause = new Error('socket hang up');
    const error = new ExternalServiceError('CheckFix', 'Request failed', { statusCode: 503, cause });

    expect(error.code).toBe(ErrorCode.CHECKFIX_API_ERROR);
    expect(error.statusCode).toBe(503);
    expect(error.cause).toBe(cause);
    expect(new ExternalServiceError('CheckFix', 'Slow', { code: ErrorCode.CHECKFIX_TIMEOUT }).code).toBe(
      ErrorCode.CHECKFIX_TIMEOUT
    );
  });

  describe('parseWithSchema', () => {
    const schema = z.object({ name: z.string().min(1), score: z.number().int().max(100) });

    it('returns the parsed value', () => {
      expect(parseWithSchema(schema, { name: 'Acme', score: 80 })).toEqual({ name: 'Acme', score: 80 });
    });

    it('throws a ValidationError listing each failing field', () => {
      let thrown: unknown;
      try {
        parseWithSchema(schema, { name: '', score: 120 });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(ValidationError);
      expect(thrown).toMatchObject({ code: ErrorCode.INVALID_INPUT, message: 'Request validation failed' });
      if (thrown instanceof ValidationError) {
        expect(thrown.details.map((detail) => detail.field)).toEqual(['name', 'score']);
      }
    });
  });

  describe('toErrorResponse', () => {
    it('maps every kind to its status and a named body', () => {
      for (const [error, kind, status] of sampleErrors) {
        const response = toErrorResponse(error, 'corr-1');
        expect(response.status).toBe(status);
        expect(STATUS_BY_KIND[kind]).toBe(status);
        expect(response.body.message).toBe(error.message);
        expect(response.body.correlationId).toBe('corr-1');
      }
      expect(toErrorResponse(sampleErrors[0][0]).body.error).toBe('NotFound');
      expect(toErrorResponse(sampleErrors[1][0]).body.error).toBe('InvalidTransition');
    });

    it('includes validation details only when present', () => {
      const detailed = new ValidationError(ErrorCode.INVALID_INPUT, 'Bad', [
        { field: 'email', message: 'Invalid email', code: 'invalid_string' },
      ]);
      expect(toErrorResponse(detailed).body.details).toEqual([
        { field: 'email', message: 'Invalid email', code: 'invalid_string' },
      ]);
      expect(toErrorResponse(new ValidationError(ErrorCode.INVALID_INPUT, 'Bad')).body.details).toBeUndefined();
    });

    it('malformed JSON is a 400 and anything unknown is a 500 without internals', () => {
      expect(toErrorResponse(new SyntaxError('Unexpected token'))).toEqual({
        status: 400,
        body: {
          error: 'ValidationError',
          message: 'Request body is not valid JSON',
          correlationId: undefined,
          details: undefined,
        },
      });

      fc.assert(
        fc.property(fc.string(), (message) => {
          const response = toErrorResponse(new Error(message));
          expect(response.status).toBe(500);
          expect(response.body.message).toBe('An unexpected error occurred');
        }),
        propertyConfig
      );
    });
  });
});
