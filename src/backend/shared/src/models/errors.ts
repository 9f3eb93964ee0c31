/**
 * Error Taxonomy
 *
 * Typed errors raised by the compliance engine and its services. Every error
 * carries a `kind` (what went wrong, used for HTTP status mapping) and a
 * machine-readable `code` (which rule was violated).
 *
 * @tested tests/property/error-taxonomy.property.test.ts
 */

/**
 * Error kinds
 */
export const ErrorKind = {
  NOT_FOUND: 'not_found',
  INVALID_TRANSITION: 'invalid_transition',
  CONFLICT: 'conflict',
  VALIDATION: 'validation_error',
  EXTERNAL_SERVICE: 'external_service_error',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/**
 * Error codes, grouped loosely by the entity they concern
 */
export const ErrorCode = {
  // not_found
  RELATIONSHIP_NOT_FOUND: 'RELATIONSHIP_NOT_FOUND',
  REQUIREMENT_NOT_FOUND: 'REQUIREMENT_NOT_FOUND',
  RESPONSE_NOT_FOUND: 'RESPONSE_NOT_FOUND',
  SUBMISSION_NOT_FOUND: 'SUBMISSION_NOT_FOUND',
  VERIFICATION_NOT_FOUND: 'VERIFICATION_NOT_FOUND',
  QUESTIONNAIRE_NOT_FOUND: 'QUESTIONNAIRE_NOT_FOUND',
  QUESTION_NOT_FOUND: 'QUESTION_NOT_FOUND',
  ORGANIZATION_NOT_FOUND: 'ORGANIZATION_NOT_FOUND',
  REPORT_NOT_FOUND: 'REPORT_NOT_FOUND',
  TEMPLATE_NOT_FOUND: 'TEMPLATE_NOT_FOUND',

  // invalid_transition
  INVALID_STATUS_TRANSITION: 'INVALID_STATUS_TRANSITION',
  NOT_PENDING_INVITATION: 'NOT_PENDING_INVITATION',
  CANNOT_START_RESPONSE: 'CANNOT_START_RESPONSE',
  CANNOT_SUBMIT: 'CANNOT_SUBMIT',
  CANNOT_REVIEW: 'CANNOT_REVIEW',
  CANNOT_RECEIVE_REQUIREMENTS: 'CANNOT_RECEIVE_REQUIREMENTS',
  REQUIREMENT_NOT_EDITABLE: 'REQUIREMENT_NOT_EDITABLE',
  RELATIONSHIP_TERMINATED: 'RELATIONSHIP_TERMINATED',
  QUESTIONNAIRE_NOT_EDITABLE: 'QUESTIONNAIRE_NOT_EDITABLE',
  QUESTIONNAIRE_NOT_DELETABLE: 'QUESTIONNAIRE_NOT_DELETABLE',
  CANNOT_PUBLISH: 'CANNOT_PUBLISH',
  TEMPLATE_NOT_EDITABLE: 'TEMPLATE_NOT_EDITABLE',
  TEMPLATE_ALREADY_PUBLISHED: 'TEMPLATE_ALREADY_PUBLISHED',
  TEMPLATE_NOT_PUBLISHED: 'TEMPLATE_NOT_PUBLISHED',

  // conflict
  SUPPLIER_ALREADY_INVITED: 'SUPPLIER_ALREADY_INVITED',
  RELATIONSHIP_EXISTS: 'RELATIONSHIP_EXISTS',
  RESPONSE_ALREADY_EXISTS: 'RESPONSE_ALREADY_EXISTS',
  RESPONSE_ALREADY_SUBMITTED: 'RESPONSE_ALREADY_SUBMITTED',
  SUBMISSION_EXISTS: 'SUBMISSION_EXISTS',
  VERIFICATION_EXISTS: 'VERIFICATION_EXISTS',
  DUPLICATE_ENTITY: 'DUPLICATE_ENTITY',
  TEMPLATE_IN_USE: 'TEMPLATE_IN_USE',

  // validation_error
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_ANSWER_FORMAT: 'INVALID_ANSWER_FORMAT',
  INVALID_OPTION_ID: 'INVALID_OPTION_ID',
  INVALID_QUESTION_TYPE: 'INVALID_QUESTION_TYPE',
  INVALID_CLASSIFICATION: 'INVALID_CLASSIFICATION',
  INVALID_GRADE: 'INVALID_GRADE',
  INVALID_REQUIREMENT_TYPE: 'INVALID_REQUIREMENT_TYPE',
  QUESTIONNAIRE_NOT_PUBLISHED: 'QUESTIONNAIRE_NOT_PUBLISHED',
  CHECKFIX_NOT_LINKED: 'CHECKFIX_NOT_LINKED',
  INVALID_CHECKFIX_ACCOUNT: 'INVALID_CHECKFIX_ACCOUNT',
  NOT_A_SUPPLIER: 'NOT_A_SUPPLIER',
  INVALID_CONFIG: 'INVALID_CONFIG',
  INVALID_TEMPLATE: 'INVALID_TEMPLATE',

  // external_service_error
  CHECKFIX_API_ERROR: 'CHECKFIX_API_ERROR',
  CHECKFIX_TIMEOUT: 'CHECKFIX_TIMEOUT',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Field-level detail attached to validation errors
 */
export interface FieldErrorDetail {
  field: string;
  message: string;
  code: string;
}

/**
 * Base class for every error the engine raises on purpose
 */
export class ComplianceError extends Error {
  readonly kind: ErrorKind;
  readonly code: ErrorCode;

  constructor(kind: ErrorKind, code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ComplianceError';
    this.kind = kind;
    this.code = code;
  }
}

export class NotFoundError extends ComplianceError {
  readonly resourceType: string;
  readonly resourceId: string;

  constructor(code: ErrorCode, resourceType: string, resourceId: string) {
    super(ErrorKind.NOT_FOUND, code, `${resourceType} ${resourceId} not found`);
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/**
 * Raised when a state change is not in the relevant transition table,
 * or when an operation's status precondition does not hold
 */
export class InvalidTransitionError extends ComplianceError {
  readonly entity: string;
  readonly from: string;
  readonly to?: string;

  constructor(
    entity: string,
    from: string,
    to?: string,
    code: ErrorCode = ErrorCode.INVALID_STATUS_TRANSITION,
    message?: string
  ) {
    super(
      ErrorKind.INVALID_TRANSITION,
      code,
      message ??
        (to === undefined
          ? `${entity} in status ${from} does not allow this operation`
          : `${entity} cannot transition from ${from} to ${to}`)
    );
    this.name = 'InvalidTransitionError';
    this.entity = entity;
    this.from = from;
    this.to = to;
  }
}

export class ConflictError extends ComplianceError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(ErrorKind.CONFLICT, code, message, options);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends ComplianceError {
  readonly details: FieldErrorDetail[];

  constructor(code: ErrorCode, message: string, details: FieldErrorDetail[] = []) {
    super(ErrorKind.VALIDATION, code, message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Raised when the verification provider fails or answers with a non-success status.
 * The original failure is kept as `cause`.
 */
export class ExternalServiceError extends ComplianceError {
  readonly service: string;
  readonly statusCode?: number;

  constructor(
    service: string,
    message: string,
    options: { code?: ErrorCode; statusCode?: number; cause?: unknown } = {}
  ) {
    super(ErrorKind.EXTERNAL_SERVICE, options.code ?? ErrorCode.CHECKFIX_API_ERROR, message, {
      cause: options.cause,
    });
    this.name = 'ExternalServiceError';
    this.service = service;
    this.statusCode = options.statusCode;
  }
}

/**
 * Type guard for engine errors
 */
export function isComplianceError(error: unknown): error is ComplianceError {
  return error instanceof ComplianceError;
}

/**
 * Checks whether an error is an engine error of the given kind
 */
export function isErrorKind(error: unknown, kind: ErrorKind): boolean {
  return isComplianceError(error) && error.kind === kind;
}
