import {
  ValidationError,
  isDomainError,
  type DomainErrorKind,
  type JsonObject,
  type ValidationIssue,
} from '@activityhub/core-domain';
import { ZodError } from 'zod';

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500;

export interface ErrorResponse {
  status: ErrorStatus;
  body: JsonObject;
  /**
   * `unexpected` errors are logged as `api_error`. Of the `expected` ones only identity failures
   * are logged, as `identity_verification_failed` warnings.
   */
  severity: 'expected' | 'unexpected';
}

const STATUS_BY_KIND: Record<DomainErrorKind, ErrorStatus> = {
  not_found: 404,
  conflict: 409,
  unauthorized: 403,
  activity_disabled: 409,
  validation: 400,
  identity_verification_failed: 401,
};

export const validationErrorFromZod = (error: ZodError): ValidationError => {
  const issues: ValidationIssue[] = error.issues.map((issue) => {
    return {
      path: issue.path.map(String).join('.'),
      message: issue.message,
    };
  });

  return new ValidationError('Invalid request', issues);
};

export const errorResponseFor = (error: unknown): ErrorResponse => {
  const domainError = error instanceof ZodError ? validationErrorFromZod(error) : error;

  if (!isDomainError(domainError)) {
    return {
      status: 500,
      body: {
        error: 'Internal server error',
      },
      severity: 'unexpected',
    };
  }

  // Verification details stay in the logs.
  if (domainError.kind === 'identity_verification_failed') {
    return {
      status: STATUS_BY_KIND.identity_verification_failed,
      body: {
        error: 'Unauthorized',
        kind: 'unauthorized',
      },
      severity: 'expected',
    };
  }

  const body: JsonObject = {
    error: domainError.message,
    kind: domainError.kind,
    key: { ...domainError.key },
  };

  if (domainError instanceof ValidationError) {
    body.issues = domainError.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
    }));
  }

  return {
    status: STATUS_BY_KIND[domainError.kind],
    body,
    severity: 'expected',
  };
};
