export type DomainErrorKind =
  | 'not_found'
  | 'conflict'
  | 'unauthorized'
  | 'activity_disabled'
  | 'validation'
  | 'identity_verification_failed';

/**
 * Identifies the record an error refers to, e.g. `{ activityId: 'python101', userId: 's1' }`.
 */
export type DomainErrorKey = Readonly<Record<string, string>>;

export interface ValidationIssue {
  path: string;
  message: string;
}

export class DomainError extends Error {
  public readonly kind: DomainErrorKind;

  public readonly key: DomainErrorKey;

  public constructor(kind: DomainErrorKind, message: string, key: DomainErrorKey = {}) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.key = key;
  }
}

export class NotFoundError extends DomainError {
  public constructor(message: string, key: DomainErrorKey = {}) {
    super('not_found', message, key);
  }
}

export class ConflictError extends DomainError {
  public constructor(message: string, key: DomainErrorKey = {}) {
    super('conflict', message, key);
  }
}

export class UnauthorizedError extends DomainError {
  public constructor(message: string, key: DomainErrorKey = {}) {
    super('unauthorized', message, key);
  }
}

export class ActivityDisabledError extends DomainError {
  public constructor(activityId: string) {
    super('activity_disabled', `Activity "${activityId}" is disabled`, { activityId });
  }
}

export class ValidationError extends DomainError {
  public readonly issues: readonly ValidationIssue[];

  public constructor(message: string, issues: readonly ValidationIssue[] = [], key: DomainErrorKey = {}) {
    super('validation', message, key);
    this.issues = issues;
  }
}

/**
 * Raised when the external verifier rejects a credential. Callers see a plain "Unauthorized";
 * `reason` is only logged.
 */
export class IdentityVerificationError extends DomainError {
  public readonly reason: string;

  public constructor(reason: string) {
    super('identity_verification_failed', 'Identity verification failed');
    this.reason = reason;
  }
}

export const isDomainError = (error: unknown): error is DomainError => {
  return error instanceof DomainError;
};
