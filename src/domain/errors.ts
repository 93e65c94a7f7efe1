export class DomainError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends DomainError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('VALIDATION_ERROR', message, 422);
    this.issues = issues;
  }

  static fromIssues(issues: ValidationIssue[]): ValidationError {
    const message = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
    return new ValidationError(message || 'invalid request', issues);
  }
}

/** Actor lacks the role, scope or ownership the action needs. */
export class AuthorizationError extends DomainError {
  constructor(message: string) {
    super('FORBIDDEN', message, 403);
  }
}

/** Action on a terminal request or on an approval step already consumed. */
export class InvalidStateError extends DomainError {
  constructor(message: string) {
    super('INVALID_STATE', message, 409);
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}
