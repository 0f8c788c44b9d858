/**
 * Shared domain error taxonomy
 *
 * Every business-rule failure carries a stable `code`. The HTTP layer maps
 * codes to status codes; nothing below it knows about HTTP.
 */

export type DomainErrorCode =
  | 'validation_error'
  | 'invalid_amount'
  | 'self_transfer'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'conflict'
  | 'insufficient_funds';

export class DomainError extends Error {
  readonly code: DomainErrorCode;

  constructor(code: DomainErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, options?: ErrorOptions) {
    super('validation_error', message, options);
  }
}

export class AuthenticationError extends DomainError {
  constructor(message = 'Authentication required', options?: ErrorOptions) {
    super('unauthorized', message, options);
  }
}

export class ForbiddenError extends DomainError {
  constructor(message = 'Forbidden', options?: ErrorOptions) {
    super('forbidden', message, options);
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string, options?: ErrorOptions) {
    super('not_found', message, options);
  }
}

export class ConflictError extends DomainError {
  constructor(message: string, options?: ErrorOptions) {
    super('conflict', message, options);
  }
}

export class InvalidAmountError extends DomainError {
  constructor(message: string, options?: ErrorOptions) {
    super('invalid_amount', message, options);
  }
}

export class SelfTransferError extends DomainError {
  constructor(message = 'Cannot transfer money to yourself', options?: ErrorOptions) {
    super('self_transfer', message, options);
  }
}

export class InsufficientFundsError extends DomainError {
  constructor(message = 'Insufficient funds', options?: ErrorOptions) {
    super('insufficient_funds', message, options);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
