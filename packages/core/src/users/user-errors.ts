/**
 * User Domain Errors
 *
 * Custom error classes for user-related business rule violations.
 */

import {
  AuthenticationError,
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../errors.js';

export class DuplicateEmailError extends ConflictError {
  constructor(email: string) {
    super(`Email already in use: ${email}`);
  }
}

export class InvalidEmailError extends ValidationError {
  constructor(email: string) {
    super(`Invalid email format: ${email}`);
  }
}

export class WeakPasswordError extends ValidationError {
  constructor(reason: string) {
    super(`Password does not meet requirements: ${reason}`);
  }
}

export class UserNotFoundError extends NotFoundError {
  constructor(userId: string) {
    super(`User not found: ${userId}`);
  }
}

// Same message for unknown email and wrong password
export class InvalidCredentialsError extends AuthenticationError {
  constructor() {
    super('Invalid email or password');
  }
}

export class InactiveAccountError extends ForbiddenError {
  constructor() {
    super('Account is suspended');
  }
}

export class IncorrectPasswordError extends AuthenticationError {
  constructor() {
    super('Current password is incorrect');
  }
}
