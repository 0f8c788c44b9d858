/**
 * Profile Domain Errors
 *
 * Custom error classes for profile-related business rule violations.
 */

import { NotFoundError, ValidationError } from '../errors.js';

export class ProfileNotFoundError extends NotFoundError {
  constructor(userId: string) {
    super(`Profile not found for user: ${userId}`);
  }
}

export class InvalidProfileDataError extends ValidationError {}
