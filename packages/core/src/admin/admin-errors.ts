import { ForbiddenError, ValidationError } from '../errors.js';

export class SelfModificationError extends ForbiddenError {
  constructor() {
    super('Admins cannot change their own role or status');
  }
}

export class EmptyAccessUpdateError extends ValidationError {
  constructor() {
    super('Provide status and/or role');
  }
}
