/**
 * Beneficiary Domain Errors
 */

import { ForbiddenError, NotFoundError } from '../errors.js';

export class BeneficiaryNotFoundError extends NotFoundError {
  constructor(beneficiaryId: string) {
    super(`Beneficiary not found: ${beneficiaryId}`);
  }
}

export class BeneficiaryAccessDeniedError extends ForbiddenError {
  constructor() {
    super('You do not have access to this beneficiary');
  }
}
