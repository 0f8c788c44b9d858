/**
 * Beneficiaries Domain
 */

export { DrizzleBeneficiaryRepository } from './beneficiary-repository.js';
export type { BeneficiaryRepository } from './beneficiary-repository.js';

export { BeneficiaryService, presentBeneficiary } from './beneficiary-service.js';
export type {
  BeneficiaryChanges,
  BeneficiaryData,
  BeneficiaryView,
  CreateBeneficiaryParams,
  UpdateBeneficiaryParams,
} from './beneficiary-types.js';

export { BeneficiaryAccessDeniedError, BeneficiaryNotFoundError } from './beneficiary-errors.js';
