/**
 * Beneficiary Domain Types
 */

export interface CreateBeneficiaryParams {
  name: string;
  email: string;
  walletNumber: string;
  phone?: string | null;
  relationship?: string | null;
}

export type UpdateBeneficiaryParams = Partial<CreateBeneficiaryParams>;

export interface BeneficiaryData {
  userId: string;
  name: string;
  email: string;
  walletNumber: string;
  phone: string | null;
  relationship: string | null;
  beneficiaryUserId: string | null;
}

export type BeneficiaryChanges = Partial<Omit<BeneficiaryData, 'userId'>>;

export interface BeneficiaryView {
  id: string;
  name: string;
  email: string;
  walletNumber: string;
  phone: string | null;
  relationship: string | null;
  /** Set when the wallet number belongs to a registered user */
  beneficiaryUserId: string | null;
  createdAt: string;
  updatedAt: string;
}
