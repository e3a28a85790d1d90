export type CredentialType = 'NEMIS' | 'NATIONAL_ID';

export type VerificationStatus = 'UNVERIFIED' | 'VERIFIED' | 'FAILED';

export type VerificationOutcome = 'pass' | 'fail';

export type IdentityErrorCode =
  | 'DUPLICATE_IDENTIFIER'
  | 'INVALID_IDENTIFIER_FORMAT'
  | 'INVALID_CREDENTIALS'
  | 'ACCOUNT_NOT_VERIFIED'
  | 'ALREADY_UPGRADED'
  | 'ACCOUNT_NOT_FOUND';

export interface StudentAccount {
  id: string;
  username: string;
  nemis_number: string | null;
  national_id: string | null;
  active_credential_type: CredentialType;
  verification_status: VerificationStatus;
  verification_message: string | null;
  full_name: string;
  email: string | null;
  phone: string | null;
  created_at: string;
  upgraded_at: string | null;
  verified_at: string | null;
}

export interface LoginResponse {
  access_token: string;
  student: StudentAccount;
}

export interface SignupResponse {
  student: StudentAccount;
  message: string;
}

export interface UpgradeResponse {
  student: StudentAccount;
  message: string;
}

export interface IdentityCheckResponse {
  valid: boolean;
  message: string;
}

export interface IdentityErrorResponse {
  statusCode: number;
  code: IdentityErrorCode;
  message: string;
}
