import type { VerificationOutcome } from '@bursary/shared';

import { CredentialType } from '../students/entities/student-account.entity';

export const VERIFICATION_PROVIDER = Symbol('VERIFICATION_PROVIDER');

export interface VerificationProfile {
  fullName: string;
  guardianIdNumber: string | null;
}

export interface VerificationResult {
  outcome: VerificationOutcome;
  message: string;
}

/**
 * An identity registry (NRB, NEMIS, or a local mock) that confirms whether an
 * identifier belongs to a real student in the site's region.
 */
export interface VerificationProvider {
  submitForVerification(
    identifierType: CredentialType,
    identifierValue: string,
    profile: VerificationProfile,
  ): Promise<VerificationResult>;
}
