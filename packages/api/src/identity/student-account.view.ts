import type { StudentAccount as StudentAccountView } from '@bursary/shared';

import { activeIdentifier, StudentAccount } from '../students/entities/student-account.entity';

export function toStudentView(account: StudentAccount): StudentAccountView {
  return {
    id: account.id,
    username: activeIdentifier(account),
    nemis_number: account.nemisNumber,
    national_id: account.nationalId,
    active_credential_type: account.activeCredentialType,
    verification_status: account.verificationStatus,
    verification_message: account.verificationMessage,
    full_name: account.fullName,
    email: account.email,
    phone: account.phone,
    created_at: account.createdAt.toISOString(),
    upgraded_at: account.upgradedAt?.toISOString() ?? null,
    verified_at: account.verifiedAt?.toISOString() ?? null,
  };
}
