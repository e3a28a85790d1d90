import type { CredentialType } from '@bursary/shared';

export interface JwtPayload {
  sub: string;
  username: string;
  credential_type: CredentialType;
  role: 'student';
}

export interface SessionUser {
  id: string;
  username: string;
  credentialType: CredentialType;
}

export interface AuthenticatedRequest {
  user: SessionUser;
}
