import { MailMessage } from '../mail/mail.service';
import { CredentialType } from '../students/entities/student-account.entity';
import {
  VerificationProfile,
  VerificationProvider,
  VerificationResult,
} from '../verification/verification.types';

export class RecordingMailService {
  readonly sent: MailMessage[] = [];
  failWith: Error | null = null;

  async send(message: MailMessage): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(message);
  }
}

export class RecordingSmsService {
  readonly sent: Array<{ phoneNumber: string; text: string }> = [];
  failWith: Error | null = null;

  async send(phoneNumber: string, text: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push({ phoneNumber, text });
  }
}

export interface VerificationCall {
  identifierType: CredentialType;
  identifierValue: string;
  profile: VerificationProfile;
}

/** Answers every request with `result`, or rejects with `failWith` when set. */
export class StubVerificationProvider implements VerificationProvider {
  readonly calls: VerificationCall[] = [];
  result: VerificationResult = { outcome: 'pass', message: 'Verified by stub.' };
  failWith: Error | null = null;

  async submitForVerification(
    identifierType: CredentialType,
    identifierValue: string,
    profile: VerificationProfile,
  ): Promise<VerificationResult> {
    this.calls.push({ identifierType, identifierValue, profile });
    if (this.failWith) {
      throw this.failWith;
    }
    return this.result;
  }
}
