import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import type { VerificationOutcome } from '@bursary/shared';

import { SessionService } from '../auth/session.service';
import { NotificationEvent, NotificationsService } from '../notifications/notifications.service';
import {
  activeIdentifier,
  CredentialType,
  StudentAccount,
  VerificationStatus,
} from '../students/entities/student-account.entity';
import { StudentsService } from '../students/students.service';
import {
  VERIFICATION_PROVIDER,
  VerificationProvider,
  VerificationResult,
} from '../verification/verification.types';
import { normalizeIdentifier, parseIdentifier } from './identifier-format';
import {
  AccountNotFoundException,
  AccountNotVerifiedException,
  AlreadyUpgradedException,
  DuplicateIdentifierException,
  InvalidCredentialsException,
} from './identity.errors';

export interface StudentProfileInput {
  fullName: string;
  email?: string | null;
  phone?: string | null;
  guardianIdNumber?: string | null;
}

export interface ExternalVerificationResult {
  outcome: VerificationOutcome;
  message?: string | null;
}

export interface AuthenticationResult {
  accessToken: string;
  account: StudentAccount;
}

/**
 * Owns how a student's login identity is established and later changed:
 * NEMIS-first signup, the one-way upgrade to a National ID, and login by
 * either identifier.
 */
@Injectable()
export class IdentityService implements OnApplicationShutdown {
  private readonly logger = new Logger(IdentityService.name);
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly studentsService: StudentsService,
    private readonly sessionService: SessionService,
    private readonly notificationsService: NotificationsService,
    private readonly configService: ConfigService,
    @Inject(VERIFICATION_PROVIDER)
    private readonly verificationProvider: VerificationProvider,
  ) {}

  async registerStudent(
    identifier: string,
    identifierType: CredentialType,
    password: string,
    profile: StudentProfileInput,
  ): Promise<StudentAccount> {
    const value = parseIdentifier(identifier, identifierType);
    const email = profile.email?.trim().toLowerCase() || null;

    await this.assertIdentifierAvailable(value, identifierType);
    if (email && (await this.studentsService.findByEmail(email))) {
      throw new DuplicateIdentifierException('email');
    }

    const passwordHash = await bcrypt.hash(password, this.bcryptRounds());
    const account = await this.studentsService.create({
      nemisNumber: identifierType === CredentialType.NEMIS ? value : null,
      nationalId: identifierType === CredentialType.NATIONAL_ID ? value : null,
      activeCredentialType: identifierType,
      passwordHash,
      fullName: profile.fullName.trim(),
      email,
      phone: profile.phone?.trim() || null,
      guardianIdNumber: profile.guardianIdNumber
        ? normalizeIdentifier(profile.guardianIdNumber)
        : null,
    });

    this.logger.log(`Registered student ${account.id} with ${identifierType}`);
    this.runInBackground(`post-signup for ${account.id}`, async () => {
      await this.notificationsService.notify(account.id, NotificationEvent.SIGNUP);
      await this.requestVerification(account);
    });

    return account;
  }

  async authenticate(identifier: string, password: string): Promise<AuthenticationResult> {
    const value = normalizeIdentifier(identifier);
    const account = value ? await this.studentsService.findByIdentifier(value, true) : null;
    if (!account?.passwordHash) {
      throw new InvalidCredentialsException();
    }

    const match = await bcrypt.compare(password, account.passwordHash);
    if (!match) {
      throw new InvalidCredentialsException();
    }

    if (this.requiresVerification() && account.verificationStatus !== VerificationStatus.VERIFIED) {
      throw new AccountNotVerifiedException();
    }

    const now = new Date();
    await this.studentsService.touchLastLogin(account.id, now);
    account.lastLoginAt = now;

    return {
      accessToken: await this.sessionService.issue(account),
      account,
    };
  }

  async upgradeToNationalId(accountId: string, nationalId: string): Promise<StudentAccount> {
    const account = await this.getAccount(accountId);
    if (account.activeCredentialType === CredentialType.NATIONAL_ID) {
      throw new AlreadyUpgradedException();
    }

    const value = parseIdentifier(nationalId, CredentialType.NATIONAL_ID);
    const holder = await this.studentsService.findByIdentifier(value);
    if (holder && holder.id !== account.id) {
      throw new DuplicateIdentifierException('nationalId');
    }

    const upgradedAt = new Date();
    const applied = await this.studentsService.upgradeCredential(account.id, value, upgradedAt);
    if (!applied) {
      throw new AlreadyUpgradedException();
    }

    account.nationalId = value;
    account.activeCredentialType = CredentialType.NATIONAL_ID;
    account.upgradedAt = upgradedAt;

    this.logger.log(`Student ${account.id} upgraded to National ID`);
    this.runInBackground(`upgrade notification for ${account.id}`, () =>
      this.notificationsService.notify(account.id, NotificationEvent.UPGRADED),
    );

    return account;
  }

  async verify(accountId: string, result: ExternalVerificationResult): Promise<StudentAccount> {
    const account = await this.getAccount(accountId);
    const next =
      result.outcome === 'pass' ? VerificationStatus.VERIFIED : VerificationStatus.FAILED;

    if (account.verificationStatus === next) {
      return account;
    }
    if (account.verificationStatus === VerificationStatus.VERIFIED) {
      this.logger.warn(`Ignoring failed verification for already verified student ${accountId}`);
      return account;
    }

    const verifiedAt = new Date();
    const message = result.message ?? null;
    const applied = await this.studentsService.updateVerification(
      account.id,
      account.verificationStatus,
      next,
      message,
      verifiedAt,
    );
    if (!applied) {
      // Another result changed the status in between; decide again against it.
      return this.verify(accountId, result);
    }
    account.verificationStatus = next;
    account.verificationMessage = message;
    account.verifiedAt = verifiedAt;

    this.logger.log(`Student ${account.id} verification status is now ${next}`);
    const event =
      next === VerificationStatus.VERIFIED
        ? NotificationEvent.VERIFICATION_PASSED
        : NotificationEvent.VERIFICATION_FAILED;
    this.runInBackground(`verification notification for ${account.id}`, () =>
      this.notificationsService.notify(account.id, event),
    );

    return account;
  }

  async getAccount(accountId: string): Promise<StudentAccount> {
    const account = await this.studentsService.findById(accountId);
    if (!account) {
      throw new AccountNotFoundException();
    }
    return account;
  }

  /** Live check used by the signup form before an account exists. */
  async checkIdentity(
    identifier: string,
    identifierType: CredentialType,
    profile: StudentProfileInput,
  ): Promise<{ valid: boolean; message: string }> {
    const value = parseIdentifier(identifier, identifierType);
    try {
      const result = await this.verificationProvider.submitForVerification(identifierType, value, {
        fullName: profile.fullName,
        guardianIdNumber: profile.guardianIdNumber
          ? normalizeIdentifier(profile.guardianIdNumber)
          : null,
      });
      return { valid: result.outcome === 'pass', message: result.message };
    } catch (error) {
      this.logger.warn(`Identity check failed: ${errorMessage(error)}`);
      return { valid: false, message: 'Verification service is unavailable. Please try again later.' };
    }
  }

  /** Resolves once every scheduled verification and notification has settled. */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.whenIdle();
  }

  private async requestVerification(account: StudentAccount): Promise<void> {
    let result: VerificationResult;
    try {
      result = await this.verificationProvider.submitForVerification(
        account.activeCredentialType,
        activeIdentifier(account),
        { fullName: account.fullName, guardianIdNumber: account.guardianIdNumber },
      );
    } catch (error) {
      this.logger.warn(
        `Verification unavailable for ${account.id}, leaving it unverified: ${errorMessage(error)}`,
      );
      return;
    }

    await this.verify(account.id, result);
  }

  private async assertIdentifierAvailable(value: string, type: CredentialType): Promise<void> {
    const existing = await this.studentsService.findByIdentifier(value);
    if (existing) {
      throw new DuplicateIdentifierException(
        type === CredentialType.NEMIS ? 'nemisNumber' : 'nationalId',
      );
    }
  }

  private runInBackground(label: string, task: () => Promise<void>): void {
    const run: Promise<void> = task()
      .catch((error: unknown) => {
        this.logger.error(`Background task ${label} failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.pending.delete(run);
      });
    this.pending.add(run);
  }

  private requiresVerification(): boolean {
    const raw = this.configService.get<string | boolean>('REQUIRE_VERIFICATION_BEFORE_LOGIN', false);
    return String(raw).toLowerCase() === 'true';
  }

  private bcryptRounds(): number {
    return Number(this.configService.get<string | number>('BCRYPT_ROUNDS', 10));
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
