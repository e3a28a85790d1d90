import { randomUUID } from 'crypto';

import { DuplicateIdentifierException } from '../identity/identity.errors';
import {
  CredentialType,
  StudentAccount,
  VerificationStatus,
} from '../students/entities/student-account.entity';
import { CreateStudentAccountInput, StudentsService } from '../students/students.service';

type StudentsStore = Pick<StudentsService, keyof StudentsService>;

/**
 * Stand-in for the Postgres-backed StudentsService. Each write checks the
 * partial unique indexes and applies in one synchronous step, the way the
 * database does, so racing callers see exactly one winner.
 */
export class InMemoryStudentsService implements StudentsStore {
  private readonly rows = new Map<string, StudentAccount>();

  async create(input: CreateStudentAccountInput): Promise<StudentAccount> {
    const row = Object.assign(new StudentAccount(), {
      ...input,
      id: randomUUID(),
      verificationStatus: VerificationStatus.UNVERIFIED,
      verificationMessage: null,
      createdAt: new Date(),
      upgradedAt: null,
      verifiedAt: null,
      lastLoginAt: null,
    });
    return this.write(row);
  }

  async save(account: StudentAccount): Promise<StudentAccount> {
    const existing = this.rows.get(account.id);
    const merged = Object.assign(new StudentAccount(), existing, account);
    if (!account.passwordHash && existing) {
      merged.passwordHash = existing.passwordHash;
    }
    return this.write(merged);
  }

  async findById(id: string, includePassword = false): Promise<StudentAccount | null> {
    const row = this.rows.get(id);
    return row ? this.copy(row, includePassword) : null;
  }

  async findByIdentifier(value: string, includePassword = false): Promise<StudentAccount | null> {
    for (const row of this.rows.values()) {
      if (row.nemisNumber === value || row.nationalId === value) {
        return this.copy(row, includePassword);
      }
    }
    return null;
  }

  async findByEmail(email: string): Promise<StudentAccount | null> {
    for (const row of this.rows.values()) {
      if (row.email === email) {
        return this.copy(row, false);
      }
    }
    return null;
  }

  async touchLastLogin(id: string, at: Date): Promise<void> {
    const row = this.rows.get(id);
    if (row) {
      row.lastLoginAt = at;
    }
  }

  async upgradeCredential(id: string, nationalId: string, at: Date): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.activeCredentialType !== CredentialType.NEMIS) {
      return false;
    }
    this.write(
      Object.assign(new StudentAccount(), row, {
        nationalId,
        activeCredentialType: CredentialType.NATIONAL_ID,
        upgradedAt: at,
      }),
    );
    return true;
  }

  async updateVerification(
    id: string,
    expected: VerificationStatus,
    status: VerificationStatus,
    message: string | null,
    at: Date,
  ): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.verificationStatus !== expected) {
      return false;
    }
    row.verificationStatus = status;
    row.verificationMessage = message;
    row.verifiedAt = at;
    return true;
  }

  all(): StudentAccount[] {
    return [...this.rows.values()].map((row) => this.copy(row, false));
  }

  private write(row: StudentAccount): StudentAccount {
    for (const other of this.rows.values()) {
      if (other.id === row.id) {
        continue;
      }
      if (row.nemisNumber !== null && other.nemisNumber === row.nemisNumber) {
        throw new DuplicateIdentifierException('nemisNumber');
      }
      if (row.nationalId !== null && other.nationalId === row.nationalId) {
        throw new DuplicateIdentifierException('nationalId');
      }
      if (row.email !== null && other.email === row.email) {
        throw new DuplicateIdentifierException('email');
      }
    }
    this.rows.set(row.id, row);
    return this.copy(row, true);
  }

  private copy(row: StudentAccount, includePassword: boolean): StudentAccount {
    const { passwordHash, ...rest } = row;
    const copy = Object.assign(new StudentAccount(), rest);
    if (includePassword) {
      copy.passwordHash = passwordHash;
    }
    return copy;
  }
}
