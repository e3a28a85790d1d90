import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';

import { DuplicateIdentifierException, IdentifierField } from '../identity/identity.errors';
import {
  CredentialType,
  EMAIL_UNIQUE_INDEX,
  NATIONAL_ID_UNIQUE_INDEX,
  NEMIS_UNIQUE_INDEX,
  StudentAccount,
  VerificationStatus,
} from './entities/student-account.entity';

export interface CreateStudentAccountInput {
  nemisNumber: string | null;
  nationalId: string | null;
  activeCredentialType: CredentialType;
  passwordHash: string;
  fullName: string;
  email: string | null;
  phone: string | null;
  guardianIdNumber: string | null;
}

const UNIQUE_VIOLATION = '23505';

const FIELD_BY_INDEX: Record<string, IdentifierField> = {
  [NEMIS_UNIQUE_INDEX]: 'nemisNumber',
  [NATIONAL_ID_UNIQUE_INDEX]: 'nationalId',
  [EMAIL_UNIQUE_INDEX]: 'email',
};

@Injectable()
export class StudentsService {
  constructor(
    @InjectRepository(StudentAccount)
    private readonly accountsRepository: Repository<StudentAccount>,
  ) {}

  async create(input: CreateStudentAccountInput): Promise<StudentAccount> {
    const entity = this.accountsRepository.create({
      ...input,
      verificationStatus: VerificationStatus.UNVERIFIED,
      verificationMessage: null,
      upgradedAt: null,
      verifiedAt: null,
      lastLoginAt: null,
    });
    return this.save(entity);
  }

  async save(account: StudentAccount): Promise<StudentAccount> {
    try {
      return await this.accountsRepository.save(account);
    } catch (error) {
      throw this.translateWriteError(error);
    }
  }

  async findById(id: string, includePassword = false): Promise<StudentAccount | null> {
    if (includePassword) {
      return this.accountsRepository
        .createQueryBuilder('account')
        .addSelect('account.passwordHash')
        .where('account.id = :id', { id })
        .getOne();
    }

    return this.accountsRepository.findOne({ where: { id } });
  }

  /** Matches `value` against either identifier column, whichever credential is active. */
  async findByIdentifier(
    value: string,
    includePassword = false,
  ): Promise<StudentAccount | null> {
    const query = this.accountsRepository
      .createQueryBuilder('account')
      .where('account.nemisNumber = :value OR account.nationalId = :value', { value })
      .orderBy('account.createdAt', 'ASC');

    if (includePassword) {
      query.addSelect('account.passwordHash');
    }

    return query.getOne();
  }

  async findByEmail(email: string): Promise<StudentAccount | null> {
    return this.accountsRepository.findOne({ where: { email } });
  }

  async touchLastLogin(id: string, at: Date): Promise<void> {
    await this.accountsRepository.update({ id }, { lastLoginAt: at });
  }

  /**
   * Switches a NEMIS account to its National ID in one conditional UPDATE.
   * Returns false when the row was no longer on NEMIS, i.e. a concurrent
   * upgrade got there first.
   */
  async upgradeCredential(id: string, nationalId: string, at: Date): Promise<boolean> {
    try {
      const result = await this.accountsRepository.update(
        { id, activeCredentialType: CredentialType.NEMIS },
        { nationalId, activeCredentialType: CredentialType.NATIONAL_ID, upgradedAt: at },
      );
      return (result.affected ?? 0) > 0;
    } catch (error) {
      throw this.translateWriteError(error);
    }
  }

  /**
   * Moves the verification status from `expected` to `status`. Returns false
   * when the row no longer holds `expected` because another result landed first.
   */
  async updateVerification(
    id: string,
    expected: VerificationStatus,
    status: VerificationStatus,
    message: string | null,
    at: Date,
  ): Promise<boolean> {
    const result = await this.accountsRepository.update(
      { id, verificationStatus: expected },
      { verificationStatus: status, verificationMessage: message, verifiedAt: at },
    );
    return (result.affected ?? 0) > 0;
  }

  private translateWriteError(error: unknown): unknown {
    if (!(error instanceof QueryFailedError)) {
      return error;
    }

    const driverError: unknown = error.driverError;
    if (typeof driverError !== 'object' || driverError === null) {
      return error;
    }

    const code = 'code' in driverError ? driverError.code : undefined;
    const constraint = 'constraint' in driverError ? driverError.constraint : undefined;
    if (code !== UNIQUE_VIOLATION || typeof constraint !== 'string') {
      return error;
    }

    const field = FIELD_BY_INDEX[constraint];
    return field ? new DuplicateIdentifierException(field) : error;
  }
}
