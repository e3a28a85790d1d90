import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

export enum CredentialType {
  NEMIS = 'NEMIS',
  NATIONAL_ID = 'NATIONAL_ID',
}

export enum VerificationStatus {
  UNVERIFIED = 'UNVERIFIED',
  VERIFIED = 'VERIFIED',
  FAILED = 'FAILED',
}

export const NEMIS_UNIQUE_INDEX = 'uq_student_accounts_nemis_number';
export const NATIONAL_ID_UNIQUE_INDEX = 'uq_student_accounts_national_id';
export const EMAIL_UNIQUE_INDEX = 'uq_student_accounts_email';

@Entity('student_accounts')
@Index(NEMIS_UNIQUE_INDEX, ['nemisNumber'], { unique: true, where: 'nemis_number IS NOT NULL' })
@Index(NATIONAL_ID_UNIQUE_INDEX, ['nationalId'], {
  unique: true,
  where: 'national_id IS NOT NULL',
})
@Index(EMAIL_UNIQUE_INDEX, ['email'], { unique: true, where: 'email IS NOT NULL' })
@Check(
  'ck_student_accounts_active_credential',
  `(active_credential_type = 'NEMIS' AND nemis_number IS NOT NULL) OR (active_credential_type = 'NATIONAL_ID' AND national_id IS NOT NULL)`,
)
export class StudentAccount {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'nemis_number', type: 'varchar', length: 20, nullable: true })
  nemisNumber!: string | null;

  @Column({ name: 'national_id', type: 'varchar', length: 20, nullable: true })
  nationalId!: string | null;

  @Column({ name: 'active_credential_type', type: 'enum', enum: CredentialType })
  activeCredentialType!: CredentialType;

  @Column({ name: 'password_hash', type: 'text', select: false })
  passwordHash!: string;

  @Column({
    name: 'verification_status',
    type: 'enum',
    enum: VerificationStatus,
    default: VerificationStatus.UNVERIFIED,
  })
  verificationStatus!: VerificationStatus;

  @Column({ name: 'verification_message', type: 'text', nullable: true })
  verificationMessage!: string | null;

  @Column({ name: 'full_name', type: 'text' })
  fullName!: string;

  @Column({ type: 'text', nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  phone!: string | null;

  @Column({ name: 'guardian_id_number', type: 'varchar', length: 20, nullable: true })
  guardianIdNumber!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'upgraded_at', type: 'timestamptz', nullable: true })
  upgradedAt!: Date | null;

  @Column({ name: 'verified_at', type: 'timestamptz', nullable: true })
  verifiedAt!: Date | null;

  @Column({ name: 'last_login_at', type: 'timestamptz', nullable: true })
  lastLoginAt!: Date | null;
}

/** The identifier a student logs in with going forward. */
export function activeIdentifier(account: StudentAccount): string {
  const value =
    account.activeCredentialType === CredentialType.NATIONAL_ID
      ? account.nationalId
      : account.nemisNumber;
  return value ?? '';
}
