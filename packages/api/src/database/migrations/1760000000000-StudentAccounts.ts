import { MigrationInterface, QueryRunner } from 'typeorm';

export class StudentAccounts1760000000000 implements MigrationInterface {
  name = 'StudentAccounts1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "pgcrypto";');

    await queryRunner.query(`
      DO $$ BEGIN
        CREATE TYPE student_accounts_active_credential_type_enum AS ENUM ('NEMIS', 'NATIONAL_ID');
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);

    await queryRunner.query(`
      DO $$ BEGIN
        CREATE TYPE student_accounts_verification_status_enum AS ENUM ('UNVERIFIED', 'VERIFIED', 'FAILED');
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS student_accounts (
        id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
        nemis_number varchar(20) NULL,
        national_id varchar(20) NULL,
        active_credential_type student_accounts_active_credential_type_enum NOT NULL,
        password_hash text NOT NULL,
        verification_status student_accounts_verification_status_enum NOT NULL DEFAULT 'UNVERIFIED',
        verification_message text NULL,
        full_name text NOT NULL,
        email text NULL,
        phone varchar(20) NULL,
        guardian_id_number varchar(20) NULL,
        created_at timestamptz NOT NULL DEFAULT now(),
        upgraded_at timestamptz NULL,
        verified_at timestamptz NULL,
        last_login_at timestamptz NULL,
        CONSTRAINT ck_student_accounts_active_credential CHECK (
          (active_credential_type = 'NEMIS' AND nemis_number IS NOT NULL)
          OR (active_credential_type = 'NATIONAL_ID' AND national_id IS NOT NULL)
        )
      );
    `);

    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_student_accounts_nemis_number
        ON student_accounts (nemis_number) WHERE nemis_number IS NOT NULL;
    `);
    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_student_accounts_national_id
        ON student_accounts (national_id) WHERE national_id IS NOT NULL;
    `);
    await queryRunner.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS uq_student_accounts_email
        ON student_accounts (email) WHERE email IS NOT NULL;
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP TABLE IF EXISTS student_accounts;');
    await queryRunner.query('DROP TYPE IF EXISTS student_accounts_verification_status_enum;');
    await queryRunner.query('DROP TYPE IF EXISTS student_accounts_active_credential_type_enum;');
  }
}
