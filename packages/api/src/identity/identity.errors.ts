import { HttpException, HttpStatus } from '@nestjs/common';
import type { IdentityErrorCode } from '@bursary/shared';

import { CredentialType } from '../students/entities/student-account.entity';

/**
 * Base class for the user-facing failures of the identity operations.
 * The web layer renders `code` and `message` next to the offending form field.
 */
export abstract class IdentityException extends HttpException {
  protected constructor(
    readonly code: IdentityErrorCode,
    message: string,
    status: HttpStatus,
  ) {
    super({ statusCode: status, code, message }, status);
  }
}

export type IdentifierField = 'nemisNumber' | 'nationalId' | 'email';

const FIELD_LABELS: Record<IdentifierField, string> = {
  nemisNumber: 'NEMIS number',
  nationalId: 'National ID',
  email: 'Email address',
};

export class DuplicateIdentifierException extends IdentityException {
  constructor(readonly field: IdentifierField) {
    super(
      'DUPLICATE_IDENTIFIER',
      `${FIELD_LABELS[field]} is already registered to another account.`,
      HttpStatus.CONFLICT,
    );
  }
}

export class InvalidIdentifierFormatException extends IdentityException {
  constructor(readonly identifierType: CredentialType, detail: string) {
    super('INVALID_IDENTIFIER_FORMAT', detail, HttpStatus.BAD_REQUEST);
  }
}

export class InvalidCredentialsException extends IdentityException {
  constructor() {
    super('INVALID_CREDENTIALS', 'Invalid credentials.', HttpStatus.UNAUTHORIZED);
  }
}

export class AccountNotVerifiedException extends IdentityException {
  constructor() {
    super(
      'ACCOUNT_NOT_VERIFIED',
      'Your identity has not been verified yet. Please try again later.',
      HttpStatus.FORBIDDEN,
    );
  }
}

export class AlreadyUpgradedException extends IdentityException {
  constructor() {
    super(
      'ALREADY_UPGRADED',
      'This account already logs in with a National ID.',
      HttpStatus.CONFLICT,
    );
  }
}

export class AccountNotFoundException extends IdentityException {
  constructor() {
    super('ACCOUNT_NOT_FOUND', 'Student account not found.', HttpStatus.NOT_FOUND);
  }
}
