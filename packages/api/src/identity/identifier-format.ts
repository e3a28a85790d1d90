import { CredentialType } from '../students/entities/student-account.entity';
import { InvalidIdentifierFormatException } from './identity.errors';

const NEMIS_PATTERN = /^[A-Z0-9]{4,20}$/;
const NATIONAL_ID_PATTERN = /^[A-Z0-9](?:[A-Z0-9-]{3,18})[A-Z0-9]$/;

export function normalizeIdentifier(value: string): string {
  return value.trim().toUpperCase();
}

/**
 * Normalizes `value` and checks it against the rules for its credential type.
 * Returns the normalized identifier, which is what gets stored and looked up.
 */
export function parseIdentifier(value: string, type: CredentialType): string {
  const normalized = normalizeIdentifier(value);

  if (type === CredentialType.NEMIS) {
    if (!NEMIS_PATTERN.test(normalized)) {
      throw new InvalidIdentifierFormatException(
        type,
        'NEMIS number must be 4 to 20 letters or digits.',
      );
    }
    return normalized;
  }

  if (!NATIONAL_ID_PATTERN.test(normalized) || !/\d/.test(normalized)) {
    throw new InvalidIdentifierFormatException(
      type,
      'National ID must be 5 to 20 letters, digits or hyphens and contain at least one digit.',
    );
  }
  return normalized;
}
