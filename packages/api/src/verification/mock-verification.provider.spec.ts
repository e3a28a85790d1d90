import { ConfigService } from '@nestjs/config';

import { CredentialType } from '../students/entities/student-account.entity';
import { MockVerificationProvider } from './mock-verification.provider';

function providerFor(county?: string): MockVerificationProvider {
  return new MockVerificationProvider(
    new ConfigService(county === undefined ? {} : { SITE_COUNTY: county }),
  );
}

const noGuardian = { fullName: 'Test Student', guardianIdNumber: null };

describe('MockVerificationProvider', () => {
  const savedCounty = process.env.SITE_COUNTY;

  beforeAll(() => {
    delete process.env.SITE_COUNTY;
  });

  afterAll(() => {
    if (savedCounty !== undefined) {
      process.env.SITE_COUNTY = savedCounty;
    }
  });

  it('fails everything when no county is configured', async () => {
    await expect(
      providerFor().submitForVerification(CredentialType.NATIONAL_ID, '20001234', noGuardian),
    ).resolves.toEqual({ outcome: 'fail', message: 'Site county is not configured.' });
  });

  describe('with a county that has prefix rules', () => {
    const provider = providerFor('Samburu');

    it('passes a National ID with the county prefix', async () => {
      await expect(
        provider.submitForVerification(CredentialType.NATIONAL_ID, '20001234', noGuardian),
      ).resolves.toEqual({ outcome: 'pass', message: 'ID verified successfully.' });
    });

    it('fails a National ID from another county', async () => {
      await expect(
        provider.submitForVerification(CredentialType.NATIONAL_ID, '10001234', noGuardian),
      ).resolves.toEqual({ outcome: 'fail', message: 'ID 10001234 does not match Samburu.' });
    });

    it('passes a NEMIS number and notes a matching guardian', async () => {
      await expect(
        provider.submitForVerification(CredentialType.NEMIS, 'SA0042', {
          fullName: 'Test Student',
          guardianIdNumber: '2345678',
        }),
      ).resolves.toEqual({ outcome: 'pass', message: 'NEMIS verified successfully.' });
    });

    it('passes a NEMIS number without a guardian check', async () => {
      await expect(
        provider.submitForVerification(CredentialType.NEMIS, 'SA0042', noGuardian),
      ).resolves.toEqual({ outcome: 'pass', message: 'NEMIS verified (guardian check skipped).' });
    });

    it('fails a NEMIS number with the wrong prefix', async () => {
      await expect(
        provider.submitForVerification(CredentialType.NEMIS, 'NA0042', noGuardian),
      ).resolves.toEqual({ outcome: 'fail', message: 'NEMIS NA0042 does not match Samburu.' });
    });
  });

  describe('with a county that has no rules', () => {
    const provider = providerFor('Kisumu');

    it('passes all-digit National IDs of six or more digits', async () => {
      await expect(
        provider.submitForVerification(CredentialType.NATIONAL_ID, '123456', noGuardian),
      ).resolves.toEqual({ outcome: 'pass', message: 'ID verified under default rules.' });
    });

    it('fails National IDs that are not all digits', async () => {
      await expect(
        provider.submitForVerification(CredentialType.NATIONAL_ID, 'ID-999', noGuardian),
      ).resolves.toEqual({ outcome: 'fail', message: 'Invalid ID format.' });
    });

    it('passes NEMIS numbers of four or more characters', async () => {
      await expect(
        provider.submitForVerification(CredentialType.NEMIS, '12345', noGuardian),
      ).resolves.toEqual({ outcome: 'pass', message: 'NEMIS verified under default rules.' });
    });
  });
});
