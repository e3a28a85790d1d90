import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CredentialType } from '../students/entities/student-account.entity';
import {
  VerificationProfile,
  VerificationProvider,
  VerificationResult,
} from './verification.types';

interface RegionRule {
  idPrefix: string;
  nemisPrefix: string;
}

// Prefix conventions used for local testing until a real registry is wired in.
const REGION_RULES: Record<string, RegionRule> = {
  samburu: { idPrefix: '2', nemisPrefix: 'SA' },
  nairobi: { idPrefix: '1', nemisPrefix: 'NA' },
};

@Injectable()
export class MockVerificationProvider implements VerificationProvider {
  private readonly logger = new Logger(MockVerificationProvider.name);

  constructor(private readonly configService: ConfigService) {}

  async submitForVerification(
    identifierType: CredentialType,
    identifierValue: string,
    profile: VerificationProfile,
  ): Promise<VerificationResult> {
    const county = this.configService.get<string>('SITE_COUNTY', '').trim();
    if (!county) {
      return this.fail('Site county is not configured.');
    }

    const rule = REGION_RULES[county.toLowerCase()];
    this.logger.debug(`Mock ${identifierType} verification against ${county}`);

    if (identifierType === CredentialType.NATIONAL_ID) {
      return this.verifyNationalId(identifierValue, county, rule);
    }
    return this.verifyNemis(identifierValue, county, rule, profile.guardianIdNumber);
  }

  private verifyNationalId(
    value: string,
    county: string,
    rule: RegionRule | undefined,
  ): VerificationResult {
    if (rule) {
      return value.startsWith(rule.idPrefix)
        ? this.pass('ID verified successfully.')
        : this.fail(`ID ${value} does not match ${county}.`);
    }

    if (/^\d{6,}$/.test(value)) {
      return this.pass('ID verified under default rules.');
    }
    return this.fail('Invalid ID format.');
  }

  private verifyNemis(
    value: string,
    county: string,
    rule: RegionRule | undefined,
    guardianIdNumber: string | null,
  ): VerificationResult {
    if (rule) {
      if (!value.toUpperCase().startsWith(rule.nemisPrefix)) {
        return this.fail(`NEMIS ${value} does not match ${county}.`);
      }
      return guardianIdNumber?.startsWith(rule.idPrefix)
        ? this.pass('NEMIS verified successfully.')
        : this.pass('NEMIS verified (guardian check skipped).');
    }

    if (value.length >= 4) {
      return this.pass('NEMIS verified under default rules.');
    }
    return this.fail('Invalid NEMIS format.');
  }

  private pass(message: string): VerificationResult {
    return { outcome: 'pass', message };
  }

  private fail(message: string): VerificationResult {
    return { outcome: 'fail', message };
  }
}
