import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { MockVerificationProvider } from './mock-verification.provider';
import { VERIFICATION_PROVIDER } from './verification.types';

@Module({
  imports: [ConfigModule],
  providers: [
    MockVerificationProvider,
    { provide: VERIFICATION_PROVIDER, useExisting: MockVerificationProvider },
  ],
  exports: [VERIFICATION_PROVIDER],
})
export class VerificationModule {}
