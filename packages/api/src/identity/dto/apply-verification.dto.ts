import { IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import type { VerificationOutcome } from '@bursary/shared';

export class ApplyVerificationDto {
  @IsIn(['pass', 'fail'])
  result!: VerificationOutcome;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  message?: string;
}
