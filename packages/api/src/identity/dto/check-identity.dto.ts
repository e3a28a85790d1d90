import { IsEnum, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

import { CredentialType } from '../../students/entities/student-account.entity';

export class CheckIdentityDto {
  @IsString()
  @IsNotEmpty()
  identifier!: string;

  @IsEnum(CredentialType)
  identifier_type!: CredentialType;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  full_name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  guardian_id_number?: string;
}
