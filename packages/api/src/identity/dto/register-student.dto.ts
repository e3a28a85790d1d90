import {
  IsEmail,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';

import { CredentialType } from '../../students/entities/student-account.entity';

export class RegisterStudentDto {
  @IsString()
  @IsNotEmpty()
  identifier!: string;

  @IsEnum(CredentialType)
  identifier_type!: CredentialType;

  @IsString()
  @MinLength(8)
  @Matches(/[A-Z]/, { message: 'Password must contain at least one uppercase letter.' })
  @Matches(/\d/, { message: 'Password must contain at least one number.' })
  @Matches(/[^A-Za-z0-9]/, { message: 'Password must contain at least one special character.' })
  password!: string;

  @IsString()
  @MinLength(2)
  @MaxLength(100)
  @Matches(/\S/, { message: 'Full name must not be blank.' })
  full_name!: string;

  @IsOptional()
  @IsEmail()
  email?: string;

  @IsOptional()
  @Matches(/^\+?\d{9,15}$/, { message: 'Phone number must be 9 to 15 digits.' })
  phone?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  guardian_id_number?: string;
}
