import { IsNotEmpty, IsString } from 'class-validator';

export class UpgradeToNationalIdDto {
  @IsString()
  @IsNotEmpty()
  national_id!: string;
}
