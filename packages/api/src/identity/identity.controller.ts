import { Body, Controller, Get, HttpCode, Post, Req, UseGuards } from '@nestjs/common';
import type {
  IdentityCheckResponse,
  LoginResponse,
  SignupResponse,
  StudentAccount,
  UpgradeResponse,
} from '@bursary/shared';

import { AuthenticatedRequest } from '../auth/auth.types';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { CheckIdentityDto } from './dto/check-identity.dto';
import { LoginDto } from './dto/login.dto';
import { RegisterStudentDto } from './dto/register-student.dto';
import { UpgradeToNationalIdDto } from './dto/upgrade-to-national-id.dto';
import { IdentityService } from './identity.service';
import { toStudentView } from './student-account.view';

@Controller('students')
export class IdentityController {
  constructor(private readonly identityService: IdentityService) {}

  @Post('signup')
  async signup(@Body() dto: RegisterStudentDto): Promise<SignupResponse> {
    const account = await this.identityService.registerStudent(
      dto.identifier,
      dto.identifier_type,
      dto.password,
      {
        fullName: dto.full_name,
        email: dto.email,
        phone: dto.phone,
        guardianIdNumber: dto.guardian_id_number,
      },
    );

    return {
      student: toStudentView(account),
      message:
        'Your account has been created successfully! You can now log in using your ID/NEMIS number and password.',
    };
  }

  @Post('login')
  @HttpCode(200)
  async login(@Body() dto: LoginDto): Promise<LoginResponse> {
    const { accessToken, account } = await this.identityService.authenticate(
      dto.identifier,
      dto.password,
    );
    return { access_token: accessToken, student: toStudentView(account) };
  }

  @Post('verify-identity')
  @HttpCode(200)
  checkIdentity(@Body() dto: CheckIdentityDto): Promise<IdentityCheckResponse> {
    return this.identityService.checkIdentity(dto.identifier, dto.identifier_type, {
      fullName: dto.full_name ?? '',
      guardianIdNumber: dto.guardian_id_number,
    });
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  async me(@Req() req: AuthenticatedRequest): Promise<{ student: StudentAccount }> {
    const account = await this.identityService.getAccount(req.user.id);
    return { student: toStudentView(account) };
  }

  @Post('me/upgrade')
  @HttpCode(200)
  @UseGuards(JwtAuthGuard)
  async upgrade(
    @Req() req: AuthenticatedRequest,
    @Body() dto: UpgradeToNationalIdDto,
  ): Promise<UpgradeResponse> {
    const account = await this.identityService.upgradeToNationalId(req.user.id, dto.national_id);
    return {
      student: toStudentView(account),
      message:
        'Your account has been upgraded. From now on, you will log in using your National ID.',
    };
  }
}
