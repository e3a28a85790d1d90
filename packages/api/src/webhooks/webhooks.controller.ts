import {
  Body,
  Controller,
  Headers,
  HttpCode,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import type { StudentAccount } from '@bursary/shared';

import { ApplyVerificationDto } from '../identity/dto/apply-verification.dto';
import { IdentityService } from '../identity/identity.service';
import { toStudentView } from '../identity/student-account.view';

/**
 * Callback endpoint for an external identity registry that finishes
 * verification after signup has returned.
 * URL pattern: POST /api/v1/webhooks/verification/:accountId
 *
 * No JWT guard: the registry authenticates with the shared secret header.
 */
@Controller('webhooks')
export class WebhooksController {
  private readonly logger = new Logger(WebhooksController.name);

  constructor(
    private readonly identityService: IdentityService,
    private readonly configService: ConfigService,
  ) {}

  @Post('verification/:accountId')
  @HttpCode(200)
  async verificationResult(
    @Param('accountId', new ParseUUIDPipe()) accountId: string,
    @Headers('x-webhook-secret') secret: string | undefined,
    @Body() dto: ApplyVerificationDto,
  ): Promise<{ student: StudentAccount }> {
    if (!this.isAuthorized(secret)) {
      throw new UnauthorizedException('Invalid webhook secret.');
    }

    this.logger.log(`Verification webhook [${dto.result}] for student: ${accountId}`);
    const account = await this.identityService.verify(accountId, {
      outcome: dto.result,
      message: dto.message,
    });
    return { student: toStudentView(account) };
  }

  private isAuthorized(secret: string | undefined): boolean {
    const expected = this.configService.get<string>('VERIFICATION_WEBHOOK_SECRET', '');
    if (!expected || !secret) {
      return false;
    }

    const given = Buffer.from(secret);
    const wanted = Buffer.from(expected);
    return given.length === wanted.length && timingSafeEqual(given, wanted);
  }
}
