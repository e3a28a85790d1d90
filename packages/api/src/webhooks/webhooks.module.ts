import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { IdentityModule } from '../identity/identity.module';
import { WebhooksController } from './webhooks.controller';

@Module({
  imports: [ConfigModule, IdentityModule],
  controllers: [WebhooksController],
})
export class WebhooksModule {}
