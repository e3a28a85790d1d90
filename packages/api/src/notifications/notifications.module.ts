import { Module } from '@nestjs/common';

import { MailModule } from '../mail/mail.module';
import { SmsModule } from '../sms/sms.module';
import { StudentsModule } from '../students/students.module';
import { NotificationsService } from './notifications.service';

@Module({
  imports: [StudentsModule, MailModule, SmsModule],
  providers: [NotificationsService],
  exports: [NotificationsService],
})
export class NotificationsModule {}
