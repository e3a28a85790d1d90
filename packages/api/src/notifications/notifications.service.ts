import { Injectable, Logger } from '@nestjs/common';

import { MailService } from '../mail/mail.service';
import { SmsService } from '../sms/sms.service';
import {
  activeIdentifier,
  CredentialType,
  StudentAccount,
} from '../students/entities/student-account.entity';
import { StudentsService } from '../students/students.service';

export enum NotificationEvent {
  SIGNUP = 'SIGNUP',
  VERIFICATION_PASSED = 'VERIFICATION_PASSED',
  VERIFICATION_FAILED = 'VERIFICATION_FAILED',
  UPGRADED = 'UPGRADED',
}

interface ComposedNotification {
  subject: string;
  text: string;
}

@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(
    private readonly studentsService: StudentsService,
    private readonly mailService: MailService,
    private readonly smsService: SmsService,
  ) {}

  /**
   * Sends the email and SMS for `event`. Never rejects: delivery problems are
   * logged and the caller carries on.
   */
  async notify(accountId: string, event: NotificationEvent): Promise<void> {
    try {
      const account = await this.studentsService.findById(accountId);
      if (!account) {
        this.logger.warn(`Skipping ${event} notification: account ${accountId} not found`);
        return;
      }

      const { subject, text } = this.compose(account, event);
      const deliveries: Array<{ channel: string; promise: Promise<void> }> = [];
      if (account.email) {
        deliveries.push({
          channel: 'email',
          promise: this.mailService.send({ to: account.email, subject, body: text }),
        });
      }
      if (account.phone) {
        deliveries.push({ channel: 'sms', promise: this.smsService.send(account.phone, text) });
      }

      const results = await Promise.allSettled(deliveries.map((delivery) => delivery.promise));
      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          this.logger.error(
            `${deliveries[index].channel} delivery of ${event} for ${accountId} failed: ${errorMessage(result.reason)}`,
          );
        }
      });
    } catch (error) {
      this.logger.error(`Notification ${event} for ${accountId} failed: ${errorMessage(error)}`);
    }
  }

  compose(account: StudentAccount, event: NotificationEvent): ComposedNotification {
    const greeting = `Dear ${account.fullName},`;
    const label =
      account.activeCredentialType === CredentialType.NATIONAL_ID ? 'National ID' : 'NEMIS number';

    switch (event) {
      case NotificationEvent.SIGNUP:
        return {
          subject: 'Bursary portal account created',
          text: `${greeting} your bursary portal account has been created. Log in with your ${label} ${activeIdentifier(account)}.`,
        };
      case NotificationEvent.VERIFICATION_PASSED:
        return {
          subject: 'Identity verified',
          text: `${greeting} your ${label} has been verified. You can now apply for bursaries.`,
        };
      case NotificationEvent.VERIFICATION_FAILED:
        return {
          subject: 'Identity verification failed',
          text: `${greeting} we could not verify your ${label}. ${account.verificationMessage ?? ''}`.trim(),
        };
      case NotificationEvent.UPGRADED:
        return {
          subject: 'Account upgraded to National ID',
          text: `${greeting} your account has been upgraded. From now on, log in using your National ID ${account.nationalId ?? ''}.`,
        };
    }
  }
}

function errorMessage(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}
