import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface MailMessage {
  to: string;
  subject: string;
  body: string;
}

@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);

  constructor(private readonly configService: ConfigService) {}

  async send(message: MailMessage): Promise<void> {
    // Mocked transport: the message is written to the log instead of SMTP.
    const from = this.configService.get<string>('MAIL_FROM', 'bursary@localhost');
    this.logger.log(`Mail from ${from} to ${message.to}: ${message.subject}`);
  }
}
