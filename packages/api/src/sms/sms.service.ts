import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class SmsService {
  private readonly logger = new Logger(SmsService.name);

  async send(phoneNumber: string, text: string): Promise<void> {
    // Mocked gateway, same as mail: delivery is logged only.
    this.logger.log(`SMS to ${phoneNumber}: ${text}`);
  }
}
