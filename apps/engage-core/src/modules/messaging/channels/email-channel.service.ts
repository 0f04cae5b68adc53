import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { MessagingConfig } from '../../../common/config/messaging.config';
import { describeHttpError } from '../../../common/utils/http-error.utils';
import { DeliveryResult } from './channel.types';

const SENDGRID_SEND_URL = 'https://api.sendgrid.com/v3/mail/send';

/**
 * Email delivery through the SendGrid v3 mail API.
 */
@Injectable()
export class EmailChannelService {
  private readonly logger = new Logger(EmailChannelService.name);
  private readonly apiKey: string | undefined;
  private readonly fromEmail: string | undefined;

  constructor(
    private readonly httpService: HttpService,
    configService: ConfigService,
  ) {
    const config = configService.get<MessagingConfig>('messaging');
    this.apiKey = config?.sendgridApiKey;
    this.fromEmail = config?.sendgridFromEmail;
  }

  async send(to: string, subject: string, body: string): Promise<DeliveryResult> {
    if (!this.apiKey || !this.fromEmail) {
      this.logger.log(`[SIMULATED] Email to ${to} | Subject: ${subject}`);
      return { delivered: true, simulated: true };
    }

    try {
      const response = await firstValueFrom(
        this.httpService.post(
          SENDGRID_SEND_URL,
          {
            personalizations: [{ to: [{ email: to }] }],
            from: { email: this.fromEmail },
            subject,
            content: [
              { type: 'text/plain', value: body },
              { type: 'text/html', value: toHtml(body) },
            ],
          },
          {
            headers: {
              Authorization: `Bearer ${this.apiKey}`,
              'Content-Type': 'application/json',
            },
          },
        ),
      );

      const messageId = response.headers['x-message-id'];
      this.logger.log(`Email sent to ${to} via SendGrid (status ${response.status})`);
      return {
        delivered: true,
        simulated: false,
        providerId: typeof messageId === 'string' ? messageId : undefined,
      };
    } catch (error) {
      const errorMsg = describeHttpError(error);
      this.logger.error(`Failed to send email to ${to}: ${errorMsg}`);
      return { delivered: false, simulated: false, error: errorMsg };
    }
  }
}

function toHtml(body: string): string {
  return body
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\n/g, '<br>');
}
