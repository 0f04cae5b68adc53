import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { MessagingConfig } from '../../../common/config/messaging.config';
import { describeHttpError } from '../../../common/utils/http-error.utils';
import { DeliveryResult } from './channel.types';

interface TwilioMessageResponse {
  sid: string;
  status: string;
}

/**
 * WhatsApp delivery through the Twilio Messages API.
 */
@Injectable()
export class WhatsAppChannelService {
  private readonly logger = new Logger(WhatsAppChannelService.name);
  private readonly config: MessagingConfig | undefined;

  constructor(
    private readonly httpService: HttpService,
    configService: ConfigService,
  ) {
    this.config = configService.get<MessagingConfig>('messaging');
  }

  /**
   * @param phoneNumber - E.164 number without the `whatsapp:` prefix
   */
  async send(phoneNumber: string, body: string): Promise<DeliveryResult> {
    const accountSid = this.config?.twilioAccountSid;
    const authToken = this.config?.twilioAuthToken;
    const from = this.config?.twilioWhatsappFrom;

    if (!accountSid || !authToken || !from) {
      this.logger.log(`[SIMULATED] WhatsApp to ${phoneNumber} | ${body.split('\n')[0]}`);
      return { delivered: true, simulated: true };
    }

    const url = `https://api.twilio.com/2010-04-01/Accounts/${encodeURIComponent(accountSid)}/Messages.json`;
    const form = new URLSearchParams({
      From: from,
      To: `whatsapp:${phoneNumber}`,
      Body: body,
    });

    try {
      const response = await firstValueFrom(
        this.httpService.post<TwilioMessageResponse>(url, form.toString(), {
          auth: { username: accountSid, password: authToken },
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        }),
      );

      this.logger.log(`WhatsApp message sent to ${phoneNumber} (SID: ${response.data.sid})`);
      return { delivered: true, simulated: false, providerId: response.data.sid };
    } catch (error) {
      const errorMsg = describeHttpError(error);
      this.logger.error(`Failed to send WhatsApp message to ${phoneNumber}: ${errorMsg}`);
      return { delivered: false, simulated: false, error: errorMsg };
    }
  }
}
