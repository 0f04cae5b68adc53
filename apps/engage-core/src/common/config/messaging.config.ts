import { registerAs } from '@nestjs/config';

export interface MessagingConfig {
  sendgridApiKey: string | undefined;
  sendgridFromEmail: string | undefined;
  twilioAccountSid: string | undefined;
  twilioAuthToken: string | undefined;
  /** Sender in Twilio format, e.g. 'whatsapp:+14155238886' */
  twilioWhatsappFrom: string | undefined;
}

export default registerAs('messaging', (): MessagingConfig => ({
  sendgridApiKey: process.env.SENDGRID_API_KEY,
  sendgridFromEmail: process.env.SENDGRID_FROM_EMAIL,
  twilioAccountSid: process.env.TWILIO_ACCOUNT_SID,
  twilioAuthToken: process.env.TWILIO_AUTH_TOKEN,
  twilioWhatsappFrom: process.env.TWILIO_WHATSAPP_FROM,
}));
