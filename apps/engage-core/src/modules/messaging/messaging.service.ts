import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User, ContactPreference } from '@engage/entities';
import { EmailChannelService } from './channels/email-channel.service';
import { WhatsAppChannelService } from './channels/whatsapp-channel.service';
import { parseComposedMessage } from './composed-message';

/**
 * Delivers composed messages on the user's preferred channel.
 *
 * Failures are logged here and reported as `false`; callers never see an
 * exception from a send.
 */
@Injectable()
export class MessagingService {
  private readonly logger = new Logger(MessagingService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepo: Repository<User>,
    private readonly emailChannel: EmailChannelService,
    private readonly whatsAppChannel: WhatsAppChannelService,
  ) {}

  async send(userId: string, text: string): Promise<boolean> {
    try {
      const user = await this.userRepo.findOne({ where: { id: userId } });
      if (!user) {
        this.logger.warn(`Cannot send message: user ${userId} not found`);
        return false;
      }
      return await this.deliver(user, text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to send message to user ${userId}: ${message}`);
      return false;
    }
  }

  private async deliver(user: User, text: string): Promise<boolean> {
    const { subject, body } = parseComposedMessage(text);

    if (user.contactPreference === ContactPreference.WHATSAPP) {
      if (user.phoneNumber) {
        const result = await this.whatsAppChannel.send(user.phoneNumber, `*${subject}*\n\n${body}`);
        return result.delivered;
      }
      this.logger.warn(`User ${user.id} prefers WhatsApp but has no phone number, using email`);
    }

    const result = await this.emailChannel.send(user.email, subject, body);
    return result.delivered;
  }
}
