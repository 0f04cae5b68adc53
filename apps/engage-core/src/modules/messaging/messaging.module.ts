import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from '@engage/entities';
import { LlmModule } from '../llm/llm.module';
import { EmailChannelService } from './channels/email-channel.service';
import { WhatsAppChannelService } from './channels/whatsapp-channel.service';
import { MessageComposerService } from './message-composer.service';
import { MessagingService } from './messaging.service';

@Module({
  imports: [HttpModule.register({ timeout: 15000 }), TypeOrmModule.forFeature([User]), LlmModule],
  providers: [EmailChannelService, WhatsAppChannelService, MessageComposerService, MessagingService],
  exports: [MessageComposerService, MessagingService],
})
export class MessagingModule {}
