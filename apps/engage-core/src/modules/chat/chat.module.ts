import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { EventModule } from '../event/event.module';
import { RegistrationModule } from '../registration/registration.module';
import { IntentExtractorService } from './intent-extractor.service';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';

@Module({
  imports: [LlmModule, EventModule, RegistrationModule],
  controllers: [ChatController],
  providers: [IntentExtractorService, ChatService],
})
export class ChatModule {}
