import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventRecord } from '@engage/entities';
import { LlmModule } from '../llm/llm.module';
import { RegistrationModule } from '../registration/registration.module';
import { EventService } from './event.service';
import { EventImportService } from './event-import.service';
import { EventController } from './event.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([EventRecord]),
    HttpModule.register({ timeout: 15000, maxRedirects: 5 }),
    LlmModule,
    RegistrationModule,
  ],
  controllers: [EventController],
  providers: [EventService, EventImportService],
  exports: [EventService],
})
export class EventModule {}
