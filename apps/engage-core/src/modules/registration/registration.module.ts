import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventRecord, Registration } from '@engage/entities';
import { UserModule } from '../user/user.module';
import { MessagingModule } from '../messaging/messaging.module';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { RegistrationService } from './registration.service';
import { RegistrationController } from './registration.controller';

@Module({
  imports: [
    TypeOrmModule.forFeature([Registration, EventRecord]),
    UserModule,
    MessagingModule,
    SchedulerModule,
  ],
  controllers: [RegistrationController],
  providers: [RegistrationService],
  exports: [RegistrationService],
})
export class RegistrationModule {}
