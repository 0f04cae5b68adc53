import {
  Controller,
  Get,
  Post,
  Delete,
  Param,
  ParseUUIDPipe,
  HttpCode,
  HttpStatus,
  NotFoundException,
} from '@nestjs/common';
import { AuthUser } from '../../common/decorators';
import { AuthenticatedUser } from '../auth/interfaces/jwt-payload.interface';
import { RegistrationService } from './registration.service';
import { RegisterResponse, RegistrationView, toRegistrationView } from './dto/registration-response.dto';

@Controller()
export class RegistrationController {
  constructor(private readonly registrationService: RegistrationService) {}

  @Post('events/:id/registrations')
  async register(
    @AuthUser() current: AuthenticatedUser,
    @Param('id', ParseUUIDPipe) eventId: string,
  ): Promise<RegisterResponse> {
    const result = await this.registrationService.register(current.id, eventId);
    return {
      registrationId: result.registration.id,
      eventId: result.event.id,
      scheduledJobIds: result.scheduledJobIds,
    };
  }

  @Delete('events/:id/registrations')
  @HttpCode(HttpStatus.NO_CONTENT)
  async cancel(
    @AuthUser() current: AuthenticatedUser,
    @Param('id', ParseUUIDPipe) eventId: string,
  ): Promise<void> {
    const cancelled = await this.registrationService.cancel(current.id, eventId);
    if (!cancelled) {
      throw new NotFoundException('Not registered for this event');
    }
  }

  @Get('registrations/me')
  async listMine(@AuthUser() current: AuthenticatedUser): Promise<RegistrationView[]> {
    const registrations = await this.registrationService.listUpcoming(current.id);
    return registrations.map((registration) => toRegistrationView(registration, registration.event));
  }
}
