import { Controller, Post, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { ChatReply } from '@engage/shared';
import { Public, CurrentUser } from '../../common/decorators';
import { AuthenticatedUser } from '../auth/interfaces/jwt-payload.interface';
import { ChatService } from './chat.service';
import { ChatDto } from './dto/chat.dto';

@Controller('chat')
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  /**
   * Anyone may chat; actions need a user token.
   */
  @Public()
  @Post()
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 30, ttl: 60000 } })
  async chat(
    @Body() dto: ChatDto,
    @CurrentUser() user: AuthenticatedUser | null,
  ): Promise<ChatReply> {
    return this.chatService.handle(dto.query, dto.context, user);
  }
}
