import { Controller, Get, Patch, Body } from '@nestjs/common';
import { AuthUser } from '../../common/decorators';
import { AuthenticatedUser } from '../auth/interfaces/jwt-payload.interface';
import { UserService } from './user.service';
import { UpdateProfileDto, UpdateContactDto, UserResponseDto, toUserResponse } from './dto';

@Controller('users')
export class UserController {
  constructor(private readonly userService: UserService) {}

  @Get('me')
  async getMe(@AuthUser() current: AuthenticatedUser): Promise<UserResponseDto> {
    return toUserResponse(await this.userService.findById(current.id));
  }

  @Patch('me/profile')
  async updateProfile(
    @AuthUser() current: AuthenticatedUser,
    @Body() dto: UpdateProfileDto,
  ): Promise<UserResponseDto> {
    return toUserResponse(await this.userService.updateProfile(current.id, dto));
  }

  @Patch('me/contact')
  async updateContact(
    @AuthUser() current: AuthenticatedUser,
    @Body() dto: UpdateContactDto,
  ): Promise<UserResponseDto> {
    return toUserResponse(await this.userService.updateContact(current.id, dto));
  }
}
