import { Controller, Post, Get, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { AuthService } from './auth.service';
import { LoginDto, SignupDto } from './dto';
import { Public, AuthUser } from '../../common/decorators';
import { AuthenticatedUser, TokenResponse } from './interfaces/jwt-payload.interface';
import { UserResponseDto, toUserResponse } from '../user/dto/user-response.dto';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Public()
  @Post('signup')
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  async signup(@Body() dto: SignupDto): Promise<TokenResponse & { user: UserResponseDto }> {
    const { accessToken, expiresIn, user } = await this.authService.signup(dto);
    return { accessToken, expiresIn, user: toUserResponse(user) };
  }

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 10, ttl: 60000 } }) // 10 attempts per minute
  async login(@Body() loginDto: LoginDto): Promise<TokenResponse> {
    return this.authService.login(loginDto);
  }

  @Get('me')
  async getMe(@AuthUser() current: AuthenticatedUser): Promise<UserResponseDto> {
    return toUserResponse(await this.authService.getMe(current.id));
  }
}
