import {
  Injectable,
  UnauthorizedException,
  ConflictException,
  BadRequestException,
  Logger,
  OnModuleInit,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { User, ContactPreference } from '@engage/entities';
import { JwtPayload, TokenResponse } from './interfaces/jwt-payload.interface';
import { LoginDto } from './dto/login.dto';
import { SignupDto } from './dto/signup.dto';
import { AuthConfig } from '../../common/config/auth.config';
import { isUniqueViolation } from '../../common/utils/db-errors.utils';
import { UserService } from '../user/user.service';

export interface SignupResult extends TokenResponse {
  user: User;
}

@Injectable()
export class AuthService implements OnModuleInit {
  private readonly logger = new Logger(AuthService.name);
  private readonly authConfig: AuthConfig;
  private dummyHash = '';

  constructor(
    private readonly userService: UserService,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {
    const config = this.configService.get<AuthConfig>('auth');
    if (!config) {
      throw new Error('Auth configuration not found');
    }
    this.authConfig = config;
  }

  async onModuleInit(): Promise<void> {
    // Valid bcrypt hash compared against when the email is unknown
    this.dummyHash = await bcrypt.hash('dummy-password-for-timing-safety', this.authConfig.bcryptRounds);
  }

  /**
   * Create an account. The very first account becomes the administrator.
   */
  async signup(dto: SignupDto): Promise<SignupResult> {
    const existing = await this.userService.findByEmail(dto.email);
    if (existing) {
      throw new ConflictException('An account with this email already exists');
    }

    if (dto.contactPreference === ContactPreference.WHATSAPP && !dto.phoneNumber) {
      throw new BadRequestException('A phone number is required for WhatsApp delivery');
    }

    const isFirstUser = (await this.userService.count()) === 0;
    const passwordHash = await bcrypt.hash(dto.password, this.authConfig.bcryptRounds);

    let user: User;
    try {
      user = await this.userService.create({
        email: dto.email,
        passwordHash,
        name: dto.name,
        jobTitle: dto.jobTitle,
        interests: dto.interests,
        contactPreference: dto.contactPreference,
        phoneNumber: dto.phoneNumber,
        isAdmin: isFirstUser,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException('An account with this email already exists');
      }
      throw error;
    }

    this.logger.log(`User ${user.email} signed up`);
    return { ...this.generateToken(user), user };
  }

  async login(loginDto: LoginDto): Promise<TokenResponse> {
    const user = await this.userService.findByEmail(loginDto.email);

    // Check user exists (timing-safe: don't reveal if user exists)
    if (!user) {
      const hashToCompare = this.dummyHash || (await bcrypt.hash('fallback', this.authConfig.bcryptRounds));
      await bcrypt.compare(loginDto.password, hashToCompare);
      throw new UnauthorizedException('Invalid credentials');
    }

    const isPasswordValid = await bcrypt.compare(loginDto.password, user.passwordHash);
    if (!isPasswordValid) {
      this.logger.warn(`Failed login for ${user.email}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    this.logger.log(`User ${user.email} logged in successfully`);
    return this.generateToken(user);
  }

  async getMe(userId: string): Promise<User> {
    const user = await this.userService.findByIdOrNull(userId);
    if (!user) {
      throw new UnauthorizedException('User not found');
    }
    return user;
  }

  private generateToken(user: User): TokenResponse {
    const payload: JwtPayload = {
      sub: user.id,
      email: user.email,
      role: user.isAdmin ? 'admin' : 'user',
      type: 'access',
    };

    const accessToken = this.jwtService.sign(payload, {
      expiresIn: this.authConfig.accessTokenTtlSeconds,
    });

    return {
      accessToken,
      expiresIn: this.authConfig.accessTokenTtlSeconds,
    };
  }
}
