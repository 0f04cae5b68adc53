import { Injectable, Logger, NotFoundException, BadRequestException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User, ContactPreference, serializeInterests } from '@engage/entities';
import { UpdateProfileDto } from './dto/update-profile.dto';
import { UpdateContactDto } from './dto/update-contact.dto';

export interface CreateUserInput {
  email: string;
  passwordHash: string;
  name: string;
  jobTitle?: string | null;
  interests?: string[];
  contactPreference?: ContactPreference;
  phoneNumber?: string | null;
  isAdmin?: boolean;
}

@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepo: Repository<User>,
  ) {}

  async findByIdOrNull(id: string): Promise<User | null> {
    return this.userRepo.findOne({ where: { id } });
  }

  async findById(id: string): Promise<User> {
    const user = await this.findByIdOrNull(id);
    if (!user) {
      throw new NotFoundException(`User with id '${id}' not found`);
    }
    return user;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.userRepo.findOne({ where: { email: normalizeEmail(email) } });
  }

  async count(): Promise<number> {
    return this.userRepo.count();
  }

  async create(input: CreateUserInput): Promise<User> {
    const user = this.userRepo.create({
      email: normalizeEmail(input.email),
      passwordHash: input.passwordHash,
      name: input.name,
      jobTitle: input.jobTitle ?? null,
      interests: serializeInterests(input.interests ?? []),
      contactPreference: input.contactPreference ?? ContactPreference.EMAIL,
      phoneNumber: input.phoneNumber ?? null,
      isAdmin: input.isAdmin ?? false,
    });

    const saved = await this.userRepo.save(user);
    this.logger.log(`Created user ${saved.id} (${saved.email})${saved.isAdmin ? ' as admin' : ''}`);
    return saved;
  }

  /**
   * Store the given interests as the user's full interest set.
   */
  async updateInterests(user: User, interests: Iterable<string>): Promise<User> {
    user.interests = serializeInterests(interests);
    await this.userRepo.update(user.id, { interests: user.interests });
    return user;
  }

  async updateProfile(id: string, dto: UpdateProfileDto): Promise<User> {
    const user = await this.findById(id);

    if (dto.name !== undefined) user.name = dto.name;
    if (dto.jobTitle !== undefined) user.jobTitle = dto.jobTitle;
    if (dto.profileImageUrl !== undefined) user.profileImageUrl = dto.profileImageUrl;
    if (dto.interests !== undefined) user.interests = serializeInterests(dto.interests);

    return this.userRepo.save(user);
  }

  /**
   * Switch the delivery channel. WhatsApp needs a phone number, either in the
   * request or already on file.
   */
  async updateContact(id: string, dto: UpdateContactDto): Promise<User> {
    const user = await this.findById(id);
    const phoneNumber = dto.phoneNumber !== undefined ? dto.phoneNumber : user.phoneNumber;

    if (dto.contactPreference === ContactPreference.WHATSAPP && !phoneNumber) {
      throw new BadRequestException('A phone number is required for WhatsApp delivery');
    }

    user.contactPreference = dto.contactPreference;
    user.phoneNumber = phoneNumber;
    return this.userRepo.save(user);
  }
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
