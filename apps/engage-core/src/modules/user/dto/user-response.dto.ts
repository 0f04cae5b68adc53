import { User, parseInterests } from '@engage/entities';

export class UserResponseDto {
  id!: string;
  email!: string;
  name!: string;
  jobTitle!: string | null;
  interests!: string[];
  contactPreference!: string;
  phoneNumber!: string | null;
  profileImageUrl!: string | null;
  role!: 'admin' | 'user';
  createdAt!: string;
}

export function toUserResponse(user: User): UserResponseDto {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    jobTitle: user.jobTitle,
    interests: parseInterests(user.interests),
    contactPreference: user.contactPreference,
    phoneNumber: user.phoneNumber,
    profileImageUrl: user.profileImageUrl,
    role: user.isAdmin ? 'admin' : 'user',
    createdAt: user.createdAt.toISOString(),
  };
}
