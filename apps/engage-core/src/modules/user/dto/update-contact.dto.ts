import { IsEnum, IsOptional, Matches, ValidateIf } from 'class-validator';
import { ContactPreference } from '@engage/entities';

export class UpdateContactDto {
  @IsEnum(ContactPreference)
  contactPreference!: ContactPreference;

  /** E.164, e.g. +15550100 */
  @IsOptional()
  @ValidateIf((_obj, value) => value !== null)
  @Matches(/^\+[1-9]\d{6,14}$/, { message: 'phoneNumber must be in E.164 format' })
  phoneNumber?: string | null;
}
