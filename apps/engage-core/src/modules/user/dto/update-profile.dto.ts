import {
  IsString,
  IsOptional,
  IsNotEmpty,
  MaxLength,
  IsArray,
  ArrayMaxSize,
  IsUrl,
  ValidateIf,
  Matches,
} from 'class-validator';

export class UpdateProfileDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name?: string;

  @IsOptional()
  @ValidateIf((_obj, value) => value !== null)
  @IsString()
  @MaxLength(255)
  jobTitle?: string | null;

  /** Replaces the stored interest set */
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(100)
  @IsString({ each: true })
  @MaxLength(64, { each: true })
  @Matches(/^[^,]+$/, { each: true, message: 'interests must not contain commas' })
  interests?: string[];

  @IsOptional()
  @ValidateIf((_obj, value) => value !== null)
  @IsUrl()
  @MaxLength(1024)
  profileImageUrl?: string | null;
}
