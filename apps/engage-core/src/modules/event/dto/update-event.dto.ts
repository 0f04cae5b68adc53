import { IsString, IsNotEmpty, IsOptional, IsDate, IsUrl, MaxLength, ValidateIf } from 'class-validator';
import { Type } from 'class-transformer';

export class UpdateEventDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(10000)
  description?: string;

  /** Changing the time does not move jobs already scheduled */
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  eventTime?: Date;

  @IsOptional()
  @ValidateIf((_obj, value) => value !== null)
  @IsUrl()
  @MaxLength(1024)
  imageUrl?: string | null;

  @IsOptional()
  @ValidateIf((_obj, value) => value !== null)
  @IsUrl()
  @MaxLength(1024)
  recordingUrl?: string | null;
}
