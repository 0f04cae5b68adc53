import { IsString, IsNotEmpty, IsOptional, IsDate, IsUrl, MaxLength, ValidateIf } from 'class-validator';
import { Type } from 'class-transformer';

export class CreateEventDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsString()
  @MaxLength(10000)
  description!: string;

  /** ISO 8601 with an offset or Z */
  @Type(() => Date)
  @IsDate()
  eventTime!: Date;

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
