import { IsString, IsNotEmpty, IsOptional, MaxLength } from 'class-validator';

export class ChatDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(1000)
  query!: string;

  /** Background for conversational answers; defaults to the upcoming events */
  @IsOptional()
  @IsString()
  @MaxLength(20000)
  context?: string;
}
