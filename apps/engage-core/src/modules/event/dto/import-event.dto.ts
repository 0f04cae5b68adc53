import { IsUrl, IsOptional, IsBoolean, MaxLength } from 'class-validator';

export class ImportEventDto {
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  @MaxLength(2048)
  url!: string;

  /** Create the event right away instead of returning a draft */
  @IsOptional()
  @IsBoolean()
  save?: boolean;
}

export interface ImportedEventDraft {
  name: string;
  description: string;
  eventTime: string;
  sourceUrl: string;
}
