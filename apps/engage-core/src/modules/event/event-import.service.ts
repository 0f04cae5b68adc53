import {
  Injectable,
  Logger,
  BadGatewayException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { z } from 'zod';
import { IMPORT_TEXT_MAX_LENGTH } from '@engage/shared';
import { LlmService } from '../llm/llm.service';
import { LlmUnavailableError } from '../llm/llm.errors';
import { htmlToText } from '../../common/utils/html.utils';
import { stripCodeFence, tryParseJson } from '../../common/utils/json.utils';
import { describeHttpError } from '../../common/utils/http-error.utils';
import { ImportedEventDraft } from './dto/import-event.dto';

const SYSTEM_PROMPT =
  'You are an expert data extraction assistant. Analyze the text of a web page and extract ' +
  'the event it describes. Return a single valid JSON object with the keys "name", ' +
  '"description" and "event_time". event_time must use the format YYYY-MM-DD HH:MM:SS ' +
  '(UTC) or ISO 8601. Use null for anything you cannot find.';

const EXAMPLE = `### Example Input Text
Join us for our annual developer conference, "CodeFusion"! This year we explore the future
of AI in software development. The event kicks off on October 26th at 9:00 AM UTC.

### Example JSON Output
{"name": "CodeFusion", "description": "An annual developer conference exploring the future of AI in software development.", "event_time": "2026-10-26 09:00:00"}`;

/**
 * Parse `YYYY-MM-DD HH:MM[:SS]` or ISO 8601. Values without an offset are UTC.
 */
export function parseEventTime(value: string): Date | null {
  let normalized = value.trim().replace(' ', 'T');
  if (/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/.test(normalized)) {
    normalized += 'Z';
  }
  const time = Date.parse(normalized);
  return Number.isNaN(time) ? null : new Date(time);
}

const extractedEventSchema = z.object({
  name: z.string().trim().min(1),
  description: z
    .string()
    .nullish()
    .transform((value) => value?.trim() ?? ''),
  event_time: z
    .string()
    .transform((value, ctx) => {
      const date = parseEventTime(value);
      if (!date) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'event_time is not a date' });
        return z.NEVER;
      }
      return date;
    }),
});

/**
 * Builds an event draft from a public web page: fetch the HTML, reduce it
 * to text and let the model pull out name, description and start time.
 */
@Injectable()
export class EventImportService {
  private readonly logger = new Logger(EventImportService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly llmService: LlmService,
  ) {}

  async importFromUrl(url: string): Promise<ImportedEventDraft> {
    this.logger.log(`Importing event from ${url}`);

    const html = await this.fetchPage(url);
    const text = htmlToText(html).slice(0, IMPORT_TEXT_MAX_LENGTH);
    if (!text) {
      throw new UnprocessableEntityException('The page has no readable text');
    }

    let raw: string;
    try {
      raw = await this.llmService.complete({
        system: SYSTEM_PROMPT,
        prompt: `${EXAMPLE}\n\n### Webpage Text to Analyze\n${text}\n\n### Your JSON Output`,
        maxTokens: 400,
        temperature: 0,
        json: true,
      });
    } catch (error) {
      if (error instanceof LlmUnavailableError) {
        throw new BadGatewayException(`Event extraction unavailable: ${error.message}`);
      }
      throw error;
    }

    const parsed = extractedEventSchema.safeParse(tryParseJson(stripCodeFence(raw)));
    if (!parsed.success) {
      this.logger.warn(`Extraction from ${url} failed validation: ${parsed.error.message}`);
      throw new UnprocessableEntityException('Could not extract valid event details from the page');
    }

    return {
      name: parsed.data.name,
      description: parsed.data.description,
      eventTime: parsed.data.event_time.toISOString(),
      sourceUrl: url,
    };
  }

  private async fetchPage(url: string): Promise<string> {
    try {
      const response = await firstValueFrom(
        this.httpService.get<string>(url, {
          responseType: 'text',
          headers: { 'User-Agent': 'Mozilla/5.0 (compatible; EngageSphereImporter/1.0)' },
          maxContentLength: 5 * 1024 * 1024,
        }),
      );
      return typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      const errorMsg = describeHttpError(error);
      this.logger.error(`Failed to fetch ${url}: ${errorMsg}`);
      throw new BadGatewayException(`Could not fetch ${url}: ${errorMsg}`);
    }
  }
}
