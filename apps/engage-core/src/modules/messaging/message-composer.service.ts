import { Injectable, Logger } from '@nestjs/common';
import { User, EventRecord } from '@engage/entities';
import { LlmService } from '../llm/llm.service';
import { MessageType } from './message-type';

const SYSTEM_PROMPT =
  'You are a friendly and professional event assistant. You write short personalised ' +
  'messages for event attendees. The output must start with a "Subject:" line, followed ' +
  'by a blank line and the message body. Return only the message.';

const EXAMPLE_OUTPUT = `Subject: Your Subject Here

Hi [User Name],

This is the body of the message.

Best,
The Event Team`;

const INSTRUCTIONS: Readonly<Record<MessageType, string>> = {
  [MessageType.WELCOME]:
    'Be warm, confirm their registration, and mention how the event relates to their interests or job title.',
  [MessageType.CONTENT_PREVIEW]:
    "Generate excitement by giving a sneak peek of the event, like a key topic or a speaker's background.",
  [MessageType.REMINDER_24H]:
    'The event starts in 24 hours. Build excitement and include the placeholder [EVENT_LINK].',
  [MessageType.REMINDER_1H]:
    'The event starts in one hour. Build excitement and include the placeholder [EVENT_LINK].',
  [MessageType.EVENT_STARTING]:
    'Be energetic and concise. Announce that the event is starting now and include the placeholder [EVENT_LINK].',
  [MessageType.FOLLOW_UP]: 'Thank them for attending and share the recording link.',
};

const FALLBACK_LINES: Readonly<Record<MessageType, string>> = {
  [MessageType.WELCOME]: 'You are registered for {event}. We look forward to seeing you there!',
  [MessageType.CONTENT_PREVIEW]: '{event} is coming up soon. Here is what to expect:\n\n{description}',
  [MessageType.REMINDER_24H]: 'A friendly reminder: {event} starts in 24 hours.',
  [MessageType.REMINDER_1H]: 'A friendly reminder: {event} starts in one hour.',
  [MessageType.EVENT_STARTING]: '{event} is starting now. Join us!',
  [MessageType.FOLLOW_UP]: 'Thank you for attending {event}.',
};

/**
 * Writes personalised attendee messages.
 *
 * Output always has the shape `Subject: ...\n\n<body>`. When the model is not
 * configured or fails, a template is used instead; compose never throws.
 */
@Injectable()
export class MessageComposerService {
  private readonly logger = new Logger(MessageComposerService.name);

  constructor(private readonly llmService: LlmService) {}

  async compose(user: User, event: EventRecord, type: MessageType): Promise<string> {
    this.logger.debug(`Composing ${type} message for ${user.email} (event ${event.id})`);

    try {
      const text = await this.llmService.complete({
        system: SYSTEM_PROMPT,
        prompt: this.buildPrompt(user, event, type),
        maxTokens: 350,
        temperature: 0.7,
      });
      if (!text.startsWith('Subject:')) {
        return `Subject: ${this.defaultSubject(event)}\n\n${text}`;
      }
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Message composition failed, using template: ${message}`);
      return this.fallback(user, event, type);
    }
  }

  /**
   * Template used when the model cannot be reached.
   */
  fallback(user: User, event: EventRecord, type: MessageType): string {
    let line = FALLBACK_LINES[type]
      .replace('{event}', () => event.name)
      .replace('{description}', () => event.description);

    if (type === MessageType.FOLLOW_UP && event.recordingUrl) {
      line += `\n\nRecording: ${event.recordingUrl}`;
    }

    const body = [
      `Hi ${user.name},`,
      line,
      `Event time: ${event.eventTime.toISOString()}`,
      'Best,\nThe Event Team',
    ].join('\n\n');

    return `Subject: ${this.defaultSubject(event)}\n\n${body}`;
  }

  private defaultSubject(event: EventRecord): string {
    return `Regarding ${event.name}`;
  }

  private buildPrompt(user: User, event: EventRecord, type: MessageType): string {
    const instruction =
      type === MessageType.FOLLOW_UP
        ? `${INSTRUCTIONS[type]} Recording link: ${event.recordingUrl ?? 'not available yet'}.`
        : INSTRUCTIONS[type];

    return [
      `Write a '${type}' message.`,
      '',
      '### Example Output Format',
      EXAMPLE_OUTPUT,
      '',
      '### User Details',
      `- Name: ${user.name}`,
      `- Job Title: ${user.jobTitle ?? 'unknown'}`,
      `- Interests: ${user.interests ?? 'none given'}`,
      '',
      '### Event Details',
      `- Name: ${event.name}`,
      `- Description: ${event.description}`,
      `- Time: ${event.eventTime.toISOString()}`,
      '',
      '### Instructions',
      instruction,
    ].join('\n');
  }
}
