import { Injectable, Logger, ConflictException } from '@nestjs/common';
import { EventRecord } from '@engage/entities';
import { ChatReply } from '@engage/shared';
import { AuthenticatedUser } from '../auth/interfaces/jwt-payload.interface';
import { EventService } from '../event/event.service';
import { RegistrationService } from '../registration/registration.service';
import { IntentExtractorService } from './intent-extractor.service';
import { ChatAction, ChatIntent, decodeIntent } from './chat-intent';

export const LOGIN_REQUIRED_REPLY = 'Please log in first so I can manage your event registrations.';
export const NO_REGISTRATIONS_REPLY = "You're not registered for any upcoming events.";
export const ASK_EVENT_NAME_REPLY = 'Which event do you mean? Please tell me its name.';
export const UNKNOWN_ACTION_REPLY = "I'm not sure how to do that yet.";

/** Events listed in the context built for callers that send none */
const CONTEXT_EVENT_LIMIT = 20;

const PROJECT_SUMMARY =
  'EngageSphere is an AI-powered agent designed to boost engagement for webinars and events. ' +
  'Registered attendees get a welcome message, a content preview, reminders 24 hours and 1 hour ' +
  'before the start, a nudge when the event goes live and a follow-up afterwards.';

/**
 * Turns a chat query into an intent and carries it out on behalf of the
 * caller, reusing the registration and cancellation workflows.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly extractor: IntentExtractorService,
    private readonly eventService: EventService,
    private readonly registrationService: RegistrationService,
  ) {}

  async handle(query: string, context: string | undefined, user: AuthenticatedUser | null): Promise<ChatReply> {
    const intent = await this.resolve(query, context?.trim() ? context : await this.buildDefaultContext());
    const reply = await this.dispatch(intent, user);

    if (intent.kind === 'action') {
      return { reply, intent: 'action', action: intent.action };
    }
    return { reply, intent: 'conversational' };
  }

  async resolve(query: string, context: string): Promise<ChatIntent> {
    const raw = await this.extractor.extract(query, context);
    const intent = decodeIntent(raw);
    this.logger.debug(
      `Resolved "${query}" as ${intent.kind === 'action' ? `action ${intent.action}` : 'conversation'}`,
    );
    return intent;
  }

  async dispatch(intent: ChatIntent, user: AuthenticatedUser | null): Promise<string> {
    if (intent.kind === 'conversational') {
      return intent.text;
    }
    if (!user) {
      return LOGIN_REQUIRED_REPLY;
    }

    switch (intent.action) {
      case ChatAction.LIST_REGISTRATIONS:
        return this.listRegistrations(user.id);
      case ChatAction.REGISTER:
        return this.withEvent(intent.eventName, (event) => this.register(user.id, event));
      case ChatAction.CANCEL:
        return this.withEvent(intent.eventName, (event) => this.cancel(user.id, event));
      default:
        this.logger.warn(`Unsupported chat action "${intent.action}"`);
        return UNKNOWN_ACTION_REPLY;
    }
  }

  private async listRegistrations(userId: string): Promise<string> {
    const registrations = await this.registrationService.listUpcoming(userId);
    if (registrations.length === 0) {
      return NO_REGISTRATIONS_REPLY;
    }

    const lines = registrations.map(
      (registration) => `- ${registration.event.name} (${registration.event.eventTime.toISOString()})`,
    );
    return `You're registered for:\n${lines.join('\n')}`;
  }

  private async withEvent(
    eventName: string | null,
    action: (event: EventRecord) => Promise<string>,
  ): Promise<string> {
    if (!eventName) {
      return ASK_EVENT_NAME_REPLY;
    }

    const event = await this.eventService.findByName(eventName);
    if (!event) {
      return `I couldn't find an event named "${eventName}".`;
    }
    return action(event);
  }

  private async register(userId: string, event: EventRecord): Promise<string> {
    try {
      await this.registrationService.register(userId, event.id);
    } catch (error) {
      if (error instanceof ConflictException) {
        return `You're already registered for "${event.name}".`;
      }
      throw error;
    }
    return `You're registered for "${event.name}"! I'll send you reminders before it starts.`;
  }

  private async cancel(userId: string, event: EventRecord): Promise<string> {
    const cancelled = await this.registrationService.cancel(userId, event.id);
    if (!cancelled) {
      return `You're not registered for "${event.name}".`;
    }
    return `Your registration for "${event.name}" has been cancelled.`;
  }

  private async buildDefaultContext(): Promise<string> {
    const events = await this.eventService.findUpcoming(CONTEXT_EVENT_LIMIT);
    if (events.length === 0) {
      return `${PROJECT_SUMMARY}\n\nThere are no upcoming events.`;
    }

    const lines = events.map(
      (event) => `- ${event.name} (${event.eventTime.toISOString()}): ${event.description}`,
    );
    return `${PROJECT_SUMMARY}\n\nUpcoming events:\n${lines.join('\n')}`;
  }
}
