import { Injectable, Logger } from '@nestjs/common';
import { LlmService } from '../llm/llm.service';

const SYSTEM_PROMPT = `You are the AI assistant for "EngageSphere". Your primary role is to help users by either answering their questions or performing actions for them. Analyze the user's query and the provided context, then choose one of the following two paths:

1. Function call: if the user wants to register for an event, cancel a registration or list their events, return a JSON object with the key "action".
   - The possible actions are "register", "cancel" and "list_registrations".
   - For "register" and "cancel", also include an "event_name" key with the name of the event taken from the query.
   - Example: "Can you sign me up for the AI conference?" -> {"action": "register", "event_name": "AI Conference"}
   - Example: "I can't make it to the Data Summit, please cancel it." -> {"action": "cancel", "event_name": "Data Summit"}
   - Example: "What am I registered for?" -> {"action": "list_registrations"}

2. Conversational response: for a general question, a greeting or anything else, return a JSON object with a single key "response" holding a friendly answer. Base the answer only on the project context. If the answer is not in the context, say you don't have that information.
   - Example: "What is EngageSphere?" -> {"response": "EngageSphere is an AI-powered agent designed to boost engagement for webinars and events."}

Return a single valid JSON object and nothing else.`;

export const CONNECTION_TROUBLE_OUTPUT = JSON.stringify({
  response: "I'm sorry, but I'm having trouble connecting to my brain right now. Please try again in a moment.",
});

export function truncateContext(context: string, maxLength: number): string {
  if (context.length <= maxLength) {
    return context;
  }
  return `${context.slice(0, maxLength)}\n... (context truncated)`;
}

/**
 * Asks the model to classify a chat query. Returns the raw model output,
 * expected to be JSON; never throws.
 */
@Injectable()
export class IntentExtractorService {
  private readonly logger = new Logger(IntentExtractorService.name);

  constructor(private readonly llmService: LlmService) {}

  async extract(query: string, context: string): Promise<string> {
    const boundedContext = truncateContext(context, this.llmService.contextMaxLength);

    try {
      return await this.llmService.complete({
        system: SYSTEM_PROMPT,
        prompt: `### Project Context\n${boundedContext}\n\n### User Question\n${query}`,
        maxTokens: 250,
        temperature: 0.2,
        json: true,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Intent extraction failed: ${message}`);
      return CONNECTION_TROUBLE_OUTPUT;
    }
  }
}
