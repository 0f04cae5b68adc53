import { z } from 'zod';
import { stripCodeFence, tryParseJson } from '../../common/utils/json.utils';

export enum ChatAction {
  REGISTER = 'register',
  CANCEL = 'cancel',
  LIST_REGISTRATIONS = 'list_registrations',
}

/**
 * Structured reading of a chat query. `action` stays a plain string so an
 * action the dispatcher does not know can still be answered.
 */
export type ChatIntent =
  | { kind: 'action'; action: string; eventName: string | null }
  | { kind: 'conversational'; text: string };

export const FALLBACK_REPLY =
  "I'm sorry, I had a little trouble understanding that. Could you please rephrase?";

const actionSchema = z.object({
  action: z.string().trim().min(1),
  event_name: z
    .string()
    .nullish()
    .transform((value) => value?.trim() || null),
});

const responseSchema = z.object({
  response: z.string(),
});

/**
 * Decode extractor output into an intent.
 *
 * An object with an `action` string is an action, even when it also carries
 * `response`. Otherwise an object with a `response` string is
 * conversational. Anything else becomes the fallback reply.
 */
export function decodeIntent(raw: string): ChatIntent {
  const value = tryParseJson(stripCodeFence(raw));

  const action = actionSchema.safeParse(value);
  if (action.success) {
    return { kind: 'action', action: action.data.action, eventName: action.data.event_name };
  }

  const response = responseSchema.safeParse(value);
  if (response.success) {
    return { kind: 'conversational', text: response.data.response };
  }

  return { kind: 'conversational', text: FALLBACK_REPLY };
}
