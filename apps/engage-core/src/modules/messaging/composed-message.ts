export const DEFAULT_SUBJECT = 'A message from your event organizer';

const SUBJECT_PREFIX = 'Subject:';

export interface ComposedMessage {
  subject: string;
  body: string;
}

/**
 * Split composed text into subject and body.
 *
 * The first paragraph is the subject line (its `Subject:` prefix is dropped),
 * the rest is the body. Text without a paragraph break is all body.
 */
export function parseComposedMessage(text: string): ComposedMessage {
  const breakAt = text.indexOf('\n\n');
  if (breakAt === -1) {
    return { subject: DEFAULT_SUBJECT, body: text };
  }

  let subject = text.slice(0, breakAt).trim();
  if (subject.startsWith(SUBJECT_PREFIX)) {
    subject = subject.slice(SUBJECT_PREFIX.length).trim();
  }

  return {
    subject: subject || DEFAULT_SUBJECT,
    body: text.slice(breakAt + 2),
  };
}
