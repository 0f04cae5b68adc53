import { JobKind, isJobKind } from './engagement-job.types';

const SEPARATOR = ':';

/**
 * Deterministic job id for a (kind, user, event) triple.
 *
 * Both the scheduling and the cancelling call sites derive ids through this
 * function, so no lookup table is needed to find a registration's jobs.
 * Components are URI-encoded (which escapes ':'), so distinct triples never
 * produce the same id.
 *
 * @example
 * buildJobId(JobKind.REMINDER_1H, 'user-1', 'event-9'); // 'reminder_1h:user-1:event-9'
 */
export function buildJobId(kind: JobKind, userId: string, eventId: string): string {
  return [kind, encodeURIComponent(userId), encodeURIComponent(eventId)].join(SEPARATOR);
}

export interface ParsedJobId {
  kind: JobKind;
  userId: string;
  eventId: string;
}

/**
 * Inverse of buildJobId. Returns null for ids not produced by it.
 */
export function parseJobId(jobId: string): ParsedJobId | null {
  const parts = jobId.split(SEPARATOR);
  if (parts.length !== 3) {
    return null;
  }

  const [kind, userId, eventId] = parts;
  if (!isJobKind(kind) || !userId || !eventId) {
    return null;
  }

  try {
    return {
      kind,
      userId: decodeURIComponent(userId),
      eventId: decodeURIComponent(eventId),
    };
  } catch {
    // Malformed percent-encoding
    return null;
  }
}
