import { JobKind, ALL_JOB_KINDS, PlannedJob } from './engagement-job.types';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Offset of each job kind relative to the event start.
 */
export const JOB_OFFSETS_MS: Readonly<Record<JobKind, number>> = {
  [JobKind.PREVIEW]: -72 * HOUR_MS,
  [JobKind.REMINDER_24H]: -24 * HOUR_MS,
  [JobKind.REMINDER_1H]: -1 * HOUR_MS,
  [JobKind.START]: 0,
  [JobKind.FOLLOW_UP]: 2 * HOUR_MS,
};

/**
 * Kinds scheduled even when their due time has already passed.
 * The follow-up depends on the event having happened, not on how early
 * the user registered.
 */
const ALWAYS_SCHEDULED: ReadonlySet<JobKind> = new Set([JobKind.FOLLOW_UP]);

export function dueTimeFor(kind: JobKind, eventTime: Date): Date {
  return new Date(eventTime.getTime() + JOB_OFFSETS_MS[kind]);
}

/**
 * Jobs to schedule for an event starting at `eventTime`, as seen at `now`.
 *
 * A job is kept when its due time is strictly after `now`; the follow-up is
 * always kept. Result is in timeline order.
 */
export function planJobs(eventTime: Date, now: Date): PlannedJob[] {
  const nowMs = now.getTime();
  const planned: PlannedJob[] = [];

  for (const kind of ALL_JOB_KINDS) {
    const dueTime = dueTimeFor(kind, eventTime);
    if (ALWAYS_SCHEDULED.has(kind) || dueTime.getTime() > nowMs) {
      planned.push({ kind, dueTime });
    }
  }

  return planned;
}
