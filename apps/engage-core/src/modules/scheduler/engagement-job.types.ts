/**
 * Engagement job types.
 */

export enum JobKind {
  /** Sneak peek of the content, 72h before start */
  PREVIEW = 'preview',
  /** Day-before reminder */
  REMINDER_24H = 'reminder_24h',
  /** Hour-before reminder */
  REMINDER_1H = 'reminder_1h',
  /** "We're live" nudge at start time */
  START = 'start',
  /** Thank-you with recording, 2h after start */
  FOLLOW_UP = 'follow_up',
}

/** All kinds in timeline order */
export const ALL_JOB_KINDS: readonly JobKind[] = [
  JobKind.PREVIEW,
  JobKind.REMINDER_24H,
  JobKind.REMINDER_1H,
  JobKind.START,
  JobKind.FOLLOW_UP,
];

export function isJobKind(value: string): value is JobKind {
  return (ALL_JOB_KINDS as readonly string[]).includes(value);
}

/**
 * Work executed when a job fires. Runs in its own promise; a rejection is
 * logged by the engine and dropped.
 */
export type ScheduledTask = () => Promise<void> | void;

export interface PlannedJob {
  kind: JobKind;
  dueTime: Date;
}

export interface PendingJobSnapshot {
  jobId: string;
  dueTime: Date;
}
