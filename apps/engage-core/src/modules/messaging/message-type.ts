import { JobKind } from '../scheduler/engagement-job.types';

export enum MessageType {
  WELCOME = 'welcome',
  CONTENT_PREVIEW = 'content_preview',
  REMINDER_24H = 'reminder_24h',
  REMINDER_1H = 'reminder_1h',
  EVENT_STARTING = 'event_starting',
  FOLLOW_UP = 'follow_up',
}

/** Message sent when a job of each kind fires */
export const MESSAGE_TYPE_FOR_JOB: Readonly<Record<JobKind, MessageType>> = {
  [JobKind.PREVIEW]: MessageType.CONTENT_PREVIEW,
  [JobKind.REMINDER_24H]: MessageType.REMINDER_24H,
  [JobKind.REMINDER_1H]: MessageType.REMINDER_1H,
  [JobKind.START]: MessageType.EVENT_STARTING,
  [JobKind.FOLLOW_UP]: MessageType.FOLLOW_UP,
};
