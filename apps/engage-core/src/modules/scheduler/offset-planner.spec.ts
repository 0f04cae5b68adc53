import { planJobs, dueTimeFor } from './offset-planner';
import { JobKind } from './engagement-job.types';

const HOUR = 60 * 60 * 1000;
const NOW = new Date('2026-03-01T12:00:00.000Z');

function at(offsetMs: number): Date {
  return new Date(NOW.getTime() + offsetMs);
}

describe('planJobs', () => {
  it('should plan all five jobs for an event more than 72h away', () => {
    const eventTime = at(100 * HOUR);

    expect(planJobs(eventTime, NOW)).toEqual([
      { kind: JobKind.PREVIEW, dueTime: at(28 * HOUR) },
      { kind: JobKind.REMINDER_24H, dueTime: at(76 * HOUR) },
      { kind: JobKind.REMINDER_1H, dueTime: at(99 * HOUR) },
      { kind: JobKind.START, dueTime: at(100 * HOUR) },
      { kind: JobKind.FOLLOW_UP, dueTime: at(102 * HOUR) },
    ]);
  });

  it('should skip the preview and day-before reminder for an event 10h away', () => {
    const kinds = planJobs(at(10 * HOUR), NOW).map((job) => job.kind);

    expect(kinds).toEqual([JobKind.REMINDER_1H, JobKind.START, JobKind.FOLLOW_UP]);
  });

  it('should keep only start and follow-up inside the last hour', () => {
    const kinds = planJobs(at(30 * 60 * 1000), NOW).map((job) => job.kind);

    expect(kinds).toEqual([JobKind.START, JobKind.FOLLOW_UP]);
  });

  it('should skip a job due exactly now', () => {
    const kinds = planJobs(at(72 * HOUR), NOW).map((job) => job.kind);

    expect(kinds).not.toContain(JobKind.PREVIEW);
    expect(kinds).toHaveLength(4);
  });

  it('should always plan the follow-up, even for a past event', () => {
    expect(planJobs(at(-5 * HOUR), NOW)).toEqual([
      { kind: JobKind.FOLLOW_UP, dueTime: at(-3 * HOUR) },
    ]);
  });
});

describe('dueTimeFor', () => {
  it('should apply the offset of each kind', () => {
    const eventTime = at(0);

    expect(dueTimeFor(JobKind.PREVIEW, eventTime)).toEqual(at(-72 * HOUR));
    expect(dueTimeFor(JobKind.REMINDER_24H, eventTime)).toEqual(at(-24 * HOUR));
    expect(dueTimeFor(JobKind.REMINDER_1H, eventTime)).toEqual(at(-HOUR));
    expect(dueTimeFor(JobKind.START, eventTime)).toEqual(eventTime);
    expect(dueTimeFor(JobKind.FOLLOW_UP, eventTime)).toEqual(at(2 * HOUR));
  });
});
