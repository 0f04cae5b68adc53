import { buildJobId, parseJobId } from './job-id';
import { JobKind } from './engagement-job.types';

describe('job ids', () => {
  it('should build a readable id from kind, user and event', () => {
    expect(buildJobId(JobKind.REMINDER_1H, 'user-1', 'event-9')).toBe('reminder_1h:user-1:event-9');
  });

  it('should be reproducible for the same triple', () => {
    expect(buildJobId(JobKind.START, 'u', 'e')).toBe(buildJobId(JobKind.START, 'u', 'e'));
  });

  it('should keep triples apart when components contain the separator', () => {
    const a = buildJobId(JobKind.PREVIEW, 'a:b', 'c');
    const b = buildJobId(JobKind.PREVIEW, 'a', 'b:c');

    expect(a).toBe('preview:a%3Ab:c');
    expect(b).toBe('preview:a:b%3Ac');
    expect(a).not.toBe(b);
  });

  it('should parse ids it built', () => {
    expect(parseJobId(buildJobId(JobKind.FOLLOW_UP, 'a:b', 'event 1'))).toEqual({
      kind: JobKind.FOLLOW_UP,
      userId: 'a:b',
      eventId: 'event 1',
    });
  });

  it.each(['', 'welcome:u:e', 'start:u', 'start:u:e:x', 'start::e', 'start:%E0%A4%A:e'])(
    'should return null for foreign id %p',
    (jobId) => {
      expect(parseJobId(jobId)).toBeNull();
    },
  );
});
