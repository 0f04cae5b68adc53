import { DueQueue } from './due-queue';

describe('DueQueue', () => {
  function drainIds(queue: DueQueue): string[] {
    const ids: string[] = [];
    for (let entry = queue.pop(); entry; entry = queue.pop()) {
      ids.push(entry.jobId);
    }
    return ids;
  }

  it('should pop entries by due time', () => {
    const queue = new DueQueue();
    queue.push({ jobId: 'c', dueAt: 300, seq: 1 });
    queue.push({ jobId: 'a', dueAt: 100, seq: 2 });
    queue.push({ jobId: 'd', dueAt: 400, seq: 3 });
    queue.push({ jobId: 'b', dueAt: 200, seq: 4 });

    expect(queue.peek()?.jobId).toBe('a');
    expect(drainIds(queue)).toEqual(['a', 'b', 'c', 'd']);
    expect(queue.length).toBe(0);
  });

  it('should break ties by insertion sequence', () => {
    const queue = new DueQueue();
    queue.push({ jobId: 'second', dueAt: 100, seq: 2 });
    queue.push({ jobId: 'third', dueAt: 100, seq: 3 });
    queue.push({ jobId: 'first', dueAt: 100, seq: 1 });

    expect(drainIds(queue)).toEqual(['first', 'second', 'third']);
  });

  it('should return undefined when empty', () => {
    const queue = new DueQueue();

    expect(queue.peek()).toBeUndefined();
    expect(queue.pop()).toBeUndefined();
  });

  it('should retain matching entries in order', () => {
    const queue = new DueQueue();
    [5, 1, 4, 2, 3, 6].forEach((dueAt, i) => queue.push({ jobId: `j${dueAt}`, dueAt, seq: i }));

    queue.retain((entry) => entry.dueAt % 2 === 0);

    expect(queue.length).toBe(3);
    expect(drainIds(queue)).toEqual(['j2', 'j4', 'j6']);
  });
});
