import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { DueQueue } from './due-queue';
import { PendingJobSnapshot, ScheduledTask } from './engagement-job.types';

/** Longest delay setTimeout accepts; longer waits are split into hops. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Stale heap entries tolerated before the heap is compacted. */
const COMPACT_THRESHOLD = 64;

interface PendingJob {
  jobId: string;
  dueAt: number;
  seq: number;
  task: ScheduledTask;
}

/**
 * In-process timer-ordered executor for one-shot engagement jobs.
 *
 * Jobs live in a table keyed by job id plus a min-heap ordered by due time.
 * A single timeout, registered in SchedulerRegistry, is armed for the earliest
 * due job. On wake every job due at or before now leaves the table first and
 * is then started in its own promise, so one slow task never holds up others.
 *
 * Table, heap and timer are only touched from synchronous code paths. On the
 * single event loop that makes each schedule / cancel / pop-due sequence
 * atomic with respect to request handlers and the firing loop.
 *
 * Lifecycle per job: pending -> fired, or pending -> cancelled. A cancel that
 * arrives after the job left the table returns false; the task still runs.
 */
@Injectable()
export class SchedulerEngine implements OnModuleDestroy {
  static readonly TIMER_NAME = 'engagement-scheduler';

  private readonly logger = new Logger(SchedulerEngine.name);
  private readonly jobs = new Map<string, PendingJob>();
  private readonly queue = new DueQueue();
  private readonly inFlight = new Set<Promise<void>>();
  private seq = 0;
  private staleEntries = 0;
  private armedFor: number | null = null;
  private stopped = false;

  constructor(private readonly schedulerRegistry: SchedulerRegistry) {}

  /**
   * Register a one-shot task to run at or after `dueTime`.
   *
   * An id that is already pending is rejected: the call is a logged no-op and
   * the first due time stays in effect.
   *
   * @returns true when the job was added
   */
  schedule(jobId: string, dueTime: Date, task: ScheduledTask): boolean {
    if (this.stopped) {
      this.logger.warn(`Scheduler stopped, dropping job ${jobId}`);
      return false;
    }

    const dueAt = dueTime.getTime();
    if (Number.isNaN(dueAt)) {
      throw new Error(`Invalid due time for job ${jobId}`);
    }

    if (this.jobs.has(jobId)) {
      this.logger.debug(`Job ${jobId} already scheduled, ignoring`);
      return false;
    }

    const seq = ++this.seq;
    this.jobs.set(jobId, { jobId, dueAt, seq, task });
    this.queue.push({ jobId, dueAt, seq });
    this.logger.debug(`Scheduled job ${jobId} for ${dueTime.toISOString()}`);

    this.arm();
    return true;
  }

  /**
   * Remove a pending job.
   *
   * @returns false when the id is unknown, already fired or already cancelled
   */
  cancel(jobId: string): boolean {
    if (!this.jobs.delete(jobId)) {
      return false;
    }

    this.staleEntries++;
    this.compactIfNeeded();
    this.logger.debug(`Cancelled job ${jobId}`);

    this.arm();
    return true;
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  get size(): number {
    return this.jobs.size;
  }

  /** Tasks started but not yet settled */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Pending jobs ordered by due time.
   */
  listPending(): PendingJobSnapshot[] {
    return [...this.jobs.values()]
      .sort((a, b) => a.dueAt - b.dueAt || a.seq - b.seq)
      .map((job) => ({ jobId: job.jobId, dueTime: new Date(job.dueAt) }));
  }

  /**
   * Resolve once every started task has settled, including tasks started
   * while waiting.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /**
   * Disarm the timer and drop every pending job. Running tasks continue.
   */
  stop(): void {
    this.stopped = true;
    this.disarm();
    const dropped = this.jobs.size;
    this.jobs.clear();
    this.queue.clear();
    this.staleEntries = 0;
    if (dropped > 0) {
      this.logger.warn(`Scheduler stopped with ${dropped} pending jobs`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    this.stop();
    await this.drain();
  }

  // ─────────────────────────────────────────────────────────────
  // Firing loop
  // ─────────────────────────────────────────────────────────────

  private onTimer(): void {
    this.armedFor = null;
    if (this.schedulerRegistry.doesExist('timeout', SchedulerEngine.TIMER_NAME)) {
      this.schedulerRegistry.deleteTimeout(SchedulerEngine.TIMER_NAME);
    }

    const due = this.popDue(Date.now());
    for (const job of due) {
      this.dispatch(job);
    }

    this.arm();
  }

  /**
   * Remove and return every live job due at or before `now`.
   */
  private popDue(now: number): PendingJob[] {
    const due: PendingJob[] = [];

    for (let entry = this.peekLive(); entry && entry.dueAt <= now; entry = this.peekLive()) {
      this.queue.pop();
      const job = this.jobs.get(entry.jobId);
      if (job) {
        this.jobs.delete(entry.jobId);
        due.push(job);
      }
    }

    return due;
  }

  private dispatch(job: PendingJob): void {
    this.logger.debug(`Firing job ${job.jobId}`);

    const run: Promise<void> = Promise.resolve()
      .then(() => job.task())
      .then(
        () => {
          this.logger.debug(`Job ${job.jobId} completed`);
        },
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(`Job ${job.jobId} failed: ${message}`);
        },
      )
      .finally(() => {
        this.inFlight.delete(run);
      });

    this.inFlight.add(run);
  }

  // ─────────────────────────────────────────────────────────────
  // Timer management
  // ─────────────────────────────────────────────────────────────

  /**
   * Make sure the timer wakes no later than the earliest live job.
   */
  private arm(): void {
    const next = this.peekLive();
    if (!next) {
      this.disarm();
      return;
    }

    const now = Date.now();
    const delay = Math.min(Math.max(next.dueAt - now, 0), MAX_TIMER_DELAY_MS);
    const wakeAt = now + delay;

    if (this.armedFor !== null && this.armedFor <= wakeAt) {
      return;
    }

    this.disarm();
    const handle = setTimeout(() => this.onTimer(), delay);
    this.schedulerRegistry.addTimeout(SchedulerEngine.TIMER_NAME, handle);
    this.armedFor = wakeAt;
  }

  private disarm(): void {
    if (this.schedulerRegistry.doesExist('timeout', SchedulerEngine.TIMER_NAME)) {
      this.schedulerRegistry.deleteTimeout(SchedulerEngine.TIMER_NAME);
    }
    this.armedFor = null;
  }

  /**
   * Earliest heap entry that still matches a pending job. Entries left behind
   * by cancelled jobs are discarded on the way.
   */
  private peekLive() {
    for (let entry = this.queue.peek(); entry; entry = this.queue.peek()) {
      const job = this.jobs.get(entry.jobId);
      if (job && job.seq === entry.seq) {
        return entry;
      }
      this.queue.pop();
      this.staleEntries = Math.max(0, this.staleEntries - 1);
    }
    return undefined;
  }

  private compactIfNeeded(): void {
    if (this.staleEntries < COMPACT_THRESHOLD || this.staleEntries * 2 < this.queue.length) {
      return;
    }
    this.queue.retain((entry) => this.jobs.get(entry.jobId)?.seq === entry.seq);
    this.staleEntries = 0;
  }
}
