import { Controller, Get, UseGuards } from '@nestjs/common';
import { PendingJobView } from '@engage/shared';
import { AdminGuard } from '../../common/guards/admin.guard';
import { SchedulerEngine } from './scheduler-engine.service';
import { parseJobId } from './job-id';

@Controller('scheduler')
@UseGuards(AdminGuard)
export class SchedulerController {
  constructor(private readonly engine: SchedulerEngine) {}

  /**
   * GET /scheduler/jobs
   * Pending engagement jobs, earliest first.
   */
  @Get('jobs')
  listJobs(): { total: number; items: PendingJobView[] } {
    const items = this.engine.listPending().map((job): PendingJobView => {
      const parsed = parseJobId(job.jobId);
      return {
        jobId: job.jobId,
        kind: parsed?.kind ?? null,
        userId: parsed?.userId ?? null,
        eventId: parsed?.eventId ?? null,
        dueTime: job.dueTime.toISOString(),
      };
    });

    return { total: items.length, items };
  }
}
