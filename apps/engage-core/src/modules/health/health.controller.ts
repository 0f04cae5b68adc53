import { Controller, Get } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Public } from '../../common/decorators';
import { SchedulerEngine } from '../scheduler/scheduler-engine.service';

@Public()
@Controller('health')
export class HealthController {
  constructor(
    private dataSource: DataSource,
    private scheduler: SchedulerEngine,
  ) {}

  @Get()
  check() {
    const dbConnected = this.dataSource.isInitialized;

    return {
      status: dbConnected ? 'ok' : 'error',
      timestamp: new Date().toISOString(),
      services: {
        database: dbConnected ? 'connected' : 'disconnected',
      },
      scheduler: {
        pendingJobs: this.scheduler.size,
        runningJobs: this.scheduler.inFlightCount,
      },
    };
  }
}
