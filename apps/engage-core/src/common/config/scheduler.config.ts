import { registerAs } from '@nestjs/config';

export interface SchedulerConfig {
  /** Re-plan jobs for stored registrations when the application boots */
  restoreOnBoot: boolean;
}

export default registerAs('scheduler', (): SchedulerConfig => ({
  restoreOnBoot: process.env.SCHEDULER_RESTORE_ON_BOOT !== 'false',
}));
