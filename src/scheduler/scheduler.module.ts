import { Module } from '@nestjs/common';

import { TIMER_QUEUE } from './interfaces';
import { SchedulerService } from './scheduler.service';
import { WaitQueueTimer } from './wait-queue-timer';

/**
 * Scheduler Module
 *
 * Deferred jobs on top of the job store and an in-process timer queue.
 */
@Module({
  providers: [SchedulerService, { provide: TIMER_QUEUE, useClass: WaitQueueTimer }],
  exports: [SchedulerService],
})
export class SchedulerModule {}
