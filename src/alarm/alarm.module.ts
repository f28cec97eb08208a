import { Module } from '@nestjs/common';

import { SchedulerModule } from '../scheduler/scheduler.module';

import { AlarmService } from './alarm.service';

@Module({
  imports: [SchedulerModule],
  providers: [AlarmService],
  exports: [AlarmService],
})
export class AlarmModule {}
