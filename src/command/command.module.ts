import { Module } from '@nestjs/common';

import { AlarmModule } from '../alarm/alarm.module';
import { FlightsModule } from '../flights/flights.module';

import { CommandRouterService } from './command-router.service';

@Module({
  imports: [AlarmModule, FlightsModule],
  providers: [CommandRouterService],
  exports: [CommandRouterService],
})
export class CommandModule {}
