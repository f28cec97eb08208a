import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';

import { AlarmModule } from './alarm/alarm.module';
import { CommandModule } from './command/command.module';
import configuration from './config/configuration';
import { ContextModule } from './context/context.module';
import { FlightsModule } from './flights/flights.module';
import { IntentModule } from './intent/intent.module';
import { NotificationModule } from './notification/notification.module';
import { OpenAiModule } from './openai/openai.module';
import { OrchestratorModule } from './orchestrator/orchestrator.module';
import { PersistenceModule } from './persistence/persistence.module';
import { ResponseModule } from './response/response.module';
import { SchedulerModule } from './scheduler/scheduler.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    OpenAiModule,
    PersistenceModule,
    SchedulerModule,
    IntentModule,
    ContextModule,
    AlarmModule,
    NotificationModule,
    FlightsModule,
    CommandModule,
    ResponseModule,
    OrchestratorModule,
  ],
})
export class AppModule {}
