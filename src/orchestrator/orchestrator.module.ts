import { Module } from '@nestjs/common';

import { CommandModule } from '../command/command.module';
import { ContextModule } from '../context/context.module';
import { IntentModule } from '../intent/intent.module';
import { ResponseModule } from '../response/response.module';

import { OrchestratorService } from './orchestrator.service';

/**
 * Orchestrator Module
 *
 * Entry point for a conversation turn. STT and TTS come from the global OpenAiModule.
 */
@Module({
  imports: [IntentModule, ContextModule, CommandModule, ResponseModule],
  providers: [OrchestratorService],
  exports: [OrchestratorService],
})
export class OrchestratorModule {}
