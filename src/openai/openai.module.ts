import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { COMPLETION_SERVICE, STT_SERVICE, TTS_SERVICE } from './interfaces';
import { OPENAI_CLIENT } from './openai.constants';
import { CompletionService, SpeechService, WhisperService } from './services';

/**
 * OpenAI Module
 *
 * Provides the generative completion, Whisper STT and TTS collaborators.
 * Global module - exports are available throughout the application.
 */
@Global()
@Module({
  providers: [
    {
      provide: OPENAI_CLIENT,
      useFactory: (configService: ConfigService) => {
        const apiKey = configService.get<string>('openai.apiKey');
        return new OpenAI({ apiKey });
      },
      inject: [ConfigService],
    },
    CompletionService,
    { provide: COMPLETION_SERVICE, useExisting: CompletionService },
    WhisperService,
    { provide: STT_SERVICE, useExisting: WhisperService },
    SpeechService,
    { provide: TTS_SERVICE, useExisting: SpeechService },
  ],
  exports: [OPENAI_CLIENT, COMPLETION_SERVICE, STT_SERVICE, TTS_SERVICE],
})
export class OpenAiModule {}
