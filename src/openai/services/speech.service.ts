import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { describeError } from '../../common/utils/describe-error';
import { withTimeout } from '../../common/utils/with-timeout';
import { ITtsService } from '../interfaces';
import { DEFAULT_TIMEOUT_MS, MODELS, OPENAI_CLIENT, TtsVoice } from '../openai.constants';

/**
 * Text-to-speech using the OpenAI speech endpoint.
 */
@Injectable()
export class SpeechService implements ITtsService {
  private readonly logger = new Logger(SpeechService.name);
  private readonly model: string;
  private readonly voice: TtsVoice;
  private readonly timeoutMs: number;

  constructor(
    @Inject(OPENAI_CLIENT) private readonly openai: OpenAI,
    private readonly configService: ConfigService,
  ) {
    this.model = this.configService.get<string>('openai.ttsModel', MODELS.TTS);
    this.voice = this.configService.get<TtsVoice>('openai.ttsVoice', 'alloy');
    this.timeoutMs = this.configService.get<number>('openai.timeoutMs', DEFAULT_TIMEOUT_MS);
  }

  async synthesizeSpeech(text: string): Promise<string | undefined> {
    if (!text.trim()) {
      return undefined;
    }

    try {
      const audio = await withTimeout(
        this.createAudio(text),
        this.timeoutMs,
        'Speech synthesis',
      );

      this.logger.debug(`Generated speech for: "${text.slice(0, 50)}"`);
      return audio.toString('base64');
    } catch (error) {
      this.logger.error(`Speech synthesis failed: ${describeError(error)}`);
      return undefined;
    }
  }

  private async createAudio(text: string): Promise<Buffer> {
    const response = await this.openai.audio.speech.create({
      model: this.model,
      voice: this.voice,
      input: text,
    });

    return Buffer.from(await response.arrayBuffer());
  }
}
