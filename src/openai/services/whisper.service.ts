import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { toFile } from 'openai/uploads';
import { z } from 'zod';

import { describeError } from '../../common/utils/describe-error';
import { withTimeout } from '../../common/utils/with-timeout';
import { ISttService, SttResult, TranscribeOptions } from '../interfaces';
import { DEFAULT_TIMEOUT_MS, MODELS, OPENAI_CLIENT } from '../openai.constants';

/**
 * Fields read from a verbose_json transcription.
 */
const verboseTranscriptionSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  duration: z.coerce.number().optional(),
  segments: z.array(z.object({ avg_logprob: z.number().optional() })).optional(),
});

type VerboseTranscription = z.infer<typeof verboseTranscriptionSchema>;

/**
 * Speech-to-text service using OpenAI Whisper API.
 */
@Injectable()
export class WhisperService implements ISttService {
  private readonly logger = new Logger(WhisperService.name);
  private readonly defaultLanguage: string;
  private readonly timeoutMs: number;

  constructor(
    @Inject(OPENAI_CLIENT) private readonly openai: OpenAI,
    private readonly configService: ConfigService,
  ) {
    this.defaultLanguage = this.configService.get<string>('openai.sttLanguage', 'en');
    this.timeoutMs = this.configService.get<number>('openai.timeoutMs', DEFAULT_TIMEOUT_MS);
  }

  /**
   * Transcribe audio to text using Whisper.
   */
  async transcribe(audio: Buffer, options: TranscribeOptions = {}): Promise<SttResult> {
    const language = options.language ?? this.defaultLanguage;
    const temperature = options.temperature ?? 0;

    if (audio.length === 0) {
      return { success: false, error: 'Empty audio input' };
    }

    try {
      const file = await toFile(audio, 'audio.wav', { type: 'audio/wav' });

      const raw: unknown = await withTimeout(
        this.openai.audio.transcriptions.create({
          file,
          model: MODELS.WHISPER,
          language,
          temperature,
          response_format: 'verbose_json',
        }),
        this.timeoutMs,
        'Transcription',
      );

      const response = verboseTranscriptionSchema.parse(raw);
      const confidence = this.calculateConfidence(response);

      this.logger.debug(
        `Transcribed audio: "${response.text.slice(0, 50)}" (confidence: ${confidence.toFixed(2)})`,
      );

      const text = response.text.trim();
      if (!text) {
        return { success: false, error: 'No speech detected' };
      }

      return {
        success: true,
        text,
        language: response.language ?? language,
        confidence,
        duration: response.duration,
      };
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Transcription failed: ${message}`);

      return { success: false, error: message };
    }
  }

  /**
   * Map Whisper's average log-probability onto a 0-1 confidence.
   * -0 → 1.0, -0.5 → 0.7, -1.0 → 0.4, clamped at 0.1.
   */
  private calculateConfidence(response: VerboseTranscription): number {
    const segments = response.segments;

    if (!segments || segments.length === 0) {
      return 0.7;
    }

    const totalLogprob = segments.reduce((sum, seg) => sum + (seg.avg_logprob ?? -0.5), 0);
    const avgLogprob = totalLogprob / segments.length;

    return Math.max(0.1, Math.min(1, 1 + avgLogprob * 0.6));
  }
}
