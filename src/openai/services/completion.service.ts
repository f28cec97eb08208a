import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { withTimeout } from '../../common/utils/with-timeout';
import { CompletionRequest, ICompletionService } from '../interfaces';
import { DEFAULT_TIMEOUT_MS, MODELS, OPENAI_CLIENT } from '../openai.constants';

/**
 * Generative completion backed by OpenAI chat completions.
 */
@Injectable()
export class CompletionService implements ICompletionService {
  private readonly logger = new Logger(CompletionService.name);
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(
    @Inject(OPENAI_CLIENT) private readonly openai: OpenAI,
    private readonly configService: ConfigService,
  ) {
    this.model = this.configService.get<string>('openai.model', MODELS.CHAT);
    this.timeoutMs = this.configService.get<number>('openai.timeoutMs', DEFAULT_TIMEOUT_MS);
  }

  async complete(request: CompletionRequest): Promise<string> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };

    if (request.json) {
      params.response_format = { type: 'json_object' };
    }

    const response = await withTimeout(
      this.openai.chat.completions.create(params),
      request.timeoutMs ?? this.timeoutMs,
      'Chat completion',
    );

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error('Completion returned no content');
    }

    this.logger.debug(`Completion (${this.model}): "${content.slice(0, 80)}"`);
    return content;
  }
}
