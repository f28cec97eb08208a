import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';

import { describeError } from '../common/utils/describe-error';
import { withTimeout } from '../common/utils/with-timeout';
import { COMPLETION_SERVICE, ICompletionService } from '../openai/interfaces';
import { DEFAULT_TIMEOUT_MS } from '../openai/openai.constants';
import { INTENT_SYSTEM_PROMPT, buildClassificationPrompt } from '../openai/prompts';

import { ACCEPTANCE_THRESHOLD, RULE_CONFIDENCE, matchRules } from './intent-rules';
import { Intent, IntentKind, createIntent, isIntentKind } from './interfaces';

/**
 * Shape of the generative classifier's JSON reply.
 */
const classifierReplySchema = z.object({
  intent: z.string(),
  slots: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
  confidence: z.number().default(0.7),
});

/**
 * Turns an utterance into an Intent.
 *
 * Narrow patterns are tried first; only when none applies is the generative
 * classifier consulted, once. Never rejects: every failure resolves to
 * 'unknown' with confidence 0.
 */
@Injectable()
export class IntentResolverService {
  private readonly logger = new Logger(IntentResolverService.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(COMPLETION_SERVICE) private readonly completion: ICompletionService,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = this.configService.get<number>('openai.timeoutMs', DEFAULT_TIMEOUT_MS);
  }

  async resolve(text: string): Promise<Intent> {
    const sourceText = text.trim();

    if (!sourceText) {
      return createIntent('unknown', {}, 0, sourceText);
    }

    const match = matchRules(sourceText);
    if (match && RULE_CONFIDENCE > ACCEPTANCE_THRESHOLD) {
      this.logger.debug(`Rule match: ${match.kind} ${JSON.stringify(match.slots)}`);
      return createIntent(match.kind, match.slots, RULE_CONFIDENCE, sourceText, match.ambiguousSlots);
    }

    try {
      return await this.classify(sourceText);
    } catch (error) {
      this.logger.warn(`Intent classification failed: ${describeError(error)}`);
      return createIntent('unknown', {}, 0, sourceText);
    }
  }

  private async classify(sourceText: string): Promise<Intent> {
    // Bounded here too, so a collaborator that ignores timeoutMs cannot stall the pipeline
    const raw = await withTimeout(
      this.completion.complete({
        systemPrompt: INTENT_SYSTEM_PROMPT,
        userPrompt: buildClassificationPrompt(sourceText),
        temperature: 0.3,
        maxTokens: 200,
        json: true,
        timeoutMs: this.timeoutMs,
      }),
      this.timeoutMs,
      'Intent classification',
    );

    const parsed = classifierReplySchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Malformed classifier reply: ${parsed.error.errors[0]?.message ?? 'invalid'}`);
    }

    const label = parsed.data.intent.trim().toLowerCase();
    const kind: IntentKind = isIntentKind(label) ? label : 'unknown';
    const slots: Record<string, string> = {};

    for (const [key, value] of Object.entries(parsed.data.slots)) {
      if (value !== null && String(value).trim() !== '') {
        slots[key] = String(value).trim();
      }
    }

    const confidence = Math.min(1, Math.max(0, parsed.data.confidence));

    this.logger.debug(`Classifier: ${kind} (${confidence.toFixed(2)})`);
    return createIntent(kind, slots, confidence, sourceText);
  }
}
