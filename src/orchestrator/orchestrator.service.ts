import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { CommandRouterService } from '../command/command-router.service';
import { TranscriptionError } from '../common/errors';
import { EN } from '../common/messages/en';
import { describeError } from '../common/utils/describe-error';
import { CONVERSATION_EVENTS } from '../context/context.constants';
import { ConversationTurnReceivedEvent } from '../context/events';
import { ContextService } from '../context/services';
import { IntentResolverService } from '../intent/intent-resolver.service';
import { ISttService, ITtsService, STT_SERVICE, TTS_SERVICE } from '../openai/interfaces';
import { ResponseSynthesizerService } from '../response/response-synthesizer.service';

import { ConversationRequest, ConversationResponse } from './interfaces';

/**
 * Runs one utterance through the whole pipeline:
 * transcribe, resolve, fetch context, record, route, synthesize, speak.
 */
@Injectable()
export class OrchestratorService {
  private readonly logger = new Logger(OrchestratorService.name);

  constructor(
    @Inject(STT_SERVICE) private readonly sttService: ISttService,
    @Inject(TTS_SERVICE) private readonly ttsService: ITtsService,
    private readonly intentResolver: IntentResolverService,
    private readonly contextService: ContextService,
    private readonly commandRouter: CommandRouterService,
    private readonly responseSynthesizer: ResponseSynthesizerService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async processConversation(request: ConversationRequest): Promise<ConversationResponse> {
    const { userId } = request;

    try {
      const text = await this.getTextInput(request);
      this.logger.debug(`Input from ${userId}: "${text.slice(0, 50)}"`);

      const intent = await this.intentResolver.resolve(text);
      this.logger.log(`Intent ${intent.kind} (confidence: ${intent.confidence.toFixed(2)})`);

      const context = await this.contextService.getUserContext(userId, intent.kind);

      this.eventEmitter.emit(
        CONVERSATION_EVENTS.TURN_RECEIVED,
        new ConversationTurnReceivedEvent({
          userId,
          text,
          intentKind: intent.kind,
          timestamp: new Date().toISOString(),
        }),
      );

      const result = await this.commandRouter.route(intent, userId, context);
      this.logger.debug(`Action ${intent.kind} -> ${result.status}`);

      const textResponse = await this.responseSynthesizer.synthesize(intent, result, context);
      const audioResponse = await this.ttsService.synthesizeSpeech(textResponse);

      return {
        success: true,
        textResponse,
        audioResponse,
        intentKind: intent.kind,
        confidence: intent.confidence,
        data: { status: result.status, ...result.data },
      };
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Conversation failed for ${userId}: ${message}`);

      return {
        success: false,
        textResponse: EN.APOLOGY,
        audioResponse: await this.ttsService.synthesizeSpeech(EN.APOLOGY),
        intentKind: 'error',
        confidence: 0,
        data: { error: message },
      };
    }
  }

  private async getTextInput(request: ConversationRequest): Promise<string> {
    if (request.text) {
      return request.text;
    }

    if (request.audio) {
      const result = await this.sttService.transcribe(Buffer.from(request.audio, 'base64'));
      if (!result.success) {
        throw new TranscriptionError(result.error);
      }
      return result.text;
    }

    throw new Error("Either 'text' or 'audio' must be provided");
  }
}
