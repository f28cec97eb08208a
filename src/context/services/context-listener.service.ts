import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import { describeError } from '../../common/utils/describe-error';
import { CONVERSATION_EVENTS } from '../context.constants';
import { ConversationTurnReceivedEvent } from '../events';

import { ContextService } from './context.service';

/**
 * Persists conversation turns emitted by the orchestrator.
 */
@Injectable()
export class ContextListenerService {
  private readonly logger = new Logger(ContextListenerService.name);

  constructor(private readonly contextService: ContextService) {}

  @OnEvent(CONVERSATION_EVENTS.TURN_RECEIVED)
  async handleTurnReceived(event: ConversationTurnReceivedEvent): Promise<void> {
    const { turn } = event;

    try {
      await this.contextService.recordTurn(turn);
    } catch (error) {
      this.logger.error(`Failed to record turn for ${turn.userId}: ${describeError(error)}`);
    }
  }
}
