import { ConversationTurn } from '../../persistence/schemas';

/**
 * Emitted by the orchestrator once a reply has been produced.
 * Persisted by the context listener; the request never waits for it.
 */
export class ConversationTurnReceivedEvent {
  constructor(public readonly turn: ConversationTurn) {}
}
