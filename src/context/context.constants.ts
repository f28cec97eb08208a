/**
 * EventEmitter2 event names for conversation events.
 */
export const CONVERSATION_EVENTS = {
  TURN_RECEIVED: 'conversation.turn.received',
} as const;
