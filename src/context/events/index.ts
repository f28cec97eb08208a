export * from './conversation-turn-received.event';
