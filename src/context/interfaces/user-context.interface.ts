import { ConversationTurn, UserPreferences } from '../../persistence/schemas';

/**
 * Everything the router and synthesizer know about the user for one request.
 */
export interface UserContext {
  userId: string;
  preferences: UserPreferences;

  /** Most recent first */
  recentTurns: ConversationTurn[];

  /** Preference subset relevant to the intent being handled */
  intentSpecific: Partial<UserPreferences>;
}
