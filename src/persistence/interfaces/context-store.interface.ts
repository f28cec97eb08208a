import { ConversationTurn, RegisteredDevice, UserPreferences } from '../schemas';

/**
 * Per-user preferences, conversation history and registered devices.
 */
export interface IContextStore {
  /** null when the user has never been seen */
  getPreferences(userId: string): Promise<UserPreferences | null>;

  putPreferences(userId: string, preferences: UserPreferences): Promise<void>;

  appendTurn(turn: ConversationTurn): Promise<void>;

  /** Most recent first, at most `limit` entries */
  recentTurns(userId: string, limit: number): Promise<ConversationTurn[]>;

  listDevices(userId: string): Promise<RegisteredDevice[]>;

  /** Insert, or replace the device with the same deviceId */
  putDevice(device: RegisteredDevice): Promise<void>;
}

export const CONTEXT_STORE = Symbol('CONTEXT_STORE');
