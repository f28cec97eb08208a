import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IANAZone } from 'luxon';
import { z } from 'zod';

import { describeError } from '../../common/utils/describe-error';
import { IntentKind } from '../../intent/interfaces';
import { CONTEXT_STORE, IContextStore } from '../../persistence/interfaces';
import {
  ConversationTurn,
  UserPreferences,
  defaultPreferences,
  userPreferencesSchema,
} from '../../persistence/schemas';
import { UserContext } from '../interfaces';

/**
 * Accepted preference updates. Every field is optional; the timezone must be a
 * real IANA zone.
 */
const preferenceUpdateSchema = z
  .object({
    timezone: z.string().refine((zone) => IANAZone.isValidZone(zone), {
      message: 'Unknown IANA timezone',
    }),
    alarmTone: userPreferencesSchema.shape.alarmTone.removeDefault(),
    usualWakeup: userPreferencesSchema.shape.usualWakeup.removeDefault(),
    airlinePref: userPreferencesSchema.shape.airlinePref.removeDefault(),
    maxPrice: userPreferencesSchema.shape.maxPrice.removeDefault(),
    seatPref: userPreferencesSchema.shape.seatPref.removeDefault(),
    flightType: userPreferencesSchema.shape.flightType.removeDefault(),
  })
  .partial()
  .strict();

export type PreferenceUpdate = z.infer<typeof preferenceUpdateSchema>;

/**
 * Preference fields handed to each intent's handler.
 */
function selectIntentSpecific(
  kind: IntentKind,
  preferences: UserPreferences,
): Partial<UserPreferences> {
  switch (kind) {
    case 'set_alarm':
    case 'delete_alarm':
      return {
        timezone: preferences.timezone,
        alarmTone: preferences.alarmTone,
        usualWakeup: preferences.usualWakeup,
      };
    case 'search_flights':
    case 'book_flight':
      return {
        airlinePref: preferences.airlinePref,
        maxPrice: preferences.maxPrice,
        seatPref: preferences.seatPref,
        flightType: preferences.flightType,
      };
    default:
      return {};
  }
}

/**
 * Provides per-user context: preferences (created with defaults on first access),
 * recent conversation turns and intent-specific settings.
 */
@Injectable()
export class ContextService {
  private readonly logger = new Logger(ContextService.name);
  private readonly recentTurnsLimit: number;

  constructor(
    @Inject(CONTEXT_STORE) private readonly store: IContextStore,
    private readonly configService: ConfigService,
  ) {
    this.recentTurnsLimit = this.configService.get<number>('conversation.recentTurnsLimit', 5);
  }

  /**
   * Build the context for a request.
   * A store failure degrades to default preferences and no history.
   */
  async getUserContext(userId: string, kind: IntentKind): Promise<UserContext> {
    try {
      const preferences = await this.getPreferences(userId);
      const recentTurns = await this.store.recentTurns(userId, this.recentTurnsLimit);

      return {
        userId,
        preferences,
        recentTurns,
        intentSpecific: selectIntentSpecific(kind, preferences),
      };
    } catch (error) {
      this.logger.warn(`Context unavailable for ${userId}, using defaults: ${describeError(error)}`);
      const preferences = defaultPreferences();

      return {
        userId,
        preferences,
        recentTurns: [],
        intentSpecific: selectIntentSpecific(kind, preferences),
      };
    }
  }

  /**
   * Merge validated updates into the user's preferences.
   * Throws if an update is invalid; nothing is written in that case.
   */
  async updatePreference(userId: string, updates: unknown): Promise<UserPreferences> {
    const result = preferenceUpdateSchema.safeParse(updates);
    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `${e.path.join('.') || 'update'}: ${e.message}`)
        .join(', ');
      throw new Error(`Invalid preference update: ${errors}`);
    }

    const merged: UserPreferences = { ...(await this.getPreferences(userId)), ...result.data };
    await this.store.putPreferences(userId, merged);

    this.logger.log(`Updated preferences for ${userId}: ${Object.keys(result.data).join(', ')}`);
    return merged;
  }

  async recordTurn(turn: ConversationTurn): Promise<void> {
    await this.store.appendTurn(turn);
    this.logger.debug(`Recorded ${turn.intentKind} turn for ${turn.userId}`);
  }

  /**
   * Conversation history, most recent first.
   */
  async getHistory(userId: string, limit = this.recentTurnsLimit): Promise<ConversationTurn[]> {
    return this.store.recentTurns(userId, limit);
  }

  private async getPreferences(userId: string): Promise<UserPreferences> {
    const stored = await this.store.getPreferences(userId);
    if (stored) {
      return stored;
    }

    const preferences = defaultPreferences();
    await this.store.putPreferences(userId, preferences);
    this.logger.log(`Created default preferences for ${userId}`);
    return preferences;
  }
}
