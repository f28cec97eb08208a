import { z } from 'zod';

/**
 * Stored per-user record: preferences, conversation history and devices.
 * One JSON document per user under data/users/.
 */

export const FLIGHT_TYPES = ['any', 'direct'] as const;

export const userPreferencesSchema = z.object({
  timezone: z.string().default('UTC'),
  alarmTone: z.string().default('default'),
  usualWakeup: z.string().nullable().default(null),
  airlinePref: z.string().nullable().default(null),
  maxPrice: z.number().nonnegative().nullable().default(null),
  seatPref: z.string().nullable().default(null),
  flightType: z.enum(FLIGHT_TYPES).default('any'),
});

export type UserPreferences = z.infer<typeof userPreferencesSchema>;

export const conversationTurnSchema = z.object({
  userId: z.string(),
  text: z.string(),
  intentKind: z.string(),
  response: z.string().optional(),
  /** ISO-8601 */
  timestamp: z.string(),
});

export type ConversationTurn = z.infer<typeof conversationTurnSchema>;

export const registeredDeviceSchema = z.object({
  userId: z.string(),
  deviceId: z.string(),
  token: z.string(),
  platform: z.string(),
  appVersion: z.string().optional(),
  registeredAt: z.string(),
  lastSeenAt: z.string(),
});

export type RegisteredDevice = z.infer<typeof registeredDeviceSchema>;

export const userRecordSchema = z.object({
  userId: z.string(),
  preferences: userPreferencesSchema.nullable().default(null),
  turns: z.array(conversationTurnSchema).default([]),
  devices: z.array(registeredDeviceSchema).default([]),
});

export type UserRecord = z.infer<typeof userRecordSchema>;

/**
 * Preferences with every field at its default.
 */
export function defaultPreferences(): UserPreferences {
  return userPreferencesSchema.parse({});
}

export function createEmptyUserRecord(userId: string): UserRecord {
  return { userId, preferences: null, turns: [], devices: [] };
}

/**
 * Validate a stored user record. Throws if the document is corrupt.
 */
export function validateUserRecord(data: unknown, userId: string): UserRecord {
  const result = userRecordSchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid user record for ${userId}: ${errors}`);
  }

  return result.data;
}
