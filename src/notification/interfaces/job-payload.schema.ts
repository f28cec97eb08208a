import { z } from 'zod';

/**
 * What a scheduled job delivers when it fires.
 * Alarms fan out to every device of the user; reminders go to one token.
 */
export const alarmPayloadSchema = z.object({
  kind: z.literal('alarm'),
  label: z.string().optional(),
  tone: z.string().default('default'),
});

export const reminderPayloadSchema = z.object({
  kind: z.literal('reminder'),
  deviceToken: z.string().min(1),
  title: z.string(),
  body: z.string(),
  metadata: z.record(z.string()).default({}),
});

export const jobPayloadSchema = z.discriminatedUnion('kind', [
  alarmPayloadSchema,
  reminderPayloadSchema,
]);

export type AlarmPayload = z.infer<typeof alarmPayloadSchema>;
export type ReminderPayload = z.infer<typeof reminderPayloadSchema>;
export type JobPayload = z.infer<typeof jobPayloadSchema>;
