import { z } from 'zod';

export const JOB_STATUSES = ['scheduled', 'sent', 'cancelled', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const scheduledJobSchema = z.object({
  jobId: z.string().min(1),
  userId: z.string(),

  /** ISO-8601 UTC instant ("...Z") */
  triggerTimeUtc: z.string(),

  /** Interpreted by the dispatcher only */
  payload: z.record(z.unknown()),

  status: z.enum(JOB_STATUSES),
  createdAt: z.string(),
  terminalAt: z.string().optional(),
  failureReason: z.string().optional(),
});

export type ScheduledJob = z.infer<typeof scheduledJobSchema>;

export const jobFileSchema = z.object({
  jobs: z.array(scheduledJobSchema).default([]),
});

export function isTerminal(status: JobStatus): boolean {
  return status !== 'scheduled';
}
