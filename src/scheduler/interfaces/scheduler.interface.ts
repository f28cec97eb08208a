import { ScheduledJob } from '../../persistence/schemas';

export interface ScheduleRequest {
  /** Generated when omitted. Reusing a pending id replaces that job. */
  jobId?: string;

  userId: string;

  /** Date, or ISO-8601 string; a string without an offset is read as UTC */
  triggerTime: Date | string;

  payload: Record<string, unknown>;
}

/**
 * Delivers a due job. Rejecting marks the job failed.
 */
export type JobDispatcher = (job: ScheduledJob) => Promise<void>;
