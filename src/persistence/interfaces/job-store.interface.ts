import { ScheduledJob } from '../schemas';

/**
 * Durable job records. Written by the scheduling engine only.
 */
export interface IJobStore {
  get(jobId: string): Promise<ScheduledJob | null>;

  /** Insert or replace by jobId */
  put(job: ScheduledJob): Promise<void>;

  delete(jobId: string): Promise<void>;

  listByUser(userId: string): Promise<ScheduledJob[]>;

  listAll(): Promise<ScheduledJob[]>;
}

export const JOB_STORE = Symbol('JOB_STORE');
