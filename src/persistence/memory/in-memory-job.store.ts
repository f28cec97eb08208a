import { Injectable } from '@nestjs/common';

import { IJobStore } from '../interfaces';
import { ScheduledJob } from '../schemas';

@Injectable()
export class InMemoryJobStore implements IJobStore {
  private readonly jobs = new Map<string, ScheduledJob>();

  async get(jobId: string): Promise<ScheduledJob | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async put(job: ScheduledJob): Promise<void> {
    this.jobs.set(job.jobId, structuredClone(job));
  }

  async delete(jobId: string): Promise<void> {
    this.jobs.delete(jobId);
  }

  async listByUser(userId: string): Promise<ScheduledJob[]> {
    return [...this.jobs.values()].filter((j) => j.userId === userId).map((j) => structuredClone(j));
  }

  async listAll(): Promise<ScheduledJob[]> {
    return [...this.jobs.values()].map((j) => structuredClone(j));
  }
}
