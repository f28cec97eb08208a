import * as path from 'path';

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { atomicWriteJson, readJsonFile } from '../../common/utils/atomic-write';
import { KeyedSequencer } from '../../common/utils/keyed-sequencer';
import { IJobStore } from '../interfaces';
import { ScheduledJob, jobFileSchema } from '../schemas';

const FILE_KEY = 'jobs';

/**
 * Job store backed by a single <dataDir>/jobs.json document.
 */
@Injectable()
export class FileJobStore implements IJobStore {
  private readonly logger = new Logger(FileJobStore.name);
  private readonly filePath: string;
  private readonly sequencer = new KeyedSequencer();

  private cache: Map<string, ScheduledJob> | null = null;

  constructor(private readonly configService: ConfigService) {
    const dataDir = this.configService.get<string>('storage.dataDir', './data');
    this.filePath = path.join(path.resolve(dataDir), 'jobs.json');
  }

  async get(jobId: string): Promise<ScheduledJob | null> {
    return this.sequencer.run(FILE_KEY, async () => {
      const job = (await this.load()).get(jobId);
      return job ? structuredClone(job) : null;
    });
  }

  async put(job: ScheduledJob): Promise<void> {
    await this.update((jobs) => {
      jobs.set(job.jobId, structuredClone(job));
    });
  }

  async delete(jobId: string): Promise<void> {
    await this.update((jobs) => {
      jobs.delete(jobId);
    });
  }

  async listByUser(userId: string): Promise<ScheduledJob[]> {
    const all = await this.listAll();
    return all.filter((job) => job.userId === userId);
  }

  async listAll(): Promise<ScheduledJob[]> {
    return this.sequencer.run(FILE_KEY, async () => {
      return [...(await this.load()).values()].map((job) => structuredClone(job));
    });
  }

  private async load(): Promise<Map<string, ScheduledJob>> {
    if (this.cache) {
      return this.cache;
    }

    const data = await readJsonFile(this.filePath);
    const jobs = new Map<string, ScheduledJob>();

    if (data !== null) {
      const result = jobFileSchema.safeParse(data);
      if (!result.success) {
        throw new Error(`Invalid job file ${this.filePath}: ${result.error.errors[0]?.message ?? ''}`);
      }
      for (const job of result.data.jobs) {
        jobs.set(job.jobId, job);
      }
      this.logger.log(`Loaded ${jobs.size} job(s) from ${this.filePath}`);
    }

    this.cache = jobs;
    return jobs;
  }

  private update(mutate: (jobs: Map<string, ScheduledJob>) => void): Promise<void> {
    return this.sequencer.run(FILE_KEY, async () => {
      const next = new Map(await this.load());
      mutate(next);

      await atomicWriteJson(this.filePath, { jobs: [...next.values()] });
      this.cache = next;
    });
  }
}
