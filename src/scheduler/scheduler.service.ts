import { randomUUID } from 'crypto';

import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';

import { InvalidTimeError } from '../common/errors';
import { describeError } from '../common/utils/describe-error';
import { KeyedSequencer } from '../common/utils/keyed-sequencer';
import { withTimeout } from '../common/utils/with-timeout';
import { IJobStore, JOB_STORE } from '../persistence/interfaces';
import { ScheduledJob, isTerminal } from '../persistence/schemas';

import { JobDispatcher, ScheduleRequest, TIMER_QUEUE, TimerHandle, TimerQueue } from './interfaces';
import { normalizeToUtc } from './normalize-time';

export const MISSED_TRIGGER_REASON = 'missed trigger while scheduler was offline';

/**
 * Engine-side state of a job.
 * `handle` is set while the job waits on the timer queue and cleared once it
 * fires or is cancelled. `generation` identifies one schedule() call, so the
 * outcome of a superseded dispatch never lands on its replacement.
 */
interface JobEntry {
  job: ScheduledJob;
  generation: number;
  handle: TimerHandle | null;
}

/**
 * Deferred job scheduling engine.
 *
 * All transitions of the job table happen synchronously; the only awaits are on
 * the dispatcher and the store, and the table is re-checked after each. Store
 * writes for one job id go through a sequencer so they land in transition order.
 */
@Injectable()
export class SchedulerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly retentionHours: number;
  private readonly dispatchTimeoutMs: number;
  private readonly writes = new KeyedSequencer();

  private readonly entries = new Map<string, JobEntry>();
  private generation = 0;
  private dispatcher: JobDispatcher | null = null;

  constructor(
    @Inject(JOB_STORE) private readonly store: IJobStore,
    @Inject(TIMER_QUEUE) private readonly timer: TimerQueue,
    private readonly configService: ConfigService,
  ) {
    this.retentionHours = this.configService.get<number>('scheduler.retentionHours', 24);
    this.dispatchTimeoutMs = this.configService.get<number>('scheduler.dispatchTimeoutMs', 15000);
  }

  /**
   * Runs after every module's onModuleInit, so dispatchers are registered
   * before a restored job can fire.
   */
  async onApplicationBootstrap(): Promise<void> {
    await this.restore();
  }

  onModuleDestroy(): void {
    this.timer.clear();
    this.logger.debug('Scheduler timers cleared');
  }

  /**
   * Install the callback that delivers due jobs. Replaces any previous one.
   */
  registerDispatcher(dispatcher: JobDispatcher): void {
    this.dispatcher = dispatcher;
  }

  /**
   * Schedule a job.
   * Rejects with InvalidTimeError if the time is unparseable or not strictly in
   * the future; no job is created in that case.
   */
  async schedule(request: ScheduleRequest): Promise<ScheduledJob> {
    const trigger = normalizeToUtc(request.triggerTime);
    const input =
      typeof request.triggerTime === 'string' ? request.triggerTime : String(request.triggerTime);

    if (!trigger) {
      throw new InvalidTimeError(`Cannot parse trigger time "${input}"`, input);
    }
    if (trigger.getTime() <= Date.now()) {
      throw new InvalidTimeError(`Trigger time ${trigger.toISOString()} is not in the future`, input);
    }

    const jobId = request.jobId ?? randomUUID();
    const previous = this.entries.get(jobId);
    if (previous && previous.handle !== null) {
      this.timer.cancel(previous.handle);
      this.logger.debug(`Replacing pending job ${jobId}`);
    }

    const job: ScheduledJob = {
      jobId,
      userId: request.userId,
      triggerTimeUtc: trigger.toISOString(),
      payload: structuredClone(request.payload),
      status: 'scheduled',
      createdAt: new Date().toISOString(),
    };
    const entry = this.arm(job);

    try {
      await this.persist(job);
    } catch (error) {
      this.rollback(jobId, entry, previous);
      throw error;
    }

    this.logger.log(`Scheduled job ${jobId} for ${job.triggerTimeUtc}`);
    return structuredClone(job);
  }

  /**
   * Cancel a pending job. Never rejects.
   * Resolves false for an unknown, fired, in-flight or already cancelled job.
   */
  async cancel(jobId: string): Promise<boolean> {
    const entry = this.entries.get(jobId);
    if (!entry || entry.handle === null) {
      return false;
    }

    this.timer.cancel(entry.handle);
    const job: ScheduledJob = {
      ...entry.job,
      status: 'cancelled',
      terminalAt: new Date().toISOString(),
    };
    this.entries.set(jobId, { ...entry, job, handle: null });
    this.logger.log(`Cancelled job ${jobId}`);

    try {
      await this.persist(job);
    } catch (error) {
      this.logger.error(`Failed to persist cancellation of ${jobId}: ${describeError(error)}`);
    }
    return true;
  }

  /**
   * Snapshot of a user's jobs, earliest trigger first.
   */
  listForUser(userId: string): ScheduledJob[] {
    return [...this.entries.values()]
      .map((entry) => entry.job)
      .filter((job) => job.userId === userId)
      .sort(
        (a, b) =>
          Date.parse(a.triggerTimeUtc) - Date.parse(b.triggerTimeUtc) ||
          Date.parse(a.createdAt) - Date.parse(b.createdAt),
      )
      .map((job) => structuredClone(job));
  }

  getJob(jobId: string): ScheduledJob | null {
    const entry = this.entries.get(jobId);
    return entry ? structuredClone(entry.job) : null;
  }

  /**
   * Delete terminal jobs older than the retention window.
   * Returns the number removed.
   */
  @Cron(CronExpression.EVERY_HOUR)
  async pruneTerminalJobs(): Promise<number> {
    const cutoff = Date.now() - this.retentionHours * 60 * 60 * 1000;
    const expired = [...this.entries.values()].filter(
      ({ job }) => job.terminalAt !== undefined && Date.parse(job.terminalAt) < cutoff,
    );

    for (const { job } of expired) {
      this.entries.delete(job.jobId);
    }

    // Deletes are queued before any await, so a schedule() under the same id lands after them.
    const results = await Promise.allSettled(
      expired.map(({ job }) =>
        this.writes.run(job.jobId, async () => {
          if (!this.entries.has(job.jobId)) {
            await this.store.delete(job.jobId);
          }
        }),
      ),
    );
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const { jobId } = expired[index].job;
        this.logger.error(`Failed to delete job ${jobId}: ${describeError(result.reason)}`);
      }
    });

    if (expired.length > 0) {
      this.logger.log(`Pruned ${expired.length} terminal job(s)`);
    }
    return expired.length;
  }

  /**
   * Load jobs from the store. Pending jobs are re-armed; those whose trigger
   * passed while the process was down are marked failed.
   */
  private async restore(): Promise<void> {
    const stored = await this.store.listAll();
    const now = Date.now();
    let rearmed = 0;
    const missed: ScheduledJob[] = [];

    for (const job of stored) {
      if (this.entries.has(job.jobId)) {
        continue;
      }

      if (isTerminal(job.status)) {
        this.entries.set(job.jobId, { job, generation: ++this.generation, handle: null });
      } else if (Date.parse(job.triggerTimeUtc) <= now) {
        const failed: ScheduledJob = {
          ...job,
          status: 'failed',
          terminalAt: new Date(now).toISOString(),
          failureReason: MISSED_TRIGGER_REASON,
        };
        this.entries.set(job.jobId, { job: failed, generation: ++this.generation, handle: null });
        missed.push(failed);
      } else {
        this.arm(job);
        rearmed++;
      }
    }

    for (const job of missed) {
      try {
        await this.persist(job);
      } catch (error) {
        this.logger.error(`Failed to persist missed job ${job.jobId}: ${describeError(error)}`);
      }
    }

    this.logger.log(
      `Restored ${stored.length} job(s): ${rearmed} re-armed, ${missed.length} missed`,
    );
  }

  /**
   * Undo a schedule() whose store write failed. A replaced job goes back to
   * the state it had before the call.
   */
  private rollback(jobId: string, entry: JobEntry, previous: JobEntry | undefined): void {
    if (this.entries.get(jobId) !== entry) {
      return;
    }
    if (entry.handle !== null) {
      this.timer.cancel(entry.handle);
    }

    if (!previous) {
      this.entries.delete(jobId);
    } else if (previous.handle !== null) {
      this.arm(previous.job);
    } else {
      this.entries.set(jobId, previous);
    }
  }

  private arm(job: ScheduledJob): JobEntry {
    const generation = ++this.generation;
    const handle = this.timer.scheduleAt(new Date(job.triggerTimeUtc), () => {
      void this.fire(job.jobId, generation);
    });

    const entry: JobEntry = { job, generation, handle };
    this.entries.set(job.jobId, entry);
    return entry;
  }

  private async fire(jobId: string, generation: number): Promise<void> {
    const entry = this.entries.get(jobId);
    if (!entry || entry.generation !== generation || entry.handle === null) {
      return;
    }

    this.entries.set(jobId, { ...entry, handle: null });
    const failureReason = await this.dispatch(entry.job);

    const current = this.entries.get(jobId);
    if (!current || current.generation !== generation) {
      this.logger.debug(`Job ${jobId} was replaced during dispatch; outcome dropped`);
      return;
    }

    const job: ScheduledJob = {
      ...current.job,
      status: failureReason === null ? 'sent' : 'failed',
      terminalAt: new Date().toISOString(),
      ...(failureReason === null ? {} : { failureReason }),
    };
    this.entries.set(jobId, { ...current, job });

    if (failureReason === null) {
      this.logger.log(`Job ${jobId} sent`);
    } else {
      this.logger.warn(`Job ${jobId} failed: ${failureReason}`);
    }

    try {
      await this.persist(job);
    } catch (error) {
      this.logger.error(`Failed to persist outcome of ${jobId}: ${describeError(error)}`);
    }
  }

  /**
   * Run the dispatcher. Resolves to null on success or the failure reason.
   */
  private async dispatch(job: ScheduledJob): Promise<string | null> {
    const dispatcher = this.dispatcher;
    if (!dispatcher) {
      return 'no dispatcher registered';
    }

    try {
      await withTimeout(
        dispatcher(structuredClone(job)),
        this.dispatchTimeoutMs,
        `Dispatch of ${job.jobId}`,
      );
      return null;
    } catch (error) {
      return describeError(error);
    }
  }

  private persist(job: ScheduledJob): Promise<void> {
    const snapshot = structuredClone(job);
    return this.writes.run(job.jobId, () => this.store.put(snapshot));
  }
}
