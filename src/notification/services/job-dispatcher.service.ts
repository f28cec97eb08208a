import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';

import { EN } from '../../common/messages/en';
import { describeError } from '../../common/utils/describe-error';
import { ScheduledJob } from '../../persistence/schemas';
import { SchedulerService } from '../../scheduler/scheduler.service';
import {
  AlarmPayload,
  IPushDeliveryService,
  PUSH_DELIVERY,
  ReminderPayload,
  jobPayloadSchema,
} from '../interfaces';

import { DeviceService } from './device.service';

/**
 * Turns due scheduler jobs into push notifications.
 * Rejecting here is what marks a job failed.
 */
@Injectable()
export class JobDispatcherService implements OnModuleInit {
  private readonly logger = new Logger(JobDispatcherService.name);

  constructor(
    private readonly scheduler: SchedulerService,
    private readonly deviceService: DeviceService,
    @Inject(PUSH_DELIVERY) private readonly push: IPushDeliveryService,
  ) {}

  onModuleInit(): void {
    this.scheduler.registerDispatcher((job) => this.dispatch(job));
  }

  async dispatch(job: ScheduledJob): Promise<void> {
    const parsed = jobPayloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      throw new Error(`Unrecognised payload for job ${job.jobId}`);
    }

    const payload = parsed.data;
    switch (payload.kind) {
      case 'alarm':
        return this.deliverAlarm(job, payload);
      case 'reminder':
        return this.deliverReminder(job, payload);
    }
  }

  private async deliverAlarm(job: ScheduledJob, payload: AlarmPayload): Promise<void> {
    const devices = await this.deviceService.listDevices(job.userId);
    if (devices.length === 0) {
      throw new Error(`No registered devices for ${job.userId}`);
    }

    const results = await Promise.allSettled(
      devices.map((device) =>
        this.push.deliver({
          token: device.token,
          title: EN.ALARM_NOTIFICATION_TITLE,
          body: EN.ALARM_NOTIFICATION_BODY(payload.label),
          data: { type: 'alarm', alarmId: job.jobId, userId: job.userId, tone: payload.tone },
        }),
      ),
    );

    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failures.length === results.length) {
      throw new Error(`Alarm delivery failed: ${describeError(failures[0].reason)}`);
    }
    if (failures.length > 0) {
      const reached = results.length - failures.length;
      this.logger.warn(`Alarm ${job.jobId} reached ${reached}/${results.length} devices`);
    }
  }

  private async deliverReminder(job: ScheduledJob, payload: ReminderPayload): Promise<void> {
    await this.push.deliver({
      token: payload.deviceToken,
      title: payload.title,
      body: payload.body,
      data: {
        type: 'reminder',
        reminderId: job.jobId,
        userId: job.userId,
        scheduledTime: job.triggerTimeUtc,
        metadata: JSON.stringify(payload.metadata),
      },
    });
  }
}
