import { randomUUID } from 'crypto';

import { Inject, Injectable, Logger } from '@nestjs/common';

import { EN } from '../../common/messages/en';
import { describeError } from '../../common/utils/describe-error';
import { ScheduledJob } from '../../persistence/schemas';
import { SchedulerService } from '../../scheduler/scheduler.service';
import { IPushDeliveryService, PUSH_DELIVERY, ReminderPayload } from '../interfaces';

import { DeviceService } from './device.service';

export interface ReminderRequest {
  userId: string;
  deviceToken: string;
  text: string;

  /** Date, or ISO-8601; no offset means UTC */
  scheduledTime: Date | string;

  /** Reusing the id of a pending reminder reschedules it */
  reminderId?: string;

  metadata?: Record<string, string>;
}

export interface ScheduledReminder {
  reminderId: string;
  scheduledFor: string;
}

export interface TestNotificationResult {
  delivered: number;
  failed: number;
}

/**
 * Push reminders to a single device token, delivered by the scheduler.
 */
@Injectable()
export class ReminderService {
  private readonly logger = new Logger(ReminderService.name);

  constructor(
    private readonly scheduler: SchedulerService,
    private readonly deviceService: DeviceService,
    @Inject(PUSH_DELIVERY) private readonly push: IPushDeliveryService,
  ) {}

  /**
   * Rejects with InvalidTimeError when the time is unreadable or not in the future.
   */
  async scheduleReminder(request: ReminderRequest): Promise<ScheduledReminder> {
    const payload: ReminderPayload = {
      kind: 'reminder',
      deviceToken: request.deviceToken,
      title: EN.REMINDER_NOTIFICATION_TITLE,
      body: request.text,
      metadata: request.metadata ?? {},
    };

    const job = await this.scheduler.schedule({
      jobId: request.reminderId ?? `reminder-${randomUUID()}`,
      userId: request.userId,
      triggerTime: request.scheduledTime,
      payload,
    });

    this.logger.log(`Reminder ${job.jobId} scheduled for ${job.triggerTimeUtc}`);
    return { reminderId: job.jobId, scheduledFor: job.triggerTimeUtc };
  }

  /**
   * Cancel a pending reminder belonging to the user.
   * Resolves false when there is nothing to cancel.
   */
  async cancelReminder(userId: string, reminderId: string): Promise<boolean> {
    const job = this.scheduler.getJob(reminderId);
    if (!job || job.userId !== userId || job.payload.kind !== 'reminder') {
      return false;
    }

    return this.scheduler.cancel(reminderId);
  }

  /**
   * All of the user's reminders with their current status, earliest first.
   */
  listReminders(userId: string): ScheduledJob[] {
    return this.scheduler.listForUser(userId).filter((job) => job.payload.kind === 'reminder');
  }

  /**
   * Push a test notification to every registered device of the user, now.
   */
  async sendTestNotification(userId: string): Promise<TestNotificationResult> {
    const devices = await this.deviceService.listDevices(userId);

    const results = await Promise.allSettled(
      devices.map((device) =>
        this.push.deliver({
          token: device.token,
          title: EN.TEST_NOTIFICATION_TITLE,
          body: EN.TEST_NOTIFICATION_BODY,
          data: { type: 'test', userId },
        }),
      ),
    );

    const failed = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    for (const failure of failed) {
      this.logger.warn(`Test notification failed: ${describeError(failure.reason)}`);
    }

    return { delivered: results.length - failed.length, failed: failed.length };
  }
}
