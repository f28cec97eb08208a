import { randomUUID } from 'crypto';

import { Injectable, Logger } from '@nestjs/common';

import { EN } from '../common/messages/en';
import { ActionResult, actionResult } from '../common/types/action-result';
import { describeError } from '../common/utils/describe-error';
import { AlarmPayload } from '../notification/interfaces';
import { ScheduledJob } from '../persistence/schemas';
import { SchedulerService } from '../scheduler/scheduler.service';

import { resolveAlarmTime } from './alarm-time';

export interface AlarmOptions {
  label?: string;
  tone?: string;
}

/**
 * Alarms are scheduler jobs with an 'alarm' payload, fanned out to the user's
 * devices when they fire.
 */
@Injectable()
export class AlarmService {
  private readonly logger = new Logger(AlarmService.name);

  constructor(private readonly scheduler: SchedulerService) {}

  /**
   * Set an alarm for the next occurrence of `time` in the user's timezone.
   */
  async setAlarm(
    userId: string,
    time: string,
    timezone = 'UTC',
    options: AlarmOptions = {},
  ): Promise<ActionResult> {
    const alarmTime = resolveAlarmTime(time, timezone);
    if (!alarmTime) {
      this.logger.warn(`Could not parse alarm time "${time}"`);
      return actionResult('error', EN.ALARM_BAD_TIME);
    }

    const payload: AlarmPayload = {
      kind: 'alarm',
      tone: options.tone ?? 'default',
      ...(options.label ? { label: options.label } : {}),
    };

    try {
      const job = await this.scheduler.schedule({
        jobId: `alarm-${randomUUID()}`,
        userId,
        triggerTime: alarmTime.toJSDate(),
        payload,
      });

      const spoken = alarmTime.toFormat('h:mm a');
      this.logger.log(`Alarm ${job.jobId} set for ${userId} at ${spoken} ${alarmTime.zoneName}`);

      return actionResult('success', EN.ALARM_SET(spoken), {
        alarmId: job.jobId,
        alarmTime: job.triggerTimeUtc,
        localTime: spoken,
        timezone: alarmTime.zoneName,
      });
    } catch (error) {
      this.logger.error(`Failed to set alarm: ${describeError(error)}`);
      return actionResult('error', EN.ALARM_SET_FAILED);
    }
  }

  /**
   * Cancel the user's most recently created pending alarm.
   */
  async deleteRecentAlarm(userId: string): Promise<ActionResult> {
    const latest = this.listAlarms(userId).reduce<ScheduledJob | null>(
      (found, job) => (!found || job.createdAt >= found.createdAt ? job : found),
      null,
    );

    if (!latest) {
      return actionResult('not_found', EN.ALARM_NONE_ACTIVE);
    }

    const cancelled = await this.scheduler.cancel(latest.jobId);
    if (!cancelled) {
      // Fired between the lookup and the cancel
      return actionResult('not_found', EN.ALARM_NONE_ACTIVE);
    }

    this.logger.log(`Deleted alarm ${latest.jobId} for ${userId}`);
    return actionResult('success', EN.ALARM_DELETED, { alarmId: latest.jobId });
  }

  /**
   * Pending alarms, earliest first.
   */
  listAlarms(userId: string): ScheduledJob[] {
    return this.scheduler
      .listForUser(userId)
      .filter((job) => job.status === 'scheduled' && job.payload.kind === 'alarm');
  }
}
