import { Module } from '@nestjs/common';

import { SchedulerModule } from '../scheduler/scheduler.module';

import { FirebasePushService } from './firebase/firebase-push.service';
import { PUSH_DELIVERY } from './interfaces';
import { DeviceService, JobDispatcherService, ReminderService } from './services';

/**
 * Notification Module
 *
 * Device registry, push reminders and delivery of due scheduler jobs.
 */
@Module({
  imports: [SchedulerModule],
  providers: [
    FirebasePushService,
    { provide: PUSH_DELIVERY, useExisting: FirebasePushService },
    DeviceService,
    ReminderService,
    JobDispatcherService,
  ],
  exports: [DeviceService, ReminderService, PUSH_DELIVERY],
})
export class NotificationModule {}
