import { Inject, Injectable, Logger } from '@nestjs/common';
import { addDays } from 'date-fns';
import { z } from 'zod';

import { CONTEXT_STORE, IContextStore } from '../../persistence/interfaces';
import { RegisteredDevice } from '../../persistence/schemas';

const REGISTRATION_TTL_DAYS = 30;

export const deviceRegistrationSchema = z.object({
  userId: z.string().min(1),
  deviceId: z.string().min(1),
  token: z.string().min(10, 'Invalid FCM token provided'),
  platform: z.string().default('mobile'),
  appVersion: z.string().optional(),
});

export type DeviceRegistration = z.input<typeof deviceRegistrationSchema>;

export interface RegistrationReceipt {
  registrationId: string;
  expiresAt: string;
}

/**
 * Registry of the push-capable devices of each user.
 */
@Injectable()
export class DeviceService {
  private readonly logger = new Logger(DeviceService.name);

  constructor(@Inject(CONTEXT_STORE) private readonly store: IContextStore) {}

  /**
   * Register a device, or refresh the token of one already known.
   * Throws when the registration is invalid.
   */
  async registerDevice(registration: DeviceRegistration): Promise<RegistrationReceipt> {
    const result = deviceRegistrationSchema.safeParse(registration);
    if (!result.success) {
      throw new Error(result.error.errors.map((e) => e.message).join(', '));
    }

    const { userId, deviceId, token, platform, appVersion } = result.data;
    const now = new Date();
    const existing = (await this.store.listDevices(userId)).find((d) => d.deviceId === deviceId);

    const device: RegisteredDevice = {
      userId,
      deviceId,
      token,
      platform,
      ...(appVersion ? { appVersion } : {}),
      registeredAt: existing?.registeredAt ?? now.toISOString(),
      lastSeenAt: now.toISOString(),
    };
    await this.store.putDevice(device);

    this.logger.log(`Device ${deviceId} registered for ${userId} (${platform})`);
    return {
      registrationId: `${userId}_${deviceId}`,
      expiresAt: addDays(now, REGISTRATION_TTL_DAYS).toISOString(),
    };
  }

  async listDevices(userId: string): Promise<RegisteredDevice[]> {
    return this.store.listDevices(userId);
  }
}
