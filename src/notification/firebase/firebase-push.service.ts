import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as admin from 'firebase-admin';

import { describeError } from '../../common/utils/describe-error';
import { IPushDeliveryService, PushMessage } from '../interfaces';

const APP_NAME = 'voice-assistant';

/**
 * Push delivery through Firebase Cloud Messaging.
 * Without credentials every delivery rejects, so due jobs end up failed.
 */
@Injectable()
export class FirebasePushService implements IPushDeliveryService, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(FirebasePushService.name);
  private readonly credentialsPath: string | undefined;
  private app: admin.app.App | null = null;

  constructor(private readonly configService: ConfigService) {
    this.credentialsPath = this.configService.get<string>('firebase.credentialsPath');
  }

  onModuleInit(): void {
    if (!this.credentialsPath) {
      this.logger.warn('No Firebase credentials configured; push delivery disabled');
      return;
    }

    try {
      this.app = admin.initializeApp(
        { credential: admin.credential.cert(this.credentialsPath) },
        APP_NAME,
      );
      this.logger.log(`Firebase initialized from ${this.credentialsPath}`);
    } catch (error) {
      this.logger.error(`Failed to initialize Firebase: ${describeError(error)}`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.app) {
      await this.app.delete();
      this.app = null;
    }
  }

  async deliver(message: PushMessage): Promise<string> {
    if (!this.app) {
      throw new Error('Push delivery is not configured');
    }

    const deliveryId = await this.app.messaging().send({
      token: message.token,
      notification: { title: message.title, body: message.body },
      data: message.data ?? {},
    });

    this.logger.debug(`Delivered "${message.title}" to ${message.token.slice(0, 12)}...`);
    return deliveryId;
  }
}
