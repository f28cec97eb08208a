import { Injectable, Logger } from '@nestjs/common';

import { IPushDeliveryService, PushMessage } from '../interfaces';

/**
 * Fake push delivery for testing.
 * Captures every delivered message; tokens in `rejectTokens` fail.
 */
@Injectable()
export class FakePushService implements IPushDeliveryService {
  private readonly logger = new Logger(FakePushService.name);

  /** Captured messages for test assertions */
  public delivered: PushMessage[] = [];

  /** Deliveries to these tokens reject */
  public rejectTokens = new Set<string>();

  private nextId = 1;

  async deliver(message: PushMessage): Promise<string> {
    if (this.rejectTokens.has(message.token)) {
      throw new Error(`Token rejected: ${message.token}`);
    }

    this.delivered.push(message);
    const deliveryId = `fake-delivery-${this.nextId++}`;
    this.logger.debug(`Captured push "${message.title}" -> ${message.token}`);
    return deliveryId;
  }

  /**
   * Clear captured messages (useful for testing).
   */
  reset(): void {
    this.delivered = [];
    this.rejectTokens.clear();
  }
}
