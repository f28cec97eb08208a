export interface PushMessage {
  /** FCM registration token */
  token: string;
  title: string;
  body: string;

  /** FCM only carries string values */
  data?: Record<string, string>;
}

/**
 * Push transport. Resolves to the provider's delivery id.
 */
export interface IPushDeliveryService {
  deliver(message: PushMessage): Promise<string>;
}

export const PUSH_DELIVERY = Symbol('PUSH_DELIVERY');
