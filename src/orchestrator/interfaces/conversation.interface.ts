import { IntentKind } from '../../intent/interfaces';

export interface ConversationRequest {
  userId: string;
  text?: string;

  /** Base64-encoded audio; used when text is absent */
  audio?: string;
}

export interface ConversationResponse {
  success: boolean;
  textResponse: string;

  /** Base64-encoded speech, absent when synthesis failed */
  audioResponse?: string;

  intentKind: IntentKind | 'error';
  confidence: number;
  data: Record<string, unknown>;
}
