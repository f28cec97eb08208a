import { INTENT_KINDS } from '../../intent/interfaces';

/**
 * System prompt for the generative intent classifier.
 */
export const INTENT_SYSTEM_PROMPT =
  'You are an expert intent parser for a voice assistant. Always respond with valid JSON.';

/**
 * Build the classification prompt for an utterance the rule tier could not place.
 */
export function buildClassificationPrompt(text: string): string {
  const parts: string[] = [];

  parts.push('Analyze the user request and extract:');
  parts.push(`1. intent: one of ${INTENT_KINDS.join(', ')}`);
  parts.push('2. slots: key-value pairs of entities, using these keys when they apply:');
  parts.push('   - set_alarm: time');
  parts.push('   - search_flights / book_flight: source, destination, date, timeWindow');
  parts.push('   - get_weather: location');
  parts.push('   - send_message: recipient, body');
  parts.push('3. confidence: a number between 0 and 1');
  parts.push('');
  parts.push('## User Request');
  parts.push(`"${text}"`);
  parts.push('');
  parts.push('Respond in JSON format:');
  parts.push('{"intent": "intent_name", "slots": {"key": "value"}, "confidence": 0.95}');

  return parts.join('\n');
}
