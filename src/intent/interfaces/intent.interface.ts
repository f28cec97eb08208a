/**
 * All intents the assistant can classify. The set is closed: anything the
 * classifier reports outside it becomes 'unknown'.
 */
export const INTENT_KINDS = [
  'set_alarm',
  'delete_alarm',
  'search_flights',
  'book_flight',
  'get_weather',
  'send_message',
  'unknown',
] as const;

export type IntentKind = (typeof INTENT_KINDS)[number];

/**
 * Coarse departure windows, in the order they are checked.
 */
export const TIME_WINDOWS = ['morning', 'afternoon', 'evening', 'night'] as const;

export type TimeWindow = (typeof TIME_WINDOWS)[number];

/**
 * Named parameters extracted from the utterance.
 */
export type Slots = Readonly<Record<string, string>>;

/**
 * Classified purpose of an utterance. Frozen once produced.
 */
export interface Intent {
  readonly kind: IntentKind;

  readonly slots: Slots;

  /** 0-1 */
  readonly confidence: number;

  /** Text the intent was resolved from */
  readonly sourceText: string;

  /** Slots whose value was picked among several candidates in the text */
  readonly ambiguousSlots?: readonly string[];
}

export function isIntentKind(value: string): value is IntentKind {
  return (INTENT_KINDS as readonly string[]).includes(value);
}

export function isTimeWindow(value: string): value is TimeWindow {
  return TIME_WINDOWS.some((known) => known === value);
}

/**
 * Build a frozen Intent.
 */
export function createIntent(
  kind: IntentKind,
  slots: Record<string, string>,
  confidence: number,
  sourceText: string,
  ambiguousSlots: string[] = [],
): Intent {
  return Object.freeze({
    kind,
    slots: Object.freeze({ ...slots }),
    confidence,
    sourceText,
    ...(ambiguousSlots.length > 0 ? { ambiguousSlots: Object.freeze([...ambiguousSlots]) } : {}),
  });
}
