import { IntentKind, TIME_WINDOWS } from './interfaces';

/** Confidence assigned to every rule-tier match */
export const RULE_CONFIDENCE = 0.9;

/** A rule match must exceed this to skip the generative tier */
export const ACCEPTANCE_THRESHOLD = 0.8;

type RuleKind = Exclude<IntentKind, 'unknown'>;

interface IntentRule {
  kind: RuleKind;
  patterns: RegExp[];
}

export interface RuleMatch {
  kind: RuleKind;
  slots: Record<string, string>;
  ambiguousSlots: string[];
}

const TIME = String.raw`(\d{1,2}(?::\d{2})?\s*(?:am|pm)?)`;

/**
 * Ordered, deliberately narrow patterns. The first match wins.
 */
const RULES: IntentRule[] = [
  {
    kind: 'set_alarm',
    patterns: [
      new RegExp(String.raw`set (?:an? )?alarm (?:for|at) ${TIME}`, 'i'),
      new RegExp(String.raw`wake me (?:up )?(?:at|by) ${TIME}`, 'i'),
      new RegExp(String.raw`remind me (?:at|by) ${TIME}`, 'i'),
    ],
  },
  {
    kind: 'delete_alarm',
    patterns: [/delete (?:the |my )?alarm/i, /cancel (?:the |my )?alarm/i, /remove (?:the |my )?alarm/i],
  },
  {
    kind: 'search_flights',
    patterns: [
      /(?:find|search|show|get).{0,30}flights?/i,
      /flights?.{0,30}(?:from|to)/i,
      /(?:book|need).{0,30}(?:flight|ticket)/i,
    ],
  },
  {
    kind: 'get_weather',
    patterns: [/(?:what'?s|how'?s) (?:the )?weather/i, /weather (?:in|for|at)/i, /temperature (?:in|for|at)/i],
  },
];

/** Words that follow a place name and end it */
const PLACE_END = String.raw`(?=\s+(?:to|from|on|for|at|in|by|today|tomorrow|tonight|this|next|day|morning|afternoon|evening|night)\b|\s+\d|$)`;

const SOURCE_PATTERN = new RegExp(String.raw`\bfrom\s+([a-z][a-z\s]*?)${PLACE_END}`, 'i');
const DESTINATION_PATTERN = new RegExp(String.raw`\bto\s+([a-z][a-z\s]*?)${PLACE_END}`, 'i');
const LOCATION_PATTERN = new RegExp(String.raw`\b(?:in|for|at)\s+([a-z][a-z\s]*?)${PLACE_END}`, 'i');

const DATE_PATTERNS = [
  /\b(\d{1,2}(?:st|nd|rd|th)?\s+(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\s+\d{4})\b/i,
  /\b(\d{4}-\d{2}-\d{2})\b/,
  /\b(day after tomorrow|tomorrow|today)\b/i,
];

/** Not places, even when they follow "to" or "from" */
const VAGUE_PLACES = new Set(['nowhere', 'anywhere', 'somewhere', 'everywhere', 'there', 'here']);

/**
 * Match text against the rule table.
 * Returns null when no rule applies.
 */
export function matchRules(text: string): RuleMatch | null {
  const cleaned = text.trim().replace(/[.!?]+$/, '');

  for (const rule of RULES) {
    for (const pattern of rule.patterns) {
      const match = pattern.exec(cleaned);
      if (match) {
        return { kind: rule.kind, ...extractSlots(rule.kind, cleaned, match) };
      }
    }
  }

  return null;
}

function extractSlots(
  kind: RuleKind,
  text: string,
  match: RegExpExecArray,
): Pick<RuleMatch, 'slots' | 'ambiguousSlots'> {
  switch (kind) {
    case 'set_alarm':
      return { slots: match[1] ? { time: match[1].trim() } : {}, ambiguousSlots: [] };
    case 'search_flights':
      return extractFlightSlots(text);
    case 'get_weather': {
      const location = capturePlace(LOCATION_PATTERN, text);
      return { slots: location ? { location } : {}, ambiguousSlots: [] };
    }
    default:
      return { slots: {}, ambiguousSlots: [] };
  }
}

/**
 * Source, destination, date token and coarse time window.
 * When several day-parts are mentioned the first in TIME_WINDOWS order wins and
 * the slot is reported as ambiguous.
 */
export function extractFlightSlots(text: string): Pick<RuleMatch, 'slots' | 'ambiguousSlots'> {
  const slots: Record<string, string> = {};
  const ambiguousSlots: string[] = [];

  const source = capturePlace(SOURCE_PATTERN, text);
  const destination = capturePlace(DESTINATION_PATTERN, text);
  if (source) slots.source = source;
  if (destination) slots.destination = destination;

  for (const pattern of DATE_PATTERNS) {
    const date = pattern.exec(text);
    if (date) {
      slots.date = date[1];
      break;
    }
  }

  const lower = text.toLowerCase();
  const windows = TIME_WINDOWS.filter((window) => lower.includes(window));
  if (windows.length > 0) {
    slots.timeWindow = windows[0];
  }
  if (windows.length > 1) {
    ambiguousSlots.push('timeWindow');
  }

  return { slots, ambiguousSlots };
}

function capturePlace(pattern: RegExp, text: string): string | null {
  const place = pattern.exec(text)?.[1]?.trim().replace(/\s+/g, ' ');
  if (!place || VAGUE_PLACES.has(place.toLowerCase())) {
    return null;
  }
  return place;
}
