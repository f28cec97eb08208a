/**
 * English user-facing message strings.
 * Every reply the assistant speaks should reference strings from this file.
 */
export const EN = {
  // Alarms
  ALARM_SET: (time: string) => `Alarm set for ${time}.`,
  ALARM_DELETED: 'Alarm deleted successfully.',
  ALARM_NONE_ACTIVE: "You don't have any active alarms.",
  ALARM_BAD_TIME: "I couldn't understand that time format. Please try again.",
  ALARM_SET_FAILED: 'Failed to set alarm. Please try again.',
  ALARM_NOTIFICATION_TITLE: '⏰ Alarm',
  ALARM_NOTIFICATION_BODY: (label?: string) => label ?? 'Time to wake up!',

  // Reminders
  REMINDER_NOTIFICATION_TITLE: '🔔 Reminder',
  TEST_NOTIFICATION_TITLE: '🚀 Test Notification',
  TEST_NOTIFICATION_BODY: 'Push notifications are working.',

  // Flights
  FLIGHT_BAD_DATE: "I couldn't understand that date format.",
  FLIGHT_SEARCH_FAILED: 'Failed to search flights. Please try again.',
  FLIGHT_NONE_FOUND: (source: string, destination: string, date: string) =>
    `I couldn't find any flights from ${source} to ${destination} on ${date}.`,
  FLIGHT_CHEAPEST: (
    count: number,
    airline: string,
    flightNumber: string,
    departure: string,
    price: string,
  ) =>
    `I found ${count} flight${count === 1 ? '' : 's'}. The cheapest is ${airline} ${flightNumber} ` +
    `departing at ${departure} for ${price}.`,
  FLIGHT_WINDOW_ASSUMED: (window: string) => `I assumed you meant the ${window}.`,

  // Command routing
  MISSING_SLOTS: (fields: string[]) => `I need the following information: ${fields.join(', ')}`,
  NOT_UNDERSTOOD: "I'm not sure how to help with that yet.",
  WEATHER_UNAVAILABLE: 'Weather service coming soon!',
  BOOKING_UNAVAILABLE: "Booking flights isn't available yet, but I can search for them.",
  MESSAGING_UNAVAILABLE: "Sending messages isn't available yet.",

  // Responses
  ACKNOWLEDGED: "I've processed your request.",
  COMPLETED: "I've completed that task for you.",
  MISSING_INFO: 'I need more information.',
  ERROR_GENERIC: 'I encountered an error. Please try again.',
  APOLOGY:
    'I apologize, but I encountered an error processing your request. Please try again.',
} as const;
