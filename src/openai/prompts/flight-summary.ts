import { Flight } from '../../flights/interfaces';

export const FLIGHT_SUMMARY_SYSTEM_PROMPT = 'You are a helpful and concise voice assistant.';

/**
 * Build the prompt asking for a spoken summary of the top flight options.
 */
export function buildFlightSummaryPrompt(
  route: { source: string; destination: string; date: string },
  flights: Flight[],
): string {
  const lines = flights.slice(0, 3).map((flight, index) => {
    const stops = flight.direct ? 'non-stop' : `${flight.stops} stop(s)`;
    return (
      `${index + 1}. ${flight.airline} ${flight.flightNumber}: departs ${flight.departureTime}, ` +
      `arrives ${flight.arrivalTime}, ${flight.currency} ${flight.price}, ${flight.duration}, ${stops}`
    );
  });

  return [
    'Present these flight options in a natural, conversational way.',
    '',
    `Flight search: ${route.source} to ${route.destination} on ${route.date}`,
    '',
    'Available flights:',
    ...lines,
    '',
    'Create a brief, helpful response (2-3 sentences) highlighting the best option.',
  ].join('\n');
}
