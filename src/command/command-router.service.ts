import { Inject, Injectable, Logger } from '@nestjs/common';

import { AlarmService } from '../alarm/alarm.service';
import { EN } from '../common/messages/en';
import { ActionResult, actionResult } from '../common/types/action-result';
import { describeError } from '../common/utils/describe-error';
import { UserContext } from '../context/interfaces';
import { FLIGHT_SEARCH, IFlightSearchService } from '../flights/interfaces';
import { Intent, IntentKind, isTimeWindow } from '../intent/interfaces';

/**
 * Intent handler function signature.
 */
type IntentHandler = (intent: Intent, userId: string, context: UserContext) => Promise<ActionResult>;

/**
 * Dispatches a resolved intent to the action that fulfils it.
 * Never rejects: handler failures come back as 'error' results.
 */
@Injectable()
export class CommandRouterService {
  private readonly logger = new Logger(CommandRouterService.name);

  /** One handler per intent kind; a missing kind does not compile */
  private readonly handlers: Record<IntentKind, IntentHandler>;

  constructor(
    private readonly alarmService: AlarmService,
    @Inject(FLIGHT_SEARCH) private readonly flightSearch: IFlightSearchService,
  ) {
    this.handlers = {
      set_alarm: (intent, userId, context) => this.handleSetAlarm(intent, userId, context),
      delete_alarm: (_intent, userId) => this.alarmService.deleteRecentAlarm(userId),
      search_flights: (intent, _userId, context) => this.handleSearchFlights(intent, context),
      book_flight: async () => actionResult('unimplemented', EN.BOOKING_UNAVAILABLE),
      get_weather: async () => actionResult('unimplemented', EN.WEATHER_UNAVAILABLE),
      send_message: async () => actionResult('unimplemented', EN.MESSAGING_UNAVAILABLE),
      unknown: async () => actionResult('unimplemented', EN.NOT_UNDERSTOOD),
    };
  }

  async route(intent: Intent, userId: string, context: UserContext): Promise<ActionResult> {
    try {
      const result = await this.handlers[intent.kind](intent, userId, context);
      this.logger.debug(`${intent.kind} -> ${result.status}`);
      return result;
    } catch (error) {
      this.logger.error(`Error handling ${intent.kind}: ${describeError(error)}`);
      return actionResult('error', describeError(error));
    }
  }

  private async handleSetAlarm(
    intent: Intent,
    userId: string,
    context: UserContext,
  ): Promise<ActionResult> {
    const { time } = intent.slots;
    if (!time) {
      return actionResult('missing_slots', EN.MISSING_SLOTS(['alarm time']), {
        missing: ['alarm time'],
      });
    }

    return this.alarmService.setAlarm(userId, time, context.preferences.timezone, {
      tone: context.preferences.alarmTone,
    });
  }

  private async handleSearchFlights(intent: Intent, context: UserContext): Promise<ActionResult> {
    const { source, destination, date } = intent.slots;
    const requestedWindow = intent.slots.timeWindow?.toLowerCase();
    // Unrecognised day-parts are dropped rather than filtering out every flight.
    const timeWindow = requestedWindow && isTimeWindow(requestedWindow) ? requestedWindow : undefined;

    const missing: string[] = [];
    if (!source) missing.push('source city');
    if (!destination) missing.push('destination city');
    if (!date) missing.push('travel date');

    if (!source || !destination || !date) {
      return actionResult('missing_slots', EN.MISSING_SLOTS(missing), { missing });
    }

    const { airlinePref, maxPrice, flightType } = context.intentSpecific;
    const result = await this.flightSearch.search({
      source,
      destination,
      date,
      ...(timeWindow ? { timeWindow } : {}),
      preferences: { airlinePref, maxPrice, flightType },
    });

    if (result.status === 'success' && timeWindow && intent.ambiguousSlots?.includes('timeWindow')) {
      return { ...result, data: { ...result.data, assumedTimeWindow: timeWindow } };
    }
    return result;
  }
}
