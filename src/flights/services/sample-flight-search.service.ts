import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

import { EN } from '../../common/messages/en';
import { ActionResult, actionResult } from '../../common/types/action-result';
import { describeError } from '../../common/utils/describe-error';
import { toAirportCode } from '../city-codes';
import sampleFlights from '../data/sample-flights.json';
import { Flight, FlightQuery, FlightSearchData, IFlightSearchService } from '../interfaces';
import { departsInWindow, parseTravelDate } from '../travel-date';

const flightSchema = z.object({
  airline: z.string(),
  flightNumber: z.string(),
  departureTime: z.string().regex(/^\d{2}:\d{2}$/),
  arrivalTime: z.string(),
  duration: z.string(),
  price: z.number().nonnegative(),
  currency: z.string(),
  direct: z.boolean(),
  stops: z.number().int().nonnegative(),
});

export const flightListSchema = z.array(flightSchema);

const MAX_RESULTS = 5;

/**
 * Flight search over a fixed sample inventory.
 * The same flights are offered for every route and date.
 */
@Injectable()
export class SampleFlightSearchService implements IFlightSearchService {
  private readonly logger = new Logger(SampleFlightSearchService.name);
  private readonly inventory: Flight[] = flightListSchema.parse(sampleFlights);

  async search(query: FlightQuery): Promise<ActionResult> {
    try {
      const date = parseTravelDate(query.date);
      if (!date) {
        this.logger.warn(`Unparseable travel date: "${query.date}"`);
        return actionResult('error', EN.FLIGHT_BAD_DATE);
      }

      const flights = this.filter(query);
      const data: FlightSearchData = {
        flights,
        count: flights.length,
        source: query.source,
        destination: query.destination,
        sourceCode: toAirportCode(query.source),
        destinationCode: toAirportCode(query.destination),
        date,
      };

      this.logger.log(
        `Flight search ${data.sourceCode} -> ${data.destinationCode} on ${date}: ${flights.length} result(s)`,
      );

      return actionResult('success', `Found ${flights.length} flight(s).`, { ...data });
    } catch (error) {
      this.logger.error(`Flight search failed: ${describeError(error)}`);
      return actionResult('error', EN.FLIGHT_SEARCH_FAILED);
    }
  }

  private filter(query: FlightQuery): Flight[] {
    const { timeWindow, preferences = {} } = query;
    let flights = [...this.inventory];

    if (timeWindow) {
      flights = flights.filter((f) => departsInWindow(f.departureTime, timeWindow));
    }

    const airline = preferences.airlinePref?.toLowerCase();
    if (airline) {
      flights = flights.filter((f) => f.airline.toLowerCase() === airline);
    }

    const maxPrice = preferences.maxPrice;
    if (maxPrice !== undefined && maxPrice !== null) {
      flights = flights.filter((f) => f.price <= maxPrice);
    }

    if (preferences.flightType === 'direct') {
      flights = flights.filter((f) => f.direct);
    }

    return flights.sort((a, b) => a.price - b.price).slice(0, MAX_RESULTS);
  }
}
