import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

import { EN } from '../common/messages/en';
import { ActionResult } from '../common/types/action-result';
import { describeError } from '../common/utils/describe-error';
import { UserContext } from '../context/interfaces';
import { flightListSchema } from '../flights/services';
import { Intent } from '../intent/interfaces';
import { COMPLETION_SERVICE, ICompletionService } from '../openai/interfaces';
import { FLIGHT_SUMMARY_SYSTEM_PROMPT, buildFlightSummaryPrompt } from '../openai/prompts';

const flightResultSchema = z.object({
  flights: flightListSchema,
  source: z.string(),
  destination: z.string(),
  date: z.string(),
  assumedTimeWindow: z.string().optional(),
});

type FlightResultData = z.infer<typeof flightResultSchema>;

/**
 * Turns an action result into the sentence spoken back to the user.
 */
@Injectable()
export class ResponseSynthesizerService {
  private readonly logger = new Logger(ResponseSynthesizerService.name);

  constructor(@Inject(COMPLETION_SERVICE) private readonly completion: ICompletionService) {}

  async synthesize(intent: Intent, result: ActionResult, _context: UserContext): Promise<string> {
    try {
      if (result.status === 'error') {
        return result.message || EN.ERROR_GENERIC;
      }
      if (result.status === 'missing_slots') {
        return result.message || EN.MISSING_INFO;
      }

      if (intent.kind === 'delete_alarm') {
        return result.message;
      }

      if (result.status === 'success') {
        if (intent.kind === 'set_alarm') return result.message;
        if (intent.kind === 'search_flights') return await this.describeFlights(result);
      }

      return EN.ACKNOWLEDGED;
    } catch (error) {
      this.logger.error(`Response synthesis failed: ${describeError(error)}`);
      return EN.COMPLETED;
    }
  }

  private async describeFlights(result: ActionResult): Promise<string> {
    const data = flightResultSchema.parse(result.data);

    const reply =
      data.flights.length === 0
        ? EN.FLIGHT_NONE_FOUND(data.source, data.destination, data.date)
        : await this.summarizeFlights(data);

    return data.assumedTimeWindow
      ? `${reply} ${EN.FLIGHT_WINDOW_ASSUMED(data.assumedTimeWindow)}`
      : reply;
  }

  private async summarizeFlights(data: FlightResultData): Promise<string> {
    try {
      return await this.completion.complete({
        systemPrompt: FLIGHT_SUMMARY_SYSTEM_PROMPT,
        userPrompt: buildFlightSummaryPrompt(data, data.flights),
        temperature: 0.7,
        maxTokens: 150,
      });
    } catch (error) {
      this.logger.warn(`Flight summary unavailable, using template: ${describeError(error)}`);
      const [cheapest] = [...data.flights].sort((a, b) => a.price - b.price);
      return EN.FLIGHT_CHEAPEST(
        data.flights.length,
        cheapest.airline,
        cheapest.flightNumber,
        cheapest.departureTime,
        `${cheapest.currency} ${cheapest.price}`,
      );
    }
  }
}
