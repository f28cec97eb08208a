import { ActionResult } from '../../common/types/action-result';

export interface Flight {
  airline: string;
  flightNumber: string;

  /** HH:mm, local to the departure airport */
  departureTime: string;
  arrivalTime: string;

  /** e.g. "2h 30m" */
  duration: string;

  price: number;
  currency: string;
  direct: boolean;
  stops: number;
}

/**
 * Flight filters taken from the user's stored preferences.
 */
export interface FlightPreferences {
  airlinePref?: string | null;
  maxPrice?: number | null;

  /** 'direct' keeps non-stop flights only */
  flightType?: string;
}

export interface FlightQuery {
  source: string;
  destination: string;

  /** "25th Dec 2026", "2026-12-25", "today", "tomorrow" or "day after tomorrow" */
  date: string;

  timeWindow?: string;
  preferences?: FlightPreferences;
}

/**
 * Payload of a successful search, carried in ActionResult.data.
 */
export interface FlightSearchData {
  flights: Flight[];
  count: number;
  source: string;
  destination: string;
  sourceCode: string;
  destinationCode: string;

  /** yyyy-MM-dd */
  date: string;
}

/**
 * Flight search collaborator.
 * Resolves to a 'success' result carrying FlightSearchData, or an 'error' result.
 */
export interface IFlightSearchService {
  search(query: FlightQuery): Promise<ActionResult>;
}

export const FLIGHT_SEARCH = Symbol('FLIGHT_SEARCH');
