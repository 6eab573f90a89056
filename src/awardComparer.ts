/**
 * awardComparer.ts — The orchestrator that ties every layer together.
 *
 * PIPELINE
 * ────────
 *   1. VALIDATE → normalize the caller's input into a frozen SearchRequest
 *   2. FETCH    → Award and Revenue searches run concurrently through the
 *                 RequestDispatcher (each on its own leased session)
 *   3. MATCH    → offerMatcher joins the two lists on their identity hash
 *   4. REPORT   → ComparisonResult, plus counts of what went unmatched
 *
 * Validation finishes before the first upstream call, so a bad request
 * never costs a session lease.
 */

import { DateTime } from 'luxon';
import { Logger } from './core/logger';
import { UnsupportedCabinClass, ValidationError } from './core/errors';
import { matchOffers } from './services/offerMatcher';
import {
  CROSS_REFERENCE_BUCKETS,
  isCabinClass,
  type ComparisonResult,
  type RawOffer,
  type SearchRequest,
  type SearchType,
} from './core/types';

const logger = new Logger('AwardComparer');

const IATA_CODE = /^[A-Z]{3}$/;
const MIN_PASSENGERS = 1;
const MAX_PASSENGERS = 9;

/** Anything that can run one search type for a request (the RequestDispatcher). */
export interface SearchExecutor {
  execute(request: SearchRequest, searchType: SearchType): Promise<RawOffer[]>;
}

export interface CompareInput {
  origin: string;
  destination: string;
  date: string;
  /** Defaults to 1. */
  passengers?: number;
  /** Case-insensitive; defaults to MAIN. */
  cabinClass?: string;
}

export class AwardComparer {
  private readonly executor: SearchExecutor;

  constructor(executor: SearchExecutor) {
    this.executor = executor;
  }

  async compare(input: CompareInput): Promise<ComparisonResult> {
    // ── Stage 1: VALIDATE ──────────────────────────────────
    const request = buildSearchRequest(input);
    const route = `${request.origin}→${request.destination} on ${request.date}`;
    logger.info(
      `Comparing ${route} (${request.passengerCount} pax, ${request.cabinClass})…`,
    );

    // ── Stage 2: FETCH ─────────────────────────────────────
    // Both searches always settle, so the sibling's session is released
    // normally even when the other side fails.
    const [award, revenue] = await Promise.allSettled([
      this.executor.execute(request, 'Award'),
      this.executor.execute(request, 'Revenue'),
    ]);

    if (award.status === 'rejected') {
      if (revenue.status === 'rejected') {
        logger.warn(`Revenue search for ${route} also failed: ${String(revenue.reason)}`);
      }
      throw award.reason;
    }
    if (revenue.status === 'rejected') {
      throw revenue.reason;
    }

    // ── Stage 3: MATCH ─────────────────────────────────────
    const flights = matchOffers(award.value, revenue.value);

    // ── Stage 4: REPORT ────────────────────────────────────
    const unmatchedAward = award.value.length - flights.length;
    const unmatchedRevenue = revenue.value.length - flights.length;
    logger.info(
      `${route}: ${flights.length} matched flight(s) from ${award.value.length} award / ` +
        `${revenue.value.length} revenue offer(s)`,
    );
    if (unmatchedAward > 0 || unmatchedRevenue > 0) {
      logger.debug(
        `${route}: ${unmatchedAward} award and ${unmatchedRevenue} revenue offer(s) left unmatched`,
      );
    }

    return {
      searchMetadata: {
        origin: request.origin,
        destination: request.destination,
        date: request.date,
        passengers: request.passengerCount,
        cabinClass: request.cabinClass,
      },
      flights,
      totalResults: flights.length,
    };
  }
}

// ─── Validation ─────────────────────────────────────────────

/** Normalize caller input into a frozen SearchRequest, or throw ValidationError. */
export function buildSearchRequest(input: CompareInput): SearchRequest {
  const origin = airportCode(input.origin, 'origin');
  const destination = airportCode(input.destination, 'destination');
  if (origin === destination) {
    throw new ValidationError('Origin and destination must differ');
  }

  const date = input.date.trim();
  if (!DateTime.fromFormat(date, 'yyyy-MM-dd').isValid) {
    throw new ValidationError(`Invalid date: ${input.date}. Expected YYYY-MM-DD`);
  }

  const passengerCount = input.passengers ?? MIN_PASSENGERS;
  if (
    !Number.isInteger(passengerCount) ||
    passengerCount < MIN_PASSENGERS ||
    passengerCount > MAX_PASSENGERS
  ) {
    throw new ValidationError(
      `Invalid passenger count: ${passengerCount}. Must be between ${MIN_PASSENGERS} and ${MAX_PASSENGERS}`,
    );
  }

  const cabinClass = (input.cabinClass ?? 'MAIN').trim().toUpperCase();
  if (!isCabinClass(cabinClass)) {
    throw new UnsupportedCabinClass(input.cabinClass ?? cabinClass, CROSS_REFERENCE_BUCKETS);
  }

  return Object.freeze({ origin, destination, date, passengerCount, cabinClass });
}

function airportCode(value: string, field: 'origin' | 'destination'): string {
  const code = value.trim().toUpperCase();
  if (!IATA_CODE.test(code)) {
    throw new ValidationError(`Invalid ${field} airport code: ${value}`);
  }
  return code;
}
