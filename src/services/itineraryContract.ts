/**
 * itineraryContract.ts — The upstream itinerary-search endpoint: request
 * payload, response normalization into RawOffers, and time formatting.
 *
 * One endpoint serves both searches; `tripOptions.searchType` picks Award
 * (points) or Revenue (cash). Every response carries `slices[]`, one per
 * flight option, each with an optional `hash` that identifies the same
 * option across the two searches.
 */

import { DateTime } from 'luxon';
import { z } from 'zod';
import { UpstreamUnavailable } from '../core/errors';
import type { CabinClass, PriceComponents, RawOffer, SearchRequest, SearchType } from '../core/types';

export const UPSTREAM_ORIGIN = 'https://www.aa.com';
export const BOOKING_URL = `${UPSTREAM_ORIGIN}/booking/choose-flights/1`;
export const SEARCH_URL = `${UPSTREAM_ORIGIN}/booking/api/search/itinerary`;

/** Authentication / rate-limit class of response: recover through the browser. */
export const REJECTION_STATUS_CODES: ReadonlySet<number> = new Set([401, 403, 419, 429]);

const DEFAULT_CARRIER = 'AA';

/** Headers the booking page itself sends with the search XHR. */
export function searchHeaders(): Record<string, string> {
  return {
    accept: 'application/json, text/plain, */*',
    'content-type': 'application/json',
    origin: UPSTREAM_ORIGIN,
    referer: BOOKING_URL,
  };
}

// ─── Request ───────────────────────────────────────────────

export function buildSearchPayload(request: SearchRequest, searchType: SearchType) {
  return {
    metadata: {
      selectedProducts: [],
      tripType: 'OneWay',
      udo: { search_method: 'Lowest' },
    },
    passengers: [{ type: 'adult', count: request.passengerCount }],
    requestHeader: { clientId: 'AAcom' },
    slices: [
      {
        allCarriers: true,
        cabin: '',
        departureDate: request.date,
        destination: request.destination.toUpperCase(),
        destinationNearbyAirports: false,
        maxStops: null,
        origin: request.origin.toUpperCase(),
        originNearbyAirports: false,
      },
    ],
    tripOptions: {
      corporateBooking: false,
      fareType: 'Lowest',
      locale: 'en_US',
      pointOfSale: null,
      searchType,
    },
    loyaltyInfo: null,
    version: 'cfr',
    queryParams: {
      sliceIndex: 0,
      sessionId: '',
      solutionSet: '',
      solutionId: '',
      sort: 'CARRIER',
    },
  };
}

export type SearchPayload = ReturnType<typeof buildSearchPayload>;

// ─── Response schemas ──────────────────────────────────────
// Every field falls back to `undefined` instead of failing the whole slice:
// an incomplete slice becomes an offer with missing components, which the
// matcher drops.

const amount = z.union([z.number(), z.string()]).optional().catch(undefined);

const SlicePricingSchema = z.object({
  perPassengerAwardPoints: amount,
  allPassengerDisplayTotal: z.object({ amount }).optional().catch(undefined),
});

const PricedEntrySchema = z.object({
  slicePricing: SlicePricingSchema.optional().catch(undefined),
});

const AwardPricingEntrySchema = z.object({
  regularPrice: PricedEntrySchema.optional().catch(undefined),
});

const SegmentSchema = z.object({
  flight: z
    .object({
      carrierCode: z.string().optional().catch(undefined),
      flightNumber: z.union([z.string(), z.number()]).optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
});

const SliceSchema = z.object({
  hash: z.string().min(1).optional().catch(undefined),
  departureDateTime: z.string().optional().catch(undefined),
  arrivalDateTime: z.string().optional().catch(undefined),
  segments: z.array(z.unknown()).optional().catch(undefined),
  productPricing: z.array(z.unknown()).optional().catch(undefined),
  productGroups: z.record(z.array(z.unknown())).optional().catch(undefined),
});

const SearchResponseSchema = z.object({
  slices: z.array(z.unknown()),
});

type Slice = z.infer<typeof SliceSchema>;

// ─── Response ──────────────────────────────────────────────

/**
 * Parse a search response body into RawOffers priced for the request's
 * cabin bucket. A body that is not JSON or has no `slices` array is not a
 * pricing payload and raises UpstreamUnavailable.
 */
export function parseSearchResponse(
  bodyText: string,
  request: SearchRequest,
  searchType: SearchType,
): RawOffer[] {
  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch (err) {
    throw new UpstreamUnavailable('Unable to parse upstream response body', { cause: err });
  }

  const parsed = SearchResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new UpstreamUnavailable('Upstream response carries no slices');
  }

  const offers: RawOffer[] = [];
  for (const rawSlice of parsed.data.slices) {
    const slice = SliceSchema.safeParse(rawSlice);
    if (!slice.success) continue;
    offers.push(toRawOffer(slice.data, request, searchType));
  }
  return offers;
}

function toRawOffer(slice: Slice, request: SearchRequest, searchType: SearchType): RawOffer {
  const price =
    searchType === 'Award'
      ? awardPrice(slice, request.cabinClass, request.passengerCount)
      : revenuePrice(slice, request.cabinClass);

  return {
    searchType,
    hash: slice.hash,
    flightNumber: flightNumberOf(slice),
    departureAt: slice.departureDateTime,
    arrivalAt: slice.arrivalDateTime,
    productGroup: request.cabinClass,
    price,
  };
}

/** Points are per passenger upstream; taxes are already an all-passenger total. */
function awardPrice(slice: Slice, cabin: CabinClass, passengers: number): PriceComponents {
  const needle = `"${cabin}"`;
  const entry = (slice.productPricing ?? []).find((e) => JSON.stringify(e).includes(needle));
  if (entry === undefined) return {};

  const pricing = AwardPricingEntrySchema.safeParse(entry);
  const slicePricing = pricing.success ? pricing.data.regularPrice?.slicePricing : undefined;
  if (!slicePricing) return {};

  const perPassenger = toNumber(slicePricing.perPassengerAwardPoints);
  return {
    pointsRequired: perPassenger === undefined ? undefined : Math.trunc(perPassenger * passengers),
    taxesFees: toNumber(slicePricing.allPassengerDisplayTotal?.amount),
  };
}

function revenuePrice(slice: Slice, cabin: CabinClass): PriceComponents {
  const first = slice.productGroups?.[cabin]?.[0];
  if (first === undefined) return {};

  const pricing = PricedEntrySchema.safeParse(first);
  if (!pricing.success || !pricing.data.slicePricing) return {};

  return {
    cashAmount: toNumber(pricing.data.slicePricing.allPassengerDisplayTotal?.amount),
  };
}

function flightNumberOf(slice: Slice): string | undefined {
  const first = slice.segments?.[0];
  if (first === undefined) return undefined;

  const segment = SegmentSchema.safeParse(first);
  const flight = segment.success ? segment.data.flight : undefined;
  if (flight?.flightNumber === undefined || flight.flightNumber === '') return undefined;

  return `${flight.carrierCode ?? DEFAULT_CARRIER}${flight.flightNumber}`;
}

function toNumber(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

// ─── Time ──────────────────────────────────────────────────

/**
 * `HH:mm` wall-clock time of an upstream timestamp, keeping its offset
 * ("2025-12-15T08:00:00.000-06:00" → "08:00"). Returns undefined when the
 * value cannot be read.
 */
export function toClockTime(timestamp: string | undefined): string | undefined {
  if (!timestamp) return undefined;

  const iso = DateTime.fromISO(timestamp, { setZone: true });
  if (iso.isValid) return iso.toFormat('HH:mm');

  const plain = DateTime.fromFormat(timestamp, "yyyy-MM-dd'T'HH:mm:ss");
  return plain.isValid ? plain.toFormat('HH:mm') : undefined;
}
