/**
 * offerMatcher.ts — Join Award and Revenue offers on their identity hash and
 * price each pairing in cents per point.
 *
 * Pure: no I/O, no shared state, and the output follows the Award list's
 * order whatever order the Revenue list arrives in. Pairings that lack a
 * hash or any pricing component are left out rather than reported; the
 * upstream omits pricing blocks routinely.
 */

import type { MatchedFlight, RawOffer } from '../core/types';
import { toClockTime } from './itineraryContract';

/** `(cash − taxes) / points × 100`, rounded to 2 decimals. */
export function calculateCpp(cashPrice: number, taxes: number, points: number): number {
  if (points <= 0) {
    throw new RangeError('Points value must be greater than zero to compute CPP.');
  }
  return roundTo2(((cashPrice - taxes) / points) * 100);
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function matchOffers(
  awardOffers: readonly RawOffer[],
  cashOffers: readonly RawOffer[],
): MatchedFlight[] {
  const cashByHash = new Map<string, RawOffer>();
  for (const offer of cashOffers) {
    if (offer.hash && !cashByHash.has(offer.hash)) {
      cashByHash.set(offer.hash, offer);
    }
  }

  const matched: MatchedFlight[] = [];
  for (const award of awardOffers) {
    if (!award.hash) continue;
    const cash = cashByHash.get(award.hash);
    if (!cash) continue;

    const flight = pair(award, cash);
    if (flight) matched.push(flight);
  }
  return matched;
}

function pair(award: RawOffer, cash: RawOffer): MatchedFlight | undefined {
  if (award.productGroup !== cash.productGroup) return undefined;

  const points = award.price.pointsRequired;
  const cashPrice = cash.price.cashAmount;
  const taxes = award.price.taxesFees ?? cash.price.taxesFees;
  if (points === undefined || cashPrice === undefined || taxes === undefined) return undefined;
  if (points <= 0) return undefined;

  const flightNumber = award.flightNumber ?? cash.flightNumber;
  const departureTime = toClockTime(award.departureAt ?? cash.departureAt);
  const arrivalTime = toClockTime(award.arrivalAt ?? cash.arrivalAt);
  if (!flightNumber || !departureTime || !arrivalTime) return undefined;

  const cpp = calculateCpp(cashPrice, taxes, points);
  if (!Number.isFinite(cpp)) return undefined;

  return {
    flightNumber,
    departureTime,
    arrivalTime,
    pointsRequired: points,
    cashPriceUsd: roundTo2(cashPrice),
    taxesFeesUsd: roundTo2(taxes),
    cpp,
  };
}
