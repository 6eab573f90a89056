import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { AwardComparer, buildSearchRequest, type SearchExecutor } from './awardComparer';
import { RequestDispatcher } from './agents/requestDispatcher';
import { SessionPool } from './agents/sessionPool';
import {
  UnsupportedCabinClass,
  UpstreamRejected,
  UpstreamUnavailable,
  ValidationError,
} from './core/errors';
import { Logger } from './core/logger';
import type { RawOffer, SearchRequest, SearchType } from './core/types';
import {
  deferred,
  FakeBrowser,
  FakeSyntheticClient,
  fixedFingerprint,
  poolConfig,
  searchBody,
  searchTypeOf,
} from './testing/fakes';

beforeAll(() => {
  Logger.setLevel('error');
});

const awardOffer: RawOffer = {
  searchType: 'Award',
  hash: 'slice-1',
  flightNumber: 'AA123',
  departureAt: '2025-12-15T08:00:00.000-06:00',
  arrivalAt: '2025-12-15T16:30:00.000-05:00',
  productGroup: 'MAIN',
  price: { pointsRequired: 12500, taxesFees: 5.6 },
};

const cashOffer: RawOffer = {
  ...awardOffer,
  searchType: 'Revenue',
  price: { cashAmount: 289 },
};

function fakeExecutor(
  impl: (request: SearchRequest, searchType: SearchType) => Promise<RawOffer[]>,
) {
  const execute = vi.fn(impl);
  const executor: SearchExecutor = { execute };
  return { execute, executor };
}

describe('buildSearchRequest', () => {
  it('normalizes codes and cabin and defaults the passenger count', () => {
    expect(
      buildSearchRequest({
        origin: ' dfw',
        destination: 'lax',
        date: '2025-12-15',
        cabinClass: 'premium_economy',
      }),
    ).toEqual({
      origin: 'DFW',
      destination: 'LAX',
      date: '2025-12-15',
      passengerCount: 1,
      cabinClass: 'PREMIUM_ECONOMY',
    });
  });

  it('defaults the cabin to MAIN', () => {
    const request = buildSearchRequest({ origin: 'DFW', destination: 'LAX', date: '2025-12-15' });
    expect(request.cabinClass).toBe('MAIN');
  });

  it('freezes the request', () => {
    const request = buildSearchRequest({ origin: 'DFW', destination: 'LAX', date: '2025-12-15' });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it.each([
    [{ origin: 'DF', destination: 'LAX', date: '2025-12-15' }, 'Invalid origin airport code: DF'],
    [{ origin: 'DFW', destination: 'L4X', date: '2025-12-15' }, 'Invalid destination airport code: L4X'],
    [{ origin: 'DFW', destination: 'dfw', date: '2025-12-15' }, 'Origin and destination must differ'],
    [{ origin: 'DFW', destination: 'LAX', date: '2025-02-30' }, 'Invalid date: 2025-02-30. Expected YYYY-MM-DD'],
    [{ origin: 'DFW', destination: 'LAX', date: '12/15/2025' }, 'Invalid date: 12/15/2025. Expected YYYY-MM-DD'],
    [
      { origin: 'DFW', destination: 'LAX', date: '2025-12-15', passengers: 0 },
      'Invalid passenger count: 0. Must be between 1 and 9',
    ],
    [
      { origin: 'DFW', destination: 'LAX', date: '2025-12-15', passengers: 10 },
      'Invalid passenger count: 10. Must be between 1 and 9',
    ],
  ])('rejects %o', (input, message) => {
    expect(() => buildSearchRequest(input)).toThrow(new ValidationError(message));
  });

  it('rejects an unsupported cabin class', () => {
    const call = () =>
      buildSearchRequest({ origin: 'DFW', destination: 'LAX', date: '2025-12-15', cabinClass: 'first' });

    expect(call).toThrow(UnsupportedCabinClass);
    expect(call).toThrow('Invalid cabin class: first. Must be one of MAIN, PREMIUM_ECONOMY');
  });
});

describe('AwardComparer', () => {
  it('validates before making any upstream call', async () => {
    const { execute, executor } = fakeExecutor(async () => []);
    const comparer = new AwardComparer(executor);

    await expect(
      comparer.compare({ origin: 'DFW', destination: 'LAX', date: '2025-12-15', cabinClass: 'first' }),
    ).rejects.toBeInstanceOf(UnsupportedCabinClass);
    expect(execute).not.toHaveBeenCalled();
  });

  it('runs both searches and reports matched flights', async () => {
    const { execute, executor } = fakeExecutor(async (_request, searchType) =>
      searchType === 'Award' ? [awardOffer] : [cashOffer],
    );
    const comparer = new AwardComparer(executor);

    const result = await comparer.compare({
      origin: 'dfw',
      destination: 'lax',
      date: '2025-12-15',
      passengers: 1,
      cabinClass: 'main',
    });

    expect(execute).toHaveBeenCalledTimes(2);
    expect(execute.mock.calls.map(([, searchType]) => searchType)).toEqual(['Award', 'Revenue']);
    expect(result).toEqual({
      searchMetadata: {
        origin: 'DFW',
        destination: 'LAX',
        date: '2025-12-15',
        passengers: 1,
        cabinClass: 'MAIN',
      },
      flights: [
        {
          flightNumber: 'AA123',
          departureTime: '08:00',
          arrivalTime: '16:30',
          pointsRequired: 12500,
          cashPriceUsd: 289,
          taxesFeesUsd: 5.6,
          cpp: 2.27,
        },
      ],
      totalResults: 1,
    });
  });

  it('returns an empty result when nothing matches', async () => {
    const { executor } = fakeExecutor(async (_request, searchType) =>
      searchType === 'Award' ? [awardOffer] : [{ ...cashOffer, hash: 'other' }],
    );

    const result = await new AwardComparer(executor).compare({
      origin: 'DFW',
      destination: 'LAX',
      date: '2025-12-15',
    });

    expect(result.flights).toEqual([]);
    expect(result.totalResults).toBe(0);
  });

  it('surfaces the award error when both searches fail', async () => {
    const awardError = new UpstreamUnavailable('award down');
    const { execute, executor } = fakeExecutor(async (_request, searchType) => {
      throw searchType === 'Award' ? awardError : new UpstreamUnavailable('revenue down');
    });

    await expect(
      new AwardComparer(executor).compare({ origin: 'DFW', destination: 'LAX', date: '2025-12-15' }),
    ).rejects.toBe(awardError);
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('surfaces the revenue error when only the revenue search fails', async () => {
    const revenueError = new UpstreamUnavailable('revenue down');
    const { executor } = fakeExecutor(async (_request, searchType) => {
      if (searchType === 'Revenue') throw revenueError;
      return [awardOffer];
    });

    await expect(
      new AwardComparer(executor).compare({ origin: 'DFW', destination: 'LAX', date: '2025-12-15' }),
    ).rejects.toBe(revenueError);
  });
});

describe('AwardComparer with the dispatcher and pool', () => {
  let pool: SessionPool | undefined;

  afterEach(async () => {
    await pool?.close();
    pool = undefined;
  });

  it('compares through pooled sessions, recovering a rejected fast path', async () => {
    const browser = new FakeBrowser();
    browser.respondInPage = (request) => ({ status: 200, body: searchBody(searchTypeOf(request)) });
    browser.cookiesFor = (session) => [{ name: 'sid', value: session.id, domain: '.aa.com', path: '/' }];
    const created = new SessionPool({
      browser,
      config: poolConfig({ capacity: 2 }),
      pickFingerprint: fixedFingerprint,
    });
    pool = created;
    await created.start();

    // Neither fast request answers until both are in flight.
    const bothSent = deferred();
    // Award searches are challenged on the fast path; Revenue goes straight through.
    const client = new FakeSyntheticClient(async (request) => {
      if (client.requests.length === 2) bothSent.resolve();
      await bothSent.promise;
      return searchTypeOf(request) === 'Award'
        ? { kind: 'rejected', statusCode: 403, reason: 'HTTP 403' }
        : { kind: 'ok', statusCode: 200, body: searchBody('Revenue') };
    });
    const dispatcher = new RequestDispatcher({
      pool: created,
      syntheticClient: client,
      browser,
      deadlineMs: 5_000,
    });

    const result = await new AwardComparer(dispatcher).compare({
      origin: 'DFW',
      destination: 'LAX',
      date: '2025-12-15',
    });

    expect(result.flights).toEqual([
      {
        flightNumber: 'AA123',
        departureTime: '08:00',
        arrivalTime: '09:45',
        pointsRequired: 12500,
        cashPriceUsd: 289,
        taxesFeesUsd: 5.6,
        cpp: 2.27,
      },
    ]);
    expect(client.requests).toHaveLength(2);
    const sessionOf = (type: SearchType) =>
      client.requests.find((request) => searchTypeOf(request) === type)?.cookies[0]?.value;
    expect([sessionOf('Award'), sessionOf('Revenue')].sort()).toEqual(['page-1', 'page-2']);

    expect(browser.inPageCalls).toHaveLength(1);
    expect(browser.inPageCalls[0].session.id).toBe(sessionOf('Award'));
    expect(created.stats()).toMatchObject({ ready: 2, busy: 0, degraded: 0 });
  });

  it('reports an unrecoverable rejection as UpstreamUnavailable', async () => {
    const browser = new FakeBrowser();
    browser.respondInPage = () => ({ status: 403, body: 'blocked' });
    const created = new SessionPool({
      browser,
      config: poolConfig({ capacity: 2 }),
      pickFingerprint: fixedFingerprint,
    });
    pool = created;
    await created.start();

    const client = new FakeSyntheticClient(() => ({
      kind: 'rejected',
      statusCode: 403,
      reason: 'HTTP 403',
    }));
    const dispatcher = new RequestDispatcher({
      pool: created,
      syntheticClient: client,
      browser,
      deadlineMs: 5_000,
    });

    const error = await new AwardComparer(dispatcher)
      .compare({ origin: 'DFW', destination: 'LAX', date: '2025-12-15' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamUnavailable);
    expect(error).toHaveProperty('cause', expect.any(UpstreamRejected));
  });
});
