/**
 * server.ts — HTTP surface: a readiness probe and the flight comparison
 * endpoint. Responses use snake_case keys.
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from 'express';
import { z } from 'zod';
import { Logger } from './core/logger';
import { ComparerError, describeError } from './core/errors';
import type { AwardComparer } from './awardComparer';
import type { ComparisonResult, MatchedFlight } from './core/types';

const logger = new Logger('Server');

export interface ServerDeps {
  comparer: Pick<AwardComparer, 'compare'>;
  pool: { isReady(): boolean };
}

const flightsQuerySchema = z.object({
  origin: z.string().min(1),
  destination: z.string().min(1),
  date: z.string().min(1),
  passengers: z.coerce.number().int().min(1).max(9).default(1),
  cabin_class: z.string().min(1).default('main'),
});

export function createServer({ comparer, pool }: ServerDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get('/health', (_req, res) => {
    if (pool.isReady()) {
      res.json({ status: 'ok' });
    } else {
      res.status(503).json({ status: 'unavailable' });
    }
  });

  app.get('/flights', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = flightsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ detail: formatIssues(parsed.error) });
      return;
    }

    const query = parsed.data;
    try {
      const result = await comparer.compare({
        origin: query.origin,
        destination: query.destination,
        date: query.date,
        passengers: query.passengers,
        cabinClass: query.cabin_class,
      });
      res.json(toResponseBody(result));
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler);
  return app;
}

// ─── Errors ─────────────────────────────────────────────────

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof ComparerError) {
    const status = err.kind === 'client' ? 400 : 502;
    if (status === 502) {
      logger.warn(`${req.method} ${req.path} → 502 (${err.name}: ${err.message})`);
    }
    res.status(status).json({ detail: err.message });
    return;
  }

  logger.error(`${req.method} ${req.path} → 500: ${describeError(err)}`, err);
  res.status(500).json({ detail: 'Internal server error' });
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`)
    .join('; ');
}

// ─── Serialization ──────────────────────────────────────────

function toResponseBody(result: ComparisonResult) {
  return {
    search_metadata: {
      origin: result.searchMetadata.origin,
      destination: result.searchMetadata.destination,
      date: result.searchMetadata.date,
      passengers: result.searchMetadata.passengers,
      cabin_class: result.searchMetadata.cabinClass,
    },
    flights: result.flights.map(toFlightBody),
    total_results: result.totalResults,
  };
}

function toFlightBody(flight: MatchedFlight) {
  return {
    flight_number: flight.flightNumber,
    departure_time: flight.departureTime,
    arrival_time: flight.arrivalTime,
    points_required: flight.pointsRequired,
    cash_price_usd: flight.cashPriceUsd,
    taxes_fees_usd: flight.taxesFeesUsd,
    cpp: flight.cpp,
  };
}
