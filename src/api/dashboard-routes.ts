/**
 * Dashboard Routes
 * Read-only views over the snapshot store: tracked models, scored vehicles,
 * market analysis, price history and statistics.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SnapshotStore } from '../database/snapshot-store.js';
import { buildStatistics, marketAnalysis, toVehicle, vehicleScore } from '../reporting/vehicle-analyzer.js';
import { ScoredVehicle } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const limitSchema = z.coerce.number().int().positive().optional();
const filterSchema = z.object({
  make: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

type Handler = (req: Request, res: Response) => Promise<void>;

function withErrors(path: string, handler: Handler): Handler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (error) {
      logger.error(`API error in ${path}`, { error: errorMessage(error) });
      res.status(500).json({ error: errorMessage(error) });
    }
  };
}

export function createDashboardRouter(store: SnapshotStore, now: () => Date = () => new Date()): Router {
  const router = Router();

  /**
   * GET /api/makes-models
   * Tracked make/model pairs with their active listing counts
   */
  router.get(
    '/makes-models',
    withErrors('/api/makes-models', async (_req, res) => {
      res.json(await store.listModels());
    })
  );

  /**
   * GET /api/vehicles/:make/:model
   * Active vehicles of a model, best score first, with the market analysis
   */
  router.get(
    '/vehicles/:make/:model',
    withErrors('/api/vehicles', async (req, res) => {
      const { make, model } = req.params;
      const at = now();

      const listings = await store.listAllActiveListings({ make, model });
      const vehicles = listings.map(listing => toVehicle(listing, at));
      const analysis = marketAnalysis(vehicles);

      const scored: ScoredVehicle[] = vehicles
        .map(vehicle => ({ ...vehicle, score: vehicleScore(vehicle, analysis) }))
        .sort((a, b) => b.score.total_score - a.score.total_score);

      res.json({ vehicles: scored, market_analysis: analysis ?? {} });
    })
  );

  /**
   * GET /api/analysis/:make/:model
   */
  router.get(
    '/analysis/:make/:model',
    withErrors('/api/analysis', async (req, res) => {
      const { make, model } = req.params;
      const at = now();

      const listings = await store.listAllActiveListings({ make, model });
      res.json(marketAnalysis(listings.map(listing => toVehicle(listing, at))) ?? {});
    })
  );

  /**
   * GET /api/price-history/:make/:model?limit=
   */
  router.get(
    '/price-history/:make/:model',
    withErrors('/api/price-history', async (req, res) => {
      const limit = limitSchema.safeParse(req.query.limit);
      if (!limit.success) {
        res.status(400).json({ error: 'limit must be a positive integer' });
        return;
      }

      const { make, model } = req.params;
      res.json(await store.getPriceHistory(make, model, limit.data));
    })
  );

  /**
   * GET /api/stats?make=&model=
   */
  router.get(
    '/stats',
    withErrors('/api/stats', async (req, res) => {
      const filter = filterSchema.safeParse(req.query);
      if (!filter.success) {
        res.status(400).json({ error: 'make and model must be non-empty strings' });
        return;
      }

      const [listings, history] = await Promise.all([
        store.listAllActiveListings(filter.data),
        store.listAllPriceHistory(filter.data),
      ]);
      res.json(buildStatistics(listings, history, now()));
    })
  );

  return router;
}
