/**
 * Discharge API Routes
 * Read-only REST access to the discharge log
 */

import { Router } from 'express';
import type { ApiError } from '../../shared/types.js';
import type { DischargeLogStore } from '../db/DischargeLogStoreSqlite.js';

export type DischargeLogReader = Pick<DischargeLogStore, 'listDischarges' | 'getDischarge'>;

const MAX_LIMIT = 1000;

export function createDischargeRoutes(store: DischargeLogReader): Router {
  const router = Router();

  // GET /api/discharges?registration=AB12CDE&limit=50 - Recent discharges
  router.get('/', async (req, res) => {
    const registration = typeof req.query.registration === 'string' ? req.query.registration : undefined;
    const rawLimit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : 100;
    if (!Number.isInteger(rawLimit) || rawLimit <= 0) {
      const error: ApiError = { error: 'INVALID_LIMIT', message: 'limit must be a positive integer' };
      return res.status(400).json(error);
    }

    const result = await store.listDischarges({ registration, limit: Math.min(rawLimit, MAX_LIMIT) });
    if (!result.ok) {
      const error: ApiError = { error: 'QUERY_FAILED', message: result.error.message };
      return res.status(500).json(error);
    }
    res.json({ discharges: result.value });
  });

  // GET /api/discharges/:id - Discharge record, step timeline and data points
  router.get('/:id', async (req, res) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id) || id <= 0) {
      const error: ApiError = { error: 'INVALID_ID', message: 'id must be a positive integer' };
      return res.status(400).json(error);
    }

    const result = await store.getDischarge(id);
    if (!result.ok) {
      const error: ApiError = { error: 'QUERY_FAILED', message: result.error.message };
      return res.status(500).json(error);
    }
    if (!result.value) {
      const error: ApiError = { error: 'NOT_FOUND', message: 'Discharge not found' };
      return res.status(404).json(error);
    }
    res.json(result.value);
  });

  return router;
}
