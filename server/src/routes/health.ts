/**
 * Health route handler
 */
import { Router, Request, Response } from 'express';
import type { AIProvider, HealthResponse } from '../types/index';

export function createHealthRouter(provider: AIProvider): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response<HealthResponse>): void => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      provider: provider.name,
      model: provider.model,
    });
  });

  return router;
}
