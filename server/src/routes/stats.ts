/**
 * Stats route handler - style example counts per contact
 */
import { Router, Request, Response } from 'express';
import type { ErrorResponse, StatsResponse } from '../types/index';
import type { StyleStore } from '../services/style-store';
import { summarizeCounts } from '../services/style-store';
import { LoggerService } from '../services/logger';
import { errorMessage } from '../utils/errors';

export function createStatsRouter(styleStore: StyleStore, logger: LoggerService): Router {
  const router = Router();

  router.get(
    '/',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (_req: Request, res: Response<StatsResponse | ErrorResponse>): Promise<void> => {
      try {
        const stats = summarizeCounts(await styleStore.countByContact());
        res.json({
          total_embeddings: stats.totalEmbeddings,
          contacts: stats.contacts,
          collections: stats.collections,
        });
      } catch (error) {
        logger.error('Failed to read embedding stats', error);
        res.status(500).json({ error: errorMessage(error) });
      }
    }
  );

  return router;
}
