/**
 * History route handler - clears a contact's conversation history
 */
import { Router, Request, Response } from 'express';
import type { ClearHistoryResponse, ErrorResponse } from '../types/index';
import { ConversationService } from '../services/conversation';
import { LoggerService } from '../services/logger';
import { errorMessage } from '../utils/errors';

export function createHistoryRouter(
  conversation: ConversationService,
  logger: LoggerService
): Router {
  const router = Router();

  router.delete(
    '/:contactId',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (
      req: Request<{ contactId: string }>,
      res: Response<ClearHistoryResponse | ErrorResponse>
    ): Promise<void> => {
      const { contactId } = req.params;
      try {
        const deleted = await conversation.clear(contactId);
        res.json({ status: 'cleared', contact_id: contactId, deleted });
      } catch (error) {
        logger.error(`Failed to clear history for '${contactId}'`, error);
        res.status(500).json({ error: errorMessage(error) });
      }
    }
  );

  return router;
}
