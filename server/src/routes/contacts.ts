/**
 * Contacts route handler - contacts seen in conversation history
 */
import { Router, Request, Response } from 'express';
import type { ContactsResponse, ErrorResponse } from '../types/index';
import { ConversationService } from '../services/conversation';
import { LoggerService } from '../services/logger';
import { errorMessage } from '../utils/errors';

export function createContactsRouter(
  conversation: ConversationService,
  logger: LoggerService
): Router {
  const router = Router();

  router.get(
    '/',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (_req: Request, res: Response<ContactsResponse | ErrorResponse>): Promise<void> => {
      try {
        const contacts = await conversation.listContacts();
        res.json({
          contacts: contacts.map((contact) => ({
            contact_id: contact.contactId,
            contact_name: contact.contactName,
            message_count: contact.messageCount,
          })),
        });
      } catch (error) {
        logger.error('Failed to list contacts', error);
        res.status(500).json({ error: errorMessage(error) });
      }
    }
  );

  return router;
}
