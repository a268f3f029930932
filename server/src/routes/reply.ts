/**
 * Reply route handler - generates a reply to an incoming WhatsApp message
 */
import { Router, Request, Response } from 'express';
import type { ErrorResponse, ReplyRequest, ReplyResponse } from '../types/index';
import { ReplyService } from '../services/reply';
import { RateLimiterService } from '../services/rate-limiter';
import { LoggerService } from '../services/logger';
import { ProviderError, errorMessage } from '../utils/errors';

const REQUIRED_FIELDS = ['contact_id', 'contact_name', 'message'] as const;

/**
 * Returns the first missing, non-string or blank field, if any
 */
export function findInvalidField(body: unknown): string | undefined {
  const entries: Array<[string, unknown]> =
    typeof body === 'object' && body !== null ? Object.entries(body) : [];
  const fields = new Map(entries);
  return REQUIRED_FIELDS.find((field) => {
    const value = fields.get(field);
    return typeof value !== 'string' || value.trim() === '';
  });
}

function isReplyRequest(body: unknown): body is ReplyRequest {
  return findInvalidField(body) === undefined;
}

/**
 * Upstream HTTP failures from the model API are 502, anything else 500
 */
export function statusForError(error: unknown): number {
  return error instanceof ProviderError && error.status !== undefined ? 502 : 500;
}

/**
 * Creates Express router for the reply endpoint
 * @param replyService - Reply generation pipeline
 * @param rateLimiter - Rate limiting service
 * @param logger - Logger service for structured logging
 */
export function createReplyRouter(
  replyService: ReplyService,
  rateLimiter: RateLimiterService,
  logger: LoggerService
): Router {
  const router = Router();

  router.post(
    '/',
    // eslint-disable-next-line @typescript-eslint/no-misused-promises
    async (req: Request, res: Response<ReplyResponse | ErrorResponse>): Promise<void> => {
      const body: unknown = req.body;
      if (!isReplyRequest(body)) {
        const field = findInvalidField(body) ?? 'body';
        logger.warn(`Reply request rejected: invalid ${field}`);
        res.status(400).json({ error: `Field '${field}' must be a non-empty string` });
        return;
      }

      const rateLimit = rateLimiter.check();
      if (!rateLimit.allowed) {
        logger.warn(`Request blocked: rate limit reached (${rateLimit.current}/${rateLimit.max})`);
        res.status(429).json({
          error: `Request limit reached. Maximum ${rateLimit.max} requests per window.`,
        });
        return;
      }

      logger.info(
        `Message from ${body.contact_name} (${body.contact_id}) ` +
          `[${rateLimit.current}/${rateLimit.max}]: ${body.message}`
      );

      try {
        const result = await replyService.generate({
          contactId: body.contact_id,
          contactName: body.contact_name,
          message: body.message,
        });
        res.json({
          reply: result.reply,
          rag_examples_used: result.ragExamplesUsed,
          response_time_ms: result.responseTimeMs,
        });
      } catch (error) {
        logger.error('Error occurred during reply request', error);
        const status = statusForError(error);
        res.status(status).json({
          error: status === 502 ? `Model API error: ${errorMessage(error)}` : errorMessage(error),
        });
      }
    }
  );

  return router;
}
