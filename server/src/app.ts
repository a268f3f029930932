/**
 * Express application factory - sets up middleware, routes, and services
 */
import express, { Application, NextFunction, Request, Response } from 'express';
import type { AIProvider } from './types/index';
import {
  createContactsRouter,
  createHealthRouter,
  createHistoryRouter,
  createReplyRouter,
  createStatsRouter,
} from './routes/index';
import {
  ConversationService,
  EmbeddingService,
  LoggerService,
  PersonaService,
  PostgresHistoryStore,
  PostgresStyleStore,
  RateLimiterService,
  ReplyService,
  RetrievalService,
  createHttpEmbeddingLoader,
} from './services/index';
import type { SqlClient, StyleStore } from './services/index';
import { getConfiguredProvider } from './providers/index';
import { config, type AppConfig } from './config/index';

/**
 * Container for all application services
 */
export interface AppServices {
  logger: LoggerService;
  provider: AIProvider;
  persona: PersonaService;
  conversation: ConversationService;
  rateLimiter: RateLimiterService;
  replyService: ReplyService;
  styleStore: StyleStore;
}

/**
 * Allows calls from any origin
 */
export function corsMiddleware(req: Request, res: Response, next: NextFunction): void {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  if (req.method === 'OPTIONS') {
    res.status(204).end();
    return;
  }
  next();
}

/**
 * Builds the service graph over a database client
 * @param db - pg Pool (or any SqlClient)
 * @param appConfig - Configuration (defaults to the loaded config)
 * @param logger - Logger service (defaults to one built from appConfig.logging)
 */
export async function createServices(
  db: SqlClient,
  appConfig: AppConfig = config,
  logger: LoggerService = new LoggerService({
    level: appConfig.logging.logLevel,
    timezone: appConfig.logging.timezone,
  })
): Promise<AppServices> {
  const persona = new PersonaService(appConfig.persona.personasDir, logger);
  await persona.loadPersona(appConfig.persona.personaFile);

  const provider = getConfiguredProvider(logger, appConfig.ai);

  const { embedding } = appConfig.rag;
  const embeddings = new EmbeddingService(
    {
      loader: createHttpEmbeddingLoader({ ...embedding, timeout: appConfig.ai.timeout }),
      dimensions: embedding.dimensions,
    },
    logger
  );

  const styleStore = new PostgresStyleStore(db);
  const retrieval = new RetrievalService(embeddings, styleStore, logger, {
    enabled: appConfig.rag.enabled,
    globalContactId: appConfig.rag.globalContactId,
  });
  const conversation = new ConversationService(
    new PostgresHistoryStore(db),
    logger,
    appConfig.history.limit
  );
  const rateLimiter = new RateLimiterService(appConfig.rateLimit);

  const replyService = new ReplyService({
    provider,
    retrieval,
    conversation,
    persona,
    logger,
    topK: appConfig.rag.topK,
  });

  return { logger, provider, persona, conversation, rateLimiter, replyService, styleStore };
}

/**
 * Creates and configures the Express application with routes
 */
export function createApp(services: AppServices): Application {
  const app = express();

  app.use(corsMiddleware);
  app.use(express.json());

  const { logger } = services;
  app.use('/reply', createReplyRouter(services.replyService, services.rateLimiter, logger));
  app.use('/health', createHealthRouter(services.provider));
  app.use('/stats', createStatsRouter(services.styleStore, logger));
  app.use('/contacts', createContactsRouter(services.conversation, logger));
  app.use('/history', createHistoryRouter(services.conversation, logger));

  return app;
}
