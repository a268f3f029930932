export { RateLimiterService } from './rate-limiter';
export { LoggerService } from './logger';
export { ConversationService } from './conversation';
export { PersonaService } from './persona';
export { EmbeddingService, createHttpEmbeddingLoader } from './embedding';
export { RetrievalService } from './retrieval';
export { ReplyService } from './reply';
export { PostgresStyleStore, summarizeCounts } from './style-store';
export { PostgresHistoryStore } from './history-store';
export { createPool } from './database';
export type { StyleStore } from './style-store';
export type { HistoryStore } from './history-store';
export type { SqlClient } from './database';
