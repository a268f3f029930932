/**
 * API request/response type definitions
 */

/**
 * Request body for POST /reply
 */
export interface ReplyRequest {
  contact_id: string;
  contact_name: string;
  message: string;
}

/**
 * Response body for POST /reply
 */
export interface ReplyResponse {
  reply: string;
  rag_examples_used: number;
  response_time_ms: number;
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  provider: string;
  model: string;
}

export interface StatsResponse {
  total_embeddings: number;
  contacts: Record<string, number>;
  collections: number;
}

export interface ContactsResponse {
  contacts: Array<{
    contact_id: string;
    contact_name: string;
    message_count: number;
  }>;
}

export interface ClearHistoryResponse {
  status: 'cleared';
  contact_id: string;
  deleted: number;
}

export interface ErrorResponse {
  error: string;
}

/**
 * Rate limit status information
 */
export interface RateLimitStatus {
  allowed: boolean;
  current: number;
  max: number;
  resetTime: number;
}
