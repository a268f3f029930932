/**
 * Retrieval type definitions
 */

/**
 * Historical pair returned by similarity search, most similar first
 */
export interface StyleExample {
  triggerText: string;
  replyText: string;
  similarity: number;
}

/**
 * Row written to the style example table
 */
export interface StyleExampleRow {
  contactId: string;
  triggerText: string;
  replyText: string;
  embedding: number[];
}

/**
 * Number of stored style examples per contact
 */
export interface EmbeddingStats {
  totalEmbeddings: number;
  contacts: Record<string, number>;
  collections: number;
}
