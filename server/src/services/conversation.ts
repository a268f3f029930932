/**
 * Conversation service - per-contact history window over the history store
 */
import type { ContactSummary, ConversationTurn, HistoryEntry } from '../types/index';
import type { HistoryStore } from './history-store';
import { LoggerService } from './logger';

/**
 * Reads and appends per-contact history
 * Reads and writes on the reply path degrade to empty/no-op on store failure
 */
export class ConversationService {
  private readonly store: HistoryStore;
  private readonly logger: LoggerService;
  private readonly historyLimit: number;

  constructor(store: HistoryStore, logger: LoggerService, historyLimit: number) {
    this.store = store;
    this.logger = logger;
    this.historyLimit = historyLimit;
  }

  /**
   * Recent history for a contact, oldest first
   */
  async getRecent(contactId: string, limit: number = this.historyLimit): Promise<ConversationTurn[]> {
    try {
      const newestFirst = await this.store.recent(contactId, limit);
      return [...newestFirst].reverse();
    } catch (error) {
      this.logger.error(`History fetch failed for '${contactId}'`, error);
      return [];
    }
  }

  /**
   * Appends a message; failures are logged and swallowed
   */
  async record(entry: HistoryEntry): Promise<void> {
    try {
      await this.store.append(entry);
      this.logger.debug(`Saved ${entry.role} message for '${entry.contactId}'`);
    } catch (error) {
      this.logger.error(`History save failed for '${entry.contactId}'`, error);
    }
  }

  listContacts(): Promise<ContactSummary[]> {
    return this.store.listContacts();
  }

  /**
   * Deletes a contact's history
   * @returns Number of rows removed
   */
  async clear(contactId: string): Promise<number> {
    const deleted = await this.store.clear(contactId);
    this.logger.info(`Cleared ${deleted} history messages for '${contactId}'`);
    return deleted;
  }
}
