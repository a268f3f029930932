/**
 * Ingest CLI - embeds trigger/reply pairs files into the style example store
 *
 * Usage:
 *   tsx server/src/cli/ingest.ts --chat chats/priya.json [--contact priya]
 *   tsx server/src/cli/ingest.ts --all-chats chats/ [--global-style]
 *   tsx server/src/cli/ingest.ts --stats
 *   tsx server/src/cli/ingest.ts --clear priya
 */
import path from 'path';
import { existsSync } from 'fs';
import { readdir } from 'fs/promises';
import { parseArgs } from 'util';
import type { StyleExampleRow, TriggerReplyPair } from '../types/index';
import { config } from '../config/index';
import { readPairFile } from '../pipeline/pair-file';
import { createPool } from '../services/database';
import { EmbeddingService, createHttpEmbeddingLoader } from '../services/embedding';
import { PostgresHistoryStore, type HistoryStore } from '../services/history-store';
import { LoggerService } from '../services/logger';
import { PostgresStyleStore, summarizeCounts, type StyleStore } from '../services/style-store';
import { CliError, ConfigError, errorMessage } from '../utils/errors';
import { isMainModule } from '../utils/is-main';

/**
 * Largest number of pairs sampled into the global collection
 */
export const GLOBAL_SAMPLE_SIZE = 200;

export type IngestCommand =
  | { kind: 'chat'; file: string; contactId: string }
  | { kind: 'all-chats'; dir: string; globalStyle: boolean }
  | { kind: 'stats' }
  | { kind: 'clear'; contactId: string };

const USAGE =
  'Usage: ingest (--chat <file> [--contact <id>] | --all-chats <dir> [--global-style] | --stats | --clear <contactId>)';

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        chat: { type: 'string' },
        contact: { type: 'string' },
        'all-chats': { type: 'string' },
        'global-style': { type: 'boolean', default: false },
        stats: { type: 'boolean', default: false },
        clear: { type: 'string' },
      },
    });
  } catch (error) {
    throw new CliError(`${errorMessage(error)}\n${USAGE}`);
  }
}

/**
 * Exactly one of --chat, --all-chats, --stats, --clear must be given
 */
export function parseIngestArgs(argv: string[]): IngestCommand {
  const { values } = readArgs(argv);
  const allChats = values['all-chats'];

  const chosen = [
    values.chat !== undefined,
    allChats !== undefined,
    values.stats === true,
    values.clear !== undefined,
  ];
  if (chosen.filter(Boolean).length !== 1) {
    throw new CliError(USAGE);
  }

  if (values.chat !== undefined) {
    return {
      kind: 'chat',
      file: values.chat,
      contactId: values.contact ?? path.parse(values.chat).name,
    };
  }
  if (allChats !== undefined) {
    return { kind: 'all-chats', dir: allChats, globalStyle: values['global-style'] === true };
  }
  if (values.clear !== undefined) {
    return { kind: 'clear', contactId: values.clear };
  }
  return { kind: 'stats' };
}

/**
 * Uniform sample without replacement (partial Fisher-Yates), input untouched
 * @param random - Source of numbers in [0, 1)
 */
export function samplePairs<T>(items: readonly T[], size: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  const count = Math.min(size, pool.length);
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

export interface IngesterDeps {
  embeddings: EmbeddingService;
  styleStore: StyleStore;
  historyStore: HistoryStore;
  globalContactId: string;
  print?: (line: string) => void;
  random?: () => number;
}

/**
 * Runs one ingest command against the stores
 */
export class Ingester {
  private readonly deps: IngesterDeps;
  private readonly print: (line: string) => void;

  constructor(deps: IngesterDeps) {
    this.deps = deps;
    this.print = deps.print ?? console.log;
  }

  async run(command: IngestCommand): Promise<void> {
    switch (command.kind) {
      case 'chat':
        await this.ingestFile(command.file, command.contactId);
        return;
      case 'all-chats':
        await this.ingestDirectory(command.dir, command.globalStyle);
        return;
      case 'stats':
        await this.showStats();
        return;
      case 'clear':
        await this.clearContact(command.contactId);
        return;
    }
  }

  /**
   * Embeds trigger texts and stores each pair under the contact
   * @returns Rows inserted
   */
  async ingestPairs(pairs: readonly TriggerReplyPair[], contactId: string): Promise<number> {
    if (pairs.length === 0) {
      this.print(`No pairs to ingest for '${contactId}'`);
      return 0;
    }

    this.print(`Embedding ${pairs.length} triggers for '${contactId}'`);
    const vectors = await this.deps.embeddings.embedBatch(
      pairs.map((pair) => pair.trigger),
      undefined,
      (done, total) => this.print(`  Embedded ${done}/${total}`)
    );

    const rows: StyleExampleRow[] = pairs.map((pair, i) => ({
      contactId,
      triggerText: pair.trigger,
      replyText: pair.reply,
      embedding: vectors[i],
    }));

    const inserted = await this.deps.styleStore.insert(rows, (done, total) =>
      this.print(`  Inserted ${done}/${total}`)
    );
    this.print(`Done: ${inserted} examples ingested for '${contactId}'`);
    return inserted;
  }

  async ingestFile(filePath: string, contactId: string): Promise<number> {
    if (!existsSync(filePath)) {
      throw new CliError(`File not found: ${filePath}`);
    }
    this.print(`Ingesting ${path.basename(filePath)} -> contact '${contactId}'`);
    return this.ingestPairs(await readPairFile(filePath), contactId);
  }

  /**
   * Ingests every *.json file in the directory under its file stem
   * @param globalStyle - Also ingest a random sample across all files under the global contact
   */
  async ingestDirectory(dir: string, globalStyle: boolean): Promise<void> {
    if (!existsSync(dir)) {
      throw new CliError(`Directory not found: ${dir}`);
    }

    const files = (await readdir(dir)).filter((name) => name.endsWith('.json')).sort();
    if (files.length === 0) {
      throw new CliError(`No .json files found in ${dir}. Run the convert CLI first.`);
    }
    this.print(`Found ${files.length} pair files in ${dir}`);

    const allPairs: TriggerReplyPair[] = [];
    for (const file of files) {
      const filePath = path.join(dir, file);
      const pairs = await readPairFile(filePath);
      this.print(`Ingesting ${file} -> contact '${path.parse(file).name}'`);
      await this.ingestPairs(pairs, path.parse(file).name);
      allPairs.push(...pairs);
    }

    if (globalStyle && allPairs.length > 0) {
      const sample = samplePairs(allPairs, GLOBAL_SAMPLE_SIZE, this.deps.random);
      this.print(`Building '${this.deps.globalContactId}' collection from ${sample.length} sampled pairs`);
      await this.ingestPairs(sample, this.deps.globalContactId);
    }
  }

  async showStats(): Promise<void> {
    const stats = summarizeCounts(await this.deps.styleStore.countByContact());
    this.print('Embedding statistics:');
    if (stats.collections === 0) {
      this.print('  (no data yet, ingest with --chat or --all-chats first)');
    }
    for (const [contactId, count] of Object.entries(stats.contacts)) {
      this.print(`  ${contactId.padEnd(20)} ${String(count).padStart(5)} examples`);
    }
    this.print(`Total: ${stats.totalEmbeddings} embeddings across ${stats.collections} collections`);

    const history = await this.deps.historyStore.countByContact();
    const historyEntries = Object.entries(history);
    this.print('Conversation history:');
    if (historyEntries.length === 0) {
      this.print('  (empty)');
    }
    for (const [contactId, count] of historyEntries) {
      this.print(`  ${contactId.padEnd(20)} ${String(count).padStart(5)} messages`);
    }
  }

  async clearContact(contactId: string): Promise<number> {
    const deleted = await this.deps.styleStore.clear(contactId);
    this.print(`Cleared ${deleted} embeddings for contact '${contactId}'`);
    return deleted;
  }
}

async function main(): Promise<void> {
  const logger = new LoggerService();

  let command: IngestCommand;
  try {
    command = parseIngestArgs(process.argv.slice(2));
    if (!config.database.url) {
      throw new ConfigError('Missing required configuration: DATABASE_URL', ['DATABASE_URL']);
    }
  } catch (error) {
    logger.error(errorMessage(error));
    process.exitCode = 1;
    return;
  }

  const pool = createPool(config.database.url);
  const { embedding } = config.rag;
  const ingester = new Ingester({
    embeddings: new EmbeddingService(
      {
        loader: createHttpEmbeddingLoader({ ...embedding, timeout: config.ai.timeout }),
        dimensions: embedding.dimensions,
      },
      logger
    ),
    styleStore: new PostgresStyleStore(pool),
    historyStore: new PostgresHistoryStore(pool),
    globalContactId: config.rag.globalContactId,
  });

  try {
    await ingester.run(command);
  } catch (error) {
    logger.error('Ingest failed', error instanceof CliError ? error.message : error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

if (isMainModule(import.meta.url)) {
  main().catch((error: unknown) => {
    new LoggerService().error('Ingest failed', error);
    process.exitCode = 1;
  });
}
