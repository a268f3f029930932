/**
 * Convert CLI - turns a WhatsApp .txt export into a trigger/reply pairs JSON file
 *
 * Usage:
 *   tsx server/src/cli/convert.ts chats/priya.txt --owner "Rahul" --preview 5
 */
import path from 'path';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { convertExport, summarizePairs } from '../pipeline/convert';
import { defaultNoiseFilter, type NoiseFilter } from '../pipeline/noise-filter';
import { writePairFile } from '../pipeline/pair-file';
import { LoggerService } from '../services/logger';
import { CliError, errorMessage } from '../utils/errors';
import { isMainModule } from '../utils/is-main';

export const DEFAULT_OWNER = '~';

export interface ConvertOptions {
  input: string;
  owner: string;
  output: string;
  preview: number;
}

/**
 * Input path with its extension replaced by .json
 */
export function defaultOutputPath(input: string): string {
  const parsed = path.parse(input);
  return path.join(parsed.dir, `${parsed.name}.json`);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        owner: { type: 'string' },
        output: { type: 'string' },
        preview: { type: 'string' },
      },
    });
  } catch (error) {
    throw new CliError(errorMessage(error));
  }
}

export function parseConvertArgs(argv: string[]): ConvertOptions {
  const parsed = readArgs(argv);

  const [input, ...extra] = parsed.positionals;
  if (!input || extra.length > 0) {
    throw new CliError('Usage: convert <chat.txt> [--owner <name>] [--output <file>] [--preview N]');
  }

  const preview = parsed.values.preview === undefined ? 0 : Number(parsed.values.preview);
  if (!Number.isInteger(preview) || preview < 0) {
    throw new CliError(`--preview must be a non-negative integer, got '${parsed.values.preview}'`);
  }

  return {
    input,
    owner: parsed.values.owner ?? DEFAULT_OWNER,
    output: parsed.values.output ?? defaultOutputPath(input),
    preview,
  };
}

/**
 * Runs the conversion and prints a report
 * @returns Process exit code
 */
export async function runConvert(
  options: ConvertOptions,
  filter: NoiseFilter,
  print: (line: string) => void = console.log
): Promise<number> {
  if (!existsSync(options.input)) {
    print(`Error: File not found: ${options.input}`);
    return 1;
  }

  print(`Reading: ${options.input}`);
  const text = await readFile(options.input, 'utf-8');
  const { pairs, counts } = convertExport(text, options.owner, filter);

  print(`  Raw messages parsed: ${counts.rawMessages}`);
  print(`  After filtering system/media: ${counts.afterFilter}`);
  print(`  After merging consecutive: ${counts.turns}`);
  print(`  Trigger -> reply pairs: ${counts.pairs}`);

  if (pairs.length === 0) {
    print('No trigger -> reply pairs found. Check:');
    print(`  - Is '${options.owner}' your sender name exactly as it appears in the export?`);
    print('  - Is the file a standard WhatsApp "Export chat" .txt file?');
    return 1;
  }

  await writePairFile(options.output, pairs);
  print(`Saved ${pairs.length} pairs to: ${options.output}`);

  if (options.preview > 0) {
    print(`Preview (first ${options.preview} pairs):`);
    pairs.slice(0, options.preview).forEach((pair, i) => {
      print(`  [${i + 1}] They said:`);
      pair.trigger.split('\n').forEach((line) => print(`      > ${line}`));
      print(`  [${i + 1}] You replied:`);
      pair.reply.split('\n').forEach((line) => print(`      < ${line}`));
    });
  }

  const summary = summarizePairs(pairs);
  print(`Total pairs: ${summary.total}`);
  print(`Avg trigger length: ${summary.averageTriggerLength} chars`);
  print(`Avg reply length: ${summary.averageReplyLength} chars`);
  return 0;
}

async function main(): Promise<void> {
  const logger = new LoggerService();
  try {
    const options = parseConvertArgs(process.argv.slice(2));
    process.exitCode = await runConvert(options, defaultNoiseFilter());
  } catch (error) {
    logger.error('Conversion failed', error instanceof CliError ? error.message : error);
    process.exitCode = 1;
  }
}

if (isMainModule(import.meta.url)) {
  void main();
}
