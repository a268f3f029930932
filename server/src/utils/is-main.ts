import path from 'path';
import { pathToFileURL } from 'url';

/**
 * True when the module with this import.meta.url is the process entry point
 */
export function isMainModule(metaUrl: string, argv: readonly string[] = process.argv): boolean {
  const entry = argv[1];
  if (!entry) {
    return false;
  }
  return pathToFileURL(path.resolve(entry)).href === metaUrl;
}
