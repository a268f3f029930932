/**
 * Error types shared across the server, CLIs and pipeline
 */

/**
 * Required configuration is missing or invalid
 */
export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.missing = missing;
  }
}

/**
 * An upstream model API answered with an error or an unreadable body
 * `status` holds the upstream HTTP status when there was one
 */
export class ProviderError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ProviderError';
    this.status = status;
  }
}

export class EmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

/**
 * A pairs JSON file could not be read or has the wrong shape
 */
export class PairFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = 'PairFileError';
    this.filePath = filePath;
  }
}

/**
 * Returns a printable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Bad command-line usage or missing input; the CLIs exit 1 on it
 */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}
