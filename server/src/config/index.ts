/**
 * Application configuration - loads environment variables and provides type-safe config
 * Supports .env and key.env files (key.env overrides .env)
 */
import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import type { ProviderType } from '../types/index';
import { ConfigError } from '../utils/errors';

/**
 * Directory holding personas/, data/ and sql/
 */
export const SERVER_ROOT = fileURLToPath(new URL('../..', import.meta.url));

dotenv.config({ path: path.join(process.cwd(), '.env') });
dotenv.config({ path: path.join(process.cwd(), 'key.env'), override: true });

type Env = Record<string, string | undefined>;

/**
 * Parses string to number, returns default if invalid
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

/**
 * Parses boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Validates and parses provider type from environment variable
 */
function parseProviderType(value: string | undefined): ProviderType {
  if (value === 'groq' || value === 'ollama') {
    return value;
  }
  return 'groq';
}

/**
 * Type-safe application configuration structure
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  ai: {
    provider: ProviderType;
    maxTokens: number;
    temperature: number;
    topP: number;
    timeout: number;
    groq: {
      apiKey: string;
      model: string;
    };
    ollama: {
      baseUrl: string;
      model: string;
    };
  };
  database: {
    url: string;
  };
  rag: {
    enabled: boolean;
    topK: number;
    globalContactId: string;
    embedding: {
      baseUrl: string;
      apiKey: string;
      model: string;
      dimensions: number;
    };
  };
  history: {
    limit: number;
  };
  persona: {
    personaFile: string;
    personasDir: string;
  };
  filters: {
    noisePatternsFile: string;
  };
  rateLimit: {
    maxRequests: number;
    windowMs: number;
  };
  logging: {
    logLevel: string;
    timezone: string;
  };
}

/**
 * Builds the configuration from an environment map
 * @param env - Variables to read (defaults to process.env)
 */
export function buildConfig(env: Env = process.env): AppConfig {
  const optionalEnv = (key: string, defaultValue: string): string => {
    const value = env[key];
    return value !== undefined && value.trim() !== '' ? value : defaultValue;
  };

  return {
    server: {
      port: parseNumber(env.PORT, 8000),
      host: optionalEnv('HOST', '0.0.0.0'),
      nodeEnv: optionalEnv('NODE_ENV', 'development'),
    },
    ai: {
      provider: parseProviderType(env.AI_PROVIDER),
      maxTokens: parseNumber(env.AI_MAX_TOKENS, 256),
      temperature: parseNumber(env.AI_TEMPERATURE, 0.75),
      topP: parseNumber(env.AI_TOP_P, 0.9),
      timeout: parseNumber(env.AI_TIMEOUT_MS, 30000),
      groq: {
        apiKey: optionalEnv('GROQ_API_KEY', ''),
        model: optionalEnv('GROQ_MODEL', 'llama-3.3-70b-versatile'),
      },
      ollama: {
        baseUrl: optionalEnv('OLLAMA_BASE_URL', 'http://localhost:11434/v1'),
        model: optionalEnv('OLLAMA_MODEL', 'llama3.1'),
      },
    },
    database: {
      url: optionalEnv('DATABASE_URL', ''),
    },
    rag: {
      enabled: !parseBoolean(env.DISABLE_RAG, false),
      topK: parseNumber(env.RAG_TOP_K, 8),
      globalContactId: optionalEnv('RAG_GLOBAL_CONTACT_ID', 'global'),
      embedding: {
        baseUrl: optionalEnv('EMBEDDING_BASE_URL', 'http://localhost:11434/v1'),
        apiKey: optionalEnv('EMBEDDING_API_KEY', ''),
        model: optionalEnv('EMBEDDING_MODEL', 'all-minilm'),
        dimensions: parseNumber(env.EMBEDDING_DIMENSIONS, 384),
      },
    },
    history: {
      limit: parseNumber(env.HISTORY_LIMIT, 10),
    },
    persona: {
      personaFile: optionalEnv('PERSONA_FILE', 'default.md'),
      personasDir: optionalEnv('PERSONAS_DIR', path.join(SERVER_ROOT, 'personas')),
    },
    filters: {
      noisePatternsFile: optionalEnv(
        'NOISE_PATTERNS_FILE',
        path.join(SERVER_ROOT, 'data', 'noise-patterns.json')
      ),
    },
    rateLimit: {
      maxRequests: parseNumber(env.RATE_LIMIT_MAX, 120),
      windowMs: parseNumber(env.RATE_LIMIT_WINDOW_MS, 3600000),
    },
    logging: {
      logLevel: optionalEnv('LOG_LEVEL', 'INFO'),
      timezone: optionalEnv('LOG_TIMEZONE', 'UTC'),
    },
  };
}

export const config: AppConfig = buildConfig();

/**
 * Lists the variables the server cannot start without
 */
export function findMissingSettings(appConfig: AppConfig): string[] {
  const missing: string[] = [];
  if (appConfig.ai.provider === 'groq' && !appConfig.ai.groq.apiKey) {
    missing.push('GROQ_API_KEY');
  }
  if (!appConfig.database.url) {
    missing.push('DATABASE_URL');
  }
  return missing;
}

/**
 * Throws a ConfigError naming every missing variable
 */
export function validateConfig(appConfig: AppConfig): void {
  const missing = findMissingSettings(appConfig);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required configuration: ${missing.join(', ')}`, missing);
  }
}
