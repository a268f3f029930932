/**
 * Server entry point - validates configuration and starts the Express application
 */
import type { Server } from 'http';
import { createApp, createServices } from './app';
import { config, validateConfig } from './config/index';
import { createPool } from './services/database';
import { LoggerService } from './services/logger';
import { isMainModule } from './utils/is-main';

export interface BannerOptions {
  title: string;
  port: number;
  provider: string;
  model: string;
  rateLimit: number;
  windowMinutes: number;
  ragEnabled: boolean;
}

const ANSI = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
} as const;

const BOX_WIDTH = 55;
const ansiPattern = new RegExp(`${'\x1b'}\\[[0-9;]*m`, 'g');

/**
 * Startup box; every row is padded to the same visible width
 */
export const generateBanner = (options: BannerOptions): string[] => {
  const { reset, bright, dim, green, cyan, yellow } = ANSI;
  const contentWidth = BOX_WIDTH - 6;
  const edge = (left: string, right: string): string =>
    `${bright}${green}${left}${'═'.repeat(BOX_WIDTH - 2)}${right}${reset}`;
  const row = (content: string): string => {
    const visible = [...content.replace(ansiPattern, '')].length;
    const padding = ' '.repeat(Math.max(0, contentWidth - visible));
    return `${bright}${green}║${reset}  ${content}${padding}  ${bright}${green}║${reset}`;
  };
  const field = (label: string, value: string): string =>
    row(`${dim}${`${label}:`.padEnd(12)}${reset}${value}`);

  return [
    '',
    edge('╔', '╗'),
    row(`${bright}${cyan}${options.title}${reset}`),
    edge('╠', '╣'),
    field('Status', `${bright}${green}✓ Running${reset}`),
    field('Port', `${yellow}${options.port}${reset}`),
    field('Provider', options.provider),
    field('Model', options.model),
    field('Rate Limit', `${options.rateLimit} requests/${options.windowMinutes} min`),
    field('Style RAG', options.ragEnabled ? 'enabled' : `${yellow}disabled${reset}`),
    edge('╚', '╝'),
    '',
  ];
};

async function main(): Promise<void> {
  const logger = new LoggerService();

  try {
    validateConfig(config);
  } catch (error) {
    logger.error('Configuration invalid, refusing to start', error);
    process.exit(1);
  }

  const pool = createPool(config.database.url);
  const services = await createServices(pool, config, logger);
  const app = createApp(services);
  const { port, host } = config.server;

  const server: Server = app.listen(port, host, () => {
    const banner = generateBanner({
      title: 'Reply Twin Server',
      port,
      provider: services.provider.name,
      model: services.provider.model,
      rateLimit: config.rateLimit.maxRequests,
      windowMinutes: Math.round(config.rateLimit.windowMs / 60000),
      ragEnabled: config.rag.enabled,
    });

    banner.forEach((line) => console.log(line));

    logger.info(`Server started successfully on ${host}:${port}`);
    logger.info(`Log level: ${config.logging.logLevel}`);
    logger.info(
      `AI Provider: ${services.provider.name} (model: ${services.provider.model}, max tokens: ${config.ai.maxTokens})`
    );
    logger.info(`Active persona: ${services.persona.getPersonaName()}`);
  });

  // Graceful shutdown
  const shutdown = (): void => {
    logger.info('Server shutting down');
    server.close();
    pool
      .end()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to close database pool', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

// Only start server if this file is run directly (not imported in tests)
if (isMainModule(import.meta.url)) {
  main().catch((error: unknown) => {
    new LoggerService().error('Server failed to start', error);
    process.exit(1);
  });
}
