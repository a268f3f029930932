import { describe, it, expect, afterEach } from 'vitest';
import { createApp, createServices } from '../app';
import { buildConfig } from '../config/index';
import { GroqProvider } from '../providers/index';
import { FakeSqlClient, quietLogger } from './helpers/fakes';
import { createTestServices, startServer, type RunningServer } from './helpers/server';

describe('createApp', () => {
  let server: RunningServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('should allow cross-origin calls', async () => {
    server = await startServer(createApp(createTestServices()));

    const response = await fetch(`${server.baseUrl}/health`, {
      headers: { Origin: 'http://phone.local' },
    });

    expect(response.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('should answer preflight requests with 204', async () => {
    server = await startServer(createApp(createTestServices()));

    const response = await fetch(`${server.baseUrl}/reply`, { method: 'OPTIONS' });

    expect(response.status).toBe(204);
    expect(response.headers.get('access-control-allow-methods')).toBe('GET, POST, DELETE, OPTIONS');
  });

  it('should return 404 for unknown routes', async () => {
    server = await startServer(createApp(createTestServices()));

    const response = await fetch(`${server.baseUrl}/chat`);

    expect(response.status).toBe(404);
  });
});

describe('createServices', () => {
  it('should wire the configured provider and default persona', async () => {
    const appConfig = buildConfig({ GROQ_API_KEY: 'test-secret', DATABASE_URL: 'postgres://test' });

    const services = await createServices(new FakeSqlClient(), appConfig, quietLogger());

    expect(services.provider).toBeInstanceOf(GroqProvider);
    expect(services.persona.getPersonaName()).toBe('default');
    expect(services.rateLimiter.getStatus().max).toBe(120);
  });

  it('should refuse to build without a provider key', async () => {
    await expect(createServices(new FakeSqlClient(), buildConfig({}), quietLogger())).rejects.toThrow(
      'Provider Groq is not configured. Missing API key.'
    );
  });
});
