import { describe, it, expect, afterEach } from 'vitest';
import { createApp } from '../../app';
import { createTestServices, startServer, type RunningServer } from '../../__tests__/helpers/server';

describe('GET /health', () => {
  let server: RunningServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('should report status, provider and model', async () => {
    server = await startServer(createApp(createTestServices()));

    const response = await fetch(`${server.baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', provider: 'Fake', model: 'fake-model' });
  });
});
