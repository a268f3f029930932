import { describe, it, expect, afterEach } from 'vitest';
import { createApp } from '../../app';
import { createTestServices, startServer, type RunningServer } from '../../__tests__/helpers/server';

describe('GET /contacts', () => {
  let server: RunningServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('should list contacts from history', async () => {
    const services = createTestServices();
    await services.historyStore.append({ contactId: 'priya', contactName: 'Priya', role: 'user', message: 'hi' });
    await services.historyStore.append({ contactId: 'priya', contactName: 'Priya', role: 'assistant', message: 'hello' });
    await services.historyStore.append({ contactId: 'amit', contactName: 'Amit', role: 'user', message: 'yo' });
    server = await startServer(createApp(services));

    const response = await fetch(`${server.baseUrl}/contacts`);

    expect(await response.json()).toEqual({
      contacts: [
        { contact_id: 'amit', contact_name: 'Amit', message_count: 1 },
        { contact_id: 'priya', contact_name: 'Priya', message_count: 2 },
      ],
    });
  });
});
