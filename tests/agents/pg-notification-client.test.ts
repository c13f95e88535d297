import { EventEmitter } from 'events';
import { pgNotificationClientFactory } from '../../agents/postgres-bus';

const mockClients: MockPgClient[] = [];

class MockPgClient extends EventEmitter {
  readonly queries: Array<{ text: string; values?: string[] }> = [];
  ended = false;

  constructor(readonly config: unknown) {
    super();
    mockClients.push(this);
  }

  async connect(): Promise<this> {
    return this;
  }

  async query(text: string, values?: string[]): Promise<{ rows: unknown[] }> {
    this.queries.push({ text, values });
    return { rows: [] };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

jest.mock('pg', () => ({
  Client: jest.fn().mockImplementation((config: unknown) => new MockPgClient(config))
}));

function lastClient(): MockPgClient {
  const client = mockClients[mockClients.length - 1];
  if (!client) {
    throw new Error('No pg client was created');
  }
  return client;
}

describe('pgNotificationClientFactory', () => {
  beforeEach(() => {
    mockClients.length = 0;
  });

  it('opens a fresh client per call with the connection string', () => {
    const factory = pgNotificationClientFactory('postgres://localhost/test');

    factory();
    factory();

    expect(mockClients).toHaveLength(2);
    expect(lastClient().config).toEqual({ connectionString: 'postgres://localhost/test' });
  });

  it('resolves connect with nothing rather than the pg client', async () => {
    const client = pgNotificationClientFactory('postgres://localhost/test')();

    await expect(client.connect()).resolves.toBeUndefined();
  });

  it('passes queries and their values through', async () => {
    const client = pgNotificationClientFactory('postgres://localhost/test')();

    await expect(client.query('SELECT pg_notify($1, $2)', ['inbox:agent-1', '{}'])).resolves.toBeUndefined();
    await client.query('LISTEN "broadcast"');

    expect(lastClient().queries).toEqual([
      { text: 'SELECT pg_notify($1, $2)', values: ['inbox:agent-1', '{}'] },
      { text: 'LISTEN "broadcast"', values: undefined }
    ]);
  });

  it('forwards notification, error and end events', () => {
    const client = pgNotificationClientFactory('postgres://localhost/test')();
    const notifications: Array<[string, string | undefined]> = [];
    const errors: Error[] = [];
    let ended = false;
    client.onNotification((channel, payload) => notifications.push([channel, payload]));
    client.onError((error) => errors.push(error));
    client.onEnd(() => {
      ended = true;
    });

    const pg = lastClient();
    pg.emit('notification', { processId: 1, channel: 'broadcast', payload: '{"id":"x"}' });
    pg.emit('error', new Error('terminated'));
    pg.emit('end');

    expect(notifications).toEqual([['broadcast', '{"id":"x"}']]);
    expect(errors.map((error) => error.message)).toEqual(['terminated']);
    expect(ended).toBe(true);
  });

  it('ends the underlying client', async () => {
    const client = pgNotificationClientFactory('postgres://localhost/test')();

    await client.end();

    expect(lastClient().ended).toBe(true);
  });
});
