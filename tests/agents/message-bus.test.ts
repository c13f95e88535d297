import { InMemoryMessageBus } from '../../agents/in-memory-bus';
import { createEnvelope, type Envelope } from '../../agents/message';
import { TransportUnavailableError } from '../../core/errors';

function note(index: number): Envelope {
  return createEnvelope({ from: 'agent-2', to: 'agent-1', kind: 'notification', payload: { index } });
}

describe('InMemoryMessageBus', () => {
  it('delivers envelopes to subscribers of the channel', async () => {
    const bus = new InMemoryMessageBus();
    const received: Envelope[] = [];
    await bus.subscribe('inbox:agent-1', (envelope) => {
      received.push(envelope);
    });

    const sent = note(1);
    await bus.publish('inbox:agent-1', sent);
    await bus.flush();

    expect(received).toHaveLength(1);
    expect(received[0]).toEqual(sent);
  });

  it('does not deliver to other channels', async () => {
    const bus = new InMemoryMessageBus();
    const received: Envelope[] = [];
    await bus.subscribe('inbox:agent-3', (envelope) => {
      received.push(envelope);
    });

    await bus.publish('inbox:agent-1', note(1));
    await bus.flush();

    expect(received).toEqual([]);
  });

  it('resolves publish without waiting for handlers to finish', async () => {
    const bus = new InMemoryMessageBus();
    const received: number[] = [];
    let open: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    await bus.subscribe('inbox:agent-1', async (envelope) => {
      await gate;
      received.push(Number(envelope.payload.index));
    });

    await bus.publish('inbox:agent-1', note(1));
    expect(received).toEqual([]);

    open();

    await bus.flush();
    expect(received).toEqual([1]);
  });

  it('supports unsubscribing, idempotently', async () => {
    const bus = new InMemoryMessageBus();
    const received: Envelope[] = [];
    const unsubscribe = await bus.subscribe('inbox:agent-1', (envelope) => {
      received.push(envelope);
    });

    await unsubscribe();
    await unsubscribe();
    await bus.publish('inbox:agent-1', note(1));
    await bus.flush();

    expect(received).toEqual([]);
  });

  it('gives each subscriber its own decoded copy', async () => {
    const bus = new InMemoryMessageBus();
    const copies: Envelope[] = [];
    await bus.subscribe('inbox:agent-1', (envelope) => {
      copies.push(envelope);
    });
    await bus.subscribe('inbox:agent-1', (envelope) => {
      copies.push(envelope);
    });

    const sent = note(7);
    await bus.publish('inbox:agent-1', sent);
    await bus.flush();

    expect(copies).toHaveLength(2);
    expect(copies[0]).toEqual(sent);
    expect(copies[1]).toEqual(sent);
    expect(copies[0]).not.toBe(sent);
  });

  it('keeps FIFO order per channel even with slow handlers', async () => {
    const bus = new InMemoryMessageBus();
    const received: number[] = [];
    await bus.subscribe('inbox:agent-1', async (envelope) => {
      const index = Number(envelope.payload.index);
      await new Promise((resolve) => setTimeout(resolve, index % 2 === 0 ? 5 : 0));
      received.push(index);
    });

    for (let index = 0; index < 10; index += 1) {
      await bus.publish('inbox:agent-1', note(index));
    }
    await bus.flush();

    expect(received).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('fails publish and subscribe while disconnected and recovers on reconnect', async () => {
    const bus = new InMemoryMessageBus();
    const received: Envelope[] = [];
    await bus.subscribe('inbox:agent-1', (envelope) => {
      received.push(envelope);
    });

    bus.disconnect();
    expect(bus.isConnected).toBe(false);
    await expect(bus.publish('inbox:agent-1', note(1))).rejects.toBeInstanceOf(TransportUnavailableError);
    await expect(bus.subscribe('inbox:agent-2', () => undefined)).rejects.toThrow('broker connection is down');

    bus.reconnect();
    await bus.publish('inbox:agent-1', note(2));
    await bus.flush();

    expect(received.map((envelope) => envelope.payload.index)).toEqual([2]);
  });

  it('marks the transport error as retryable', async () => {
    const bus = new InMemoryMessageBus();
    bus.disconnect();

    const error = await bus.publish('inbox:agent-1', note(1)).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(TransportUnavailableError);
    expect(error instanceof TransportUnavailableError && error.retryable).toBe(true);
  });

  it('rejects operations after close', async () => {
    const bus = new InMemoryMessageBus();
    await bus.close();

    await expect(bus.publish('inbox:agent-1', note(1))).rejects.toThrow('bus is closed');
  });
});
