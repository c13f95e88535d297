import { InMemoryMessageBus } from '../../agents/in-memory-bus';
import { TransportUnavailableError } from '../../core/errors';
import { silentLogger } from '../../logging/logger';
import { buildContainer } from '../../server/container';

describe('buildContainer', () => {
  it('starts the configured agents on a shared handler', async () => {
    const context = await buildContainer({ env: { LOG_LEVEL: 'silent', AGENTS: 'general:g-1,synthesis:s-1' } });

    try {
      expect(context.agents.list().map((agent) => agent.status.state)).toEqual(['running', 'running']);
      expect(context.communication.getStatus().registeredAgents).toEqual(['g-1', 's-1']);
      expect(context.settings.bus).toEqual({ driver: 'memory' });
    } finally {
      await context.cleanup();
    }

    expect(context.communication.getStatus().registeredAgents).toEqual([]);
  });

  it('leaves a caller-provided bus open on cleanup', async () => {
    const bus = new InMemoryMessageBus();
    const context = await buildContainer({ env: { LOG_LEVEL: 'silent' }, bus, logger: silentLogger });

    await context.cleanup();

    expect(bus.isConnected).toBe(true);
    await bus.close();
  });

  it('rejects invalid configuration', async () => {
    await expect(buildContainer({ env: { LLM_PROVIDER: 'openai' } })).rejects.toThrow(
      'Invalid configuration: OPENAI_API_KEY: is required when LLM_PROVIDER=openai; OPENAI_MODEL: is required when LLM_PROVIDER=openai'
    );
  });

  it('stops what it started when an agent cannot register', async () => {
    const bus = new InMemoryMessageBus();
    bus.disconnect();

    await expect(buildContainer({ env: { LOG_LEVEL: 'silent' }, bus, logger: silentLogger }))
      .rejects.toBeInstanceOf(TransportUnavailableError);
  });
});
