import { createAgent } from '../agents/agent-factory';
import { AgentRegistry } from '../agents/agent-registry';
import { CommunicationHandler } from '../agents/communication-handler';
import { InMemoryMessageBus } from '../agents/in-memory-bus';
import type { MessageBus } from '../agents/message-bus';
import { PostgresMessageBus } from '../agents/postgres-bus';
import { loadSettings, type Settings } from '../config/settings';
import type { CompletionCapability } from '../core/contracts/completion';
import { MockCompletionAdapter, OpenAIAdapter } from '../llm';
import { ConsoleAuditLogger, type RuntimeAuditLogger } from '../logging/audit-logger';
import { ConsoleLogger, type Logger } from '../logging/logger';
import { InMemoryMemoryStore } from '../memory/in-memory-memory-store';
import type { MemoryCapability } from '../memory/types';
import { TaskRegistry } from '../tasks/task-registry';

export interface ContainerContext {
  settings: Settings;
  logger: Logger;
  bus: MessageBus;
  communication: CommunicationHandler;
  tasks: TaskRegistry;
  agents: AgentRegistry;
  memory: MemoryCapability;
  completion: CompletionCapability;
  /**
   * Stops every agent, releases the communication handler and closes the bus.
   * Call when the container is no longer needed (e.g., in test teardown).
   */
  cleanup(): Promise<void>;
}

export interface BuildContainerOptions {
  env?: NodeJS.ProcessEnv;
  /** Overrides the configured completion provider. */
  completion?: CompletionCapability;
  /** Overrides the configured bus. The caller keeps ownership of it. */
  bus?: MessageBus;
  logger?: Logger;
  auditLogger?: RuntimeAuditLogger;
}

export async function buildContainer(options: BuildContainerOptions = {}): Promise<ContainerContext> {
  const settings = loadSettings(options.env ?? process.env);
  const logger = options.logger ?? new ConsoleLogger('taskmesh', settings.logLevel);
  const auditLogger = options.auditLogger ?? (settings.logLevel === 'silent' ? undefined : new ConsoleAuditLogger());

  const ownsBus = !options.bus;
  const bus = options.bus ?? await buildBus(settings, logger);
  const communication = new CommunicationHandler({ bus, logger: logger.child('CommunicationHandler') });
  const tasks = new TaskRegistry({ retentionMs: settings.taskRetentionMs });
  const memory = new InMemoryMemoryStore();
  const completion = options.completion ?? buildCompletion(settings);
  const agents = new AgentRegistry();

  for (const spec of settings.agents) {
    agents.register(createAgent(spec.role, spec.id, {
      completion,
      tasks,
      memory,
      communication,
      logger,
      auditLogger,
      maxConcurrentTasks: settings.maxConcurrentTasks,
      taskTimeoutMs: settings.taskTimeoutMs,
      requestTimeoutMs: settings.requestTimeoutMs
    }));
  }

  try {
    await agents.startAll();
  } catch (error) {
    await agents.stopAll();
    await communication.shutdown();
    if (ownsBus) {
      await bus.close();
    }
    throw error;
  }
  logger.info(`Started ${settings.agents.length} agents on the ${settings.bus.driver} bus`);

  return {
    settings,
    logger,
    bus,
    communication,
    tasks,
    agents,
    memory,
    completion,
    async cleanup() {
      await agents.stopAll();
      await communication.shutdown();
      if (ownsBus) {
        await bus.close();
      }
    }
  };
}

async function buildBus(settings: Settings, logger: Logger): Promise<MessageBus> {
  if (settings.bus.driver === 'postgres') {
    const bus = new PostgresMessageBus({
      connectionString: settings.bus.databaseUrl,
      logger: logger.child('PostgresMessageBus')
    });
    await bus.connect();
    return bus;
  }

  return new InMemoryMessageBus({ logger: logger.child('InMemoryMessageBus') });
}

function buildCompletion(settings: Settings): CompletionCapability {
  const completion = settings.completion;
  if (completion.provider === 'openai') {
    return new OpenAIAdapter({
      apiKey: completion.apiKey,
      model: completion.model,
      baseUrl: completion.baseUrl
    });
  }

  return new MockCompletionAdapter({ response: completion.response });
}
