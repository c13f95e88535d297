/**
 * Two agents on one in-memory bus: a research agent submits its own task,
 * then asks the synthesis agent to summarise the findings over a request.
 * Not wired into the HTTP server - standalone illustration.
 *
 * Run with: npm run build && node dist/examples/agent-collaboration.example.js
 */

import { createAgent } from '../agents/agent-factory';
import { CommunicationHandler } from '../agents/communication-handler';
import { InMemoryMessageBus } from '../agents/in-memory-bus';
import { MockCompletionAdapter } from '../llm/mock-adapter';
import { ConsoleAuditLogger } from '../logging/audit-logger';
import { ConsoleLogger } from '../logging/logger';
import { InMemoryMemoryStore } from '../memory/in-memory-memory-store';
import { TaskRegistry } from '../tasks/task-registry';

async function main(): Promise<void> {
  const logger = new ConsoleLogger('example', 'info');
  const bus = new InMemoryMessageBus({ logger: logger.child('InMemoryMessageBus') });
  const communication = new CommunicationHandler({ bus, logger: logger.child('CommunicationHandler') });
  const dependencies = {
    completion: new MockCompletionAdapter({
      generateFn: (prompt: string) => `Echo of ${prompt.split('\n')[0]} [1]`
    }),
    tasks: new TaskRegistry(),
    memory: new InMemoryMemoryStore(),
    communication,
    logger,
    auditLogger: new ConsoleAuditLogger()
  };

  const researcher = createAgent('research', 'research-1', dependencies);
  const synthesizer = createAgent('synthesis', 'synthesis-1', dependencies);
  await researcher.start();
  await synthesizer.start();

  try {
    const taskId = researcher.submitTask({ query: 'tidal energy', depth: 'light' });
    const findings = await researcher.getTaskResult(taskId, 5_000);
    console.log(`[example] research finished with confidence ${findings.confidence}`);

    const reply = await researcher.request('synthesis-1', {
      task: { topic: 'tidal energy', synthesis_type: 'summary', sources: [findings.content] }
    }, 5_000);
    console.log('[example] synthesis reply:', JSON.stringify(reply.payload));
  } finally {
    await researcher.stop();
    await synthesizer.stop();
    await communication.shutdown();
    await bus.close();
  }
}

main().catch((error: unknown) => {
  console.error('[example] failed:', error);
  process.exit(1);
});
