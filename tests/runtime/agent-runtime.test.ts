import type { MessageHandler } from '../../agents/communication-handler';
import { CommunicationHandler } from '../../agents/communication-handler';
import { InMemoryMessageBus } from '../../agents/in-memory-bus';
import type { MessageBus } from '../../agents/message-bus';
import { createEnvelope } from '../../agents/message';
import type { CompletionOptions } from '../../core/contracts/completion';
import {
  AbortedError,
  NotStartedError,
  QuotaExceededError,
  TaskFailedError,
  TaskTimedOutError,
  UnknownTaskError
} from '../../core/errors';
import { MockCompletionAdapter } from '../../llm/mock-adapter';
import type { RuntimeAuditContext } from '../../logging/audit-logger';
import { InMemoryMemoryStore } from '../../memory/in-memory-memory-store';
import { AgentRuntime } from '../../runtime/agent-runtime';
import { generalVariant } from '../../runtime/prompts';
import type { AgentRuntimeOptions } from '../../runtime/types';
import { TaskRegistry } from '../../tasks/task-registry';

function gate(): { opened: Promise<void>; open: () => void } {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

function createRuntime(overrides: Partial<AgentRuntimeOptions> = {}): AgentRuntime {
  return new AgentRuntime({
    agentId: 'agent-1',
    variant: generalVariant,
    completion: new MockCompletionAdapter({ response: 'hello there' }),
    tasks: new TaskRegistry(),
    ...overrides
  });
}

describe('AgentRuntime', () => {
  const runtimes: AgentRuntime[] = [];

  function started(overrides: Partial<AgentRuntimeOptions> = {}): Promise<AgentRuntime> {
    const runtime = createRuntime(overrides);
    runtimes.push(runtime);
    return runtime.start().then(() => runtime);
  }

  afterEach(async () => {
    await Promise.all(runtimes.splice(0).map((runtime) => runtime.stop()));
  });

  it('processes a submitted task into a scored output', async () => {
    const runtime = await started();

    const taskId = runtime.submitTask({ prompt: 'Say hi' });
    const output = await runtime.getTaskResult(taskId, 1_000);

    expect(output).toEqual({
      content: 'hello there',
      confidence: 0.4,
      agentId: 'agent-1',
      processingTimeMs: expect.any(Number),
      memoryMatches: 0,
      sourceCount: 0
    });
  });

  it('counts the sources cited in the output', async () => {
    const runtime = await started({
      completion: new MockCompletionAdapter({ response: 'See [1] and [2], also [1] and https://example.com/tides.' })
    });

    const output = await runtime.getTaskResult(runtime.submitTask({ prompt: 'Cite it' }), 1_000);

    expect(output.sourceCount).toBe(3);
  });

    it('passes the variant instruction and generation settings to the completion', async () => {
    const seen: CompletionOptions[] = [];
    const runtime = await started({
      maxTokens: 256,
      temperature: 0.1,
      completion: new MockCompletionAdapter({
        generateFn: (_prompt, options) => {
          seen.push(options);
          return 'ok';
        }
      })
    });

    await runtime.getTaskResult(runtime.submitTask({ prompt: 'Say hi' }), 1_000);

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ systemInstruction: generalVariant.systemInstruction, maxTokens: 256, temperature: 0.1 });
  });

  it('rejects submissions before start', () => {
    const runtime = createRuntime();
    expect(() => runtime.submitTask({ prompt: 'Say hi' })).toThrow(NotStartedError);
    expect(() => runtime.submitTask({ prompt: 'Say hi' })).toThrow('Agent agent-1 is stopped, not running');
  });

  it('completes a hundred concurrent tasks within the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const runtime = await started({
      maxConcurrentTasks: 4,
      completion: new MockCompletionAdapter({
        generateFn: async (prompt) => {
          active += 1;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 1));
          active -= 1;
          return `answer to ${prompt}`;
        }
      })
    });

    const taskIds = Array.from({ length: 100 }, (_, index) => runtime.submitTask({ prompt: `task ${index}` }));
    const outputs = await Promise.all(taskIds.map((taskId) => runtime.getTaskResult(taskId, 5_000)));

    expect(new Set(taskIds).size).toBe(100);
    expect(outputs.map((output) => output.content)).toEqual(taskIds.map((_, index) => `answer to task ${index}`));
    expect(peak).toBe(4);
    expect(runtime.getMetrics().tasksProcessed).toBe(100);
  });

  it('records capability failures with their kind', async () => {
    const tasks = new TaskRegistry();
    const runtime = await started({
      tasks,
      completion: new MockCompletionAdapter({ error: new QuotaExceededError('quota') })
    });

    const taskId = runtime.submitTask({ prompt: 'Say hi' });
    const error = await runtime.getTaskResult(taskId, 1_000).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TaskFailedError);
    expect(error instanceof TaskFailedError && error.failure).toEqual({ kind: 'QuotaExceeded', message: 'quota' });
    expect(tasks.get(taskId)?.status).toBe('failed');
    expect(runtime.getMetrics().tasksFailed).toBe(1);
  });

  it('times out a task that outlives its deadline and aborts the completion', async () => {
    const tasks = new TaskRegistry();
    let aborted = false;
    const runtime = await started({
      tasks,
      taskTimeoutMs: 50,
      completion: new MockCompletionAdapter({
        generateFn: (_prompt, options) => new Promise<string>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => {
            aborted = true;
            reject(new AbortedError('Completion was aborted'));
          });
        })
      })
    });

    const taskId = runtime.submitTask({ prompt: 'Say hi' });

    await expect(runtime.getTaskResult(taskId, 1_000)).rejects.toBeInstanceOf(TaskTimedOutError);
    expect(tasks.get(taskId)?.status).toBe('timed_out');
    expect(tasks.get(taskId)?.error).toEqual({ kind: 'TaskTimedOut', message: `Task ${taskId} exceeded its 50ms deadline` });
    expect(aborted).toBe(true);
    expect(runtime.getMetrics().tasksTimedOut).toBe(1);
  });

  it('fails queued tasks with RuntimeStopped and lets in-flight tasks finish on stop', async () => {
    const tasks = new TaskRegistry();
    const release = gate();
    const runtime = createRuntime({
      tasks,
      completion: new MockCompletionAdapter({
        generateFn: async () => {
          await release.opened;
          return 'finished';
        }
      })
    });
    await runtime.start();

    const [running, queuedA, queuedB] = [
      runtime.submitTask({ prompt: 'one' }),
      runtime.submitTask({ prompt: 'two' }),
      runtime.submitTask({ prompt: 'three' })
    ];
    const stopping = runtime.stop();
    release.open();
    await stopping;

    expect(tasks.get(running)?.status).toBe('completed');
    expect(tasks.get(queuedA)?.error?.kind).toBe('RuntimeStopped');
    expect(tasks.get(queuedB)?.status).toBe('failed');
    expect(runtime.currentState).toBe('stopped');
  });

  it('does not return tasks owned by another agent', async () => {
    const tasks = new TaskRegistry();
    const owner = await started({ tasks });
    const other = await started({ tasks, agentId: 'agent-2' });

    const taskId = owner.submitTask({ prompt: 'Say hi' });

    await expect(other.getTaskResult(taskId, 100)).rejects.toBeInstanceOf(UnknownTaskError);
  });

  it('remembers confident outputs and recalls them for later tasks', async () => {
    const memory = new InMemoryMemoryStore();
    const prompts: string[] = [];
    const runtime = await started({
      memory,
      scorer: () => 0.9,
      completion: new MockCompletionAdapter({
        generateFn: (prompt) => {
          prompts.push(prompt);
          return prompt.startsWith('why tides') ? 'tides follow the moon' : 'low tide at noon';
        }
      })
    });

    const first = runtime.submitTask({ prompt: 'why tides' });
    await runtime.getTaskResult(first, 1_000);
    const second = await runtime.getTaskResult(runtime.submitTask({ prompt: 'tides today' }), 1_000);

    expect(memory.size).toBe(2);
    const recalledMemories = await memory.search('moon', 5);
    expect(recalledMemories).toHaveLength(1);
    const [recalled] = recalledMemories;
    expect(recalled.content).toBe('tides follow the moon');
    expect(recalled.tags).toEqual(['general', `task:${first}`]);
    expect(recalled.importance).toBe(0.9);
    expect(second.memoryMatches).toBe(1);
    expect(prompts[1]).toBe('tides today\n\nRelevant context:\n1. tides follow the moon');
  });

  it('does not remember outputs below the threshold', async () => {
    const memory = new InMemoryMemoryStore();
    const runtime = await started({ memory, scorer: () => 0.3 });

    await runtime.getTaskResult(runtime.submitTask({ prompt: 'Say hi' }), 1_000);

    expect(memory.size).toBe(0);
  });

  it('tracks processing time in its metrics', async () => {
    let clock = 0;
    const runtime = await started({ getTime: () => (clock += 10) });

    await runtime.getTaskResult(runtime.submitTask({ prompt: 'one' }), 1_000);
    await runtime.getTaskResult(runtime.submitTask({ prompt: 'two' }), 1_000);

    expect(runtime.getMetrics()).toEqual({
      tasksProcessed: 2,
      tasksFailed: 0,
      tasksTimedOut: 0,
      totalProcessingTimeMs: 20,
      averageProcessingTimeMs: 10
    });
  });

  it('audits lifecycle and task transitions', async () => {
    const events: RuntimeAuditContext[] = [];
    const runtime = createRuntime({ auditLogger: { logRuntimeEvent: (context) => { events.push(context); } } });
    await runtime.start();

    const taskId = runtime.submitTask({ prompt: 'Say hi' });
    await runtime.getTaskResult(taskId, 1_000);
    await runtime.stop();

    expect(events.map((event) => event.event)).toEqual([
      'runtime_started',
      'task_submitted',
      'task_started',
      'task_completed',
      'runtime_stopped'
    ]);
    expect(events[1]).toEqual({ agentId: 'agent-1', taskId, event: 'task_submitted', data: undefined });
  });

  it('requires a communication handler for outgoing messages', async () => {
    const runtime = await started();
    await expect(runtime.notify('agent-2', {})).rejects.toThrow('Agent agent-1 has no communication handler');
  });

  it('validates its options', () => {
    expect(() => createRuntime({ maxConcurrentTasks: 0 })).toThrow('maxConcurrentTasks must be a finite integer >= 1. Got: 0');
    expect(() => createRuntime({ rememberThreshold: 2 })).toThrow('rememberThreshold must be between 0 and 1. Got: 2');
  });
});

describe('AgentRuntime messaging', () => {
  let bus: InMemoryMessageBus;
  let communication: CommunicationHandler;
  const runtimes: AgentRuntime[] = [];

  beforeEach(() => {
    bus = new InMemoryMessageBus();
    communication = new CommunicationHandler({ bus });
  });

  afterEach(async () => {
    await Promise.all(runtimes.splice(0).map((runtime) => runtime.stop()));
    await communication.shutdown();
    await bus.close();
  });

  async function startRuntime(overrides: Partial<AgentRuntimeOptions> = {}): Promise<AgentRuntime> {
    const runtime = createRuntime({ communication, ...overrides });
    runtimes.push(runtime);
    await runtime.start();
    return runtime;
  }

  const client: MessageHandler = { handle: () => undefined };

  it('answers requests with the task output', async () => {
    await startRuntime();
    await communication.register('client', client);

    const response = await communication.sendAndWait(
      'agent-1',
      createEnvelope({ from: 'client', to: 'agent-1', kind: 'request', payload: { task: { prompt: 'Say hi' } } }),
      1_000
    );

    expect(response.payload).toMatchObject({
      status: 'completed',
      result: { content: 'hello there', confidence: 0.4, agentId: 'agent-1', memoryMatches: 0, sourceCount: 0 }
    });
  });

  it('answers requests with the failure kind', async () => {
    await startRuntime({ completion: new MockCompletionAdapter({ error: new QuotaExceededError('quota') }) });
    await communication.register('client', client);

    const response = await communication.sendAndWait(
      'agent-1',
      createEnvelope({ from: 'client', to: 'agent-1', kind: 'request', payload: { prompt: 'Say hi' } }),
      1_000
    );

    expect(response.payload).toEqual({ status: 'failed', error: { kind: 'QuotaExceeded', message: 'quota' } });
  });

  it('reports invalid task input as InvalidRequest', async () => {
    await startRuntime();
    await communication.register('client', client);

    const response = await communication.sendAndWait(
      'agent-1',
      createEnvelope({ from: 'client', to: 'agent-1', kind: 'request', payload: { depth: 'light' } }),
      1_000
    );

    expect(response.payload).toEqual({
      status: 'failed',
      error: { kind: 'InvalidRequest', message: 'Task input requires one of: prompt, query, topic' }
    });
  });

  it('lets one runtime request work from another', async () => {
    const tasks = new TaskRegistry();
    const asker = await startRuntime({ tasks, agentId: 'agent-a' });
    await startRuntime({ tasks, agentId: 'agent-b', completion: new MockCompletionAdapter({ response: 'from b' }) });

    const response = await asker.request('agent-b', { task: { prompt: 'help' } }, 1_000);

    expect(response.from).toBe('agent-b');
    expect(response.payload).toMatchObject({ status: 'completed', result: { content: 'from b', agentId: 'agent-b' } });
  });

  it('hands notifications to the message hook', async () => {
    const received: string[] = [];
    await startRuntime({ onMessage: (envelope) => { received.push(envelope.kind); } });
    const sender = await startRuntime({ agentId: 'agent-2' });

    await sender.notify('agent-1', { note: 'hi' });
    await sender.broadcast({ news: 'all' });
    await bus.flush();

    expect(received).toEqual(['notification', 'broadcast']);
  });

  it('finishes a start in progress before stopping', async () => {
    const registration = gate();
    const slowBus: MessageBus = {
      publish: (channel, envelope) => bus.publish(channel, envelope),
      subscribe: async (channel, handler) => {
        await registration.opened;
        return bus.subscribe(channel, handler);
      },
      close: () => bus.close()
    };
    const slowCommunication = new CommunicationHandler({ bus: slowBus });
    const runtime = createRuntime({ communication: slowCommunication });

    const starting = runtime.start();
    const stopping = runtime.stop();
    expect(runtime.currentState).toBe('starting');
    expect(runtime.start()).toBe(starting);

    registration.open();
    await starting;
    await stopping;

    expect(runtime.currentState).toBe('stopped');
    expect(slowCommunication.isRegistered('agent-1')).toBe(false);
    await slowCommunication.shutdown();
  });

  it('stays stopped when a start that a stop waited on fails', async () => {
    const failingBus: MessageBus = {
      publish: (channel, envelope) => bus.publish(channel, envelope),
      subscribe: async () => {
        throw new Error('subscribe refused');
      },
      close: () => bus.close()
    };
    const runtime = createRuntime({ communication: new CommunicationHandler({ bus: failingBus }) });

    const starting = runtime.start();
    const stopping = runtime.stop();

    await expect(starting).rejects.toThrow('subscribe refused');
    await expect(stopping).resolves.toBeUndefined();
    expect(runtime.currentState).toBe('stopped');
  });
});
