/**
 * AgentRuntime owns one agent's task queue. Submitted tasks are processed by
 * a bounded pump: recall memories, build the variant's prompt, call the
 * completion capability under a per-task deadline, score and record the
 * output. Requests arriving through the communication handler are turned into
 * tasks and answered with their outcome.
 */

import type { MessageHandler } from '../agents/communication-handler';
import { BROADCAST_ADDRESS } from '../agents/channels';
import { createEnvelope, type Envelope } from '../agents/message';
import { isPayloadObject, readNumber, type Payload } from '../agents/payload';
import { startDeadline } from '../core/deadline';
import {
  InternalError,
  NotStartedError,
  RuntimeStoppedError,
  TaskFailedError,
  TaskTimedOutError,
  UnknownTaskError,
  toTaskError,
  type TaskError
} from '../core/errors';
import { settle } from '../core/result';
import type { RuntimeAuditEvent } from '../logging/audit-logger';
import { silentLogger, type Logger } from '../logging/logger';
import type { MemoryRecord } from '../memory/types';
import type { AwaitOptions } from '../tasks/task-registry';
import type { TaskOutput, TaskRecord } from '../tasks/types';
import { countSources, scoreConfidence } from './confidence-scorer';
import type {
  AgentMetrics,
  AgentRuntimeOptions,
  AgentState,
  AgentStatus,
  AgentVariant,
  ConfidenceScorer
} from './types';

const TASK_DEADLINE = Symbol('TaskDeadline');

export class AgentRuntime implements MessageHandler {
  readonly agentId: string;
  private readonly options: AgentRuntimeOptions;
  private readonly variant: AgentVariant;
  private readonly logger: Logger;
  private readonly getTime: () => number;
  private readonly scorer: ConfidenceScorer;
  private readonly maxConcurrentTasks: number;
  private readonly taskTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly rememberThreshold: number;
  private readonly memorySearchLimit: number;

  private state: AgentState = 'stopped';
  private starting: Promise<void> | null = null;
  private readonly queue: string[] = [];
  private readonly inFlight = new Map<string, Promise<void>>();
  private tasksProcessed = 0;
  private tasksFailed = 0;
  private tasksTimedOut = 0;
  private totalProcessingTimeMs = 0;

  constructor(options: AgentRuntimeOptions) {
    if (!options.agentId) {
      throw new Error('agentId is required');
    }

    const maxConcurrentTasks = Math.floor(Number(options.maxConcurrentTasks ?? 1));
    if (!Number.isFinite(maxConcurrentTasks) || maxConcurrentTasks < 1) {
      throw new Error(`maxConcurrentTasks must be a finite integer >= 1. Got: ${options.maxConcurrentTasks}`);
    }

    const taskTimeoutMs = Math.floor(Number(options.taskTimeoutMs ?? 300_000));
    if (!Number.isFinite(taskTimeoutMs) || taskTimeoutMs < 1) {
      throw new Error(`taskTimeoutMs must be a finite positive number. Got: ${options.taskTimeoutMs}`);
    }

    const requestTimeoutMs = Math.floor(Number(options.requestTimeoutMs ?? 30_000));
    if (!Number.isFinite(requestTimeoutMs) || requestTimeoutMs < 1) {
      throw new Error(`requestTimeoutMs must be a finite positive number. Got: ${options.requestTimeoutMs}`);
    }

    const rememberThreshold = options.rememberThreshold ?? 0.6;
    if (!Number.isFinite(rememberThreshold) || rememberThreshold < 0 || rememberThreshold > 1) {
      throw new Error(`rememberThreshold must be between 0 and 1. Got: ${options.rememberThreshold}`);
    }

    this.agentId = options.agentId;
    this.options = options;
    this.variant = options.variant;
    this.logger = (options.logger ?? silentLogger).child(`Agent:${options.agentId}`);
    this.getTime = options.getTime ?? (() => Date.now());
    this.scorer = options.scorer ?? scoreConfidence;
    this.maxConcurrentTasks = maxConcurrentTasks;
    this.taskTimeoutMs = taskTimeoutMs;
    this.requestTimeoutMs = requestTimeoutMs;
    this.rememberThreshold = rememberThreshold;
    this.memorySearchLimit = Math.max(0, Math.floor(options.memorySearchLimit ?? 5));
  }

  get role(): AgentVariant['role'] {
    return this.variant.role;
  }

  get currentState(): AgentState {
    return this.state;
  }

  /**
   * Registers with the communication handler and begins processing. While a
   * start is underway further calls share it; once running they are no-ops.
   * A failed registration leaves the runtime stopped.
   */
  start(): Promise<void> {
    if (this.state !== 'stopped') {
      return this.starting ?? Promise.resolve();
    }
    this.state = 'starting';
    const starting = this.enterRunning().finally(() => {
      this.starting = null;
    });
    this.starting = starting;
    return starting;
  }

  private async enterRunning(): Promise<void> {
    try {
      await this.options.communication?.register(this.agentId, this);
    } catch (error) {
      this.state = 'stopped';
      this.logger.error('Failed to register with the communication handler:', error);
      throw error;
    }

    this.state = 'running';
    this.logger.info(`Started (${this.variant.role}, concurrency ${this.maxConcurrentTasks})`);
    this.logAudit('runtime_started');
    this.pump();
  }

  /**
   * Fails queued tasks with RuntimeStopped, waits for in-flight tasks (each
   * bounded by the task deadline), then deregisters. Called mid-start, it
   * lets the start finish first.
   */
  async stop(): Promise<void> {
    if (this.state === 'starting' && this.starting) {
      const started = await settle(this.starting);
      if (!started.ok) {
        return;
      }
    }
    if (this.state !== 'running') {
      return;
    }
    this.state = 'stopping';

    for (const taskId of this.queue.splice(0)) {
      this.failTask(taskId, new RuntimeStoppedError(`Agent ${this.agentId} stopped before task ${taskId} started`).toJSON());
    }

    await Promise.all(this.inFlight.values());

    try {
      await this.options.communication?.deregister(this.agentId);
    } catch (error) {
      this.logger.warn('Failed to deregister:', error);
    }

    this.state = 'stopped';
    this.logger.info('Stopped');
    this.logAudit('runtime_stopped', undefined, this.metricsData());
  }

  /** Records and enqueues a task. Never waits for processing. */
  submitTask(input: Payload): string {
    if (this.state !== 'running') {
      throw new NotStartedError(this.agentId, this.state);
    }

    const taskId = this.options.tasks.create(this.agentId, input);
    this.queue.push(taskId);
    this.logAudit('task_submitted', taskId);
    this.pump();
    return taskId;
  }

  /**
   * Waits up to `timeoutMs` for the task to finish and returns its output.
   * Throws TaskFailed, TaskTimedOut, TaskTimeout or UnknownTask.
   */
  async getTaskResult(taskId: string, timeoutMs: number, options: AwaitOptions = {}): Promise<TaskOutput> {
    const record = this.options.tasks.get(taskId);
    if (!record || record.ownerAgent !== this.agentId) {
      throw new UnknownTaskError(taskId);
    }

    const terminal = await this.options.tasks.awaitResult(taskId, timeoutMs, options);
    return outputOf(terminal);
  }

  handle(envelope: Envelope): void | Promise<void> {
    if (envelope.kind === 'request') {
      this.answer(envelope).catch((error: unknown) => {
        this.logger.error(`Failed to answer request ${envelope.id} from ${envelope.from}:`, error);
      });
      return;
    }

    if (this.options.onMessage) {
      return this.options.onMessage(envelope);
    }
    this.logger.debug(`Ignoring ${envelope.kind} ${envelope.id} from ${envelope.from}`);
  }

  /** Sends a request to another agent and waits for its response. */
  async request(
    to: string,
    payload: Payload,
    timeoutMs: number = this.requestTimeoutMs,
    options: AwaitOptions = {}
  ): Promise<Envelope> {
    const communication = this.requireCommunication();
    const envelope = createEnvelope({ from: this.agentId, to, kind: 'request', payload });
    return communication.sendAndWait(to, envelope, timeoutMs, options);
  }

  async notify(to: string, payload: Payload): Promise<void> {
    const communication = this.requireCommunication();
    await communication.send(to, createEnvelope({ from: this.agentId, to, kind: 'notification', payload }));
  }

  async broadcast(payload: Payload): Promise<void> {
    const communication = this.requireCommunication();
    await communication.broadcast(createEnvelope({ from: this.agentId, to: BROADCAST_ADDRESS, kind: 'broadcast', payload }));
  }

  getStatus(): AgentStatus {
    return {
      agentId: this.agentId,
      role: this.variant.role,
      state: this.state,
      queueDepth: this.queue.length,
      inFlight: this.inFlight.size,
      maxConcurrentTasks: this.maxConcurrentTasks
    };
  }

  getMetrics(): AgentMetrics {
    const finished = this.tasksProcessed;
    return {
      tasksProcessed: this.tasksProcessed,
      tasksFailed: this.tasksFailed,
      tasksTimedOut: this.tasksTimedOut,
      totalProcessingTimeMs: this.totalProcessingTimeMs,
      averageProcessingTimeMs: finished ? this.totalProcessingTimeMs / finished : 0
    };
  }

  private pump(): void {
    while (this.state === 'running' && this.inFlight.size < this.maxConcurrentTasks) {
      const taskId = this.queue.shift();
      if (taskId === undefined) {
        return;
      }

      const run = this.runTask(taskId)
        .catch((error: unknown) => {
          this.logger.error(`Task ${taskId} could not be recorded:`, error);
        })
        .finally(() => {
          this.inFlight.delete(taskId);
          this.pump();
        });
      this.inFlight.set(taskId, run);
    }
  }

  private async runTask(taskId: string): Promise<void> {
    const record = this.options.tasks.markRunning(taskId);
    const startedAt = this.getTime();
    this.logAudit('task_started', taskId);

    const controller = new AbortController();
    let cancelDeadline: () => void = () => {};
    const deadline = new Promise<typeof TASK_DEADLINE>((resolve) => {
      cancelDeadline = startDeadline(this.taskTimeoutMs, () => resolve(TASK_DEADLINE));
    });

    try {
      const outcome = await Promise.race([this.execute(record, controller.signal, startedAt), deadline]);

      if (outcome === TASK_DEADLINE) {
        controller.abort();
        const error = new TaskTimedOutError(taskId, `Task ${taskId} exceeded its ${this.taskTimeoutMs}ms deadline`);
        this.options.tasks.timeOut(taskId, error.toJSON());
        this.tasksTimedOut += 1;
        this.logger.warn(error.message);
        this.logAudit('task_timed_out', taskId, { timeoutMs: this.taskTimeoutMs });
        return;
      }

      this.options.tasks.complete(taskId, outcome);
      this.tasksProcessed += 1;
      this.totalProcessingTimeMs += outcome.processingTimeMs;
      this.logAudit('task_completed', taskId, {
        confidence: outcome.confidence,
        processingTimeMs: outcome.processingTimeMs
      });
      await this.rememberOutput(record, outcome);
    } catch (error) {
      if (this.options.tasks.get(taskId)?.status !== 'running') {
        throw error;
      }
      this.failTask(taskId, toTaskError(error));
    } finally {
      cancelDeadline();
    }
  }

  private async execute(record: TaskRecord, signal: AbortSignal, startedAt: number): Promise<TaskOutput> {
    const query = this.variant.memoryQuery(record.input);
    const memories = await this.recall(query);
    const prompt = this.variant.buildPrompt(record.input, memories);

    const content = await this.options.completion.complete(prompt, {
      systemInstruction: this.variant.systemInstruction,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
      signal
    });

    return {
      content,
      confidence: this.scorer(content),
      agentId: this.agentId,
      processingTimeMs: Math.max(0, this.getTime() - startedAt),
      memoryMatches: memories.length,
      sourceCount: countSources(content)
    };
  }

  private async recall(query: string): Promise<MemoryRecord[]> {
    const memory = this.options.memory;
    if (!memory || this.memorySearchLimit === 0) {
      return [];
    }
    try {
      return await memory.search(query, this.memorySearchLimit);
    } catch (error) {
      this.logger.warn('Memory search failed, continuing without memories:', error);
      return [];
    }
  }

  private async rememberOutput(record: TaskRecord, output: TaskOutput): Promise<void> {
    const memory = this.options.memory;
    if (!memory || output.confidence < this.rememberThreshold) {
      return;
    }
    try {
      await memory.remember({
        content: output.content,
        kind: this.variant.role,
        tags: [...this.variant.memoryTags, `task:${record.taskId}`],
        importance: output.confidence
      });
    } catch (error) {
      this.logger.warn(`Failed to remember output of task ${record.taskId}:`, error);
    }
  }

  private failTask(taskId: string, error: TaskError): void {
    this.options.tasks.fail(taskId, error);
    this.tasksFailed += 1;
    this.logger.warn(`Task ${taskId} failed: ${error.kind}: ${error.message}`);
    this.logAudit('task_failed', taskId, { error });
  }

  private async answer(request: Envelope): Promise<void> {
    const communication = this.options.communication;
    if (!communication) {
      return;
    }
    const task = request.payload.task;
    const input = isPayloadObject(task) ? task : request.payload;
    const requested = readNumber(request.payload, 'timeout_ms');
    const timeoutMs = requested !== undefined && requested > 0 ? requested : this.requestTimeoutMs;

    const outcome = await settle(async () => {
      const taskId = this.submitTask(input);
      return this.getTaskResult(taskId, timeoutMs);
    });

    if (outcome.ok) {
      const { content, confidence, agentId, processingTimeMs, memoryMatches, sourceCount } = outcome.value;
      await communication.respond(request, {
        status: 'completed',
        result: { content, confidence, agentId, processingTimeMs, memoryMatches, sourceCount }
      });
      return;
    }

    const failure = outcome.error instanceof TaskFailedError ? outcome.error.failure : outcome.error.toJSON();
    await communication.respond(request, {
      status: 'failed',
      error: { kind: failure.kind, message: failure.message }
    });
  }

  private requireCommunication(): NonNullable<AgentRuntimeOptions['communication']> {
    if (!this.options.communication) {
      throw new Error(`Agent ${this.agentId} has no communication handler`);
    }
    if (this.state !== 'running') {
      throw new NotStartedError(this.agentId, this.state);
    }
    return this.options.communication;
  }

  private metricsData(): Record<string, unknown> {
    return { ...this.getMetrics() };
  }

  private logAudit(event: RuntimeAuditEvent, taskId?: string, data?: Record<string, unknown>): void {
    const auditLogger = this.options.auditLogger;
    if (!auditLogger) {
      return;
    }
    try {
      const result = auditLogger.logRuntimeEvent({ agentId: this.agentId, taskId, event, data });
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          this.logger.warn(`Audit logging failed for ${event}:`, error);
        });
      }
    } catch (error) {
      this.logger.warn(`Audit logging failed for ${event}:`, error);
    }
  }
}

function outputOf(record: TaskRecord): TaskOutput {
  switch (record.status) {
    case 'completed':
      if (!record.result) {
        throw new InternalError(`Task ${record.taskId} completed without a result`);
      }
      return { ...record.result };
    case 'failed':
      throw new TaskFailedError(record.taskId, record.error ?? { kind: 'Internal', message: 'Unknown failure' });
    case 'timed_out':
      throw new TaskTimedOutError(record.taskId, record.error?.message);
    default:
      throw new InternalError(`Task ${record.taskId} is not terminal (${record.status})`);
  }
}
