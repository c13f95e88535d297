import { randomUUID } from 'crypto';
import { assertTimeout, startDeadline } from '../core/deadline';
import {
  AbortedError,
  InvalidTransitionError,
  TaskTimeoutError,
  UnknownTaskError,
  type TaskError
} from '../core/errors';
import { toPayload, type Payload } from '../agents/payload';
import { isTerminal, type TaskOutput, type TaskRecord, type TaskStats, type TaskStatus } from './types';

export interface TaskRegistryOptions {
  /** How long terminal records stay readable. Default: 10 minutes. */
  retentionMs?: number;
  getTime?: () => number;
  generateTaskId?: () => string;
}

export interface AwaitOptions {
  signal?: AbortSignal;
}

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed', 'timed_out'],
  completed: [],
  failed: [],
  timed_out: []
};

type Waiter = (record: TaskRecord) => void;

/**
 * Holds task records for the agents of one process. Records are frozen
 * snapshots replaced on every transition; once terminal a record is never
 * replaced again. Expired records are evicted lazily on access.
 */
export class TaskRegistry {
  private readonly records = new Map<string, TaskRecord>();
  private readonly waiters = new Map<string, Set<Waiter>>();
  private readonly retentionMs: number;
  private readonly getTime: () => number;
  private readonly generateTaskId: () => string;

  constructor(options: TaskRegistryOptions = {}) {
    const retentionMs = options.retentionMs ?? 10 * 60 * 1000;
    if (!Number.isFinite(retentionMs) || retentionMs < 0) {
      throw new Error(`retentionMs must be a finite non-negative number. Got: ${options.retentionMs}`);
    }
    this.retentionMs = retentionMs;
    this.getTime = options.getTime ?? (() => Date.now());
    this.generateTaskId = options.generateTaskId ?? randomUUID;
  }

  create(ownerAgent: string, input: Payload): string {
    if (!ownerAgent) {
      throw new Error('Task owner is required');
    }
    this.evictExpired();

    const taskId = this.generateTaskId();
    if (this.records.has(taskId)) {
      throw new Error(`Task id ${taskId} is already in use`);
    }

    this.records.set(taskId, Object.freeze({
      taskId,
      ownerAgent,
      input: toPayload(input),
      status: 'pending',
      submittedAt: this.getTime()
    }));
    return taskId;
  }

  get(taskId: string): TaskRecord | undefined {
    this.evictExpired();
    return this.records.get(taskId);
  }

  markRunning(taskId: string): TaskRecord {
    return this.transition(taskId, 'running', (record) => ({ ...record, status: 'running', startedAt: this.getTime() }));
  }

  complete(taskId: string, result: TaskOutput): TaskRecord {
    return this.transition(taskId, 'completed', (record) => ({
      ...record,
      status: 'completed',
      result: Object.freeze({ ...result }),
      completedAt: this.getTime()
    }));
  }

  fail(taskId: string, error: TaskError): TaskRecord {
    return this.transition(taskId, 'failed', (record) => ({
      ...record,
      status: 'failed',
      error: Object.freeze({ kind: error.kind, message: error.message }),
      completedAt: this.getTime()
    }));
  }

  timeOut(taskId: string, error: TaskError): TaskRecord {
    return this.transition(taskId, 'timed_out', (record) => ({
      ...record,
      status: 'timed_out',
      error: Object.freeze({ kind: error.kind, message: error.message }),
      completedAt: this.getTime()
    }));
  }

  /**
   * Resolves with the terminal record of `taskId`. Waiting never changes the
   * task: when the wait elapses the record is left as it is.
   */
  awaitResult(taskId: string, timeoutMs: number, options: AwaitOptions = {}): Promise<TaskRecord> {
    try {
      assertTimeout(timeoutMs);
    } catch (error) {
      return Promise.reject(error);
    }

    const record = this.get(taskId);
    if (!record) {
      return Promise.reject(new UnknownTaskError(taskId));
    }
    if (isTerminal(record.status)) {
      return Promise.resolve(record);
    }

    const signal = options.signal;
    if (signal?.aborted) {
      return Promise.reject(new AbortedError(`Wait for task ${taskId} was aborted`));
    }

    return new Promise<TaskRecord>((resolve, reject) => {
      let waiters = this.waiters.get(taskId);
      if (!waiters) {
        waiters = new Set();
        this.waiters.set(taskId, waiters);
      }
      const owner = waiters;

      const release = (): void => {
        cancelDeadline();
        signal?.removeEventListener('abort', onAbort);
        owner.delete(waiter);
        if (owner.size === 0 && this.waiters.get(taskId) === owner) {
          this.waiters.delete(taskId);
        }
      };

      const waiter: Waiter = (terminal) => {
        release();
        resolve(terminal);
      };

      const onAbort = (): void => {
        release();
        reject(new AbortedError(`Wait for task ${taskId} was aborted`));
      };

      const cancelDeadline = startDeadline(timeoutMs, () => {
        release();
        reject(new TaskTimeoutError(taskId, timeoutMs));
      });

      owner.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  listByOwner(agentId: string): TaskRecord[] {
    this.evictExpired();
    return [...this.records.values()].filter((record) => record.ownerAgent === agentId);
  }

  stats(): TaskStats {
    this.evictExpired();
    const stats: TaskStats = { pending: 0, running: 0, completed: 0, failed: 0, timed_out: 0 };
    for (const record of this.records.values()) {
      stats[record.status] += 1;
    }
    return stats;
  }

  /** Drops terminal records older than the retention window. Returns how many were removed. */
  evictExpired(): number {
    const cutoff = this.getTime() - this.retentionMs;
    let evicted = 0;
    for (const [taskId, record] of this.records) {
      if (record.completedAt !== undefined && record.completedAt <= cutoff) {
        this.records.delete(taskId);
        evicted += 1;
      }
    }
    return evicted;
  }

  private transition(taskId: string, to: TaskStatus, next: (record: TaskRecord) => TaskRecord): TaskRecord {
    const record = this.get(taskId);
    if (!record) {
      throw new UnknownTaskError(taskId);
    }
    if (!ALLOWED_TRANSITIONS[record.status].includes(to)) {
      throw new InvalidTransitionError(taskId, record.status, to);
    }

    const updated = Object.freeze(next(record));
    this.records.set(taskId, updated);

    if (isTerminal(to)) {
      const waiters = this.waiters.get(taskId);
      this.waiters.delete(taskId);
      for (const waiter of waiters ?? []) {
        waiter(updated);
      }
    }
    return updated;
  }
}
