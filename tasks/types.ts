import type { TaskError } from '../core/errors';
import type { Payload } from '../agents/payload';

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'timed_out';

const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'timed_out'];

export interface TaskOutput {
  content: string;
  confidence: number;
  agentId: string;
  processingTimeMs: number;
  memoryMatches: number;
  /** Distinct URLs and numbered citations in `content`. */
  sourceCount: number;
}

export interface TaskRecord {
  readonly taskId: string;
  readonly ownerAgent: string;
  readonly input: Readonly<Payload>;
  readonly status: TaskStatus;
  readonly result?: Readonly<TaskOutput>;
  readonly error?: Readonly<TaskError>;
  readonly submittedAt: number;
  readonly startedAt?: number;
  readonly completedAt?: number;
}

export type TaskStats = Record<TaskStatus, number>;

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
