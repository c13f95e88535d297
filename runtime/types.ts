/**
 * Types for the agent runtime: variants, options, status and metrics.
 */

import type { CommunicationHandler } from '../agents/communication-handler';
import type { Envelope } from '../agents/message';
import type { Payload } from '../agents/payload';
import type { CompletionCapability } from '../core/contracts/completion';
import type { RuntimeAuditLogger } from '../logging/audit-logger';
import type { Logger } from '../logging/logger';
import type { MemoryCapability, MemoryRecord } from '../memory/types';
import type { TaskRegistry } from '../tasks/task-registry';

export type AgentState = 'stopped' | 'starting' | 'running' | 'stopping';

export type AgentRole = 'research' | 'synthesis' | 'general';

/** What distinguishes one kind of agent from another: how it turns a task into a prompt. */
export interface AgentVariant {
  readonly role: AgentRole;
  readonly systemInstruction: string;
  /** Tags attached to outputs written to memory. */
  readonly memoryTags: readonly string[];
  /** Text used to recall related memories. Throws InvalidRequestError when the input has none. */
  memoryQuery(input: Readonly<Payload>): string;
  buildPrompt(input: Readonly<Payload>, memories: readonly MemoryRecord[]): string;
}

export type ConfidenceScorer = (text: string) => number;

export type MessageHook = (envelope: Envelope) => void | Promise<void>;

export interface AgentRuntimeOptions {
  agentId: string;
  variant: AgentVariant;
  completion: CompletionCapability;
  /** Shared by every runtime of the process. */
  tasks: TaskRegistry;
  memory?: MemoryCapability;
  /** Without one the runtime only serves local submissions. */
  communication?: CommunicationHandler;
  logger?: Logger;
  auditLogger?: RuntimeAuditLogger;
  /** Optional clock for deterministic tests. Default: Date.now */
  getTime?: () => number;
  /** Tasks processed at once. Default: 1. */
  maxConcurrentTasks?: number;
  /** Per-task deadline. Default: 300000 (5 min). */
  taskTimeoutMs?: number;
  /** Wait used for incoming requests without `timeout_ms`, and for outgoing requests. Default: 30000. */
  requestTimeoutMs?: number;
  /** Outputs scoring at least this are written to memory. Default: 0.6. */
  rememberThreshold?: number;
  /** Memories recalled per task. Default: 5. */
  memorySearchLimit?: number;
  maxTokens?: number;
  temperature?: number;
  scorer?: ConfidenceScorer;
  /** Receives every envelope that is not a request. */
  onMessage?: MessageHook;
}

export interface AgentStatus {
  agentId: string;
  role: AgentRole;
  state: AgentState;
  queueDepth: number;
  inFlight: number;
  maxConcurrentTasks: number;
}

export interface AgentMetrics {
  tasksProcessed: number;
  tasksFailed: number;
  tasksTimedOut: number;
  totalProcessingTimeMs: number;
  averageProcessingTimeMs: number;
}
