export type ErrorKind =
  | 'TransportUnavailable'
  | 'PeerGone'
  | 'RequestTimeout'
  | 'Aborted'
  | 'UnknownTask'
  | 'UnknownAgent'
  | 'InvalidTransition'
  | 'TaskTimeout'
  | 'TaskTimedOut'
  | 'TaskFailed'
  | 'NotStarted'
  | 'RuntimeStopped'
  | 'InvalidEnvelope'
  | 'QuotaExceeded'
  | 'ServiceUnavailable'
  | 'InvalidRequest'
  | 'Internal';

/**
 * Serializable description of a failure, stored on task records and sent in
 * response payloads.
 */
export interface TaskError {
  kind: string;
  message: string;
}

export abstract class AgentError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean = false;

  toJSON(): TaskError {
    return { kind: this.kind, message: this.message };
  }
}

export class TransportUnavailableError extends AgentError {
  readonly kind = 'TransportUnavailable';
  override readonly retryable = true;
  override readonly name = 'TransportUnavailableError';
}

export class PeerGoneError extends AgentError {
  readonly kind = 'PeerGone';
  override readonly name = 'PeerGoneError';

  constructor(readonly agentId: string) {
    super(`Agent ${agentId} is no longer registered`);
  }
}

export class RequestTimeoutError extends AgentError {
  readonly kind = 'RequestTimeout';
  override readonly retryable = true;
  override readonly name = 'RequestTimeoutError';

  constructor(readonly to: string, readonly timeoutMs: number) {
    super(`Request to ${to} timed out after ${timeoutMs}ms`);
  }
}

export class AbortedError extends AgentError {
  readonly kind = 'Aborted';
  override readonly name = 'AbortedError';
}

export class UnknownTaskError extends AgentError {
  readonly kind = 'UnknownTask';
  override readonly name = 'UnknownTaskError';

  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
  }
}

export class UnknownAgentError extends AgentError {
  readonly kind = 'UnknownAgent';
  override readonly name = 'UnknownAgentError';

  constructor(readonly agentId: string) {
    super(`Agent ${agentId} not found`);
  }
}

export class InvalidTransitionError extends AgentError {
  readonly kind = 'InvalidTransition';
  override readonly name = 'InvalidTransitionError';

  constructor(readonly taskId: string, readonly from: string, readonly to: string) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
  }
}

export class TaskTimeoutError extends AgentError {
  readonly kind = 'TaskTimeout';
  override readonly retryable = true;
  override readonly name = 'TaskTimeoutError';

  constructor(readonly taskId: string, readonly timeoutMs: number) {
    super(`Task ${taskId} did not finish within ${timeoutMs}ms`);
  }
}

export class TaskTimedOutError extends AgentError {
  readonly kind = 'TaskTimedOut';
  override readonly name = 'TaskTimedOutError';

  constructor(readonly taskId: string, message?: string) {
    super(message ?? `Task ${taskId} exceeded its deadline`);
  }
}

export class TaskFailedError extends AgentError {
  readonly kind = 'TaskFailed';
  override readonly name = 'TaskFailedError';

  constructor(readonly taskId: string, readonly failure: TaskError) {
    super(`Task ${taskId} failed: ${failure.kind}: ${failure.message}`);
  }

  override toJSON(): TaskError & { failure: TaskError } {
    return { kind: this.kind, message: this.message, failure: this.failure };
  }
}

export class NotStartedError extends AgentError {
  readonly kind = 'NotStarted';
  override readonly name = 'NotStartedError';

  constructor(readonly agentId: string, readonly state: string) {
    super(`Agent ${agentId} is ${state}, not running`);
  }
}

export class RuntimeStoppedError extends AgentError {
  readonly kind = 'RuntimeStopped';
  override readonly name = 'RuntimeStoppedError';
}

export class InvalidEnvelopeError extends AgentError {
  readonly kind = 'InvalidEnvelope';
  override readonly name = 'InvalidEnvelopeError';
}

export class QuotaExceededError extends AgentError {
  readonly kind = 'QuotaExceeded';
  override readonly retryable = true;
  override readonly name = 'QuotaExceededError';
}

export class ServiceUnavailableError extends AgentError {
  readonly kind = 'ServiceUnavailable';
  override readonly retryable = true;
  override readonly name = 'ServiceUnavailableError';
}

export class InvalidRequestError extends AgentError {
  readonly kind = 'InvalidRequest';
  override readonly name = 'InvalidRequestError';
}

export class InternalError extends AgentError {
  readonly kind = 'Internal';
  override readonly name = 'InternalError';
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/**
 * Captures any thrown value as a TaskError. Domain errors keep their kind;
 * anything else is reported under its constructor name.
 */
export function toTaskError(error: unknown): TaskError {
  if (error instanceof AgentError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: error.name || 'Error', message: error.message };
  }
  return { kind: 'Error', message: String(error) };
}
