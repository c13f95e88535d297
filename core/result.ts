import { AgentError, InternalError, isAgentError } from './errors';

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: AgentError };

export async function settle<T>(work: Promise<T> | (() => T | Promise<T>)): Promise<Result<T>> {
  try {
    const value = typeof work === 'function' ? await work() : await work;
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: asAgentError(error) };
  }
}

export function asAgentError(error: unknown): AgentError {
  if (isAgentError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, { cause: error });
}
