export type RuntimeAuditEvent =
  | 'runtime_started'
  | 'runtime_stopped'
  | 'task_submitted'
  | 'task_started'
  | 'task_completed'
  | 'task_failed'
  | 'task_timed_out';

export interface RuntimeAuditContext {
  agentId: string;
  taskId?: string;
  event: RuntimeAuditEvent;
  data?: Record<string, unknown>;
}

/** Sink for runtime lifecycle and task transition events. */
export interface RuntimeAuditLogger {
  logRuntimeEvent(context: RuntimeAuditContext): void | Promise<void>;
}

const DEFAULT_SENSITIVE_FIELDS = [
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credential'
];

/**
 * Replaces values whose key contains a sensitive pattern (case-insensitive)
 * with `[REDACTED]`, recursing into arrays and objects.
 */
export function redactObject(
  value: unknown,
  sensitiveFields: string[] = DEFAULT_SENSITIVE_FIELDS,
  visited: WeakSet<object> = new WeakSet()
): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (visited.has(value)) {
    return '[CIRCULAR]';
  }
  visited.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactObject(item, sensitiveFields, visited));
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    if (sensitiveFields.some((pattern) => lowerKey.includes(pattern))) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactObject(nested, sensitiveFields, visited);
    }
  }
  return result;
}

export class ConsoleAuditLogger implements RuntimeAuditLogger {
  constructor(
    private readonly getTime: () => number = () => Date.now(),
    private readonly sensitiveFields: string[] = DEFAULT_SENSITIVE_FIELDS
  ) {}

  logRuntimeEvent(context: RuntimeAuditContext): void {
    const line = JSON.stringify({
      timestamp: new Date(this.getTime()).toISOString(),
      ...context,
      data: context.data ? redactObject(context.data, this.sensitiveFields) : undefined
    });
    console.log(`[AUDIT] ${line}`);
  }
}
