import { z } from 'zod';
import { parseAgentSpecs } from '../agents/agent-factory';
import type { AgentSpec } from '../agents/types';
import type { LogLevel } from '../logging/logger';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  BUS_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
  DATABASE_URL: z.string().min(1).optional(),
  LLM_PROVIDER: z.enum(['mock', 'openai']).default('mock'),
  MOCK_LLM_RESPONSE: z.string().default('mock-response'),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  TASK_TIMEOUT_MS: positiveInt(300_000),
  TASK_RETENTION_MS: z.coerce.number().int().nonnegative().default(600_000),
  REQUEST_TIMEOUT_MS: positiveInt(30_000),
  MAX_CONCURRENT_TASKS: positiveInt(1),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  AGENTS: z.string().default('research:research-1,synthesis:synthesis-1')
}).superRefine((env, context) => {
  if (env.BUS_DRIVER === 'postgres' && !env.DATABASE_URL) {
    context.addIssue({ code: z.ZodIssueCode.custom, path: ['DATABASE_URL'], message: 'is required when BUS_DRIVER=postgres' });
  }
  if (env.LLM_PROVIDER === 'openai') {
    for (const name of ['OPENAI_API_KEY', 'OPENAI_MODEL'] as const) {
      if (!env[name]) {
        context.addIssue({ code: z.ZodIssueCode.custom, path: [name], message: 'is required when LLM_PROVIDER=openai' });
      }
    }
  }
});

export type BusSettings =
  | { driver: 'memory' }
  | { driver: 'postgres'; databaseUrl: string };

export type CompletionSettings =
  | { provider: 'mock'; response: string }
  | { provider: 'openai'; apiKey: string; model: string; baseUrl: string };

export interface Settings {
  bus: BusSettings;
  completion: CompletionSettings;
  taskTimeoutMs: number;
  taskRetentionMs: number;
  requestTimeoutMs: number;
  maxConcurrentTasks: number;
  logLevel: LogLevel;
  port: number;
  agents: AgentSpec[];
}

/**
 * Reads and validates configuration from environment variables. Throws one
 * error naming every offending variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  let agents: AgentSpec[];
  try {
    agents = parseAgentSpecs(values.AGENTS);
  } catch (error) {
    throw new Error(`Invalid configuration: AGENTS: ${error instanceof Error ? error.message : String(error)}`);
  }

  return {
    bus: values.BUS_DRIVER === 'postgres' && values.DATABASE_URL
      ? { driver: 'postgres', databaseUrl: values.DATABASE_URL }
      : { driver: 'memory' },
    completion: values.LLM_PROVIDER === 'openai' && values.OPENAI_API_KEY && values.OPENAI_MODEL
      ? { provider: 'openai', apiKey: values.OPENAI_API_KEY, model: values.OPENAI_MODEL, baseUrl: values.OPENAI_BASE_URL }
      : { provider: 'mock', response: values.MOCK_LLM_RESPONSE },
    taskTimeoutMs: values.TASK_TIMEOUT_MS,
    taskRetentionMs: values.TASK_RETENTION_MS,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    maxConcurrentTasks: values.MAX_CONCURRENT_TASKS,
    logLevel: values.LOG_LEVEL,
    port: values.PORT,
    agents
  };
}

/** Unset and empty variables both fall back to the default. */
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}
