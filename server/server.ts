import Fastify, { type FastifyReply } from 'fastify';
import { z } from 'zod';
import { toPayload } from '../agents/payload';
import { loadSettings } from '../config/settings';
import { InvalidRequestError, TaskFailedError, UnknownAgentError, type ErrorKind } from '../core/errors';
import { settle, type Result } from '../core/result';
import type { AgentRuntime } from '../runtime/agent-runtime';
import { buildContainer, type BuildContainerOptions } from './container';

const agentParamsSchema = z.object({
  agentId: z.string().min(1)
});

const taskParamsSchema = agentParamsSchema.extend({
  taskId: z.string().min(1)
});

const submitTaskSchema = z.object({
  input: z.record(z.unknown())
});

const resultQuerySchema = z.object({
  timeoutMs: z.coerce.number().int().positive().max(600_000).optional()
});

const requestSchema = z.object({
  to: z.string().min(1),
  payload: z.record(z.unknown()).default({}),
  timeoutMs: z.number().int().positive().max(600_000).optional()
});

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  UnknownTask: 404,
  UnknownAgent: 404,
  TaskTimeout: 408,
  RequestTimeout: 408,
  NotStarted: 409,
  RuntimeStopped: 409,
  InvalidTransition: 409,
  PeerGone: 410,
  TaskFailed: 422,
  QuotaExceeded: 429,
  TransportUnavailable: 503,
  ServiceUnavailable: 503,
  TaskTimedOut: 504,
  InvalidEnvelope: 400,
  InvalidRequest: 400
};

export async function buildServer(options: { logger?: boolean; container?: BuildContainerOptions } = {}) {
  const fastify = Fastify({ logger: options.logger ?? true });
  const context = await buildContainer(options.container);
  const { agents, settings } = context;

  fastify.addHook('onClose', async () => {
    await context.cleanup();
  });

  const requireAgent = (agentId: string): AgentRuntime => {
    const agent = agents.get(agentId);
    if (!agent) {
      throw new UnknownAgentError(agentId);
    }
    return agent;
  };

  fastify.get('/health', async () => ({ status: 'ok' }));

  fastify.get('/agents', async () => ({ agents: agents.list() }));

  fastify.post('/agents/:agentId/tasks', async (request, reply) => {
    const params = agentParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    const body = submitTaskSchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const { agentId } = params.data;
    const { input } = body.data;
    const result = await settle(() => ({ taskId: requireAgent(agentId).submitTask(toPayload(input)) }));
    return sendResult(reply, result, 202);
  });

  fastify.get('/agents/:agentId/tasks/:taskId', async (request, reply) => {
    const params = taskParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    const query = resultQuerySchema.safeParse(request.query);
    if (!query.success) {
      return sendValidationError(reply, query.error);
    }

    const { agentId, taskId } = params.data;
    const timeoutMs = query.data.timeoutMs ?? settings.requestTimeoutMs;
    const result = await settle(() => requireAgent(agentId).getTaskResult(taskId, timeoutMs));
    return sendResult(reply, result);
  });

  fastify.post('/agents/:agentId/requests', async (request, reply) => {
    const params = agentParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    const body = requestSchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const { agentId } = params.data;
    const { to, payload, timeoutMs } = body.data;
    const result = await settle(async () => {
      const response = await requireAgent(agentId).request(to, toPayload(payload), timeoutMs ?? settings.requestTimeoutMs);
      return response.payload;
    });
    return sendResult(reply, result);
  });

  return fastify;
}

function sendResult<T>(reply: FastifyReply, result: Result<T>, successCode = 200): FastifyReply {
  if (result.ok) {
    return reply.code(successCode).send({ ok: true, value: result.value });
  }

  const error = result.error;
  const body = error instanceof TaskFailedError
    ? { kind: error.kind, message: error.message, failure: error.failure }
    : { kind: error.kind, message: error.message };
  return reply.code(STATUS_BY_KIND[error.kind] ?? 500).send({ ok: false, error: body });
}

function sendValidationError(reply: FastifyReply, error: z.ZodError): FastifyReply {
  const message = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  const invalid = new InvalidRequestError(message);
  return reply.code(400).send({ ok: false, error: invalid.toJSON() });
}

if (require.main === module) {
  buildServer().then(async (fastify) => {
    const { port } = loadSettings();
    try {
      await fastify.listen({ port, host: '0.0.0.0' });
      console.log(`Server listening on port ${port}`);
    } catch (error) {
      console.error(`[ERROR] Failed to start server on port ${port}:`, error);
      process.exit(1);
    }
  }).catch((error: unknown) => {
    console.error('[ERROR] Failed to build server:', error);
    process.exit(1);
  });
}
