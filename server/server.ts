import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { buildContainer, type BuildContainerOptions } from './container';
import { loadConfig } from '../core/config';
import { FleetError, InvalidArgumentError, NotFoundError } from '../core/errors';
import { ConsoleLogger } from '../core/logging/logger';
import { assertSafePayload } from '../core/validation';
import { jsonValueSchema } from '../memory/types';

const submitTaskSchema = z
  .object({
    /** Plain text, or structured task data as a JSON object or array. */
    description: z.union([z.string().trim().min(1).max(10_000), z.record(jsonValueSchema), z.array(jsonValueSchema)]),
    capability: z.string().trim().min(1).max(256).optional(),
    deadlineMs: z.number().int().nonnegative().optional(),
    /** Hold the response until the task completes or fails. */
    wait: z.boolean().default(false)
  })
  .strict();

const taskParamsSchema = z.object({ taskId: z.string().min(1) });
const agentParamsSchema = z.object({ agentId: z.string().min(1) });

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function statusCodeFor(error: Error & { statusCode?: number }): number {
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof InvalidArgumentError) {
    return 400;
  }
  if (error instanceof FleetError) {
    return 500;
  }
  // Fastify's own errors (bad JSON, oversized body) carry a status.
  return error.statusCode ?? 500;
}

export async function buildServer(
  options: { logger?: boolean; container?: BuildContainerOptions } = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? true });
  const containerContext = await buildContainer(options.container);
  const { orchestrator, memory } = containerContext;

  fastify.addHook('onClose', async () => {
    await containerContext.cleanup();
  });

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = statusCodeFor(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    }
    reply.code(statusCode).send({
      error: error.message,
      ...(error instanceof FleetError ? { code: error.code } : {})
    });
  });

  fastify.get('/health', async () => ({ status: 'ok', orchestrator: orchestrator.isRunning ? 'running' : 'stopped' }));

  fastify.post('/tasks', async (request, reply) => {
    assertSafePayload(request.body);
    const parsed = submitTaskSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: formatIssues(parsed.error) });
    }
    if (!orchestrator.isRunning) {
      return reply.code(503).send({ error: 'Orchestrator is not running' });
    }

    const { description, capability, deadlineMs, wait } = parsed.data;
    const taskId = orchestrator.submitTask(description, capability, { deadlineMs });
    if (!wait) {
      return reply.code(202).send({ taskId, status: orchestrator.getTask(taskId).status });
    }
    return reply.code(200).send(await orchestrator.waitForTask(taskId));
  });

  fastify.get('/tasks', async () => ({ tasks: orchestrator.listTasks() }));

  fastify.get('/tasks/:taskId', async (request, reply) => {
    const parsed = taskParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: formatIssues(parsed.error) });
    }
    return orchestrator.getTask(parsed.data.taskId);
  });

  fastify.get('/status', async () => orchestrator.status());

  fastify.get('/agents/:agentId/ping', async (request, reply) => {
    const parsed = agentParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: formatIssues(parsed.error) });
    }
    return orchestrator.ping(parsed.data.agentId);
  });

  fastify.get('/memory/stats', async () => memory.stats());

  try {
    await containerContext.start();
  } catch (error) {
    await fastify.close();
    throw error;
  }
  return fastify;
}

if (require.main === module) {
  const logger = new ConsoleLogger({ scope: 'server' });
  const start = async (): Promise<void> => {
    const config = loadConfig();
    const fastify = await buildServer({ container: { config } });
    await fastify.listen({ port: config.port, host: '0.0.0.0' });

    const shutdown = (signal: string): void => {
      logger.info('Shutting down', { signal });
      fastify.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', { error });
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  };

  start().catch((error: unknown) => {
    logger.error('Failed to start server', { error });
    process.exit(1);
  });
}
