import { z } from 'zod';
import type { ErrorDescriptor } from '../core/errors';
import { jsonValueSchema, type JsonValue } from '../memory/types';

export const TOPICS = {
  register: 'agent.register',
  heartbeat: 'agent.heartbeat',
  status: 'agent.status',
  unhealthy: 'agent.unhealthy',
  result: 'agent.result',
  error: 'agent.error',
  taskStarted: 'task.started',
  taskCompleted: 'task.completed',
  taskFailed: 'task.failed',
  systemStats: 'system.stats'
} as const;

export function dispatchTopic(agentId: string): string {
  return `dispatch.${agentId}`;
}

export const errorDescriptorSchema: z.ZodType<ErrorDescriptor> = z.object({
  name: z.string(),
  code: z.enum([
    'BUS_UNAVAILABLE',
    'TIMEOUT',
    'NOT_FOUND',
    'INVALID_ARGUMENT',
    'NO_ELIGIBLE_AGENT',
    'AGENT_HANDLER_ERROR',
    'TASK_FAILED',
    'CANCELLED',
    'UNKNOWN'
  ]),
  message: z.string(),
  fatal: z.boolean().optional()
});

export const registerRequestSchema = z.object({
  agentType: z.string().min(1),
  capabilities: z.array(z.string()).optional()
});

export const registerResponseSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), agentId: z.string().min(1) }),
  z.object({ ok: z.literal(false), error: errorDescriptorSchema })
]);

export const heartbeatSchema = z.object({
  agentId: z.string().min(1),
  agentType: z.string().optional(),
  sentAt: z.number().optional()
});

export const statusEventSchema = z.object({
  agentId: z.string().min(1),
  status: z.enum(['ready', 'stopped'])
});

export const dispatchRequestSchema = z.object({
  taskId: z.string().min(1),
  dispatchId: z.string().min(1),
  description: jsonValueSchema,
  capability: z.string().min(1)
});

export type DispatchRequest = z.infer<typeof dispatchRequestSchema>;

/** Single-line text for a task description. Structured descriptions render as JSON. */
export function describeTask(description: JsonValue): string {
  return typeof description === 'string' ? description : JSON.stringify(description);
}

export const dispatchResponseSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: z.record(z.unknown()) }),
  z.object({ ok: z.literal(false), error: errorDescriptorSchema })
]);

export type DispatchResponse = z.infer<typeof dispatchResponseSchema>;

export const taskStartedSchema = z.object({
  taskId: z.string().min(1),
  dispatchId: z.string().min(1),
  agentId: z.string().min(1)
});
