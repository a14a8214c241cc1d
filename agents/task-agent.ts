import type { Message, Payload } from '../bus/message';
import { AgentHandlerError } from '../core/errors';
import { describeTask, dispatchRequestSchema } from '../orchestrator/protocol';
import type { AgentContext, FleetAgent } from './types';

/** Working-memory lifetime of the note kept for the task being handled. */
const CURRENT_TASK_TTL_MS = 10 * 60 * 1000;

/**
 * General-purpose agent for the default `task` capability: it files every
 * task it receives as episodic memory and reports what it recorded.
 */
export class TaskAgent implements FleetAgent {
  readonly agentType = 'task-agent';

  capabilities(): string[] {
    return ['task'];
  }

  async receive(message: Message, context: AgentContext): Promise<Payload> {
    const parsed = dispatchRequestSchema.safeParse(message.payload);
    if (!parsed.success) {
      throw new AgentHandlerError(`Unsupported message on ${message.topic}`);
    }
    const { taskId, description, capability } = parsed.data;

    await context.memory.store(
      'working',
      `${context.agentId}:current-task`,
      { taskId, description },
      { ttlMs: CURRENT_TASK_TTL_MS }
    );
    const memoryKey = `task:${taskId}`;
    await context.memory.store(
      'episodic',
      memoryKey,
      { taskId, description, capability, handledBy: context.agentId },
      { metadata: { capability, agentId: context.agentId } }
    );
    context.logger.info('Recorded task', { taskId });

    return { summary: `Recorded task: ${describeTask(description)}`, memoryKey };
  }
}
