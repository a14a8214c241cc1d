/**
 * In-process fleet: an orchestrator, a general task agent and a small photo
 * agent sharing one in-memory bus. Submits a couple of tasks and prints the
 * fleet status.
 *
 * Run with: npx ts-node examples/agent-fleet.example.ts
 */

import type { AgentContext, FleetAgent } from '../agents/types';
import type { Message, Payload } from '../bus/message';
import { loadConfig } from '../core/config';
import { AgentHandlerError } from '../core/errors';
import { ConsoleLogger, type Logger } from '../core/logging/logger';
import { describeTask, dispatchRequestSchema } from '../orchestrator/protocol';
import type { Task } from '../orchestrator/types';
import { buildContainer } from '../server/container';

/** Files a shoot under its client and remembers where it went. */
export class PhotoAgent implements FleetAgent {
  readonly agentType = 'photo-agent';

  capabilities(): string[] {
    return ['photo', 'photo.organize'];
  }

  async receive(message: Message, context: AgentContext): Promise<Payload> {
    const parsed = dispatchRequestSchema.safeParse(message.payload);
    if (!parsed.success) {
      throw new AgentHandlerError(`Unsupported message on ${message.topic}`);
    }
    const client = /for (\w+)/i.exec(describeTask(parsed.data.description))?.[1]?.toLowerCase() ?? 'unsorted';
    const folder = `clients/${client}/${parsed.data.taskId.slice(0, 8)}`;
    await context.memory.store('semantic', `folder:${parsed.data.taskId}`, { folder, client });
    return { summary: `Filed shoot in ${folder}`, folder };
  }
}

export interface FleetDemoResult {
  tasks: Task[];
  agentTypes: string[];
}

export async function runFleetDemo(logger: Logger): Promise<FleetDemoResult> {
  const context = await buildContainer({
    config: loadConfig({ HEARTBEAT_INTERVAL_MS: '1000', REQUEST_TIMEOUT_MS: '5000' }),
    logger,
    localAgents: true
  });
  await context.start();

  try {
    await context.hostAgent(new PhotoAgent());
    const tasks = [
      await context.orchestrator.runTask('Organize the wedding shoot for Alvarez', 'photo.organize'),
      await context.orchestrator.runTask('Send the April newsletter')
    ];
    const agentTypes = context.orchestrator
      .status()
      .agents.map((agent) => agent.agentType)
      .sort();
    return { tasks, agentTypes };
  } finally {
    await context.cleanup();
  }
}

async function main(): Promise<void> {
  const logger = new ConsoleLogger({ level: 'info', scope: 'example' });
  const { tasks, agentTypes } = await runFleetDemo(logger);
  for (const task of tasks) {
    console.log(`${task.taskId} ${task.status} via ${task.assignedAgent ?? '-'}: ${JSON.stringify(task.result)}`);
  }
  console.log(`Agents seen: ${agentTypes.join(', ')}`);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
