/**
 * Pure helpers for the fleet control CLI: command parsing, response schemas
 * and formatting. Exported for testing.
 */

import { z } from 'zod';

export type ControlCommand =
  | { kind: 'task'; description: string; capability?: string }
  | { kind: 'ping'; agentId: string }
  | { kind: 'status' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'invalid'; message: string };

export const HELP_TEXT = [
  'Commands:',
  '  task [@capability] <description>  submit a task and wait for its outcome',
  '  ping <agentId>                    show an agent\'s last heartbeat',
  '  status                            list agents and task counts',
  '  help                              show this help',
  '  quit                              leave the CLI'
].join('\n');

export function parseCommand(line: string): ControlCommand {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'invalid', message: 'Type a command, or "help" to list them' };
  }
  const [head = '', ...rest] = trimmed.split(/\s+/);
  const verb = head.toLowerCase();

  switch (verb) {
    case 'task': {
      let capability: string | undefined;
      const words = [...rest];
      if (words[0]?.startsWith('@')) {
        capability = words.shift()?.slice(1);
        if (!capability) {
          return { kind: 'invalid', message: 'Capability after "@" must not be empty' };
        }
      }
      const description = words.join(' ');
      if (!description) {
        return { kind: 'invalid', message: 'Usage: task [@capability] <description>' };
      }
      return capability ? { kind: 'task', description, capability } : { kind: 'task', description };
    }
    case 'ping':
      if (rest.length !== 1 || !rest[0]) {
        return { kind: 'invalid', message: 'Usage: ping <agentId>' };
      }
      return { kind: 'ping', agentId: rest[0] };
    case 'status':
      return { kind: 'status' };
    case 'help':
    case '?':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    default:
      return { kind: 'invalid', message: `Unknown command "${head}". Type "help" to list commands` };
  }
}

const errorSchema = z.object({ name: z.string(), code: z.string(), message: z.string() });

export const taskViewSchema = z.object({
  taskId: z.string(),
  description: z.unknown(),
  requiredCapability: z.string(),
  status: z.string(),
  assignedAgent: z.string().optional(),
  attempts: z.number(),
  lastError: errorSchema.passthrough().optional(),
  result: z.unknown().optional()
});

export const agentViewSchema = z.object({
  agentId: z.string(),
  agentType: z.string(),
  capabilities: z.array(z.string()),
  status: z.string(),
  lastHeartbeat: z.number()
});

export const statusViewSchema = z.object({
  agents: z.array(agentViewSchema),
  tasks: z.record(z.number())
});

export const pingViewSchema = z.object({
  agentId: z.string(),
  agentType: z.string(),
  status: z.string(),
  lastHeartbeat: z.number(),
  ageMs: z.number()
});

export type TaskView = z.infer<typeof taskViewSchema>;
export type StatusView = z.infer<typeof statusViewSchema>;
export type PingView = z.infer<typeof pingViewSchema>;

export function formatDurationMs(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  return `${Math.floor(ms / 60_000)}m ${Math.round((ms % 60_000) / 1000)}s`;
}

export function formatTask(task: TaskView): string {
  const lines: string[] = [`Task ${task.taskId}: ${task.status}`];
  lines.push(`Capability: ${task.requiredCapability}`);
  if (task.assignedAgent) lines.push(`Agent: ${task.assignedAgent}`);
  if (task.attempts > 0) lines.push(`Failed attempts: ${task.attempts}`);
  if (task.lastError) lines.push(`Error: ${task.lastError.code}: ${task.lastError.message}`);
  if (task.result !== undefined) {
    const summary = summarize(task.result);
    lines.push(summary === undefined ? `Result: ${JSON.stringify(task.result)}` : `Result: ${summary}`);
  }
  return lines.join('\n');
}

export function formatStatus(status: StatusView): string {
  const lines: string[] = [];
  if (status.agents.length === 0) {
    lines.push('No agents registered');
  } else {
    lines.push(`Agents (${status.agents.length}):`);
    for (const agent of status.agents) {
      lines.push(`  ${agent.agentId}  ${agent.agentType}  ${agent.status}  [${agent.capabilities.join(', ')}]`);
    }
  }
  const counts = Object.entries(status.tasks)
    .map(([name, count]) => `${name}=${count}`)
    .join(' ');
  lines.push(`Tasks: ${counts}`);
  return lines.join('\n');
}

export function formatPing(ping: PingView): string {
  return `${ping.agentId} (${ping.agentType}) is ${ping.status}, last heartbeat ${formatDurationMs(ping.ageMs)} ago`;
}

function summarize(result: unknown): string | undefined {
  if (result && typeof result === 'object' && 'summary' in result && typeof result.summary === 'string') {
    return result.summary;
  }
  return undefined;
}
