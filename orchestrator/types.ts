import type { AgentRecord, AgentStatus } from '../agents/types';
import type { Payload } from '../bus/message';
import type { ErrorDescriptor } from '../core/errors';
import type { JsonValue } from '../memory/types';

export type TaskStatus = 'pending' | 'dispatched' | 'in_progress' | 'completed' | 'failed';

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'failed'];

export interface Task {
  taskId: string;
  /** Plain text or structured task data. */
  description: JsonValue;
  requiredCapability: string;
  status: TaskStatus;
  assignedAgent?: string;
  /** Failed dispatch attempts so far. */
  attempts: number;
  lastError?: ErrorDescriptor;
  result?: Payload;
  submittedAt: number;
  updatedAt: number;
  /** After this instant a task still waiting for an agent fails. */
  deadlineAt: number;
}

export interface SubmitTaskOptions {
  /** Overrides the configured task deadline. */
  deadlineMs?: number;
}

export interface PingResult {
  agentId: string;
  agentType: string;
  status: AgentStatus;
  lastHeartbeat: number;
  /** Time since the last heartbeat. */
  ageMs: number;
}

export interface FleetStatus {
  agents: AgentRecord[];
  tasks: Record<TaskStatus, number>;
}

export interface SystemStats {
  /** Time since the orchestrator started; 0 while stopped. */
  uptimeMs: number;
  agents: Record<AgentStatus, number>;
  /** Agents ready or busy. */
  agentsOnline: number;
  /** Agent types in the catalog, when one is configured. */
  agentTypesExpected?: number;
  tasks: Record<TaskStatus, number>;
  health: 'healthy' | 'degraded';
}
