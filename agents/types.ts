import type { Message, Payload } from '../bus/message';
import type { MessageBus } from '../bus/message-bus';
import type { Logger } from '../core/logging/logger';
import type { IMemoryManager } from '../memory/memory-manager';

export type AgentStatus = 'starting' | 'ready' | 'busy' | 'unhealthy' | 'stopped';

export interface AgentRecord {
  agentId: string;
  agentType: string;
  /** Sorted, without duplicates. */
  capabilities: string[];
  status: AgentStatus;
  lastHeartbeat: number;
  registeredAt: number;
}

/** Everything an agent may touch while handling one message. */
export interface AgentContext {
  agentId: string;
  memory: IMemoryManager;
  bus: MessageBus;
  logger: Logger;
  /** Fires when the runtime abandons the message during shutdown. */
  signal: AbortSignal;
}

/**
 * Domain logic of one agent type. The runtime owns lifecycle, heartbeats and
 * replies; an agent only turns a message into a result payload or throws.
 */
export interface FleetAgent {
  readonly agentType: string;
  capabilities(): string[];
  /** Event topics handled by one instance of this agent type, besides its dispatch topic. */
  eventTopics?(): string[];
  receive(message: Message, context: AgentContext): Promise<Payload>;
}
