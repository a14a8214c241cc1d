/**
 * Runtime types for the agent runtime layer.
 */

import type { FleetAgent } from '../agents/types';
import type { MessageBus } from '../bus/message-bus';
import type { Logger } from '../core/logging/logger';
import type { IMemoryManager } from '../memory/memory-manager';

/**
 * created → starting → running → stopping → stopped, plus failed from
 * starting or running when the runtime itself breaks.
 */
export type RuntimeState = 'created' | 'starting' | 'running' | 'stopping' | 'stopped' | 'failed';

export interface RuntimeTransition {
  agentId?: string;
  from: RuntimeState;
  to: RuntimeState;
  /** Present on transitions to failed. */
  error?: unknown;
}

export interface RuntimeTimers {
  setInterval: typeof setInterval;
  clearInterval: typeof clearInterval;
  setTimeout: typeof setTimeout;
  clearTimeout: typeof clearTimeout;
}

/** Options for constructing AgentRuntime. */
export interface AgentRuntimeOptions {
  agent: FleetAgent;
  bus: MessageBus;
  memory: IMemoryManager;
  logger?: Logger;
  /** Run under a known identity instead of registering over the bus. */
  agentId?: string;
  /** Heartbeat interval in ms. */
  heartbeatIntervalMs: number;
  /** How long registration may take. Default: 30000. */
  registrationTimeoutMs?: number;
  /** How long stop() waits for in-flight handlers before abandoning them. Default: 5000. */
  shutdownGraceMs?: number;
  /** Optional clock for deterministic tests. Default: Date.now */
  getTime?: () => number;
  /** Optional timer functions for deterministic tests. */
  timers?: RuntimeTimers;
  /** Called on every state change. */
  onTransition?: (transition: RuntimeTransition) => void;
}
