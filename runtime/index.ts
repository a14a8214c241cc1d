/**
 * Runtime module: agent lifecycle, heartbeat, dispatch handling and shutdown drain.
 */

export { AgentRuntime } from './agent-runtime';
export type { AgentRuntimeOptions, RuntimeState, RuntimeTimers, RuntimeTransition } from './types';
