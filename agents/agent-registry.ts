import { InvalidArgumentError } from '../core/errors';
import type { AgentCatalog } from '../core/config';
import type { AgentRecord, AgentStatus } from './types';

const AGENT_TYPE_PATTERN = /^[\w-]+$/;
const AGENT_ID_PATTERN = /^[\w:-]+$/;

export interface RegisterAgentInput {
  agentId: string;
  agentType: string;
  capabilities?: string[];
  now: number;
}

/**
 * Owns the fleet's agent records. Every mutation is synchronous, so a
 * heartbeat and a dispatch decision for the same record never interleave.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, AgentRecord>();

  constructor(private readonly catalog?: AgentCatalog) {}

  /**
   * Adds a record in `starting`. Registering an existing id replaces the
   * record, which is how a restarted agent rejoins under its old identity.
   */
  register(input: RegisterAgentInput): AgentRecord {
    if (!AGENT_TYPE_PATTERN.test(input.agentType)) {
      throw new InvalidArgumentError(`Invalid agent type "${input.agentType}"`);
    }
    if (!AGENT_ID_PATTERN.test(input.agentId)) {
      throw new InvalidArgumentError(`Invalid agent id "${input.agentId}"`);
    }

    const record: AgentRecord = {
      agentId: input.agentId,
      agentType: input.agentType,
      capabilities: this.resolveCapabilities(input.agentType, input.capabilities ?? []),
      status: 'starting',
      lastHeartbeat: input.now,
      registeredAt: input.now
    };
    this.agents.set(record.agentId, record);
    return copy(record);
  }

  remove(agentId: string): boolean {
    return this.agents.delete(agentId);
  }

  get(agentId: string): AgentRecord | undefined {
    const record = this.agents.get(agentId);
    return record ? copy(record) : undefined;
  }

  list(): AgentRecord[] {
    return [...this.agents.values()].map(copy);
  }

  /**
   * Records a heartbeat. A starting or unhealthy agent becomes ready; a stopped
   * one stays stopped until it registers again. Returns the updated record, or
   * undefined for an unknown agent.
   */
  recordHeartbeat(agentId: string, now: number): AgentRecord | undefined {
    const record = this.agents.get(agentId);
    if (!record) {
      return undefined;
    }
    record.lastHeartbeat = Math.max(record.lastHeartbeat, now);
    if (record.status === 'starting' || record.status === 'unhealthy') {
      record.status = 'ready';
    }
    return copy(record);
  }

  setStatus(agentId: string, status: AgentStatus): AgentRecord | undefined {
    const record = this.agents.get(agentId);
    if (!record) {
      return undefined;
    }
    record.status = status;
    return copy(record);
  }

  /** Moves `from` to `to` only when the record is currently in `from`. */
  transition(agentId: string, from: AgentStatus, to: AgentStatus): boolean {
    const record = this.agents.get(agentId);
    if (!record || record.status !== from) {
      return false;
    }
    record.status = to;
    return true;
  }

  /** Ready agents offering the capability, in registration order. */
  eligible(capability: string): AgentRecord[] {
    return [...this.agents.values()]
      .filter((record) => record.status === 'ready' && record.capabilities.includes(capability))
      .sort((a, b) => a.registeredAt - b.registeredAt || compare(a.agentId, b.agentId))
      .map(copy);
  }

  /**
   * Marks every live agent silent for longer than `maxSilenceMs` unhealthy and
   * returns the records that changed.
   */
  markSilent(now: number, maxSilenceMs: number): AgentRecord[] {
    const changed: AgentRecord[] = [];
    for (const record of this.agents.values()) {
      if (record.status === 'unhealthy' || record.status === 'stopped') {
        continue;
      }
      if (now - record.lastHeartbeat > maxSilenceMs) {
        record.status = 'unhealthy';
        changed.push(copy(record));
      }
    }
    return changed;
  }

  private resolveCapabilities(agentType: string, declared: string[]): string[] {
    const cleaned = [...new Set(declared.map((capability) => capability.trim()).filter(Boolean))].sort();
    if (!this.catalog) {
      if (cleaned.length === 0) {
        throw new InvalidArgumentError(`Agent type "${agentType}" declared no capabilities`);
      }
      return cleaned;
    }

    const entry = this.catalog[agentType];
    if (!entry) {
      throw new InvalidArgumentError(`Unknown agent type "${agentType}"`);
    }
    if (cleaned.length === 0) {
      return [...new Set(entry.capabilities)].sort();
    }
    const unknown = cleaned.filter((capability) => !entry.capabilities.includes(capability));
    if (unknown.length > 0) {
      throw new InvalidArgumentError(`Agent type "${agentType}" does not offer: ${unknown.join(', ')}`);
    }
    return cleaned;
  }
}

function copy(record: AgentRecord): AgentRecord {
  return { ...record, capabilities: [...record.capabilities] };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
