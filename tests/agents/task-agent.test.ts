import { TaskAgent } from '../../agents/task-agent';
import type { AgentContext } from '../../agents/types';
import { BusClient } from '../../bus/bus-client';
import { InMemoryTransport } from '../../bus/in-memory-transport';
import type { Message } from '../../bus/message';
import { AgentHandlerError } from '../../core/errors';
import { silentLogger } from '../../core/logging/logger';
import { MemoryManager } from '../../memory/memory-manager';
import { InMemoryMemoryRepository } from '../../memory/repositories/in-memory-memory-repository';

function dispatchMessage(payload: Record<string, unknown>): Message {
  return {
    id: 'm-1',
    topic: 'dispatch.task-agent-1',
    kind: 'request',
    payload,
    correlationId: 'c-1',
    replyTo: 'reply.orchestrator.c-1',
    sender: 'orchestrator',
    sentAt: 1000
  };
}

describe('TaskAgent', () => {
  let memory: MemoryManager;
  let context: AgentContext;

  beforeEach(() => {
    memory = new MemoryManager({
      durable: new InMemoryMemoryRepository(),
      working: new InMemoryMemoryRepository(),
      getTime: () => 1000
    });
    context = {
      agentId: 'task-agent-1',
      memory,
      bus: new BusClient({ transport: new InMemoryTransport() }),
      logger: silentLogger,
      signal: new AbortController().signal
    };
  });

  it('offers the task capability', () => {
    const agent = new TaskAgent();

    expect(agent.agentType).toBe('task-agent');
    expect(agent.capabilities()).toEqual(['task']);
  });

  it('records the task in episodic and working memory', async () => {
    const agent = new TaskAgent();

    const result = await agent.receive(
      dispatchMessage({ taskId: 't-7', dispatchId: 'd-1', description: 'Book the studio', capability: 'task' }),
      context
    );

    expect(result).toEqual({ summary: 'Recorded task: Book the studio', memoryKey: 'task:t-7' });

    const episode = await memory.retrieveItem('episodic', 'task:t-7');
    expect(episode.value).toEqual({
      taskId: 't-7',
      description: 'Book the studio',
      capability: 'task',
      handledBy: 'task-agent-1'
    });
    expect(episode.metadata).toEqual({ capability: 'task', agentId: 'task-agent-1' });

    const current = await memory.retrieveItem('working', 'task-agent-1:current-task');
    expect(current.value).toEqual({ taskId: 't-7', description: 'Book the studio' });
    expect(current.ttlMs).toBe(600_000);
  });

  it('rejects messages that are not dispatches', async () => {
    const agent = new TaskAgent();

    await expect(agent.receive(dispatchMessage({ note: 'hello' }), context)).rejects.toThrow(
      new AgentHandlerError('Unsupported message on dispatch.task-agent-1')
    );
  });
});
