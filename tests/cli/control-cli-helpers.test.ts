import {
  formatDurationMs,
  formatPing,
  formatStatus,
  formatTask,
  parseCommand
} from '../../cli/control-cli-helpers';

describe('control-cli-helpers', () => {
  describe('parseCommand', () => {
    it('parses a task with the default capability', () => {
      expect(parseCommand('task  Sort the March shoot ')).toEqual({
        kind: 'task',
        description: 'Sort the March shoot'
      });
    });

    it('parses a task addressed to a capability', () => {
      expect(parseCommand('task @photo.organize Sort the March shoot')).toEqual({
        kind: 'task',
        description: 'Sort the March shoot',
        capability: 'photo.organize'
      });
    });

    it('rejects tasks without a description or with a bare @', () => {
      expect(parseCommand('task')).toEqual({ kind: 'invalid', message: 'Usage: task [@capability] <description>' });
      expect(parseCommand('task @photo')).toEqual({
        kind: 'invalid',
        message: 'Usage: task [@capability] <description>'
      });
      expect(parseCommand('task @ hello')).toEqual({
        kind: 'invalid',
        message: 'Capability after "@" must not be empty'
      });
    });

    it('parses ping, status, help and quit', () => {
      expect(parseCommand('ping task-agent-1a2b')).toEqual({ kind: 'ping', agentId: 'task-agent-1a2b' });
      expect(parseCommand('STATUS')).toEqual({ kind: 'status' });
      expect(parseCommand('?')).toEqual({ kind: 'help' });
      expect(parseCommand('exit')).toEqual({ kind: 'quit' });
    });

    it('reports usage errors', () => {
      expect(parseCommand('ping')).toEqual({ kind: 'invalid', message: 'Usage: ping <agentId>' });
      expect(parseCommand('ping a b')).toEqual({ kind: 'invalid', message: 'Usage: ping <agentId>' });
      expect(parseCommand('   ')).toEqual({ kind: 'invalid', message: 'Type a command, or "help" to list them' });
      expect(parseCommand('deploy now')).toEqual({
        kind: 'invalid',
        message: 'Unknown command "deploy". Type "help" to list commands'
      });
    });
  });

  describe('formatDurationMs', () => {
    it('picks a unit by magnitude', () => {
      expect(formatDurationMs(999)).toBe('999ms');
      expect(formatDurationMs(2500)).toBe('2.5s');
      expect(formatDurationMs(125_000)).toBe('2m 5s');
    });
  });

  describe('formatTask', () => {
    it('formats a completed task with its summary', () => {
      const out = formatTask({
        taskId: 't1',
        description: 'Sort the March shoot',
        requiredCapability: 'task',
        status: 'completed',
        assignedAgent: 'task-agent-1',
        attempts: 0,
        result: { summary: 'Recorded task: Sort the March shoot', memoryKey: 'task:t1' }
      });

      expect(out).toBe(
        ['Task t1: completed', 'Capability: task', 'Agent: task-agent-1', 'Result: Recorded task: Sort the March shoot'].join(
          '\n'
        )
      );
    });

    it('formats a failed task with its last error', () => {
      const out = formatTask({
        taskId: 't2',
        description: 'Edit',
        requiredCapability: 'photo',
        status: 'failed',
        attempts: 3,
        lastError: { name: 'RequestTimeoutError', code: 'TIMEOUT', message: 'No response' }
      });

      expect(out).toBe(['Task t2: failed', 'Capability: photo', 'Failed attempts: 3', 'Error: TIMEOUT: No response'].join('\n'));
    });

    it('prints results without a summary as JSON', () => {
      const out = formatTask({
        taskId: 't3',
        description: 'Count',
        requiredCapability: 'task',
        status: 'completed',
        attempts: 0,
        result: { total: 4 }
      });

      expect(out.split('\n').pop()).toBe('Result: {"total":4}');
    });
  });

  describe('formatStatus', () => {
    it('lists agents and task counts', () => {
      const out = formatStatus({
        agents: [
          { agentId: 'task-agent-1', agentType: 'task-agent', capabilities: ['task'], status: 'ready', lastHeartbeat: 5 }
        ],
        tasks: { pending: 0, completed: 2 }
      });

      expect(out).toBe('Agents (1):\n  task-agent-1  task-agent  ready  [task]\nTasks: pending=0 completed=2');
    });

    it('says so when no agents are registered', () => {
      expect(formatStatus({ agents: [], tasks: { pending: 1 } })).toBe('No agents registered\nTasks: pending=1');
    });
  });

  describe('formatPing', () => {
    it('shows status and heartbeat age', () => {
      expect(
        formatPing({ agentId: 'crm-agent-7', agentType: 'crm-agent', status: 'unhealthy', lastHeartbeat: 10, ageMs: 2500 })
      ).toBe('crm-agent-7 (crm-agent) is unhealthy, last heartbeat 2.5s ago');
    });
  });
});
