import { AgentRegistry } from '../../agents/agent-registry';
import type { AgentCatalog } from '../../core/config';
import { InvalidArgumentError } from '../../core/errors';

const catalog: AgentCatalog = {
  'photo-agent': { capabilities: ['photo', 'photo.organize'] },
  'crm-agent': { capabilities: ['crm'] }
};

describe('AgentRegistry', () => {
  it('registers agents in starting with sorted, unique capabilities', () => {
    const registry = new AgentRegistry();

    const record = registry.register({
      agentId: 'writer-1',
      agentType: 'writer',
      capabilities: [' draft', 'edit', 'draft'],
      now: 100
    });

    expect(record).toEqual({
      agentId: 'writer-1',
      agentType: 'writer',
      capabilities: ['draft', 'edit'],
      status: 'starting',
      lastHeartbeat: 100,
      registeredAt: 100
    });
  });

  it('rejects malformed ids and types', () => {
    const registry = new AgentRegistry();

    expect(() => registry.register({ agentId: 'a b', agentType: 'writer', capabilities: ['x'], now: 0 })).toThrow(
      'Invalid agent id "a b"'
    );
    expect(() => registry.register({ agentId: 'w1', agentType: 'writer.v2', capabilities: ['x'], now: 0 })).toThrow(
      InvalidArgumentError
    );
  });

  it('requires capabilities when there is no catalog', () => {
    const registry = new AgentRegistry();

    expect(() => registry.register({ agentId: 'w1', agentType: 'writer', capabilities: ['  '], now: 0 })).toThrow(
      'Agent type "writer" declared no capabilities'
    );
  });

  describe('with a catalog', () => {
    it('fills in the catalog capabilities', () => {
      const registry = new AgentRegistry(catalog);

      expect(registry.register({ agentId: 'p1', agentType: 'photo-agent', now: 0 }).capabilities).toEqual([
        'photo',
        'photo.organize'
      ]);
    });

    it('accepts a subset and rejects capabilities the type does not offer', () => {
      const registry = new AgentRegistry(catalog);

      expect(
        registry.register({ agentId: 'p1', agentType: 'photo-agent', capabilities: ['photo.organize'], now: 0 })
          .capabilities
      ).toEqual(['photo.organize']);
      expect(() =>
        registry.register({ agentId: 'p2', agentType: 'photo-agent', capabilities: ['crm', 'photo'], now: 0 })
      ).toThrow('Agent type "photo-agent" does not offer: crm');
    });

    it('rejects unknown types', () => {
      const registry = new AgentRegistry(catalog);

      expect(() => registry.register({ agentId: 'x1', agentType: 'ghost', now: 0 })).toThrow(
        'Unknown agent type "ghost"'
      );
    });
  });

  it('replaces a record registered again under the same id', () => {
    const registry = new AgentRegistry();
    registry.register({ agentId: 'w1', agentType: 'writer', capabilities: ['draft'], now: 0 });
    registry.recordHeartbeat('w1', 10);

    const again = registry.register({ agentId: 'w1', agentType: 'writer', capabilities: ['edit'], now: 50 });

    expect(again.status).toBe('starting');
    expect(registry.list()).toHaveLength(1);
    expect(registry.get('w1')?.capabilities).toEqual(['edit']);
  });

  it('returns copies that cannot change registry state', () => {
    const registry = new AgentRegistry();
    registry.register({ agentId: 'w1', agentType: 'writer', capabilities: ['draft'], now: 0 });

    const record = registry.get('w1');
    record?.capabilities.push('hack');
    if (record) {
      record.status = 'ready';
    }

    expect(registry.get('w1')).toMatchObject({ status: 'starting', capabilities: ['draft'] });
  });

  describe('heartbeats', () => {
    it('moves starting and unhealthy agents to ready but leaves stopped ones', () => {
      const registry = new AgentRegistry();
      registry.register({ agentId: 'a', agentType: 'writer', capabilities: ['draft'], now: 0 });
      registry.register({ agentId: 'b', agentType: 'writer', capabilities: ['draft'], now: 0 });
      registry.register({ agentId: 'c', agentType: 'writer', capabilities: ['draft'], now: 0 });
      registry.setStatus('b', 'unhealthy');
      registry.setStatus('c', 'stopped');

      expect(registry.recordHeartbeat('a', 5)?.status).toBe('ready');
      expect(registry.recordHeartbeat('b', 5)?.status).toBe('ready');
      expect(registry.recordHeartbeat('c', 5)?.status).toBe('stopped');
      expect(registry.recordHeartbeat('missing', 5)).toBeUndefined();
    });

    it('never moves lastHeartbeat backwards', () => {
      const registry = new AgentRegistry();
      registry.register({ agentId: 'a', agentType: 'writer', capabilities: ['draft'], now: 0 });
      registry.recordHeartbeat('a', 500);

      expect(registry.recordHeartbeat('a', 200)?.lastHeartbeat).toBe(500);
    });
  });

  it('marks agents silent for longer than the limit unhealthy', () => {
    const registry = new AgentRegistry();
    registry.register({ agentId: 'quiet', agentType: 'writer', capabilities: ['draft'], now: 0 });
    registry.register({ agentId: 'edge', agentType: 'writer', capabilities: ['draft'], now: 0 });
    registry.register({ agentId: 'gone', agentType: 'writer', capabilities: ['draft'], now: 0 });
    registry.recordHeartbeat('quiet', 1000);
    registry.recordHeartbeat('edge', 7000);
    registry.setStatus('gone', 'stopped');

    const changed = registry.markSilent(10_000, 3000);

    expect(changed.map((record) => record.agentId)).toEqual(['quiet']);
    expect(registry.get('edge')?.status).toBe('ready');
    expect(registry.get('gone')?.status).toBe('stopped');
  });

  it('transitions only from the expected status', () => {
    const registry = new AgentRegistry();
    registry.register({ agentId: 'a', agentType: 'writer', capabilities: ['draft'], now: 0 });
    registry.recordHeartbeat('a', 1);

    expect(registry.transition('a', 'ready', 'busy')).toBe(true);
    expect(registry.transition('a', 'ready', 'busy')).toBe(false);
    expect(registry.transition('missing', 'ready', 'busy')).toBe(false);
    expect(registry.get('a')?.status).toBe('busy');
  });

  it('lists eligible agents by registration time, then id', () => {
    const registry = new AgentRegistry();
    registry.register({ agentId: 'late', agentType: 'writer', capabilities: ['draft'], now: 20 });
    registry.register({ agentId: 'b-early', agentType: 'writer', capabilities: ['draft'], now: 10 });
    registry.register({ agentId: 'a-early', agentType: 'writer', capabilities: ['draft'], now: 10 });
    registry.register({ agentId: 'editor', agentType: 'writer', capabilities: ['edit'], now: 0 });
    registry.register({ agentId: 'idle', agentType: 'writer', capabilities: ['draft'], now: 0 });
    for (const id of ['late', 'b-early', 'a-early', 'editor']) {
      registry.recordHeartbeat(id, 30);
    }

    expect(registry.eligible('draft').map((record) => record.agentId)).toEqual(['a-early', 'b-early', 'late']);
  });

  it('removes agents', () => {
    const registry = new AgentRegistry();
    registry.register({ agentId: 'a', agentType: 'writer', capabilities: ['draft'], now: 0 });

    expect(registry.remove('a')).toBe(true);
    expect(registry.remove('a')).toBe(false);
    expect(registry.get('a')).toBeUndefined();
  });
});
