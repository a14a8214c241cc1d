import { Pool } from 'pg';
import { TaskAgent } from '../agents/task-agent';
import type { FleetAgent } from '../agents/types';
import { BusClient } from '../bus/bus-client';
import { InMemoryTransport } from '../bus/in-memory-transport';
import { RedisTransport } from '../bus/redis-transport';
import type { BusTransport } from '../bus/transport';
import { loadAgentCatalog, loadConfig, type FleetConfig } from '../core/config';
import { Container } from '../core/di/container';
import { ConsoleLogger, type Logger } from '../core/logging/logger';
import { MemoryManager } from '../memory/memory-manager';
import { InMemoryMemoryRepository } from '../memory/repositories/in-memory-memory-repository';
import type { MemoryRepository } from '../memory/repositories/memory-repository';
import { PostgresMemoryRepository } from '../memory/repositories/postgres-memory-repository';
import { Orchestrator } from '../orchestrator/orchestrator';
import { AgentRuntime } from '../runtime';

export interface FleetServices {
  config: FleetConfig;
  logger: Logger;
  transport: BusTransport;
  durableMemory: MemoryRepository;
  memory: MemoryManager;
  orchestratorBus: BusClient;
  orchestrator: Orchestrator;
}

export interface BuildContainerOptions {
  /** Environment read when no config is given. Default: process.env */
  env?: NodeJS.ProcessEnv;
  config?: FleetConfig;
  logger?: Logger;
  /** Replaces the transport that BUS_URL would select. */
  transport?: BusTransport;
  /** Replaces the pool that DATABASE_URL would open. The caller keeps ownership. */
  pool?: Pool;
  /**
   * Hosts a TaskAgent in this process so `task` commands have somewhere to go.
   * Default: true when the bus is in-process.
   */
  localAgents?: boolean;
  /** Directory the agent catalog path is resolved against. */
  cwd?: string;
}

export interface ContainerContext {
  container: Container<FleetServices>;
  config: FleetConfig;
  orchestrator: Orchestrator;
  memory: MemoryManager;
  /** Agents hosted in this process; empty until start(). */
  runtimes: AgentRuntime[];
  start(): Promise<void>;
  /** Runs an agent in this process on its own bus client. Stopped by cleanup(). */
  hostAgent(agent: FleetAgent): Promise<AgentRuntime>;
  cleanup(): Promise<void>;
}

export async function buildContainer(options: BuildContainerOptions = {}): Promise<ContainerContext> {
  const container = new Container<FleetServices>();
  const config = options.config ?? loadConfig(options.env);
  const logger = options.logger ?? new ConsoleLogger({ level: config.logLevel });

  let ownedPool: Pool | null = null;
  const pool = options.pool ?? (config.databaseUrl ? (ownedPool = new Pool({ connectionString: config.databaseUrl })) : null);

  let durableMemory: MemoryRepository;
  try {
    if (pool) {
      const repository = new PostgresMemoryRepository(pool);
      await repository.ensureSchema();
      durableMemory = repository;
    } else {
      durableMemory = new InMemoryMemoryRepository();
    }
  } catch (error) {
    if (ownedPool) {
      await ownedPool.end();
    }
    throw error;
  }

  const localTransport = !options.transport && !config.busUrl;
  const catalog = loadAgentCatalog(config.agentCatalogPath, options.cwd);

  container.registerValue('config', config);
  container.registerValue('logger', logger);
  container.registerValue('durableMemory', durableMemory);
  container.register(
    'transport',
    (c) => {
      if (options.transport) {
        return options.transport;
      }
      const busUrl = c.resolve('config').busUrl;
      return busUrl
        ? new RedisTransport({ url: busUrl, logger: c.resolve('logger').child('redis') })
        : new InMemoryTransport({ logger: c.resolve('logger').child('transport') });
    },
    { singleton: true }
  );
  container.register(
    'memory',
    (c) =>
      new MemoryManager({
        durable: c.resolve('durableMemory'),
        working: new InMemoryMemoryRepository(),
        logger: c.resolve('logger')
      }),
    { singleton: true }
  );
  container.register(
    'orchestratorBus',
    (c) => createBusClient(c.resolve('transport'), c.resolve('config'), c.resolve('logger'), 'orchestrator'),
    { singleton: true }
  );
  container.register(
    'orchestrator',
    (c) => {
      const fleetConfig = c.resolve('config');
      return new Orchestrator({
        bus: c.resolve('orchestratorBus'),
        logger: c.resolve('logger'),
        catalog,
        heartbeatIntervalMs: fleetConfig.heartbeatIntervalMs,
        maxAttempts: fleetConfig.dispatchMaxAttempts,
        requestTimeoutMs: fleetConfig.requestTimeoutMs,
        pollIntervalMs: fleetConfig.dispatchPollIntervalMs,
        taskDeadlineMs: fleetConfig.taskDeadlineMs,
        taskHistoryLimit: fleetConfig.taskHistoryLimit,
        defaultCapability: fleetConfig.defaultCapability
      });
    },
    { singleton: true }
  );

  const transport = container.resolve('transport');
  const memory = container.resolve('memory');
  const orchestrator = container.resolve('orchestrator');
  const runtimes: AgentRuntime[] = [];
  const runtimeBuses: BusClient[] = [];
  let started = false;

  const start = async (): Promise<void> => {
    if (started) {
      return;
    }
    started = true;
    await transport.connect();
    await orchestrator.start();
    memory.startSweep(config.memorySweepIntervalMs);

    if (options.localAgents ?? localTransport) {
      await hostAgent(new TaskAgent());
    }
  };

  const hostAgent = async (agent: FleetAgent): Promise<AgentRuntime> => {
    if (!started) {
      throw new Error('Start the fleet before hosting agents');
    }
    const bus = createBusClient(transport, config, logger, agent.agentType);
    runtimeBuses.push(bus);
    const runtime = new AgentRuntime({
      agent,
      bus,
      memory,
      logger,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      shutdownGraceMs: config.shutdownGraceMs
    });
    runtimes.push(runtime);
    await runtime.start();
    return runtime;
  };

  const cleanup = async (): Promise<void> => {
    await Promise.all(runtimes.map((runtime) => runtime.stop()));
    await orchestrator.stop();
    memory.stopSweep();
    for (const bus of runtimeBuses) {
      await bus.close();
    }
    await container.resolve('orchestratorBus').close();
    await transport.close();
    if (ownedPool) {
      await ownedPool.end();
    }
  };

  return { container, config, orchestrator, memory, runtimes, start, hostAgent, cleanup };
}

function createBusClient(transport: BusTransport, config: FleetConfig, logger: Logger, name: string): BusClient {
  return new BusClient({
    transport,
    clientId: `${name}-${process.pid}-${Math.random().toString(36).slice(2, 8)}`,
    logger,
    publishMaxAttempts: config.publishMaxAttempts,
    publishBackoffMs: config.publishBackoffMs,
    defaultRequestTimeoutMs: config.requestTimeoutMs
  });
}
