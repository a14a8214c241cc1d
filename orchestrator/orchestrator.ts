import { randomUUID } from 'crypto';
import { AgentRegistry } from '../agents/agent-registry';
import type { AgentRecord, AgentStatus } from '../agents/types';
import type { Message, Payload } from '../bus/message';
import { BROADCAST, consumerGroup, type MessageBus, type Subscription } from '../bus/message-bus';
import type { AgentCatalog } from '../core/config';
import {
  CancelledError,
  describeError,
  InvalidArgumentError,
  NoEligibleAgentError,
  NotFoundError,
  TaskFailedError,
  type ErrorDescriptor
} from '../core/errors';
import { silentLogger, type Logger } from '../core/logging/logger';
import { assertSafePayload } from '../core/validation';
import { jsonValueSchema, type JsonValue } from '../memory/types';
import {
  dispatchResponseSchema,
  dispatchTopic,
  heartbeatSchema,
  registerRequestSchema,
  statusEventSchema,
  taskStartedSchema,
  TOPICS,
  type DispatchRequest
} from './protocol';
import {
  TERMINAL_TASK_STATUSES,
  type FleetStatus,
  type PingResult,
  type SubmitTaskOptions,
  type SystemStats,
  type Task,
  type TaskStatus
} from './types';

/** Missed heartbeats tolerated before an agent is marked unhealthy. */
const HEARTBEAT_TOLERANCE = 3;

export interface OrchestratorTimers {
  setInterval: typeof setInterval;
  clearInterval: typeof clearInterval;
  setTimeout: typeof setTimeout;
  clearTimeout: typeof clearTimeout;
}

export interface OrchestratorOptions {
  bus: MessageBus;
  logger?: Logger;
  /** Static agent-type topology. Without one, any type may register. */
  catalog?: AgentCatalog;
  heartbeatIntervalMs: number;
  /** Failed attempts after which a task fails. */
  maxAttempts: number;
  /** How long one dispatch may take before it counts as failed. */
  requestTimeoutMs: number;
  /** Upper bound on how long a task waits before looking for an agent again. */
  pollIntervalMs: number;
  /** Default time a task may wait for an eligible agent. */
  taskDeadlineMs: number;
  /** Capability used when a task names none. Default: "task". */
  defaultCapability?: string;
  /** Finished tasks kept for lookup; older ones are forgotten. Default: 1000. */
  taskHistoryLimit?: number;
  getTime?: () => number;
  timers?: OrchestratorTimers;
  generateId?: () => string;
}

interface TaskEntry {
  task: Task;
  /** Identifies the dispatch currently in flight; progress from any other is stale. */
  dispatchId?: string;
  /** Agent that failed the previous attempt. */
  excludedAgent?: string;
  readonly settled: Promise<Task>;
  resolve: (task: Task) => void;
}

export class Orchestrator {
  private readonly bus: MessageBus;
  private readonly logger: Logger;
  private readonly registry: AgentRegistry;
  private readonly heartbeatIntervalMs: number;
  private readonly maxAttempts: number;
  private readonly requestTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly taskDeadlineMs: number;
  private readonly defaultCapability: string;
  private readonly taskHistoryLimit: number;
  private readonly catalogSize: number | undefined;
  private readonly getTime: () => number;
  private readonly timers: OrchestratorTimers;
  private readonly generateId: () => string;

  private readonly tasks = new Map<string, TaskEntry>();
  /** Ids of finished tasks still held in `tasks`, oldest first. */
  private readonly history: string[] = [];
  private readonly finished = { completed: 0, failed: 0 };
  private readonly cursors = new Map<string, number>();
  private readonly drivers = new Set<Promise<void>>();
  private readonly availabilityWaiters = new Set<() => void>();
  private subscriptions: Subscription[] = [];
  private monitorHandle: ReturnType<typeof setInterval> | null = null;
  private lifecycle = new AbortController();
  private running = false;
  private startedAt = 0;

  constructor(options: OrchestratorOptions) {
    this.bus = options.bus;
    this.logger = (options.logger ?? silentLogger).child('orchestrator');
    this.registry = new AgentRegistry(options.catalog);
    this.heartbeatIntervalMs = positive('heartbeatIntervalMs', options.heartbeatIntervalMs);
    this.maxAttempts = positive('maxAttempts', options.maxAttempts);
    this.requestTimeoutMs = positive('requestTimeoutMs', options.requestTimeoutMs);
    this.pollIntervalMs = positive('pollIntervalMs', options.pollIntervalMs);
    this.taskDeadlineMs = positive('taskDeadlineMs', options.taskDeadlineMs);
    this.defaultCapability = options.defaultCapability ?? 'task';
    this.taskHistoryLimit = positive('taskHistoryLimit', options.taskHistoryLimit ?? 1_000);
    this.catalogSize = options.catalog ? Object.keys(options.catalog).length : undefined;
    this.getTime = options.getTime ?? (() => Date.now());
    this.timers = options.timers ?? {
      setInterval: globalThis.setInterval.bind(globalThis),
      clearInterval: globalThis.clearInterval.bind(globalThis),
      setTimeout: globalThis.setTimeout.bind(globalThis),
      clearTimeout: globalThis.clearTimeout.bind(globalThis)
    };
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Subscribes to the fleet protocol topics and starts the health monitor.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.lifecycle = new AbortController();

    const handlers: Array<[string, (message: Message) => Promise<void> | void, boolean]> = [
      [TOPICS.register, (message) => this.onRegisterRequest(message), true],
      [TOPICS.heartbeat, (message) => this.onHeartbeat(message), true],
      [TOPICS.status, (message) => this.onStatus(message), true],
      [TOPICS.taskStarted, (message) => this.onTaskStarted(message), false]
    ];
    try {
      for (const [topic, handler, grouped] of handlers) {
        this.subscriptions.push(
          await this.bus.subscribe(topic, handler, grouped ? consumerGroup('orchestrator') : BROADCAST)
        );
      }
    } catch (error) {
      await this.unsubscribeAll();
      throw error;
    }

    this.monitorHandle = this.timers.setInterval(() => {
      this.checkHealth();
      this.publishQuietly(TOPICS.systemStats, { ...this.systemStats() });
    }, this.heartbeatIntervalMs);
    this.startedAt = this.getTime();
    this.running = true;
    this.logger.info('Orchestrator started', { heartbeatIntervalMs: this.heartbeatIntervalMs });
  }

  /**
   * Stops monitoring, unsubscribes and fails every unfinished task as cancelled.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.monitorHandle) {
      this.timers.clearInterval(this.monitorHandle);
      this.monitorHandle = null;
    }
    this.lifecycle.abort(new CancelledError('Orchestrator stopped before the task finished'));
    await Promise.all([...this.drivers]);
    await this.unsubscribeAll();
    this.logger.info('Orchestrator stopped');
  }

  /** Registers an agent and returns its id. The record starts in `starting`. */
  register(agentType: string, capabilities?: string[], options: { agentId?: string } = {}): string {
    const agentId = options.agentId ?? `${agentType}-${this.generateId().slice(0, 8)}`;
    const record = this.registry.register({ agentId, agentType, capabilities, now: this.getTime() });
    this.logger.info('Agent registered', {
      agentId,
      agentType,
      capabilities: record.capabilities
    });
    return agentId;
  }

  deregister(agentId: string): boolean {
    const removed = this.registry.remove(agentId);
    if (removed) {
      this.logger.info('Agent deregistered', { agentId });
    }
    return removed;
  }

  getAgent(agentId: string): AgentRecord {
    const record = this.registry.get(agentId);
    if (!record) {
      throw new NotFoundError(`Unknown agent "${agentId}"`);
    }
    return record;
  }

  listAgents(): AgentRecord[] {
    return this.registry.list();
  }

  /**
   * Queues a task and returns its id. The description is any JSON value: plain
   * text or structured task data. Dispatch runs in the background; use
   * waitForTask to observe the outcome.
   */
  submitTask(description: JsonValue, requiredCapability?: string, options: SubmitTaskOptions = {}): string {
    if (!this.running) {
      throw new Error('Orchestrator is not running');
    }
    const normalized = normalizeDescription(description);
    const capability = (requiredCapability ?? this.defaultCapability).trim();
    if (!capability) {
      throw new InvalidArgumentError('Required capability must not be empty');
    }
    const deadlineMs = options.deadlineMs ?? this.taskDeadlineMs;
    if (!Number.isFinite(deadlineMs) || deadlineMs < 0) {
      throw new InvalidArgumentError(`Task deadline must be a non-negative number. Got: ${deadlineMs}`);
    }

    const now = this.getTime();
    const task: Task = {
      taskId: this.generateId(),
      description: normalized,
      requiredCapability: capability,
      status: 'pending',
      attempts: 0,
      submittedAt: now,
      updatedAt: now,
      deadlineAt: now + deadlineMs
    };
    let resolve: (task: Task) => void = () => {};
    const settled = new Promise<Task>((done) => {
      resolve = done;
    });
    const entry: TaskEntry = { task, settled, resolve };
    this.tasks.set(task.taskId, entry);
    this.logger.info('Task submitted', { taskId: task.taskId, capability });

    const driver: Promise<void> = this.drive(entry)
      .catch((error: unknown) => {
        this.fail(entry, describeError(error));
      })
      .then(() => {
        this.drivers.delete(driver);
      });
    this.drivers.add(driver);
    return task.taskId;
  }

  getTask(taskId: string): Task {
    return copyTask(this.entry(taskId).task);
  }

  listTasks(): Task[] {
    return [...this.tasks.values()].map((entry) => copyTask(entry.task));
  }

  /** Resolves with the task once it is completed or failed. */
  async waitForTask(taskId: string): Promise<Task> {
    const task = await this.entry(taskId).settled;
    return copyTask(task);
  }

  /**
   * Submits a task and waits for it. Rejects with TaskFailedError carrying the
   * last error when the task fails.
   */
  async runTask(description: JsonValue, requiredCapability?: string, options?: SubmitTaskOptions): Promise<Task> {
    const taskId = this.submitTask(description, requiredCapability, options);
    const task = await this.waitForTask(taskId);
    if (task.status === 'failed') {
      throw new TaskFailedError(
        taskId,
        task.lastError ?? { name: 'Error', code: 'UNKNOWN', message: 'Task failed without an error' }
      );
    }
    return task;
  }

  ping(agentId: string): PingResult {
    const record = this.getAgent(agentId);
    return {
      agentId: record.agentId,
      agentType: record.agentType,
      status: record.status,
      lastHeartbeat: record.lastHeartbeat,
      ageMs: Math.max(0, this.getTime() - record.lastHeartbeat)
    };
  }

  /** Agents plus task counts. Finished counts include tasks dropped from history. */
  status(): FleetStatus {
    return { agents: this.registry.list(), tasks: this.taskCounts() };
  }

  /** Snapshot published on `system.stats` every heartbeat interval. */
  systemStats(): SystemStats {
    const agents: Record<AgentStatus, number> = { starting: 0, ready: 0, busy: 0, unhealthy: 0, stopped: 0 };
    for (const record of this.registry.list()) {
      agents[record.status]++;
    }
    const online = agents.ready + agents.busy;
    const stats: SystemStats = {
      uptimeMs: this.running ? Math.max(0, this.getTime() - this.startedAt) : 0,
      agents,
      agentsOnline: online,
      tasks: this.taskCounts(),
      health: agents.unhealthy > 0 ? 'degraded' : 'healthy'
    };
    if (this.catalogSize !== undefined) {
      stats.agentTypesExpected = this.catalogSize;
    }
    return stats;
  }

  /** Marks agents silent for more than three heartbeat intervals unhealthy. */
  checkHealth(): AgentRecord[] {
    const now = this.getTime();
    const changed = this.registry.markSilent(now, HEARTBEAT_TOLERANCE * this.heartbeatIntervalMs);
    for (const record of changed) {
      this.logger.warn('Agent missed heartbeats, marking unhealthy', {
        agentId: record.agentId,
        silentForMs: now - record.lastHeartbeat
      });
      this.publishQuietly(TOPICS.unhealthy, {
        agentId: record.agentId,
        agentType: record.agentType,
        lastHeartbeat: record.lastHeartbeat
      });
    }
    return changed;
  }

  private taskCounts(): Record<TaskStatus, number> {
    const tasks: Record<TaskStatus, number> = {
      pending: 0,
      dispatched: 0,
      in_progress: 0,
      completed: this.finished.completed,
      failed: this.finished.failed
    };
    for (const entry of this.tasks.values()) {
      if (!TERMINAL_TASK_STATUSES.includes(entry.task.status)) {
        tasks[entry.task.status]++;
      }
    }
    return tasks;
  }

  /** Counts a finished task and forgets the oldest ones past the history limit. */
  private retire(task: Task): void {
    if (task.status === 'completed' || task.status === 'failed') {
      this.finished[task.status]++;
    }
    this.history.push(task.taskId);
    while (this.history.length > this.taskHistoryLimit) {
      const evicted = this.history.shift();
      if (evicted !== undefined) {
        this.tasks.delete(evicted);
      }
    }
  }

  private async drive(entry: TaskEntry): Promise<void> {
    const signal = this.lifecycle.signal;
    const { task } = entry;

    for (;;) {
      if (signal.aborted) {
        throw signal.reason;
      }

      const agent = this.selectAgent(task.requiredCapability, entry.excludedAgent);
      if (!agent) {
        const now = this.getTime();
        if (now >= task.deadlineAt) {
          this.fail(entry, describeError(new NoEligibleAgentError(task.requiredCapability)));
          return;
        }
        await this.waitForAvailability(Math.min(this.pollIntervalMs, task.deadlineAt - now), signal);
        continue;
      }

      if (await this.dispatchOnce(entry, agent, signal)) {
        return;
      }
      if (task.attempts >= this.maxAttempts) {
        this.fail(entry, task.lastError ?? describeError(new Error('Dispatch failed')));
        return;
      }
    }
  }

  /**
   * Round-robin per capability among ready agents, skipping `excluded` when
   * another agent is available. The chosen agent is marked busy.
   */
  private selectAgent(capability: string, excluded?: string): AgentRecord | undefined {
    const eligible = this.registry.eligible(capability);
    const candidates =
      excluded && eligible.some((record) => record.agentId !== excluded)
        ? eligible.filter((record) => record.agentId !== excluded)
        : eligible;
    if (candidates.length === 0) {
      return undefined;
    }

    const cursor = this.cursors.get(capability) ?? 0;
    const chosen = candidates[cursor % candidates.length];
    this.cursors.set(capability, cursor + 1);
    if (!chosen) {
      return undefined;
    }
    this.registry.transition(chosen.agentId, 'ready', 'busy');
    return chosen;
  }

  /** Returns true when the task completed. */
  private async dispatchOnce(entry: TaskEntry, agent: AgentRecord, signal: AbortSignal): Promise<boolean> {
    const { task } = entry;
    const dispatchId = this.generateId();
    entry.dispatchId = dispatchId;
    this.update(task, { status: 'dispatched', assignedAgent: agent.agentId });
    this.logger.debug('Dispatching task', { taskId: task.taskId, agentId: agent.agentId, attempt: task.attempts + 1 });

    const request: DispatchRequest = {
      taskId: task.taskId,
      dispatchId,
      description: task.description,
      capability: task.requiredCapability
    };

    try {
      const reply = await this.bus.request(dispatchTopic(agent.agentId), request, {
        timeoutMs: this.requestTimeoutMs,
        signal
      });
      const parsed = dispatchResponseSchema.safeParse(reply.payload);
      if (!parsed.success) {
        throw new InvalidArgumentError(`Malformed dispatch response from ${agent.agentId}`);
      }
      if (parsed.data.ok) {
        this.complete(entry, agent.agentId, parsed.data.result);
        return true;
      }
      this.recordFailure(entry, agent.agentId, parsed.data.error);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      this.recordFailure(entry, agent.agentId, describeError(error));
    } finally {
      entry.dispatchId = undefined;
      if (this.registry.transition(agent.agentId, 'busy', 'ready')) {
        this.notifyAvailability();
      }
    }
    return false;
  }

  private recordFailure(entry: TaskEntry, agentId: string, error: ErrorDescriptor): void {
    const { task } = entry;
    entry.excludedAgent = agentId;
    this.update(task, { status: 'pending', attempts: task.attempts + 1, lastError: error });
    this.logger.warn('Dispatch attempt failed', {
      taskId: task.taskId,
      agentId,
      attempts: task.attempts,
      error: error.message
    });
  }

  private complete(entry: TaskEntry, agentId: string, result: Payload): void {
    const { task } = entry;
    this.update(task, { status: 'completed', result });
    this.logger.info('Task completed', { taskId: task.taskId, agentId, attempts: task.attempts });
    this.publishQuietly(TOPICS.taskCompleted, {
      taskId: task.taskId,
      agentId,
      attempts: task.attempts,
      result
    });
    entry.resolve(copyTask(task));
    this.retire(task);
  }

  private fail(entry: TaskEntry, error: ErrorDescriptor): void {
    const { task } = entry;
    if (TERMINAL_TASK_STATUSES.includes(task.status)) {
      return;
    }
    this.update(task, { status: 'failed', lastError: error });
    this.logger.warn('Task failed', { taskId: task.taskId, attempts: task.attempts, error: error.message });
    this.publishQuietly(TOPICS.taskFailed, {
      taskId: task.taskId,
      attempts: task.attempts,
      error
    });
    entry.resolve(copyTask(task));
    this.retire(task);
  }

  private update(task: Task, changes: Partial<Task>): void {
    Object.assign(task, changes, { updatedAt: this.getTime() });
  }

  private waitForAvailability(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const wake = () => {
        this.timers.clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        this.availabilityWaiters.delete(wake);
        resolve();
      };
      const onAbort = () => {
        this.timers.clearTimeout(timer);
        this.availabilityWaiters.delete(wake);
        reject(signal.reason);
      };
      const timer = this.timers.setTimeout(wake, ms);
      this.availabilityWaiters.add(wake);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private notifyAvailability(): void {
    for (const wake of [...this.availabilityWaiters]) {
      wake();
    }
  }

  private async onRegisterRequest(message: Message): Promise<void> {
    if (message.kind !== 'request') {
      this.logger.warn('Ignoring registration that expects no reply', { sender: message.sender });
      return;
    }
    const parsed = registerRequestSchema.safeParse(message.payload);
    if (!parsed.success) {
      await this.bus.respond(message, {
        ok: false,
        error: describeError(new InvalidArgumentError('Malformed registration request'))
      });
      return;
    }

    try {
      const agentId = this.register(parsed.data.agentType, parsed.data.capabilities);
      await this.bus.respond(message, { ok: true, agentId });
    } catch (error) {
      await this.bus.respond(message, { ok: false, error: describeError(error) });
    }
  }

  private onHeartbeat(message: Message): void {
    const parsed = heartbeatSchema.safeParse(message.payload);
    if (!parsed.success) {
      this.logger.warn('Malformed heartbeat', { sender: message.sender });
      return;
    }
    const before = this.registry.get(parsed.data.agentId);
    const record = this.registry.recordHeartbeat(parsed.data.agentId, this.getTime());
    if (!record || !before) {
      this.logger.debug('Heartbeat from unknown agent', { agentId: parsed.data.agentId });
      return;
    }
    if (before.status !== record.status) {
      this.logger.info('Agent is ready', { agentId: record.agentId, previous: before.status });
      this.notifyAvailability();
    }
  }

  private onStatus(message: Message): void {
    const parsed = statusEventSchema.safeParse(message.payload);
    if (!parsed.success) {
      this.logger.warn('Malformed status event', { sender: message.sender });
      return;
    }
    const { agentId, status } = parsed.data;
    if (!this.registry.get(agentId)) {
      this.logger.debug('Status from unknown agent', { agentId });
      return;
    }
    // `ready` only applies to starting or unhealthy agents.
    const applied =
      status === 'ready'
        ? this.registry.transition(agentId, 'starting', 'ready') || this.registry.transition(agentId, 'unhealthy', 'ready')
        : this.registry.setStatus(agentId, status) !== undefined;
    if (!applied) {
      this.logger.debug('Ignoring status that does not apply', { agentId, status });
      return;
    }
    this.logger.info('Agent status changed', { agentId, status });
    if (status === 'ready') {
      this.notifyAvailability();
    }
  }

  private onTaskStarted(message: Message): void {
    const parsed = taskStartedSchema.safeParse(message.payload);
    if (!parsed.success) {
      return;
    }
    const entry = this.tasks.get(parsed.data.taskId);
    if (!entry || entry.dispatchId !== parsed.data.dispatchId || entry.task.status !== 'dispatched') {
      this.logger.debug('Ignoring stale task progress', { taskId: parsed.data.taskId });
      return;
    }
    this.update(entry.task, { status: 'in_progress' });
  }

  private publishQuietly(topic: string, payload: Payload): void {
    this.bus.publish(topic, payload).catch((error: unknown) => {
      this.logger.error('Failed to publish fleet event', { topic, error });
    });
  }

  private async unsubscribeAll(): Promise<void> {
    const subscriptions = this.subscriptions;
    this.subscriptions = [];
    await Promise.all(
      subscriptions.map((subscription) =>
        subscription.unsubscribe().catch((error: unknown) => {
          this.logger.warn('Failed to unsubscribe', { topic: subscription.topic, error });
        })
      )
    );
  }

  private entry(taskId: string): TaskEntry {
    const entry = this.tasks.get(taskId);
    if (!entry) {
      throw new NotFoundError(`Unknown task "${taskId}"`);
    }
    return entry;
  }
}

function copyTask(task: Task): Task {
  return {
    ...task,
    ...(task.lastError ? { lastError: { ...task.lastError } } : {}),
    ...(task.result ? { result: structuredClone(task.result) } : {})
  };
}

function normalizeDescription(description: JsonValue): JsonValue {
  assertSafePayload({ description });
  const parsed = jsonValueSchema.safeParse(description);
  if (!parsed.success) {
    throw new InvalidArgumentError('Task description must be a JSON value');
  }
  const value = typeof parsed.data === 'string' ? parsed.data.trim() : parsed.data;
  if (value === '' || value === null) {
    throw new InvalidArgumentError('Task description is required');
  }
  return value;
}

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number. Got: ${value}`);
  }
  return value;
}
