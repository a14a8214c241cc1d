/**
 * AgentRuntime hosts one FleetAgent: it registers the agent, keeps its
 * heartbeat going, feeds it dispatch and event messages and answers for it.
 * Handlers for one subscription run one at a time; stop() drains them within
 * the shutdown grace period and aborts whatever is left.
 */

import type { AgentContext, FleetAgent } from '../agents/types';
import type { Message, Payload } from '../bus/message';
import { BROADCAST, consumerGroup, type MessageBus, type Subscription } from '../bus/message-bus';
import {
  AgentHandlerError,
  CancelledError,
  describeError,
  errorFromDescriptor,
  InvalidArgumentError,
  isFatal
} from '../core/errors';
import { silentLogger, type Logger } from '../core/logging/logger';
import type { IMemoryManager } from '../memory/memory-manager';
import { dispatchRequestSchema, dispatchTopic, registerResponseSchema, TOPICS } from '../orchestrator/protocol';
import type { AgentRuntimeOptions, RuntimeState, RuntimeTimers, RuntimeTransition } from './types';

interface InFlight {
  readonly controller: AbortController;
  readonly done: Promise<void>;
}

export class AgentRuntime {
  private readonly agent: FleetAgent;
  private readonly bus: MessageBus;
  private readonly memory: IMemoryManager;
  private readonly logger: Logger;
  private readonly heartbeatIntervalMs: number;
  private readonly registrationTimeoutMs: number;
  private readonly shutdownGraceMs: number;
  private readonly getTime: () => number;
  private readonly timers: RuntimeTimers;
  private readonly onTransition?: (transition: RuntimeTransition) => void;

  private currentState: RuntimeState = 'created';
  private id: string | undefined;
  private subscriptions: Subscription[] = [];
  private heartbeatHandle: ReturnType<typeof setInterval> | null = null;
  private readonly inFlight = new Set<InFlight>();
  private startPromise: Promise<string> | null = null;
  private stopPromise: Promise<void> | null = null;

  constructor(options: AgentRuntimeOptions) {
    const heartbeatIntervalMs = Math.floor(Number(options.heartbeatIntervalMs));
    if (!Number.isFinite(heartbeatIntervalMs) || heartbeatIntervalMs < 1) {
      throw new Error(`heartbeatIntervalMs must be a finite positive number. Got: ${options.heartbeatIntervalMs}`);
    }
    const shutdownGraceMs = Math.floor(Number(options.shutdownGraceMs ?? 5_000));
    if (!Number.isFinite(shutdownGraceMs) || shutdownGraceMs < 0) {
      throw new Error(`shutdownGraceMs must be a finite non-negative number. Got: ${options.shutdownGraceMs}`);
    }

    this.agent = options.agent;
    this.bus = options.bus;
    this.memory = options.memory;
    this.id = options.agentId;
    this.heartbeatIntervalMs = heartbeatIntervalMs;
    this.registrationTimeoutMs = options.registrationTimeoutMs ?? 30_000;
    this.shutdownGraceMs = shutdownGraceMs;
    this.getTime = options.getTime ?? (() => Date.now());
    this.timers = options.timers ?? {
      setInterval: globalThis.setInterval.bind(globalThis),
      clearInterval: globalThis.clearInterval.bind(globalThis),
      setTimeout: globalThis.setTimeout.bind(globalThis),
      clearTimeout: globalThis.clearTimeout.bind(globalThis)
    };
    this.onTransition = options.onTransition;
    this.logger = (options.logger ?? silentLogger).child(options.agent.agentType);
  }

  get state(): RuntimeState {
    return this.currentState;
  }

  get agentId(): string | undefined {
    return this.id;
  }

  /** Number of messages currently being handled. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Registers (unless an agent id was given), subscribes and sends the first
   * heartbeat. Resolves with the agent id once the runtime is running.
   */
  start(): Promise<string> {
    if (!this.startPromise) {
      if (this.currentState !== 'created') {
        return Promise.reject(new Error(`Cannot start a runtime in state ${this.currentState}`));
      }
      this.startPromise = this.boot();
    }
    return this.startPromise;
  }

  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async boot(): Promise<string> {
    this.transition('starting');
    try {
      const agentId = this.id ?? (await this.register());
      this.id = agentId;

      this.subscriptions.push(
        await this.bus.subscribe(dispatchTopic(agentId), (message) => this.track(message), BROADCAST)
      );
      for (const topic of this.agent.eventTopics?.() ?? []) {
        this.subscriptions.push(
          await this.bus.subscribe(topic, (message) => this.track(message), consumerGroup(this.agent.agentType))
        );
      }

      await this.sendHeartbeat(agentId);
      this.heartbeatHandle = this.timers.setInterval(() => {
        this.sendHeartbeat(agentId).catch((error: unknown) => this.fail(error));
      }, this.heartbeatIntervalMs);
    } catch (error) {
      await this.fail(error);
      throw error;
    }

    this.transition('running');
    this.logger.info('Agent runtime running', { agentId: this.id });
    return this.requireId();
  }

  private async register(): Promise<string> {
    const reply = await this.bus.request(
      TOPICS.register,
      { agentType: this.agent.agentType, capabilities: this.agent.capabilities() },
      { timeoutMs: this.registrationTimeoutMs }
    );
    const parsed = registerResponseSchema.safeParse(reply.payload);
    if (!parsed.success) {
      throw new InvalidArgumentError('Malformed registration response');
    }
    if (!parsed.data.ok) {
      throw errorFromDescriptor(parsed.data.error);
    }
    return parsed.data.agentId;
  }

  private async sendHeartbeat(agentId: string): Promise<void> {
    await this.bus.publish(TOPICS.heartbeat, {
      agentId,
      agentType: this.agent.agentType,
      sentAt: this.getTime()
    });
  }

  /** Runs one message while keeping it visible to shutdown. */
  private async track(message: Message): Promise<void> {
    const controller = new AbortController();
    const entry: InFlight = { controller, done: this.handle(message, controller.signal) };
    this.inFlight.add(entry);
    try {
      await entry.done;
    } finally {
      this.inFlight.delete(entry);
    }
  }

  private async handle(message: Message, signal: AbortSignal): Promise<void> {
    const agentId = this.requireId();
    const isRequest = message.kind === 'request';

    if (this.currentState !== 'running') {
      await this.report(message, new AgentHandlerError(`Agent ${agentId} is ${this.currentState}`));
      return;
    }

    if (message.topic === dispatchTopic(agentId)) {
      const dispatch = dispatchRequestSchema.safeParse(message.payload);
      if (!dispatch.success) {
        await this.report(message, new InvalidArgumentError('Malformed dispatch request'));
        return;
      }
      await this.publishQuietly(TOPICS.taskStarted, {
        taskId: dispatch.data.taskId,
        dispatchId: dispatch.data.dispatchId,
        agentId
      });
    }

    const context: AgentContext = {
      agentId,
      memory: this.memory,
      bus: this.bus,
      logger: this.logger,
      signal
    };

    let result: Payload;
    try {
      result = await this.agent.receive(message, context);
    } catch (error) {
      this.logger.error('Agent handler failed', { topic: message.topic, messageId: message.id, error });
      await this.report(message, error);
      if (isFatal(error)) {
        this.logger.error('Fatal handler error, stopping agent', { agentId });
        this.stop().catch((stopError: unknown) => {
          this.logger.error('Agent runtime stop failed', { error: stopError });
        });
      }
      return;
    }

    if (isRequest) {
      await this.respondQuietly(message, { ok: true, result });
    } else {
      await this.publishQuietly(TOPICS.result, {
        agentId,
        topic: message.topic,
        messageId: message.id,
        result
      });
    }
  }

  /** Answers a request with an error, or publishes agent.error for an event. */
  private async report(message: Message, error: unknown): Promise<void> {
    const descriptor = describeError(error);
    if (message.kind === 'request') {
      await this.respondQuietly(message, { ok: false, error: descriptor });
      return;
    }
    await this.publishQuietly(TOPICS.error, {
      agentId: this.id,
      topic: message.topic,
      messageId: message.id,
      error: descriptor
    });
  }

  private async respondQuietly(message: Message, payload: Payload): Promise<void> {
    try {
      await this.bus.respond(message, payload);
    } catch (error) {
      this.logger.error('Failed to answer request', { topic: message.topic, messageId: message.id, error });
    }
  }

  private async publishQuietly(topic: string, payload: Payload): Promise<void> {
    try {
      await this.bus.publish(topic, payload);
    } catch (error) {
      this.logger.error('Failed to publish', { topic, error });
    }
  }

  private async shutdown(): Promise<void> {
    if (this.currentState === 'created') {
      this.transition('stopped');
      return;
    }
    if (this.currentState === 'starting' && this.startPromise) {
      await this.startPromise.catch(() => undefined);
    }
    if (this.currentState !== 'running') {
      return;
    }

    this.transition('stopping');
    this.stopHeartbeat();
    await this.unsubscribeAll();
    await this.drain();

    const agentId = this.requireId();
    await this.publishQuietly(TOPICS.status, { agentId, status: 'stopped' });
    this.transition('stopped');
    this.logger.info('Agent runtime stopped', { agentId });
  }

  /** Waits for in-flight handlers up to the grace period, then aborts the rest. */
  private async drain(): Promise<void> {
    if (this.inFlight.size === 0) {
      return;
    }
    const pending = [...this.inFlight];
    let timer: ReturnType<typeof setTimeout> | undefined;
    const graceElapsed = new Promise<'timeout'>((resolve) => {
      timer = this.timers.setTimeout(() => resolve('timeout'), this.shutdownGraceMs);
    });
    const outcome = await Promise.race([
      Promise.allSettled(pending.map((entry) => entry.done)).then(() => 'drained' as const),
      graceElapsed
    ]);
    if (timer !== undefined) {
      this.timers.clearTimeout(timer);
    }

    if (outcome === 'timeout') {
      const abandoned = pending.filter((entry) => this.inFlight.has(entry));
      this.logger.warn('Abandoning in-flight handlers after shutdown grace period', {
        abandoned: abandoned.length,
        graceMs: this.shutdownGraceMs
      });
      for (const entry of abandoned) {
        entry.controller.abort(new CancelledError('Agent stopped before the handler finished'));
      }
    }
  }

  /** Moves to failed and releases everything the runtime holds. */
  private async fail(error: unknown): Promise<void> {
    if (this.currentState !== 'starting' && this.currentState !== 'running') {
      return;
    }
    this.logger.error('Agent runtime failed', { agentId: this.id, error });
    this.transition('failed', error);
    this.stopHeartbeat();
    for (const entry of this.inFlight) {
      entry.controller.abort(new CancelledError('Agent runtime failed'));
    }
    await this.unsubscribeAll();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatHandle != null) {
      this.timers.clearInterval(this.heartbeatHandle);
      this.heartbeatHandle = null;
    }
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

  private transition(to: RuntimeState, error?: unknown): void {
    const from = this.currentState;
    this.currentState = to;
    this.onTransition?.({ agentId: this.id, from, to, ...(error === undefined ? {} : { error }) });
  }

  private requireId(): string {
    if (this.id === undefined) {
      throw new Error('Agent runtime has no agent id yet');
    }
    return this.id;
  }
}
