export type FleetErrorCode =
  | 'BUS_UNAVAILABLE'
  | 'TIMEOUT'
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'NO_ELIGIBLE_AGENT'
  | 'AGENT_HANDLER_ERROR'
  | 'TASK_FAILED'
  | 'CANCELLED';

/**
 * Serializable form of an error as it travels inside a message payload.
 */
export interface ErrorDescriptor {
  name: string;
  code: FleetErrorCode | 'UNKNOWN';
  message: string;
  fatal?: boolean;
}

export class FleetError extends Error {
  constructor(
    readonly code: FleetErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The transport stayed unreachable after the publish retry budget was spent. */
export class BusUnavailableError extends FleetError {
  readonly attempts: number;

  constructor(message: string, options: { attempts: number; cause?: unknown }) {
    super('BUS_UNAVAILABLE', message, { cause: options.cause });
    this.attempts = options.attempts;
  }
}

export class RequestTimeoutError extends FleetError {
  constructor(
    readonly topic: string,
    readonly timeoutMs: number
  ) {
    super('TIMEOUT', `No response on ${topic} within ${timeoutMs}ms`);
  }
}

export class NotFoundError extends FleetError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class InvalidArgumentError extends FleetError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class NoEligibleAgentError extends FleetError {
  constructor(readonly capability: string) {
    super('NO_ELIGIBLE_AGENT', `No eligible agent with capability "${capability}"`);
  }
}

/**
 * Raised by agent domain logic. A fatal handler error stops the runtime that
 * raised it; anything else is reported to the requester and the runtime keeps
 * running.
 */
export class AgentHandlerError extends FleetError {
  readonly fatal: boolean;

  constructor(message: string, options?: { fatal?: boolean; cause?: unknown }) {
    super('AGENT_HANDLER_ERROR', message, { cause: options?.cause });
    this.fatal = options?.fatal ?? false;
  }
}

export class TaskFailedError extends FleetError {
  constructor(
    readonly taskId: string,
    readonly lastError: ErrorDescriptor
  ) {
    super('TASK_FAILED', `Task ${taskId} failed: ${lastError.name}: ${lastError.message}`);
  }
}

/** Work abandoned because its owner shut down. */
export class CancelledError extends FleetError {
  constructor(message: string) {
    super('CANCELLED', message);
  }
}

export function describeError(error: unknown): ErrorDescriptor {
  if (error instanceof AgentHandlerError) {
    return { name: error.name, code: error.code, message: error.message, fatal: error.fatal };
  }
  if (error instanceof FleetError) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, code: 'UNKNOWN', message: error.message };
  }
  return { name: 'Error', code: 'UNKNOWN', message: String(error) };
}

export function isFatal(error: unknown): boolean {
  return error instanceof AgentHandlerError && error.fatal;
}

/**
 * Rebuilds an error received over the bus. Classes that need more than a
 * message come back as a FleetError carrying the original name and code.
 */
export function errorFromDescriptor(descriptor: ErrorDescriptor): Error {
  let error: Error;
  switch (descriptor.code) {
    case 'AGENT_HANDLER_ERROR':
      error = new AgentHandlerError(descriptor.message, { fatal: descriptor.fatal });
      break;
    case 'NOT_FOUND':
      error = new NotFoundError(descriptor.message);
      break;
    case 'INVALID_ARGUMENT':
      error = new InvalidArgumentError(descriptor.message);
      break;
    case 'CANCELLED':
      error = new CancelledError(descriptor.message);
      break;
    case 'UNKNOWN':
      error = new Error(descriptor.message);
      break;
    default:
      error = new FleetError(descriptor.code, descriptor.message);
  }
  error.name = descriptor.name;
  return error;
}
