import { z } from 'zod';
import { InvalidArgumentError } from '../core/errors';
import { assertSafePayload } from '../core/validation';

export type MessageKind = 'event' | 'request' | 'response';

export type Payload = Record<string, unknown>;

/**
 * Wire-level unit of communication. Immutable once published.
 */
export interface Message {
  /** Identity of this copy, used by subscribers to drop duplicate deliveries. */
  readonly id: string;
  readonly topic: string;
  readonly kind: MessageKind;
  readonly payload: Payload;
  /** Unique per request; echoed by the matching response. Events carry their own id here. */
  readonly correlationId: string;
  readonly replyTo?: string;
  /** Bus client that published the message. */
  readonly sender: string;
  readonly sentAt: number;
}

// <domain>.<event>, each segment made of word characters, dashes or colons
const TOPIC_PATTERN = /^[\w-]+(\.[\w:-]+)+$/;

export function isValidTopic(topic: string): boolean {
  return TOPIC_PATTERN.test(topic);
}

export function assertTopic(topic: string): void {
  if (!isValidTopic(topic)) {
    throw new InvalidArgumentError(`Invalid topic "${topic}": expected <domain>.<event>`);
  }
}

const messageSchema = z.object({
  id: z.string().min(1),
  topic: z.string().min(1),
  kind: z.enum(['event', 'request', 'response']),
  payload: z.record(z.unknown()),
  correlationId: z.string().min(1),
  replyTo: z.string().min(1).optional(),
  sender: z.string().min(1),
  sentAt: z.number()
});

export function encodeMessage(message: Message): string {
  return JSON.stringify(message);
}

/**
 * Parses a raw transport frame. Frames that are not JSON, do not match the
 * envelope or carry unsafe payload keys are rejected with InvalidArgumentError.
 */
export function decodeMessage(raw: string): Message {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new InvalidArgumentError('Message frame is not valid JSON');
  }

  assertSafePayload(json);

  const parsed = messageSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Malformed message: ${parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`
    );
  }
  return parsed.data;
}
