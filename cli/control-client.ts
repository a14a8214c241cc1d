/**
 * HTTP client for the fleet control API, plus the command runner the CLI
 * drives it with.
 */

import type { z } from 'zod';
import {
  formatPing,
  formatStatus,
  formatTask,
  HELP_TEXT,
  pingViewSchema,
  statusViewSchema,
  taskViewSchema,
  type ControlCommand,
  type PingView,
  type StatusView,
  type TaskView
} from './control-cli-helpers';

/** Max ms a `task` command waits for the server. Default 10 min. */
const DEFAULT_TIMEOUT_MS = 600_000;

export interface ControlClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class ControlClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ControlClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async health(): Promise<boolean> {
    const res = await this.fetchApi('/health');
    return res.ok;
  }

  async runTask(description: string, capability?: string): Promise<TaskView> {
    return this.request('/tasks', taskViewSchema, {
      method: 'POST',
      body: JSON.stringify({ description, capability, wait: true })
    });
  }

  async status(): Promise<StatusView> {
    return this.request('/status', statusViewSchema);
  }

  async ping(agentId: string): Promise<PingView> {
    return this.request(`/agents/${encodeURIComponent(agentId)}/ping`, pingViewSchema);
  }

  private async request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, init?: RequestInit): Promise<T> {
    const res = await this.fetchApi(path, init);
    const text = await res.text();
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${errorMessage(text)}`);
    }
    const parsed = schema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }
    return parsed.data;
  }

  private async fetchApi(path: string, init?: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        headers: { 'Content-Type': 'application/json' },
        signal: controller.signal
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new Error(`Request timed out after ${this.timeoutMs / 1000}s`);
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Runs one parsed command and returns the text to print, or null to quit.
 */
export async function runCommand(client: ControlClient, command: ControlCommand): Promise<string | null> {
  switch (command.kind) {
    case 'quit':
      return null;
    case 'help':
      return HELP_TEXT;
    case 'invalid':
      return command.message;
    case 'status':
      return formatStatus(await client.status());
    case 'ping':
      return formatPing(await client.ping(command.agentId));
    case 'task':
      return formatTask(await client.runTask(command.description, command.capability));
  }
}

function errorMessage(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') {
    return parsed.error;
  }
  return body;
}
