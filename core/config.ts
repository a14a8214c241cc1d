import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { LogLevel } from './logging/logger';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  BUS_URL: z.string().url().optional(),
  DATABASE_URL: z.string().min(1).optional(),
  HEARTBEAT_INTERVAL_MS: positiveInt(10_000),
  DISPATCH_MAX_ATTEMPTS: positiveInt(3),
  REQUEST_TIMEOUT_MS: positiveInt(30_000),
  DISPATCH_POLL_INTERVAL_MS: positiveInt(1_000),
  TASK_DEADLINE_MS: positiveInt(300_000),
  TASK_HISTORY_LIMIT: positiveInt(1_000),
  PUBLISH_MAX_ATTEMPTS: positiveInt(5),
  PUBLISH_BACKOFF_MS: positiveInt(100),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(5_000),
  MEMORY_SWEEP_INTERVAL_MS: positiveInt(60_000),
  AGENT_CATALOG_PATH: z.string().min(1).default('config/agents.json'),
  DEFAULT_CAPABILITY: z.string().min(1).default('task'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000)
});

const catalogSchema = z.record(
  z.object({
    capabilities: z.array(z.string().min(1)).min(1),
    description: z.string().optional()
  })
);

export type AgentCatalog = z.infer<typeof catalogSchema>;

export interface FleetConfig {
  busUrl?: string;
  databaseUrl?: string;
  heartbeatIntervalMs: number;
  dispatchMaxAttempts: number;
  requestTimeoutMs: number;
  dispatchPollIntervalMs: number;
  taskDeadlineMs: number;
  taskHistoryLimit: number;
  publishMaxAttempts: number;
  publishBackoffMs: number;
  shutdownGraceMs: number;
  memorySweepIntervalMs: number;
  agentCatalogPath: string;
  defaultCapability: string;
  logLevel: LogLevel;
  port: number;
}

/**
 * Reads the fleet configuration from environment variables.
 * Blank values count as unset so `FOO=` in a dotenv file falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FleetConfig {
  const raw = Object.fromEntries(
    Object.keys(envSchema.shape).map((name) => {
      const value = env[name];
      return [name, value === undefined || value.trim() === '' ? undefined : value.trim()];
    })
  );

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const data = parsed.data;
  return {
    busUrl: data.BUS_URL,
    databaseUrl: data.DATABASE_URL,
    heartbeatIntervalMs: data.HEARTBEAT_INTERVAL_MS,
    dispatchMaxAttempts: data.DISPATCH_MAX_ATTEMPTS,
    requestTimeoutMs: data.REQUEST_TIMEOUT_MS,
    dispatchPollIntervalMs: data.DISPATCH_POLL_INTERVAL_MS,
    taskDeadlineMs: data.TASK_DEADLINE_MS,
    taskHistoryLimit: data.TASK_HISTORY_LIMIT,
    publishMaxAttempts: data.PUBLISH_MAX_ATTEMPTS,
    publishBackoffMs: data.PUBLISH_BACKOFF_MS,
    shutdownGraceMs: data.SHUTDOWN_GRACE_MS,
    memorySweepIntervalMs: data.MEMORY_SWEEP_INTERVAL_MS,
    agentCatalogPath: data.AGENT_CATALOG_PATH,
    defaultCapability: data.DEFAULT_CAPABILITY,
    logLevel: data.LOG_LEVEL,
    port: data.PORT
  };
}

/**
 * Loads the static agent-type catalog. A missing file means no catalog:
 * any agent type may register with the capabilities it declares.
 */
export function loadAgentCatalog(path: string, cwd: string = process.cwd()): AgentCatalog | undefined {
  const fullPath = resolve(cwd, path);
  if (!existsSync(fullPath)) {
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Invalid agent catalog at ${fullPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = catalogSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(
      `Invalid agent catalog at ${fullPath}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
    );
  }
  return parsed.data;
}
