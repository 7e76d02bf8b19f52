import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

const anthropicProviderSchema = z.object({
  apiKey: z.string().default(''),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(600_000),
});

const providersSchema = z.object({
  anthropic: anthropicProviderSchema,
});

const agentsSchema = z.object({
  file: z.string().min(1, 'Agents file path is required'),
  coordinator: z.string().min(1).default('coordinator'),
});

const storeSchema = z.object({
  dbPath: z.string().min(1, 'Database path is required'),
});

// Execution loop: retry budget, tool round-trip cap, tool deadline
const runtimeSchema = z.object({
  maxAttempts: z.number().int().positive().default(5),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().positive().default(30_000),
  jitterFactor: z.number().min(0).max(1).default(0.2),
  maxToolRoundTrips: z.number().int().positive().default(25),
  toolTimeoutMs: z.number().int().positive().default(30_000),
});

const orchestratorSchema = z.object({
  maxConcurrent: z.number().int().positive().default(5),
});

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export const configSchema = z.object({
  providers: providersSchema,
  agents: agentsSchema,
  store: storeSchema,
  runtime: runtimeSchema,
  orchestrator: orchestratorSchema,
  logging: loggingSchema,
});

export type Config = z.infer<typeof configSchema>;
export type ProviderConfig = z.infer<typeof providersSchema>;
export type AgentsConfig = z.infer<typeof agentsSchema>;
export type StoreConfig = z.infer<typeof storeSchema>;
export type RuntimeConfig = z.infer<typeof runtimeSchema>;
export type OrchestratorConfig = z.infer<typeof orchestratorSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

function intFromEnv(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function floatFromEnv(value: string | undefined): number | undefined {
  return value ? parseFloat(value) : undefined;
}

/**
 * Load configuration from environment variables
 * @throws Error listing every invalid field
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    providers: {
      anthropic: {
        apiKey: env.ANTHROPIC_API_KEY || '',
        baseUrl: env.ANTHROPIC_BASE_URL || undefined,
        timeoutMs: intFromEnv(env.ANTHROPIC_TIMEOUT_MS),
      },
    },
    agents: {
      file: env.AGENTS_FILE || 'agents.json',
      coordinator: env.COORDINATOR_AGENT || undefined,
    },
    store: {
      dbPath: env.CONDUCTOR_DB_PATH || '.conductor/conductor.db',
    },
    runtime: {
      maxAttempts: intFromEnv(env.RUN_MAX_ATTEMPTS),
      baseDelayMs: intFromEnv(env.RETRY_BASE_DELAY_MS),
      maxDelayMs: intFromEnv(env.RETRY_MAX_DELAY_MS),
      jitterFactor: floatFromEnv(env.RETRY_JITTER),
      maxToolRoundTrips: intFromEnv(env.MAX_TOOL_ROUND_TRIPS),
      toolTimeoutMs: intFromEnv(env.TOOL_TIMEOUT_MS),
    },
    orchestrator: {
      maxConcurrent: intFromEnv(env.MAX_CONCURRENT_SUBTASKS),
    },
    logging: {
      level: env.LOG_LEVEL || undefined,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errorMessages}`);
  }

  return result.data;
}

// Lazily loaded singleton
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
