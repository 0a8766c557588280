import { z } from 'zod';
import {
  DEFAULT_CONFIRMATION_POLICY,
  DEFAULT_ENGINE_CONFIG,
  JITO_MAINNET_ENDPOINTS,
  type ConnectionConfig,
  type EngineConfig,
} from '@sluice/execution-engine';

export type BackendName = 'rpc' | 'jito';

export interface WorkerConfig {
  port: number;
  /** PostgreSQL; in-memory stores when unset */
  databaseUrl?: string;
  builderUrl: string;
  builderTimeoutMs: number;
  connection: ConnectionConfig;
  /** Fallback order */
  backends: BackendName[];
  jitoEndpoint: string;
  metricsSnapshotIntervalMs: number;
  engine: EngineConfig;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((v) => v === 'true' || v === '1');

const backendListSchema = z
  .string()
  .default('rpc')
  .transform((v) =>
    v
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  )
  .pipe(
    z
      .array(z.enum(['rpc', 'jito']))
      .min(1, 'at least one backend is required')
      .refine((list) => new Set(list).size === list.length, 'backends must not repeat'),
  );

const envSchema = z.object({
  PORT: positiveInt(8081),
  DATABASE_URL: z.string().min(1).optional(),
  BUILDER_URL: z.string().url(),
  BUILDER_TIMEOUT_MS: positiveInt(10_000),
  SOLANA_NETWORK: z.enum(['mainnet-beta', 'devnet', 'localnet']).default('devnet'),
  HELIUS_API_KEY: z.string().min(1).optional(),
  SOLANA_RPC_URL: z.string().url().optional(),
  BACKENDS: backendListSchema,
  JITO_ENDPOINT: z.string().url().default(JITO_MAINNET_ENDPOINTS[0]),
  METRICS_SNAPSHOT_INTERVAL_MS: positiveInt(60_000),

  MAX_CONCURRENT_EXECUTIONS: positiveInt(DEFAULT_ENGINE_CONFIG.maxConcurrentExecutions),
  EXECUTION_TIMEOUT_MS: positiveInt(DEFAULT_ENGINE_CONFIG.executionTimeoutMs),
  MAX_RETRIES: nonNegativeInt(DEFAULT_ENGINE_CONFIG.maxRetries),
  RETRY_BASE_DELAY_MS: positiveInt(DEFAULT_ENGINE_CONFIG.retry.baseDelayMs),
  RETRY_MAX_DELAY_MS: positiveInt(DEFAULT_ENGINE_CONFIG.retry.maxDelayMs),
  RETRY_JITTER: flag(DEFAULT_ENGINE_CONFIG.retry.jitter),
  CIRCUIT_BREAKER_THRESHOLD: positiveInt(DEFAULT_ENGINE_CONFIG.circuitBreakerThreshold),
  CIRCUIT_BREAKER_RESET_MS: positiveInt(DEFAULT_ENGINE_CONFIG.circuitBreakerResetMs),
  MAX_QUEUE_SIZE: positiveInt(DEFAULT_ENGINE_CONFIG.maxQueueSize),
  DRAIN_TIMEOUT_MS: nonNegativeInt(DEFAULT_ENGINE_CONFIG.drainTimeoutMs),
  CLEANUP_INTERVAL_MS: positiveInt(DEFAULT_ENGINE_CONFIG.cleanupIntervalMs),
  RETENTION_MS: positiveInt(DEFAULT_ENGINE_CONFIG.retentionMs),
  PRIORITIZE_BY_CONFIDENCE: flag(DEFAULT_ENGINE_CONFIG.prioritizeByConfidence),
  SIMULATE_BEFORE_SEND: flag(DEFAULT_ENGINE_CONFIG.simulateBeforeSend),
  CONFIRMATION_TARGET: z.enum(['confirmed', 'finalized']).default(DEFAULT_CONFIRMATION_POLICY.targetLevel),
  CONFIRMATION_MAX_WAIT_MS: positiveInt(DEFAULT_CONFIRMATION_POLICY.maxWaitMs),
});

/**
 * Validate environment variables and map them onto worker settings.
 * Unset values fall back to the engine defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    builderUrl: e.BUILDER_URL,
    builderTimeoutMs: e.BUILDER_TIMEOUT_MS,
    connection: {
      cluster: e.SOLANA_NETWORK,
      heliusApiKey: e.HELIUS_API_KEY,
      customRpcUrl: e.SOLANA_RPC_URL,
    },
    backends: e.BACKENDS,
    jitoEndpoint: e.JITO_ENDPOINT,
    metricsSnapshotIntervalMs: e.METRICS_SNAPSHOT_INTERVAL_MS,
    engine: {
      ...DEFAULT_ENGINE_CONFIG,
      maxConcurrentExecutions: e.MAX_CONCURRENT_EXECUTIONS,
      executionTimeoutMs: e.EXECUTION_TIMEOUT_MS,
      maxRetries: e.MAX_RETRIES,
      retry: {
        ...DEFAULT_ENGINE_CONFIG.retry,
        baseDelayMs: e.RETRY_BASE_DELAY_MS,
        maxDelayMs: e.RETRY_MAX_DELAY_MS,
        jitter: e.RETRY_JITTER,
      },
      circuitBreakerThreshold: e.CIRCUIT_BREAKER_THRESHOLD,
      circuitBreakerResetMs: e.CIRCUIT_BREAKER_RESET_MS,
      maxQueueSize: e.MAX_QUEUE_SIZE,
      drainTimeoutMs: e.DRAIN_TIMEOUT_MS,
      cleanupIntervalMs: e.CLEANUP_INTERVAL_MS,
      retentionMs: e.RETENTION_MS,
      prioritizeByConfidence: e.PRIORITIZE_BY_CONFIDENCE,
      simulateBeforeSend: e.SIMULATE_BEFORE_SEND,
      confirmation: {
        ...DEFAULT_CONFIRMATION_POLICY,
        targetLevel: e.CONFIRMATION_TARGET,
        maxWaitMs: e.CONFIRMATION_MAX_WAIT_MS,
      },
    },
  };
}
