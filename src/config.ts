/**
 * Engine configuration.
 *
 * Defaults merged with PIPELINE_* environment variables, then with explicit
 * partial overrides (CLI flags, tests).
 */

import { ConfigError } from './domain/errors';
import { HealthCheckPolicy, DEFAULT_HEALTH_CHECK } from './domain/deployment';
import { StagePolicy } from './domain/pipeline';
import { LogLevel, parseLogLevel } from './logger';

/** What a second deploy to a busy target does. */
export type LockMode = 'fail-fast' | 'block';

export interface EngineConfig {
  /** Stages running at once when neither the pipeline nor the caller says otherwise. */
  concurrency: number;
  stagePolicy: StagePolicy;
  lockMode: LockMode;
  /** Bound on waiting for a busy target in block mode. */
  lockWaitMs: number;
  /** Raw artifact repository base URL; unset means in-memory storage. */
  artifactRepositoryUrl?: string;
  /** Credential reference for the artifact repository ("user:password"). */
  artifactRepositoryCredentialsRef?: string;
  /** Registry v2 API base URL used to resolve image digests. */
  registryUrl: string;
  registryCredentialsRef?: string;
  sshOptions: string[];
  /** Defaults for targets that leave parts of their health check out. */
  healthCheck: HealthCheckPolicy;
  /** Bound on removing a container during rollback or cleanup. */
  teardownTimeoutMs: number;
  port: number;
  logLevel: LogLevel;
}

export const DEFAULT_STAGE_POLICY: Readonly<StagePolicy> = {
  timeoutMs: 600_000,
  retries: 2,
  backoffStrategy: 'exponential',
  backoffBaseMs: 1_000,
};

export const DEFAULT_CONFIG: Readonly<EngineConfig> = {
  concurrency: 2,
  stagePolicy: { ...DEFAULT_STAGE_POLICY },
  lockMode: 'fail-fast',
  lockWaitMs: 300_000,
  registryUrl: 'https://registry-1.docker.io',
  sshOptions: ['-o', 'BatchMode=yes', '-o', 'StrictHostKeyChecking=accept-new', '-o', 'ConnectTimeout=10'],
  healthCheck: { ...DEFAULT_HEALTH_CHECK },
  teardownTimeoutMs: 60_000,
  port: 5080,
  logLevel: LogLevel.Info,
};

function readInt(env: NodeJS.ProcessEnv, name: string, min: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`, { name, value: raw });
  }
  return value;
}

function readLockMode(env: NodeJS.ProcessEnv): LockMode | undefined {
  const raw = env.PIPELINE_LOCK_MODE;
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'fail-fast' || raw === 'block') return raw;
  throw new ConfigError(`PIPELINE_LOCK_MODE must be "fail-fast" or "block", got "${raw}"`);
}

/** Build the engine configuration from the environment and explicit overrides. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  const fromEnv: Partial<EngineConfig> = {};

  const concurrency = readInt(env, 'PIPELINE_CONCURRENCY', 1);
  if (concurrency !== undefined) fromEnv.concurrency = concurrency;

  const stagePolicy: StagePolicy = { ...DEFAULT_CONFIG.stagePolicy };
  const timeoutMs = readInt(env, 'PIPELINE_STAGE_TIMEOUT_MS', 1);
  if (timeoutMs !== undefined) stagePolicy.timeoutMs = timeoutMs;
  const retries = readInt(env, 'PIPELINE_STAGE_RETRIES', 0);
  if (retries !== undefined) stagePolicy.retries = retries;
  const backoffBaseMs = readInt(env, 'PIPELINE_BACKOFF_BASE_MS', 0);
  if (backoffBaseMs !== undefined) stagePolicy.backoffBaseMs = backoffBaseMs;
  fromEnv.stagePolicy = stagePolicy;

  const lockMode = readLockMode(env);
  if (lockMode) fromEnv.lockMode = lockMode;
  const lockWaitMs = readInt(env, 'PIPELINE_LOCK_WAIT_MS', 0);
  if (lockWaitMs !== undefined) fromEnv.lockWaitMs = lockWaitMs;

  if (env.PIPELINE_ARTIFACT_REPOSITORY_URL) fromEnv.artifactRepositoryUrl = env.PIPELINE_ARTIFACT_REPOSITORY_URL;
  if (env.PIPELINE_ARTIFACT_REPOSITORY_CREDENTIALS) {
    fromEnv.artifactRepositoryCredentialsRef = env.PIPELINE_ARTIFACT_REPOSITORY_CREDENTIALS;
  }
  if (env.PIPELINE_REGISTRY_URL) fromEnv.registryUrl = env.PIPELINE_REGISTRY_URL;
  if (env.PIPELINE_REGISTRY_CREDENTIALS) fromEnv.registryCredentialsRef = env.PIPELINE_REGISTRY_CREDENTIALS;

  // Replaces the default list; one whitespace-separated argument list.
  if (env.PIPELINE_SSH_OPTIONS !== undefined) {
    fromEnv.sshOptions = env.PIPELINE_SSH_OPTIONS.split(/\s+/).filter((arg) => arg.length > 0);
  }

  const healthCheck: HealthCheckPolicy = { ...DEFAULT_CONFIG.healthCheck };
  if (env.PIPELINE_HEALTH_PATH) healthCheck.path = env.PIPELINE_HEALTH_PATH;
  const healthRetries = readInt(env, 'PIPELINE_HEALTH_RETRIES', 1);
  if (healthRetries !== undefined) healthCheck.retries = healthRetries;
  const healthIntervalMs = readInt(env, 'PIPELINE_HEALTH_INTERVAL_MS', 0);
  if (healthIntervalMs !== undefined) healthCheck.intervalMs = healthIntervalMs;
  const healthTimeoutMs = readInt(env, 'PIPELINE_HEALTH_TIMEOUT_MS', 1);
  if (healthTimeoutMs !== undefined) healthCheck.timeoutMs = healthTimeoutMs;

  const teardownTimeoutMs = readInt(env, 'PIPELINE_TEARDOWN_TIMEOUT_MS', 1);
  if (teardownTimeoutMs !== undefined) fromEnv.teardownTimeoutMs = teardownTimeoutMs;

  const port = readInt(env, 'PIPELINE_PORT', 0) ?? readInt(env, 'PORT', 0);
  if (port !== undefined) fromEnv.port = port;

  if (env.PIPELINE_LOG_LEVEL) {
    const level = parseLogLevel(env.PIPELINE_LOG_LEVEL);
    if (!level) throw new ConfigError(`Unknown PIPELINE_LOG_LEVEL "${env.PIPELINE_LOG_LEVEL}"`);
    fromEnv.logLevel = level;
  }

  return {
    ...DEFAULT_CONFIG,
    ...fromEnv,
    ...overrides,
    stagePolicy: { ...stagePolicy, ...overrides.stagePolicy },
    healthCheck: { ...healthCheck, ...overrides.healthCheck },
  };
}
