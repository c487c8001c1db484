/**
 * Composition root: builds a ready engine from configuration. The CLI and
 * the HTTP server both start here; tests pass fakes through the overrides.
 */

import { ArtifactBackend, ArtifactStoreClient } from './artifacts/artifact-store';
import { HttpArtifactBackend } from './artifacts/http-backend';
import { MemoryArtifactBackend } from './artifacts/memory-backend';
import { EngineConfig, loadConfig } from './config';
import { PipelineEventPublisher } from './data-plane/publisher';
import { DeploymentController } from './deploy/deployment-controller';
import { HttpHealthChecker } from './deploy/health-checker';
import { RegistryHttpClient } from './deploy/registry-client';
import { ContainerRuntime, HealthChecker, ImageRegistry } from './deploy/runtime';
import { SshDockerRuntime } from './deploy/ssh-runtime';
import { TargetLockManager } from './deploy/target-lock';
import { resolveCredential } from './domain/credentials';
import { PipelineExecutor } from './engine/executor';
import { StageRegistry } from './engine/stage-registry';
import { errorContext, logger, setLogLevel } from './logger';
import { CommandRunner, SpawnCommandRunner } from './process/command-runner';
import { createBuiltinRegistry } from './stages';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';

const log = logger.child({ module: 'bootstrap' });

export interface EngineOverrides {
  store?: Store;
  runner?: CommandRunner;
  /** Backend of the run-scoped artifact store. */
  artifactBackend?: ArtifactBackend;
  /** Backend of the publish repository. */
  publishBackend?: ArtifactBackend;
  imageRegistry?: ImageRegistry;
  runtime?: ContainerRuntime;
  health?: HealthChecker;
  /** Base directory for relative stage paths. */
  workdir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface Engine {
  config: EngineConfig;
  store: Store;
  publisher: PipelineEventPublisher;
  registry: StageRegistry;
  artifacts: ArtifactStoreClient;
  locks: TargetLockManager;
  deployments: DeploymentController;
  executor: PipelineExecutor;
}

export function createEngine(config: EngineConfig = loadConfig(), overrides: EngineOverrides = {}): Engine {
  setLogLevel(config.logLevel);
  const env = overrides.env ?? process.env;
  const store = overrides.store ?? createMemoryStore();
  const publisher = new PipelineEventPublisher(store);
  const runner = overrides.runner ?? new SpawnCommandRunner();

  const artifacts = new ArtifactStoreClient(overrides.artifactBackend ?? new MemoryArtifactBackend());
  const publishBackend =
    overrides.publishBackend ??
    (config.artifactRepositoryUrl
      ? new HttpArtifactBackend({
          baseUrl: config.artifactRepositoryUrl,
          credentialsRef: config.artifactRepositoryCredentialsRef,
          env,
        })
      : undefined);
  const publishRepository = publishBackend ? new ArtifactStoreClient(publishBackend) : artifacts;

  const imageRegistry =
    overrides.imageRegistry ??
    new RegistryHttpClient({
      defaultRegistryUrl: config.registryUrl,
      credentialsRef: config.registryCredentialsRef,
      env,
    });
  const locks = new TargetLockManager({ mode: config.lockMode, waitTimeoutMs: config.lockWaitMs });
  const deployments = new DeploymentController({
    targets: store.targets,
    locks,
    registry: imageRegistry,
    runtime: overrides.runtime ?? new SshDockerRuntime({ runner, sshOptions: config.sshOptions, env }),
    health: overrides.health ?? new HttpHealthChecker(),
    events: publisher,
    teardownTimeoutMs: config.teardownTimeoutMs,
  });

  const registry = createBuiltinRegistry({
    runner,
    artifacts,
    publishRepository,
    registry: imageRegistry,
    deployments,
    workdir: overrides.workdir,
  });

  const executor = new PipelineExecutor(store, publisher, registry, {
    config,
    secrets: collectSecrets([config.artifactRepositoryCredentialsRef, config.registryCredentialsRef], env),
  });

  log.debug('Engine created', {
    artifacts: artifacts.backendKind,
    publishRepository: publishRepository.backendKind,
    lockMode: config.lockMode,
    concurrency: config.concurrency,
  });
  return { config, store, publisher, registry, artifacts, locks, deployments, executor };
}

/** Resolved credential values (and their password parts) to mask in messages. */
function collectSecrets(refs: Array<string | undefined>, env: NodeJS.ProcessEnv): string[] {
  const secrets: string[] = [];
  for (const ref of refs) {
    if (!ref) continue;
    try {
      const value = resolveCredential(ref, env);
      secrets.push(value);
      const colon = value.indexOf(':');
      if (colon >= 0 && colon < value.length - 1) secrets.push(value.slice(colon + 1));
    } catch (err) {
      log.warn('Credential reference cannot be resolved yet', { ...errorContext(err) });
    }
  }
  return secrets;
}
