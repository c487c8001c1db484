/**
 * In-process stand-ins for the engine's external collaborators: processes,
 * the image registry, the container runtime and health probes.
 */

import { ContainerInstance, DeploymentTarget } from '../../src/domain/deployment';
import { ContainerRuntime, HealthChecker, ImageRegistry, RunContainerRequest } from '../../src/deploy/runtime';
import { CompiledStage } from '../../src/dsl/compiler';
import { DependencyOutput, StageExecutionContext } from '../../src/engine/stage-registry';
import { createLogger } from '../../src/logger';
import { CommandResult, CommandRunOptions, CommandRunner } from '../../src/process/command-runner';

export interface RecordedCommand {
  command: string;
  args: string[];
  options?: CommandRunOptions;
}

type Responder = (call: RecordedCommand) => CommandResult | Promise<CommandResult>;

/** Records every invocation and answers from a responder (exit 0 by default). */
export class FakeCommandRunner implements CommandRunner {
  calls: RecordedCommand[] = [];

  constructor(private respond: Responder = () => ({ exitCode: 0, output: [] })) {}

  async run(command: string, args: string[], options?: CommandRunOptions): Promise<CommandResult> {
    const call: RecordedCommand = { command, args, options };
    this.calls.push(call);
    const result = await this.respond(call);
    for (const line of result.output) options?.onLine?.(line, 'stdout');
    return result;
  }

  /** The last argument of each call: the command line for `sh -c` and `ssh`. */
  commandLines(): string[] {
    return this.calls.map((call) => call.args[call.args.length - 1] ?? '');
  }
}

export class FakeImageRegistry implements ImageRegistry {
  lookups: string[] = [];

  constructor(private digests: Record<string, string> = {}) {}

  set(imageRef: string, digest: string): void {
    this.digests[imageRef] = digest;
  }

  async resolve(imageRef: string): Promise<string | null> {
    this.lookups.push(imageRef);
    return this.digests[imageRef] ?? null;
  }
}

/** Tracks containers per name; `calls` reads like a shell history. */
export class FakeContainerRuntime implements ContainerRuntime {
  calls: string[] = [];
  running = new Set<string>();
  runExitCode = 0;
  /** removeContainer never answers, whatever signal it gets. */
  hangOnRemove = false;
  /** Runs inside runContainer before it answers. */
  onRun?: (request: RunContainerRequest, signal?: AbortSignal) => void | Promise<void>;

  async runContainer(_target: DeploymentTarget, request: RunContainerRequest, signal?: AbortSignal): Promise<CommandResult> {
    this.calls.push(`run ${request.containerName} ${request.image} ${request.hostPort}:${request.containerPort}`);
    await this.onRun?.(request, signal);
    if (this.runExitCode !== 0) {
      return { exitCode: this.runExitCode, output: ['pulling image', 'container exited'] };
    }
    this.running.add(request.containerName);
    return { exitCode: 0, output: [] };
  }

  async removeContainer(_target: DeploymentTarget, containerName: string): Promise<CommandResult> {
    this.calls.push(`rm ${containerName}`);
    if (this.hangOnRemove) return new Promise<CommandResult>(() => undefined);
    this.running.delete(containerName);
    return { exitCode: 0, output: [] };
  }
}

/** Healthy whenever the instance is running, unless `respond` says otherwise. */
export class FakeHealthChecker implements HealthChecker {
  probes: string[] = [];
  respond?: (instance: ContainerInstance, signal?: AbortSignal) => boolean | Promise<boolean>;

  constructor(private runtime: FakeContainerRuntime) {}

  async check(_target: DeploymentTarget, instance: ContainerInstance, signal?: AbortSignal): Promise<boolean> {
    this.probes.push(instance.containerName);
    if (this.respond) return this.respond(instance, signal);
    return this.runtime.running.has(instance.containerName);
  }
}

export function makeTarget(overrides: Partial<DeploymentTarget> = {}): DeploymentTarget {
  return {
    id: 'web',
    host: 'web-1.internal',
    user: 'deploy',
    serviceName: 'shop',
    containerPort: 8080,
    slots: [
      { name: 'blue', port: 8081 },
      { name: 'green', port: 8082 },
    ],
    healthCheck: { path: '/health', retries: 3, intervalMs: 0, timeoutMs: 1000 },
    ...overrides,
  };
}

export function makeCompiledStage(overrides: Partial<CompiledStage> = {}): CompiledStage {
  return {
    id: 'build',
    type: 'build',
    index: 0,
    inputs: {},
    policy: { timeoutMs: 1000, retries: 0, backoffStrategy: 'fixed', backoffBaseMs: 0 },
    idempotent: true,
    dependencies: [],
    dependents: [],
    ...overrides,
  };
}

export function makeStageContext(overrides: Partial<StageExecutionContext> = {}): StageExecutionContext {
  const dependencies: Record<string, DependencyOutput> = {};
  return {
    runId: 'run_test',
    commitSha: 'abcdef1234567890',
    stageId: 'build',
    attempt: 1,
    dependencies,
    signal: new AbortController().signal,
    logger: createLogger({ test: true }),
    ...overrides,
  };
}

/** Resolves once `predicate` holds, polling on the macrotask queue. */
export async function waitUntil(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('condition not reached in time');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
