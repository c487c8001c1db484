/**
 * Deployment controller: blue/green rollout of an image to one target.
 *
 * The candidate always starts in the slot the current instance does not
 * occupy, so the previous instance keeps serving until the candidate is
 * healthy and traffic has moved. Any failure, cancellation included, tears
 * the candidate down and leaves the previous instance untouched. The target
 * lock is released on every exit path.
 */

import { LockMode } from '../config';
import {
  ContainerInstance,
  DeploymentResult,
  DeploymentTarget,
  SlotConfig,
} from '../domain/deployment';
import {
  DeploymentFailedError,
  ImageNotFoundError,
  PipelineError,
  TargetNotFoundError,
} from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { EventSink } from '../data-plane/publisher';
import { CommandResult } from '../process/command-runner';
import { errorContext, logger } from '../logger';
import { TargetStore } from '../storage/store';
import { abortable, abortReason, sleep, throwIfAborted } from '../util/abort';
import { ContainerRuntime, HealthChecker, ImageRegistry } from './runtime';
import { TargetLockManager } from './target-lock';

const log = logger.child({ module: 'deployment-controller' });

/** Output lines kept in failure details. */
const LOG_TAIL_LINES = 20;

export const DEFAULT_TEARDOWN_TIMEOUT_MS = 60_000;

export interface DeploymentControllerDeps {
  targets: TargetStore;
  locks: TargetLockManager;
  registry: ImageRegistry;
  runtime: ContainerRuntime;
  health: HealthChecker;
  events?: EventSink;
  /** Bound on removing a container, so a hung host cannot keep the target lock. */
  teardownTimeoutMs?: number;
}

export interface DeployOptions {
  signal?: AbortSignal;
  /** Lock holder and event correlation. */
  runId?: string;
  stageId?: string;
  lockMode?: LockMode;
  lockWaitMs?: number;
}

/** A rollout step failed; carries details for DeploymentFailedError. */
class CandidateFailure extends Error {
  constructor(message: string, public readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'CandidateFailure';
  }
}

export class DeploymentController {
  constructor(private deps: DeploymentControllerDeps) {}

  /** Record a target declaration. The current instance, if known, is kept. */
  async registerTarget(target: DeploymentTarget): Promise<DeploymentTarget> {
    return this.deps.targets.register(target);
  }

  async getTarget(targetId: string): Promise<DeploymentTarget> {
    const target = await this.deps.targets.getById(targetId);
    if (!target) throw new TargetNotFoundError(targetId);
    return target;
  }

  async deploy(targetId: string, imageRef: string, options: DeployOptions = {}): Promise<DeploymentResult> {
    const { signal } = options;
    const startedMs = Date.now();
    await this.getTarget(targetId);
    throwIfAborted(signal);

    const digest = await this.deps.registry.resolve(imageRef, signal);
    if (!digest) throw new ImageNotFoundError(imageRef);

    const lease = await this.deps.locks.acquire(targetId, {
      holder: options.runId ?? 'manual',
      signal,
      ...(options.lockMode ? { mode: options.lockMode } : {}),
      ...(options.lockWaitMs !== undefined ? { waitTimeoutMs: options.lockWaitMs } : {}),
    });
    log.info('Target lock acquired', { targetId, holder: lease.holder });

    try {
      // Re-read under the lock: the previous holder may have changed the current instance.
      const target = await this.getTarget(targetId);
      return await this.rollout(target, imageRef, digest, startedMs, options);
    } finally {
      lease.release();
      log.info('Target lock released', { targetId, holder: lease.holder });
    }
  }

  private async rollout(
    target: DeploymentTarget,
    imageRef: string,
    digest: string,
    startedMs: number,
    options: DeployOptions,
  ): Promise<DeploymentResult> {
    const { signal } = options;
    const previous = target.current;

    if (previous?.digest === digest && (await this.probe(target, previous, signal))) {
      log.info('Target already runs this digest', { targetId: target.id, digest });
      return {
        targetId: target.id,
        imageRef,
        digest,
        outcome: 'unchanged',
        instance: previous,
        previous,
        healthChecks: 1,
        durationMs: Date.now() - startedMs,
      };
    }

    const slot = pickFreeSlot(target);
    const candidate: ContainerInstance = {
      containerName: `${target.serviceName}-${slot.name}`,
      slot: slot.name,
      hostPort: slot.port,
      image: imageRef,
      digest,
      deployedAt: new Date().toISOString(),
    };
    await this.emit('deployment.started', target.id, options, {
      imageRef,
      digest,
      slot: slot.name,
      previous: previous?.containerName,
    });

    let healthChecks: number;
    try {
      const started = await this.deps.runtime.runContainer(
        target,
        {
          containerName: candidate.containerName,
          image: imageRef,
          hostPort: slot.port,
          containerPort: target.containerPort,
          replace: true,
        },
        signal,
      );
      if (started.exitCode !== 0) {
        throw new CandidateFailure(`container ${candidate.containerName} failed to start (exit ${started.exitCode})`, {
          exitCode: started.exitCode,
          logTail: started.output.slice(-LOG_TAIL_LINES),
        });
      }

      healthChecks = await this.awaitHealthy(target, candidate, signal);

      if (this.deps.runtime.switchTraffic) {
        const switched = await this.deps.runtime.switchTraffic(target, candidate, signal);
        if (switched.exitCode !== 0) {
          throw new CandidateFailure(`traffic switch to ${candidate.containerName} failed (exit ${switched.exitCode})`, {
            exitCode: switched.exitCode,
            logTail: switched.output.slice(-LOG_TAIL_LINES),
          });
        }
      }
    } catch (err) {
      await this.teardown(target, candidate);
      const reason = signal?.aborted ? 'cancelled' : err instanceof Error ? err.message : String(err);
      await this.emit('deployment.rolled_back', target.id, options, {
        imageRef,
        candidate: candidate.containerName,
        kept: previous?.containerName,
        reason,
      });
      if (signal?.aborted) throw abortReason(signal);
      if (err instanceof CandidateFailure) {
        throw new DeploymentFailedError(target.id, err.message, { imageRef, digest, ...err.details });
      }
      if (err instanceof PipelineError) {
        throw new DeploymentFailedError(target.id, err.message, { imageRef, digest, cause: err.code });
      }
      throw new DeploymentFailedError(target.id, reason, { imageRef, digest });
    }

    // Committed: the candidate serves traffic from here on.
    if (previous && previous.containerName !== candidate.containerName) {
      try {
        const removed = await this.removeContainer(target, previous.containerName);
        if (removed.exitCode !== 0) {
          log.warn('Previous instance could not be removed', {
            targetId: target.id,
            containerName: previous.containerName,
            exitCode: removed.exitCode,
          });
        }
      } catch (err) {
        log.warn('Previous instance could not be removed', {
          targetId: target.id,
          containerName: previous.containerName,
          ...errorContext(err),
        });
      }
    }
    await this.deps.targets.update(target.id, { current: candidate });

    const result: DeploymentResult = {
      targetId: target.id,
      imageRef,
      digest,
      outcome: 'deployed',
      instance: candidate,
      ...(previous ? { previous } : {}),
      healthChecks,
      durationMs: Date.now() - startedMs,
    };
    await this.emit('deployment.succeeded', target.id, options, {
      imageRef,
      digest,
      containerName: candidate.containerName,
      healthChecks,
      durationMs: result.durationMs,
    });
    return result;
  }

  /** Probe until healthy. Returns the number of checks made. */
  private async awaitHealthy(target: DeploymentTarget, instance: ContainerInstance, signal?: AbortSignal): Promise<number> {
    const policy = target.healthCheck;
    for (let attempt = 1; attempt <= policy.retries; attempt++) {
      throwIfAborted(signal);
      if (await this.probe(target, instance, signal)) return attempt;
      if (attempt < policy.retries) await sleep(policy.intervalMs, signal);
    }
    throw new CandidateFailure(`health check failed after ${policy.retries} attempts`, {
      healthCheck: { ...policy, url: `http://${target.host}:${instance.hostPort}${policy.path}` },
    });
  }

  private async probe(target: DeploymentTarget, instance: ContainerInstance, signal?: AbortSignal): Promise<boolean> {
    try {
      return await this.deps.health.check(target, instance, signal);
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      log.debug('Health probe errored', { targetId: target.id, containerName: instance.containerName, ...errorContext(err) });
      return false;
    }
  }

  /** Ignores the run's signal: it must also run after cancellation. */
  private async teardown(target: DeploymentTarget, candidate: ContainerInstance): Promise<void> {
    try {
      const removed = await this.removeContainer(target, candidate.containerName);
      if (removed.exitCode !== 0) {
        log.error('Candidate teardown failed', {
          targetId: target.id,
          containerName: candidate.containerName,
          exitCode: removed.exitCode,
        });
      }
    } catch (err) {
      log.error('Candidate teardown failed', { targetId: target.id, containerName: candidate.containerName, ...errorContext(err) });
    }
  }

  /** Remove a container within the teardown timeout, whether or not the runtime honours the signal. */
  private removeContainer(target: DeploymentTarget, containerName: string): Promise<CommandResult> {
    const timeout = AbortSignal.timeout(this.deps.teardownTimeoutMs ?? DEFAULT_TEARDOWN_TIMEOUT_MS);
    return abortable(this.deps.runtime.removeContainer(target, containerName, timeout), timeout);
  }

  private async emit(
    type: PipelineEventType,
    targetId: string,
    options: DeployOptions,
    payload: Record<string, unknown>,
  ): Promise<void> {
    if (!this.deps.events) return;
    await this.deps.events.publish({
      type,
      targetId,
      ...(options.runId ? { runId: options.runId } : {}),
      ...(options.stageId ? { stageId: options.stageId } : {}),
      payload,
    });
  }
}

/** The first slot the current instance does not occupy. */
export function pickFreeSlot(target: DeploymentTarget): SlotConfig {
  const current = target.current;
  const free = target.slots.find(
    (slot) => !current || (slot.name !== current.slot && slot.port !== current.hostPort),
  );
  if (!free) {
    throw new DeploymentFailedError(target.id, 'no free slot for the candidate', {
      slots: target.slots.map((s) => s.name),
      current: current?.slot,
    });
  }
  return free;
}
