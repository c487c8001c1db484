/**
 * Stage runner: executes one stage instance within a run.
 *
 * Execution is policy-driven: every attempt is bounded by the stage timeout,
 * and idempotent stages are retried with exponential backoff. Non-idempotent
 * stages (deploy) get exactly one attempt; a failed deploy needs an explicit
 * re-trigger.
 */

import { ArtifactRef } from '../domain/artifact';
import {
  PipelineError,
  StageExecutionError,
  StageTimeoutError,
  TypedError,
  createTypedError,
} from '../domain/errors';
import { StageStatus } from '../domain/run';
import { CompiledStage } from '../dsl/compiler';
import { Logger } from '../logger';
import { linkedAbortController, sleep } from '../util/abort';
import { DependencyOutput, StageDefinition, StageExecutionResult } from './stage-registry';

/** Upper bound on a single backoff delay. */
export const MAX_BACKOFF_MS = 30_000;

/** Run-level context the executor hands to the runner. */
export interface StageRunContext {
  runId: string;
  commitSha: string;
  dependencies: Record<string, DependencyOutput>;
  /** Aborted when the run is cancelled or aborted. */
  signal: AbortSignal;
  logger: Logger;
  /** Called before sleeping for a retry. */
  onRetry?: (info: { attempt: number; delayMs: number; error: TypedError }) => void | Promise<void>;
}

/** Terminal result of running a stage. */
export interface StageRunOutcome {
  status: StageStatus.Succeeded | StageStatus.Failed | StageStatus.Cancelled;
  attempts: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  outputs?: Record<string, unknown>;
  artifact?: ArtifactRef;
  error?: TypedError;
}

/** Maximum attempts a stage gets under its policy. */
export function maxAttemptsFor(stage: CompiledStage): number {
  return stage.idempotent ? stage.policy.retries + 1 : 1;
}

/** Backoff delay before attempt `attempt + 1`. */
export function computeBackoff(
  strategy: 'fixed' | 'exponential',
  baseMs: number,
  attempt: number,
): number {
  const delay = strategy === 'fixed' ? baseMs : baseMs * Math.pow(2, attempt - 1);
  return Math.min(delay, MAX_BACKOFF_MS);
}

/** Execute a stage with its timeout and retry policy. */
export async function runStage(
  stage: CompiledStage,
  definition: StageDefinition | undefined,
  context: StageRunContext,
): Promise<StageRunOutcome> {
  const startMs = Date.now();
  const startedAt = new Date(startMs).toISOString();
  const finish = (
    status: StageRunOutcome['status'],
    attempts: number,
    extra: Partial<StageRunOutcome> = {},
  ): StageRunOutcome => ({
    status,
    attempts,
    startedAt,
    completedAt: new Date().toISOString(),
    durationMs: Date.now() - startMs,
    ...extra,
  });

  if (!definition) {
    return finish(StageStatus.Failed, 0, {
      error: createTypedError({
        code: 'STAGE.NO_HANDLER',
        message: `No definition registered for stage type "${stage.type}"`,
        stageId: stage.id,
        retryable: false,
        suggestedFixes: [{ type: 'REGISTER_STAGE', params: { stageType: stage.type } }],
      }),
    });
  }

  const maxAttempts = maxAttemptsFor(stage);
  let lastError: TypedError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (context.signal.aborted) {
      return finish(StageStatus.Cancelled, attempt - 1);
    }

    try {
      const result = await executeAttempt(stage, definition, context, attempt);
      const missing = (definition.outputContract ?? []).filter((key) => !(key in result.outputs));
      if (missing.length > 0) {
        return finish(StageStatus.Failed, attempt, {
          error: createTypedError({
            code: 'STAGE.OUTPUT_CONTRACT',
            message: `Stage "${stage.id}" did not produce declared outputs: ${missing.join(', ')}`,
            stageId: stage.id,
            retryable: false,
            details: { missing },
          }),
        });
      }
      return finish(StageStatus.Succeeded, attempt, {
        outputs: result.outputs,
        ...(result.artifact ? { artifact: result.artifact } : {}),
      });
    } catch (err) {
      if (context.signal.aborted) {
        return finish(StageStatus.Cancelled, attempt);
      }

      lastError = classifyError(stage, err, attempt, maxAttempts);
      if (!lastError.retryable || attempt >= maxAttempts) {
        return finish(StageStatus.Failed, attempt, { error: lastError });
      }

      const delayMs = computeBackoff(stage.policy.backoffStrategy, stage.policy.backoffBaseMs, attempt);
      context.logger.warn('Stage attempt failed, retrying', {
        stageId: stage.id,
        attempt,
        maxAttempts,
        delayMs,
        code: lastError.code,
      });
      await context.onRetry?.({ attempt, delayMs, error: lastError });
      try {
        await sleep(delayMs, context.signal);
      } catch {
        return finish(StageStatus.Cancelled, attempt, { error: lastError });
      }
    }
  }

  return finish(StageStatus.Failed, maxAttempts, { error: lastError });
}

/**
 * One bounded attempt. The definition receives a signal that aborts on
 * timeout as well as on run cancellation; the returned promise settles as
 * soon as either happens even if the implementation ignores its signal.
 */
async function executeAttempt(
  stage: CompiledStage,
  definition: StageDefinition,
  context: StageRunContext,
  attempt: number,
): Promise<StageExecutionResult> {
  const { controller, dispose } = linkedAbortController(context.signal);
  const timeoutError = new StageTimeoutError(stage.id, stage.policy.timeoutMs, attempt);

  return new Promise<StageExecutionResult>((resolve, reject) => {
    const settle = () => {
      clearTimeout(timer);
      controller.signal.removeEventListener('abort', onAbort);
      dispose();
    };
    const onAbort = () => {
      settle();
      reject(controller.signal.reason instanceof Error ? controller.signal.reason : timeoutError);
    };
    const timer = setTimeout(() => controller.abort(timeoutError), stage.policy.timeoutMs);
    controller.signal.addEventListener('abort', onAbort, { once: true });

    definition
      .execute(stage, {
        runId: context.runId,
        commitSha: context.commitSha,
        stageId: stage.id,
        attempt,
        dependencies: context.dependencies,
        signal: controller.signal,
        logger: context.logger.child({ stageId: stage.id, attempt }),
      })
      .then(
        (result) => {
          settle();
          resolve(result);
        },
        (err: unknown) => {
          settle();
          reject(err);
        },
      );
  });
}

function classifyError(stage: CompiledStage, err: unknown, attempt: number, maxAttempts: number): TypedError {
  if (err instanceof PipelineError) {
    return {
      ...err.typedError,
      stageId: stage.id,
      details: { ...err.typedError.details, attempt, maxAttempts },
    };
  }
  const message = err instanceof Error ? err.message : 'Unknown stage execution error';
  return new StageExecutionError(stage.id, message, { attempt, maxAttempts }).typedError;
}
