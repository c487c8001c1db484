/**
 * Pipeline executor: the core orchestration engine.
 *
 * Compiles a spec into a stage graph, then schedules stages as their
 * dependencies succeed, at most `concurrency` at a time. A failed stage
 * skips its transitive dependents while independent branches keep running.
 * A failed deployment aborts the whole run. Cancellation aborts the run's
 * signal; every running stage observes it and nothing new starts.
 */

import { v4 as uuid } from 'uuid';
import { EngineConfig, DEFAULT_CONFIG } from '../config';
import { PipelineSpec } from '../domain/pipeline';
import {
  CancelRunInput,
  CreateRunInput,
  PipelineRun,
  RunStatus,
  StageInstance,
  StageStatus,
} from '../domain/run';
import {
  InvalidRunStateError,
  PipelineError,
  RunCancelledError,
  RunNotFoundError,
  SpecError,
  TypedError,
  createTypedError,
  maskSecretsInMessage,
  runInvalidStateError,
  specValidationError,
} from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { PipelineEventPublisher } from '../data-plane/publisher';
import { COMMIT_SHA_PATTERN, SCHEMA_CONSTRAINTS } from '../dsl/schema';
import { PipelineGraph, buildPipelineGraph, descendantsOf } from '../dsl/compiler';
import { errorContext, logger } from '../logger';
import { ListOptions, ListResult, Store } from '../storage/store';
import { DependencyOutput, StageRegistry } from './stage-registry';
import { runStage } from './stage-runner';
import { isTerminalRunStatus, transitionRunStatus, transitionStageStatus } from './state-machine';

const log = logger.child({ module: 'executor' });

/** Error code that aborts the whole run when a stage fails with it. */
export const RUN_ABORTING_CODES: readonly string[] = ['DEPLOYMENT.FAILED'];

export interface ExecutorOptions {
  config?: Pick<EngineConfig, 'concurrency' | 'stagePolicy' | 'healthCheck'>;
  /** Values masked out of stage error messages before they are stored. */
  secrets?: string[];
}

interface ActiveRun {
  run: PipelineRun;
  graph: PipelineGraph;
  controller: AbortController;
  done: Promise<PipelineRun>;
}

export class PipelineExecutor {
  private config: Pick<EngineConfig, 'concurrency' | 'stagePolicy' | 'healthCheck'>;
  private secrets: string[];
  private active = new Map<string, ActiveRun>();

  constructor(
    private store: Store,
    private publisher: PipelineEventPublisher,
    private registry: StageRegistry,
    options: ExecutorOptions = {},
  ) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.secrets = (options.secrets ?? []).filter((s) => s.length > 0);
  }

  /** Compile a spec against the registry. Throws SpecError subclasses. */
  compile(spec: PipelineSpec): PipelineGraph {
    return buildPipelineGraph(spec, this.registry, {
      defaults: this.config.stagePolicy,
      healthCheck: this.config.healthCheck,
    });
  }

  /** Validate the pipeline spec, record a run with every stage pending. */
  async createRun(input: CreateRunInput): Promise<PipelineRun> {
    if (!COMMIT_SHA_PATTERN.test(input.commitSha)) {
      throw new SpecError(
        specValidationError(`commitSha must be 7-64 hex characters, got "${input.commitSha}"`, { field: 'commitSha' }),
      );
    }

    const graph = this.compile(input.spec);
    const concurrency = input.concurrency ?? graph.concurrency ?? this.config.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > SCHEMA_CONSTRAINTS.maxConcurrency) {
      throw new SpecError(
        specValidationError(`concurrency must be an integer between 1 and ${SCHEMA_CONSTRAINTS.maxConcurrency}`, {
          field: 'concurrency',
          value: concurrency,
        }),
      );
    }

    for (const target of graph.targets) {
      await this.store.targets.register(target);
    }

    const now = new Date().toISOString();
    const stages: Record<string, StageInstance> = {};
    for (const stageId of graph.executionOrder) {
      const compiled = graph.stages[stageId];
      stages[stageId] = {
        id: stageId,
        type: compiled.type,
        dependencies: [...compiled.dependencies],
        inputs: compiled.inputs,
        status: StageStatus.Pending,
        attempts: 0,
      };
    }

    const run: PipelineRun = {
      id: `run_${uuid()}`,
      pipelineName: graph.name,
      commitSha: input.commitSha,
      spec: input.spec,
      status: RunStatus.Created,
      concurrency,
      triggeredAt: input.triggeredAt ?? now,
      createdAt: now,
      updatedAt: now,
      executionOrder: graph.executionOrder,
      stages,
      graphHash: graph.graphHash,
    };

    await this.store.runs.create(run);
    await this.safePublishRunEvent(run, 'run.created');
    log.info('Run created', {
      runId: run.id,
      pipeline: run.pipelineName,
      commitSha: run.commitSha,
      stages: graph.executionOrder.length,
      concurrency,
    });
    for (const warning of graph.warnings) {
      log.warn('Pipeline spec warning', { runId: run.id, warning });
    }
    return run;
  }

  /** Create a run and execute it in the background. */
  async startRun(input: CreateRunInput): Promise<PipelineRun> {
    const run = await this.createRun(input);
    this.execute(structuredClone(run)).catch((err: unknown) => {
      log.error('Run execution crashed', { runId: run.id, ...errorContext(err) });
    });
    return run;
  }

  /** Execute a created run to a terminal state. */
  async executeRun(runId: string): Promise<PipelineRun> {
    this.assertNotExecuting(runId);
    return this.execute(await this.getRun(runId));
  }

  private async execute(run: PipelineRun): Promise<PipelineRun> {
    this.assertNotExecuting(run.id);
    const graph = this.compile(run.spec);
    const controller = new AbortController();
    let settle: (run: PipelineRun) => void = () => undefined;
    const done = new Promise<PipelineRun>((resolve) => {
      settle = resolve;
    });
    const entry: ActiveRun = { run, graph, controller, done };
    this.active.set(run.id, entry);

    try {
      const result = await this.executeRunInternal(entry);
      settle(result);
      return result;
    } catch (err) {
      settle(structuredClone(entry.run));
      throw err;
    } finally {
      this.active.delete(run.id);
    }
  }

  private assertNotExecuting(runId: string): void {
    if (!this.active.has(runId)) return;
    throw new InvalidRunStateError(
      createTypedError({
        code: 'RUN.ALREADY_RUNNING',
        message: `Run "${runId}" is already being executed`,
        runId,
        retryable: false,
      }),
    );
  }

  /** Resolves with the terminal run once an executing run finishes. */
  async waitForRun(runId: string): Promise<PipelineRun> {
    const entry = this.active.get(runId);
    if (entry) return entry.done;
    return this.getRun(runId);
  }

  /**
   * Request cancellation. An executing run is cancelled by its scheduler:
   * running stages are signalled and nothing new starts. A run that is not
   * executing is cancelled immediately.
   */
  async cancelRun(runId: string, cancelledBy: string, reason?: string): Promise<PipelineRun> {
    const entry = this.active.get(runId);
    const run = entry?.run ?? (await this.getRun(runId));

    if (isTerminalRunStatus(run.status)) {
      throw new InvalidRunStateError(runInvalidStateError(runId, run.status, RunStatus.Cancelled));
    }

    run.cancelledBy = cancelledBy;
    run.cancelReason = reason;
    run.cancelledAt = new Date().toISOString();
    log.info('Run cancellation requested', { runId, cancelledBy, reason });

    if (entry) {
      entry.controller.abort(new RunCancelledError(runId, reason));
      return structuredClone(run);
    }

    for (const stage of Object.values(run.stages)) {
      if (stage.status === StageStatus.Pending) {
        this.transitionStage(run, stage, StageStatus.Cancelled);
      }
    }
    return this.finishRun(run, RunStatus.Cancelled, new RunCancelledError(runId, reason).typedError);
  }

  /** Convenience overload taking a CancelRunInput. */
  async cancel(input: CancelRunInput): Promise<PipelineRun> {
    return this.cancelRun(input.runId, input.cancelledBy, input.reason);
  }

  async getRun(runId: string): Promise<PipelineRun> {
    const active = this.active.get(runId);
    if (active) return structuredClone(active.run);
    const run = await this.store.runs.getById(runId);
    if (!run) throw new RunNotFoundError(runId);
    return run;
  }

  async listRuns(options?: ListOptions & { status?: RunStatus }): Promise<ListResult<PipelineRun>> {
    return this.store.runs.list(options);
  }

  isExecuting(runId: string): boolean {
    return this.active.has(runId);
  }

  private async executeRunInternal(entry: ActiveRun): Promise<PipelineRun> {
    const { run, graph, controller } = entry;

    this.transitionRun(run, RunStatus.Queued);
    await this.persist(run);

    if (controller.signal.aborted) {
      return this.finalize(entry);
    }

    this.transitionRun(run, RunStatus.Running);
    run.startedAt = new Date().toISOString();
    await this.persist(run);
    await this.safePublishRunEvent(run, 'run.started');
    log.info('Run started', { runId: run.id, concurrency: run.concurrency });

    const running = new Map<string, Promise<void>>();
    for (;;) {
      while (running.size < run.concurrency && !controller.signal.aborted) {
        const next = this.nextReadyStage(run, graph.executionOrder);
        if (!next) break;
        // Claim synchronously so the next pick does not see it as pending.
        this.transitionStage(run, next, StageStatus.Running);
        const task = this.runStageInstance(entry, next.id).finally(() => {
          running.delete(next.id);
        });
        running.set(next.id, task);
      }
      if (running.size === 0) break;
      await Promise.race(running.values());
    }

    return this.finalize(entry);
  }

  /** First pending stage, in execution order, whose dependencies all succeeded. */
  private nextReadyStage(run: PipelineRun, order: string[]): StageInstance | undefined {
    for (const stageId of order) {
      const stage = run.stages[stageId];
      if (stage.status !== StageStatus.Pending) continue;
      if (stage.dependencies.every((dep) => run.stages[dep]?.status === StageStatus.Succeeded)) {
        return stage;
      }
    }
    return undefined;
  }

  private async runStageInstance(entry: ActiveRun, stageId: string): Promise<void> {
    const { run, graph, controller } = entry;
    const stage = run.stages[stageId];
    const compiled = graph.stages[stageId];

    stage.startedAt = new Date().toISOString();
    await this.persist(run);
    await this.safePublishStageEvent(run, stageId, 'stage.started');

    const dependencies: Record<string, DependencyOutput> = {};
    for (const dep of compiled.dependencies) {
      const upstream = run.stages[dep];
      dependencies[dep] = {
        type: upstream.type,
        outputs: upstream.outputs ?? {},
        ...(upstream.artifact ? { artifact: upstream.artifact } : {}),
      };
    }

    const outcome = await runStage(compiled, this.registry.get(compiled.type), {
      runId: run.id,
      commitSha: run.commitSha,
      dependencies,
      signal: controller.signal,
      logger: log.child({ runId: run.id }),
      onRetry: async ({ attempt, delayMs, error }) => {
        stage.attempts = attempt;
        await this.safePublishStageEvent(run, stageId, 'stage.retrying', {
          attempt,
          delayMs,
          error: this.maskError(error),
        });
      },
    });

    this.transitionStage(run, stage, outcome.status);
    stage.attempts = outcome.attempts;
    stage.startedAt = outcome.startedAt;
    stage.completedAt = outcome.completedAt;
    stage.durationMs = outcome.durationMs;
    if (outcome.outputs) stage.outputs = outcome.outputs;
    if (outcome.artifact) stage.artifact = outcome.artifact;
    if (outcome.error) stage.error = this.maskError({ ...outcome.error, runId: run.id });

    if (outcome.status === StageStatus.Succeeded) {
      log.info('Stage succeeded', { runId: run.id, stageId, attempts: stage.attempts, durationMs: stage.durationMs });
      await this.persist(run);
      await this.safePublishStageEvent(run, stageId, 'stage.succeeded');
      return;
    }

    if (outcome.status === StageStatus.Cancelled) {
      log.info('Stage cancelled', { runId: run.id, stageId });
      await this.persist(run);
      await this.safePublishStageEvent(run, stageId, 'stage.cancelled');
      return;
    }

    const error = stage.error ?? createTypedError({
      code: 'STAGE.UNKNOWN_FAILURE',
      message: `Stage "${stageId}" failed`,
      stageId,
      retryable: false,
    });
    log.warn('Stage failed', { runId: run.id, stageId, code: error.code, attempts: stage.attempts });
    await this.safePublishStageEvent(run, stageId, 'stage.failed');

    const skipped = await this.skipDependents(run, graph, stageId);
    let failure = run.failure;
    if (!failure) {
      failure = { stageId, code: error.code, message: error.message, skipped };
      run.failure = failure;
      run.error = error;
    }

    if (RUN_ABORTING_CODES.includes(error.code) && !controller.signal.aborted) {
      log.error('Deployment failed, aborting run', { runId: run.id, stageId });
      controller.abort(
        new PipelineError(
          createTypedError({
            code: 'RUN.ABORTED',
            message: `Run aborted: stage "${stageId}" failed with ${error.code}`,
            runId: run.id,
            stageId,
            retryable: false,
          }),
        ),
      );
      for (const pending of Object.values(run.stages)) {
        if (pending.status === StageStatus.Pending) {
          await this.skipStage(run, pending, stageId);
          if (failure.stageId === stageId) failure.skipped.push(pending.id);
        }
      }
    }
    await this.persist(run);
  }

  /** Skip every pending transitive dependent of a failed stage. */
  private async skipDependents(run: PipelineRun, graph: PipelineGraph, failedId: string): Promise<string[]> {
    const descendants = descendantsOf(graph, failedId);
    const skipped: string[] = [];
    for (const stageId of graph.executionOrder) {
      const stage = run.stages[stageId];
      if (!descendants.has(stageId) || stage.status !== StageStatus.Pending) continue;
      await this.skipStage(run, stage, failedId);
      skipped.push(stageId);
    }
    return skipped;
  }

  private async skipStage(run: PipelineRun, stage: StageInstance, because: string): Promise<void> {
    this.transitionStage(run, stage, StageStatus.Skipped);
    stage.skippedBecause = because;
    stage.completedAt = new Date().toISOString();
    await this.safePublishStageEvent(run, stage.id, 'stage.skipped');
  }

  private async finalize(entry: ActiveRun): Promise<PipelineRun> {
    const { run, controller } = entry;
    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && reason instanceof RunCancelledError) {
      for (const stage of Object.values(run.stages)) {
        if (stage.status === StageStatus.Pending) {
          this.transitionStage(run, stage, StageStatus.Cancelled);
          await this.safePublishStageEvent(run, stage.id, 'stage.cancelled');
        }
      }
      return this.finishRun(run, RunStatus.Cancelled, reason.typedError);
    }

    const failed = Object.values(run.stages).some(
      (s) => s.status === StageStatus.Failed || s.status === StageStatus.Cancelled,
    );
    if (failed || run.failure) {
      return this.finishRun(run, RunStatus.Failed, run.error);
    }
    return this.finishRun(run, RunStatus.Succeeded);
  }

  private async finishRun(run: PipelineRun, status: RunStatus, error?: TypedError): Promise<PipelineRun> {
    this.transitionRun(run, status);
    run.completedAt = new Date().toISOString();
    if (error) run.error = error;
    await this.persist(run);

    const eventType: PipelineEventType =
      status === RunStatus.Succeeded ? 'run.succeeded' : status === RunStatus.Cancelled ? 'run.cancelled' : 'run.failed';
    await this.safePublishRunEvent(run, eventType);
    log.info('Run finished', {
      runId: run.id,
      status,
      failedStage: run.failure?.stageId,
      durationMs: run.startedAt ? Date.parse(run.completedAt) - Date.parse(run.startedAt) : 0,
    });
    return structuredClone(run);
  }

  private transitionRun(run: PipelineRun, target: RunStatus): void {
    const result = transitionRunStatus(run.status, target);
    if (!result.success) {
      throw new InvalidRunStateError(result.error ?? runInvalidStateError(run.id, run.status, target));
    }
    run.status = target;
  }

  private transitionStage(run: PipelineRun, stage: StageInstance, target: StageStatus): void {
    const result = transitionStageStatus(stage.status, target);
    if (!result.success) {
      throw new InvalidRunStateError(
        result.error ?? createTypedError({
          code: 'STAGE.INVALID_TRANSITION',
          message: `Invalid stage state transition: ${stage.status} -> ${target}`,
          runId: run.id,
          stageId: stage.id,
          retryable: false,
        }),
      );
    }
    stage.status = target;
  }

  private maskError(error: TypedError): TypedError {
    if (this.secrets.length === 0) return error;
    return { ...error, message: maskSecretsInMessage(error.message, this.secrets) };
  }

  private async persist(run: PipelineRun): Promise<void> {
    const updated = await this.store.runs.update(run.id, run);
    if (updated) run.updatedAt = updated.updatedAt;
  }

  // Publishing is observational: a failing event store must not fail the run.
  private async safePublishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<void> {
    try {
      await this.publisher.publishRunEvent(run, eventType);
    } catch (err) {
      log.warn('Failed to publish run event', { runId: run.id, eventType, ...errorContext(err) });
    }
  }

  private async safePublishStageEvent(
    run: PipelineRun,
    stageId: string,
    eventType: PipelineEventType,
    extra?: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.publisher.publishStageEvent(run, stageId, eventType, extra);
    } catch (err) {
      log.warn('Failed to publish stage event', { runId: run.id, stageId, eventType, ...errorContext(err) });
    }
  }
}
