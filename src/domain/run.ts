/**
 * Pipeline run domain model.
 *
 * A PipelineRun is one execution of a pipeline spec for one commit. It owns
 * its StageInstances; only the executor mutates them.
 */

import { ArtifactRef } from './artifact';
import { TypedError } from './errors';
import { PipelineSpec } from './pipeline';

/** Pipeline run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Queued = 'queued',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

/** Stage instance states. */
export enum StageStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Skipped = 'skipped',
  Cancelled = 'cancelled',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Queued, RunStatus.Cancelled],
  [RunStatus.Queued]: [RunStatus.Running, RunStatus.Cancelled],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Cancelled]: [],
};

/** Valid state transitions for stage instances. */
export const VALID_STAGE_TRANSITIONS: Record<StageStatus, StageStatus[]> = {
  [StageStatus.Pending]: [StageStatus.Running, StageStatus.Skipped, StageStatus.Cancelled],
  [StageStatus.Running]: [StageStatus.Succeeded, StageStatus.Failed, StageStatus.Cancelled],
  [StageStatus.Succeeded]: [],
  [StageStatus.Failed]: [],
  [StageStatus.Skipped]: [],
  [StageStatus.Cancelled]: [],
};

/** One node of a run's stage graph. */
export interface StageInstance {
  id: string;
  type: string;
  /** Ids of the stages that must succeed before this one starts. */
  dependencies: string[];
  inputs: Record<string, unknown>;
  status: StageStatus;
  /** Attempts made, retries included. */
  attempts: number;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  outputs?: Record<string, unknown>;
  /** Artifact produced by this stage, if any. */
  artifact?: ArtifactRef;
  error?: TypedError;
  /** Failed ancestor that caused this stage to be skipped. */
  skippedBecause?: string;
}

/** First failure of a run, as reported to users. */
export interface RunFailureSummary {
  stageId: string;
  /** Error kind, e.g. "STAGE.TIMEOUT". */
  code: string;
  message: string;
  /** Dependents skipped because of this failure. */
  skipped: string[];
}

/** One execution of a pipeline for one commit. */
export interface PipelineRun {
  id: string;
  pipelineName: string;
  /** Commit identity; the version key of every artifact this run produces. */
  commitSha: string;
  spec: PipelineSpec;
  status: RunStatus;
  /** Maximum number of stages running at once. */
  concurrency: number;
  triggeredAt: string;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  /** Stage ids in deterministic topological order. */
  executionOrder: string[];
  stages: Record<string, StageInstance>;
  failure?: RunFailureSummary;
  /** Run-level error (abort, cancellation). */
  error?: TypedError;
  graphHash?: string;
  cancelledBy?: string;
  cancelledAt?: string;
  cancelReason?: string;
}

/** Input for creating a new run. */
export interface CreateRunInput {
  spec: PipelineSpec;
  commitSha: string;
  /** Overrides the pipeline's and the engine's default concurrency. */
  concurrency?: number;
  triggeredAt?: string;
}

/** Input for cancelling a run. */
export interface CancelRunInput {
  runId: string;
  cancelledBy: string;
  reason?: string;
}
