/**
 * Storage layer interfaces.
 *
 * Runs, events and deployment target records go through these contracts so
 * the engine can run on the in-memory reference store or a durable backend.
 */

import { DeploymentTarget } from '../domain/deployment';
import { PipelineEvent, PipelineEventType } from '../domain/events';
import { PipelineRun, RunStatus } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export interface RunStore {
  create(run: PipelineRun): Promise<PipelineRun>;
  getById(id: string): Promise<PipelineRun | null>;
  update(id: string, run: Partial<PipelineRun>): Promise<PipelineRun | null>;
  /** Most recent first. */
  list(options?: ListOptions & { status?: RunStatus }): Promise<ListResult<PipelineRun>>;
}

export interface EventStore {
  create(event: PipelineEvent): Promise<PipelineEvent>;
  listByRun(runId: string, options?: ListOptions & { eventTypes?: PipelineEventType[] }): Promise<PipelineEvent[]>;
}

/** Deployment target records. Writes come only from the deployment controller. */
export interface TargetStore {
  /** Insert or replace the declaration, keeping the recorded current instance. */
  register(target: DeploymentTarget): Promise<DeploymentTarget>;
  getById(id: string): Promise<DeploymentTarget | null>;
  update(id: string, updates: Partial<DeploymentTarget>): Promise<DeploymentTarget | null>;
  list(): Promise<DeploymentTarget[]>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  runs: RunStore;
  events: EventStore;
  targets: TargetStore;
}
