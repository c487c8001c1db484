/**
 * In-memory storage implementation.
 *
 * Reference implementation for the CLI, the server and tests. Values are
 * deep-copied on the way in and out so callers never alias stored state.
 */

import { DeploymentTarget } from '../domain/deployment';
import { PipelineEvent, PipelineEventType } from '../domain/events';
import { PipelineRun, RunStatus } from '../domain/run';
import {
  EventStore,
  ListOptions,
  ListResult,
  RunStore,
  Store,
  TargetStore,
  toListResult,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(value: T): T {
  return structuredClone(value);
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, PipelineRun>();

  async create(run: PipelineRun): Promise<PipelineRun> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<PipelineRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<PipelineRun>): Promise<PipelineRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: PipelineRun = { ...existing, ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions & { status?: RunStatus }): Promise<ListResult<PipelineRun>> {
    const matching = [...this.data.values()]
      .filter((run) => !options?.status || run.status === options.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return toListResult(applyListOptions(matching, options).map(deepCopy), matching.length, options);
  }
}

class MemoryEventStore implements EventStore {
  private data: PipelineEvent[] = [];

  async create(event: PipelineEvent): Promise<PipelineEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByRun(
    runId: string,
    options?: ListOptions & { eventTypes?: PipelineEventType[] },
  ): Promise<PipelineEvent[]> {
    const types = options?.eventTypes;
    const matching = this.data.filter(
      (e) => e.runId === runId && (!types?.length || types.includes(e.type)),
    );
    return applyListOptions(matching, { limit: options?.limit ?? 1000, offset: options?.offset }).map(deepCopy);
  }
}

class MemoryTargetStore implements TargetStore {
  private data = new Map<string, DeploymentTarget>();

  async register(target: DeploymentTarget): Promise<DeploymentTarget> {
    const existing = this.data.get(target.id);
    const record: DeploymentTarget = {
      ...deepCopy(target),
      current: target.current ?? existing?.current,
    };
    this.data.set(target.id, record);
    return deepCopy(record);
  }

  async getById(id: string): Promise<DeploymentTarget | null> {
    const target = this.data.get(id);
    return target ? deepCopy(target) : null;
  }

  async update(id: string, updates: Partial<DeploymentTarget>): Promise<DeploymentTarget | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: DeploymentTarget = { ...existing, ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(): Promise<DeploymentTarget[]> {
    return [...this.data.values()].map(deepCopy);
  }
}

/** Create an in-memory store. */
export function createMemoryStore(): Store {
  return {
    runs: new MemoryRunStore(),
    events: new MemoryEventStore(),
    targets: new MemoryTargetStore(),
  };
}
