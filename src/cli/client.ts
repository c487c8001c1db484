/**
 * HTTP client for a running pipeline server.
 */

import { PipelineError, SpecError, TypedError, createTypedError } from '../domain/errors';
import { PipelineSpec } from '../domain/pipeline';
import { PipelineRun } from '../domain/run';
import { isTerminalRunStatus } from '../engine/state-machine';
import { sleep } from '../util/abort';
import { FetchFn } from '../artifacts/http-backend';

function isTypedError(value: unknown): value is TypedError {
  return (
    typeof value === 'object' && value !== null &&
    'code' in value && typeof value.code === 'string' &&
    'message' in value && typeof value.message === 'string'
  );
}

function isPipelineRun(value: unknown): value is PipelineRun {
  return (
    typeof value === 'object' && value !== null &&
    'id' in value && typeof value.id === 'string' &&
    'status' in value && typeof value.status === 'string' &&
    'executionOrder' in value && Array.isArray(value.executionOrder) &&
    'stages' in value && typeof value.stages === 'object'
  );
}

export class PipelineApiClient {
  private baseUrl: string;
  private fetchFn: FetchFn;

  constructor(baseUrl: string, options: { fetch?: FetchFn } = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
  }

  async createRun(spec: PipelineSpec, commitSha: string, concurrency?: number): Promise<PipelineRun> {
    return this.runRequest('POST', '/api/runs', { spec, commitSha, ...(concurrency !== undefined ? { concurrency } : {}) });
  }

  async getRun(runId: string): Promise<PipelineRun> {
    return this.runRequest('GET', `/api/runs/${encodeURIComponent(runId)}`);
  }

  async cancelRun(runId: string, reason?: string): Promise<PipelineRun> {
    return this.runRequest('POST', `/api/runs/${encodeURIComponent(runId)}/cancel`, reason ? { reason } : {});
  }

  /** Poll until the run reaches a terminal state. */
  async waitForRun(
    runId: string,
    options: { intervalMs?: number; signal?: AbortSignal; onUpdate?: (run: PipelineRun) => void } = {},
  ): Promise<PipelineRun> {
    for (;;) {
      const run = await this.getRun(runId);
      options.onUpdate?.(run);
      if (isTerminalRunStatus(run.status)) return run;
      await sleep(options.intervalMs ?? 1_000, options.signal);
    }
  }

  private async runRequest(method: 'GET' | 'POST', path: string, body?: unknown): Promise<PipelineRun> {
    const res = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json', 'X-Identity-Id': 'cli' },
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });
    const payload: unknown = await res.json();

    if (!res.ok) {
      const error =
        typeof payload === 'object' && payload !== null && 'error' in payload && isTypedError(payload.error)
          ? payload.error
          : createTypedError({ code: 'SYSTEM.HTTP', message: `Server answered ${res.status}`, retryable: res.status >= 500 });
      throw error.code.startsWith('SPEC.') ? new SpecError(error) : new PipelineError(error);
    }
    if (typeof payload !== 'object' || payload === null || !('run' in payload) || !isPipelineRun(payload.run)) {
      throw new PipelineError(
        createTypedError({ code: 'SYSTEM.HTTP', message: 'Server response has no run', retryable: false }),
      );
    }
    return payload.run;
  }
}
