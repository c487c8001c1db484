import express from 'express';
import { createEngine, Engine } from '../../src/bootstrap';
import { loadConfig } from '../../src/config';
import { createApp } from '../../src/server';
import { FakeCommandRunner, FakeContainerRuntime, FakeHealthChecker, FakeImageRegistry } from '../helpers/fakes';

interface ApiResponse {
  status: number;
  body: unknown;
}

async function request(
  app: express.Application,
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {},
): Promise<ApiResponse> {
  return new Promise<ApiResponse>((resolve, reject) => {
    const server = app.listen(0, () => {
      const addr = server.address();
      if (typeof addr !== 'object' || addr === null) {
        server.close();
        reject(new Error('server is not listening on a port'));
        return;
      }
      const options: RequestInit = {
        method,
        headers: { 'Content-Type': 'application/json', ...headers },
      };
      if (body !== undefined) options.body = typeof body === 'string' ? body : JSON.stringify(body);

      fetch(`http://127.0.0.1:${addr.port}${path}`, options)
        .then(async (res) => {
          const json: unknown = await res.json();
          server.close();
          resolve({ status: res.status, body: json });
        })
        .catch((err: unknown) => {
          server.close();
          reject(err);
        });
    });
  });
}

function runIdOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'run' in body) {
    const run: unknown = body.run;
    if (typeof run === 'object' && run !== null && 'id' in run && typeof run.id === 'string') return run.id;
  }
  throw new Error(`no run in response: ${JSON.stringify(body)}`);
}

const SPEC = {
  name: 'shop',
  stages: [
    { id: 'build', type: 'build', with: { command: 'make' } },
    { id: 'test', type: 'build', needs: ['build'], with: { command: 'make test' } },
  ],
};

describe('Run API', () => {
  let engine: Engine;
  let app: express.Application;
  let runner: FakeCommandRunner;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    const runtime = new FakeContainerRuntime();
    engine = createEngine(loadConfig({}), {
      runner,
      imageRegistry: new FakeImageRegistry(),
      runtime,
      health: new FakeHealthChecker(runtime),
      env: {},
    });
    app = createApp(engine);
  });

  test('GET /health reports the stage types', async () => {
    const res = await request(app, 'GET', '/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'ok',
      stageTypes: ['scan', 'build', 'package', 'publish', 'containerize', 'deploy'],
      lockMode: 'fail-fast',
    });
  });

  test('POST /api/runs starts a run that executes in the background', async () => {
    const res = await request(app, 'POST', '/api/runs', { spec: SPEC, commitSha: 'abc1234' });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      run: { pipelineName: 'shop', commitSha: 'abc1234', status: 'created', executionOrder: ['build', 'test'] },
    });

    const runId = runIdOf(res.body);
    await engine.executor.waitForRun(runId);

    const status = await request(app, 'GET', `/api/runs/${runId}`);
    expect(status.body).toMatchObject({
      run: { id: runId, status: 'succeeded', stages: { build: { status: 'succeeded' }, test: { status: 'succeeded' } } },
    });
    expect(runner.commandLines()).toEqual(['make', 'make test']);
  });

  test('accepts the pipeline spec as YAML text', async () => {
    const yaml = ['name: shop', 'stages:', '  - id: build', '    type: build', '    with:', '      command: make'].join('\n');

    const res = await request(app, 'POST', '/api/runs', { spec: yaml, commitSha: 'abc1234' });

    expect(res.status).toBe(201);
    await engine.executor.waitForRun(runIdOf(res.body));
  });

  test('rejects a request without a commit SHA', async () => {
    const res = await request(app, 'POST', '/api/runs', { spec: SPEC });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'REQUEST.INVALID', message: '"commitSha" is required' } });
  });

  test('rejects a cyclic spec before any run exists', async () => {
    const cyclic = {
      name: 'shop',
      stages: [
        { id: 'a', type: 'build', needs: ['b'], with: { command: 'a' } },
        { id: 'b', type: 'build', needs: ['a'], with: { command: 'b' } },
      ],
    };

    const res = await request(app, 'POST', '/api/runs', { spec: cyclic, commitSha: 'abc1234' });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'SPEC.CYCLIC_DEPENDENCY' } });
    expect((await engine.executor.listRuns()).total).toBe(0);
  });

  test('rejects a malformed JSON body', async () => {
    const res = await request(app, 'POST', '/api/runs', '{"spec":');

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'REQUEST.MALFORMED_BODY' } });
  });

  test('GET /api/runs/:runId answers 404 for an unknown run', async () => {
    const res = await request(app, 'GET', '/api/runs/run_missing');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ error: { code: 'RUN.NOT_FOUND', message: 'Run not found: run_missing' } });
  });

  test('GET /api/runs filters by status', async () => {
    const created = await engine.executor.createRun({ spec: SPEC, commitSha: 'abc1234' });

    const res = await request(app, 'GET', '/api/runs?status=created');
    const bad = await request(app, 'GET', '/api/runs?status=done');

    expect(res.body).toMatchObject({ items: [{ id: created.id }], total: 1, hasMore: false });
    expect(bad.status).toBe(400);
  });

  test('GET /api/runs/:runId/events filters by type', async () => {
    const run = await engine.executor.createRun({ spec: SPEC, commitSha: 'abc1234' });
    await engine.executor.executeRun(run.id);

    const res = await request(app, 'GET', `/api/runs/${run.id}/events?types=stage.succeeded`);

    expect(res.body).toMatchObject({
      events: [{ stageId: 'build' }, { stageId: 'test' }],
      total: 2,
    });
  });

  test('POST /api/runs/:runId/cancel cancels a run that has not started', async () => {
    const run = await engine.executor.createRun({ spec: SPEC, commitSha: 'abc1234' });

    const res = await request(app, 'POST', `/api/runs/${run.id}/cancel`, { reason: 'superseded' }, { 'x-identity-id': 'user_1' });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      run: {
        status: 'cancelled',
        cancelledBy: 'user_1',
        cancelReason: 'superseded',
        stages: { build: { status: 'cancelled' }, test: { status: 'cancelled' } },
      },
    });
  });

  test('cancelling a finished run conflicts', async () => {
    const run = await engine.executor.createRun({ spec: SPEC, commitSha: 'abc1234' });
    await engine.executor.executeRun(run.id);

    const res = await request(app, 'POST', `/api/runs/${run.id}/cancel`, {});

    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({ error: { code: 'RUN.INVALID_TRANSITION' } });
  });
});
