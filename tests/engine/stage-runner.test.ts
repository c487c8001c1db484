import { NonRetryableStageError, StageExecutionError } from '../../src/domain/errors';
import { StageStatus } from '../../src/domain/run';
import { MAX_BACKOFF_MS, computeBackoff, maxAttemptsFor, runStage, StageRunContext } from '../../src/engine/stage-runner';
import { StageDefinition, StageExecutionContext } from '../../src/engine/stage-registry';
import { createLogger } from '../../src/logger';
import { makeCompiledStage } from '../helpers/fakes';

function runContext(overrides: Partial<StageRunContext> = {}): StageRunContext {
  return {
    runId: 'run_test',
    commitSha: 'abc1234',
    dependencies: {},
    signal: new AbortController().signal,
    logger: createLogger(),
    ...overrides,
  };
}

function definition(execute: StageDefinition['execute'], extra: Partial<StageDefinition> = {}): StageDefinition {
  return { type: 'build', idempotent: true, execute, ...extra };
}

/** Never settles on its own; rejects with the signal's reason. */
function waitForAbort(context: StageExecutionContext): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    context.signal.addEventListener('abort', () => reject(context.signal.reason), { once: true });
  });
}

describe('runStage', () => {
  test('succeeds on the first attempt', async () => {
    const outcome = await runStage(
      makeCompiledStage(),
      definition(async () => ({ outputs: { exitCode: 0 } })),
      runContext(),
    );

    expect(outcome.status).toBe(StageStatus.Succeeded);
    expect(outcome.attempts).toBe(1);
    expect(outcome.outputs).toEqual({ exitCode: 0 });
  });

  test('retries a retryable failure and reports each retry', async () => {
    let calls = 0;
    const retries: Array<{ attempt: number; delayMs: number; code: string }> = [];

    const outcome = await runStage(
      makeCompiledStage({ policy: { timeoutMs: 1000, retries: 2, backoffStrategy: 'fixed', backoffBaseMs: 0 } }),
      definition(async (stage) => {
        calls++;
        if (calls === 1) throw new StageExecutionError(stage.id, 'flaky network');
        return { outputs: { exitCode: 0 } };
      }),
      runContext({
        onRetry: ({ attempt, delayMs, error }) => {
          retries.push({ attempt, delayMs, code: error.code });
        },
      }),
    );

    expect(outcome.status).toBe(StageStatus.Succeeded);
    expect(outcome.attempts).toBe(2);
    expect(retries).toEqual([{ attempt: 1, delayMs: 0, code: 'STAGE.EXECUTION' }]);
  });

  test('fails after exhausting retries', async () => {
    const outcome = await runStage(
      makeCompiledStage({ policy: { timeoutMs: 1000, retries: 1, backoffStrategy: 'fixed', backoffBaseMs: 0 } }),
      definition(async (stage) => {
        throw new StageExecutionError(stage.id, 'Command exited with 2: make');
      }),
      runContext(),
    );

    expect(outcome.status).toBe(StageStatus.Failed);
    expect(outcome.attempts).toBe(2);
    expect(outcome.error?.code).toBe('STAGE.EXECUTION');
    expect(outcome.error?.details).toEqual({ attempt: 2, maxAttempts: 2 });
  });

  test('does not retry a non-retryable failure', async () => {
    let calls = 0;
    const outcome = await runStage(
      makeCompiledStage({ policy: { timeoutMs: 1000, retries: 3, backoffStrategy: 'fixed', backoffBaseMs: 0 } }),
      definition(async () => {
        calls++;
        throw new NonRetryableStageError('Quality gate failed (exit 1)', 1);
      }),
      runContext(),
    );

    expect(calls).toBe(1);
    expect(outcome.status).toBe(StageStatus.Failed);
    expect(outcome.error?.code).toBe('STAGE.NON_RETRYABLE');
    expect(outcome.error?.stageId).toBe('build');
  });

  test('gives a non-idempotent stage exactly one attempt', async () => {
    let calls = 0;
    const stage = makeCompiledStage({
      id: 'deploy',
      type: 'deploy',
      idempotent: false,
      policy: { timeoutMs: 1000, retries: 3, backoffStrategy: 'fixed', backoffBaseMs: 0 },
    });

    const outcome = await runStage(
      stage,
      definition(async () => {
        calls++;
        throw new Error('connection reset');
      }),
      runContext(),
    );

    expect(maxAttemptsFor(stage)).toBe(1);
    expect(calls).toBe(1);
    expect(outcome.status).toBe(StageStatus.Failed);
    expect(outcome.error?.message).toBe('connection reset');
  });

  test('bounds each attempt by the stage timeout', async () => {
    const outcome = await runStage(
      makeCompiledStage({ policy: { timeoutMs: 20, retries: 1, backoffStrategy: 'fixed', backoffBaseMs: 0 } }),
      definition((_stage, context) => waitForAbort(context)),
      runContext(),
    );

    expect(outcome.status).toBe(StageStatus.Failed);
    expect(outcome.attempts).toBe(2);
    expect(outcome.error?.code).toBe('STAGE.TIMEOUT');
    expect(outcome.error?.message).toBe('Stage "build" timed out after 20ms');
  });

  test('settles on timeout even if the stage ignores its signal', async () => {
    const outcome = await runStage(
      makeCompiledStage({ policy: { timeoutMs: 20, retries: 0, backoffStrategy: 'fixed', backoffBaseMs: 0 } }),
      definition(() => new Promise(() => undefined)),
      runContext(),
    );

    expect(outcome.error?.code).toBe('STAGE.TIMEOUT');
  });

  test('reports cancellation when the run signal aborts', async () => {
    const controller = new AbortController();
    const pending = runStage(
      makeCompiledStage({ policy: { timeoutMs: 5000, retries: 2, backoffStrategy: 'fixed', backoffBaseMs: 0 } }),
      definition((_stage, context) => waitForAbort(context)),
      runContext({ signal: controller.signal }),
    );
    controller.abort(new Error('cancelled by test'));

    const outcome = await pending;
    expect(outcome.status).toBe(StageStatus.Cancelled);
    expect(outcome.attempts).toBe(1);
  });

  test('does not start when the run is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    const outcome = await runStage(
      makeCompiledStage(),
      definition(async () => {
        calls++;
        return { outputs: {} };
      }),
      runContext({ signal: controller.signal }),
    );

    expect(calls).toBe(0);
    expect(outcome.status).toBe(StageStatus.Cancelled);
    expect(outcome.attempts).toBe(0);
  });

  test('fails when declared outputs are missing', async () => {
    const outcome = await runStage(
      makeCompiledStage({ id: 'image', type: 'containerize' }),
      definition(async () => ({ outputs: { imageRef: 'registry.example.com/shop:abc1234' } }), {
        outputContract: ['imageRef', 'digest'],
      }),
      runContext(),
    );

    expect(outcome.status).toBe(StageStatus.Failed);
    expect(outcome.error?.code).toBe('STAGE.OUTPUT_CONTRACT');
    expect(outcome.error?.details).toEqual({ missing: ['digest'] });
  });

  test('fails without an attempt when no definition is registered', async () => {
    const outcome = await runStage(makeCompiledStage({ type: 'lint' }), undefined, runContext());

    expect(outcome.attempts).toBe(0);
    expect(outcome.error?.code).toBe('STAGE.NO_HANDLER');
  });

  test('passes dependency outputs through to the stage', async () => {
    let seen: unknown;
    await runStage(
      makeCompiledStage({ id: 'package', dependencies: ['build'] }),
      definition(async (_stage, context) => {
        seen = context.dependencies.build.outputs.exitCode;
        return { outputs: {} };
      }),
      runContext({ dependencies: { build: { type: 'build', outputs: { exitCode: 0 } } } }),
    );

    expect(seen).toBe(0);
  });
});

describe('computeBackoff', () => {
  test('doubles exponentially from the base', () => {
    expect([1, 2, 3].map((attempt) => computeBackoff('exponential', 1000, attempt))).toEqual([1000, 2000, 4000]);
  });

  test('keeps a fixed delay', () => {
    expect(computeBackoff('fixed', 500, 4)).toBe(500);
  });

  test('caps every delay', () => {
    expect(computeBackoff('exponential', 1000, 10)).toBe(MAX_BACKOFF_MS);
    expect(MAX_BACKOFF_MS).toBe(30000);
  });
});
