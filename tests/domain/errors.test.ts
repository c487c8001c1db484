import {
  errorDomainOf,
  maskSecret,
  maskSecretsInMessage,
  RunCancelledError,
  StageTimeoutError,
  toTypedError,
} from '../../src/domain/errors';

describe('typed errors', () => {
  test('a thrown pipeline error keeps its typed form', () => {
    const err = new StageTimeoutError('build', 5000, 2);

    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('STAGE.TIMEOUT');
    expect(err.retryable).toBe(true);
    expect(toTypedError(err)).toMatchObject({
      code: 'STAGE.TIMEOUT',
      message: 'Stage "build" timed out after 5000ms',
      stageId: 'build',
      details: { timeoutMs: 5000, attempt: 2 },
      suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: 10000 } }],
    });
  });

  test('anything else becomes an internal error', () => {
    expect(toTypedError(new Error('boom'))).toEqual({
      code: 'SYSTEM.INTERNAL',
      message: 'boom',
      stageId: undefined,
      runId: undefined,
      retryable: false,
      details: undefined,
      suggestedFixes: [],
    });
    expect(toTypedError('plain', 'RUN.FAILED').code).toBe('RUN.FAILED');
  });

  test('cancellation carries the reason', () => {
    expect(new RunCancelledError('run_1', 'requested by user').message).toBe('Run cancelled: requested by user');
    expect(new RunCancelledError('run_1').message).toBe('Run cancelled');
  });

  test('errorDomainOf takes the namespace', () => {
    expect(errorDomainOf('DEPLOYMENT.TARGET_BUSY')).toBe('DEPLOYMENT');
    expect(errorDomainOf('INTERNAL')).toBe('INTERNAL');
  });
});

describe('secret masking', () => {
  test('keeps the last four characters of long secrets', () => {
    expect(maskSecret('test-secret-value')).toBe('*************alue');
    expect(maskSecret('short')).toBe('****');
  });

  test('masks every occurrence in a message', () => {
    expect(maskSecretsInMessage('token=test-secret-value; again test-secret-value', ['test-secret-value'])).toBe(
      'token=*************alue; again *************alue',
    );
  });
});
