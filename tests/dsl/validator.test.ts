import { parsePipelineSpec, validatePipelineSpec } from '../../src/dsl/validator';
import { SpecError } from '../../src/domain/errors';

const validTarget = {
  id: 'web',
  host: 'web-1.internal',
  user: 'deploy',
  credentialsRef: 'env:DEPLOY_KEY_PATH',
  serviceName: 'shop',
  containerPort: 8080,
  slots: [
    { name: 'blue', port: 8081 },
    { name: 'green', port: 8082 },
  ],
};

describe('validatePipelineSpec', () => {
  test('accepts a minimal spec', () => {
    const result = validatePipelineSpec({ name: 'shop', stages: [{ id: 'build', type: 'build' }] });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.spec).toEqual({ name: 'shop', stages: [{ id: 'build', type: 'build' }] });
  });

  test('keeps declared policy, concurrency and targets', () => {
    const result = validatePipelineSpec({
      name: 'shop',
      concurrency: 3,
      defaults: { retries: 1, backoffStrategy: 'fixed' },
      targets: [validTarget],
      stages: [{ id: 'build', type: 'build', with: { command: 'make' }, policy: { timeoutMs: 60000 } }],
    });

    expect(result.valid).toBe(true);
    expect(result.spec?.concurrency).toBe(3);
    expect(result.spec?.defaults).toEqual({ retries: 1, backoffStrategy: 'fixed' });
    expect(result.spec?.targets).toEqual([validTarget]);
    expect(result.spec?.stages[0].policy).toEqual({ timeoutMs: 60000 });
  });

  test('rejects a document that is not a mapping', () => {
    const result = validatePipelineSpec(['build']);

    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('SPEC.INVALID_DOCUMENT');
  });

  test('reports missing required fields', () => {
    const result = validatePipelineSpec({ stages: [] });

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].code).toBe('SPEC.REQUIRED_FIELD');
    expect(result.errors[0].message).toBe('Missing required field: name');
  });

  test('rejects duplicate stage ids', () => {
    const result = validatePipelineSpec({
      name: 'shop',
      stages: [
        { id: 'build', type: 'build' },
        { id: 'build', type: 'scan' },
      ],
    });

    expect(result.errors.map((e) => e.code)).toEqual(['SPEC.DUPLICATE_ID']);
    expect(result.errors[0].stageId).toBe('build');
  });

  test('rejects malformed stage ids', () => {
    const result = validatePipelineSpec({ name: 'shop', stages: [{ id: 'build stage', type: 'build' }] });

    expect(result.errors[0].message).toBe('stages[0].id must be letters, digits, "-" or "_" (max 64 chars)');
  });

  test('bounds policy values', () => {
    const result = validatePipelineSpec({
      name: 'shop',
      stages: [{ id: 'build', type: 'build', policy: { retries: 11, backoffStrategy: 'linear' } }],
    });

    expect(result.errors.map((e) => e.message)).toEqual([
      'stages[0].policy.retries must be an integer between 0 and 10',
      'stages[0].policy.backoffStrategy must be one of fixed, exponential',
    ]);
  });

  test('requires two distinct slots per target', () => {
    const oneSlot = validatePipelineSpec({
      name: 'shop',
      targets: [{ ...validTarget, slots: [{ name: 'blue', port: 8081 }] }],
      stages: [{ id: 'build', type: 'build' }],
    });
    const samePort = validatePipelineSpec({
      name: 'shop',
      targets: [
        {
          ...validTarget,
          slots: [
            { name: 'blue', port: 8081 },
            { name: 'green', port: 8081 },
          ],
        },
      ],
      stages: [{ id: 'build', type: 'build' }],
    });

    expect(oneSlot.errors[0].message).toBe('targets[0].slots must be a list of at least 2 { name, port } entries');
    expect(samePort.errors[0].message).toBe('targets[0].slots must be slots with distinct names and ports');
  });

  test('rejects credential references with an unknown source', () => {
    const result = validatePipelineSpec({
      name: 'shop',
      targets: [{ ...validTarget, credentialsRef: 'vault:deploy' }],
      stages: [{ id: 'build', type: 'build' }],
    });

    expect(result.errors[0].message).toBe(
      'targets[0].credentialsRef must be a credential reference (env:<VAR> or literal:<value>)',
    );
  });

  test('warns about repeated dependencies and unknown fields', () => {
    const result = validatePipelineSpec({
      name: 'shop',
      trigger: 'push',
      stages: [
        { id: 'build', type: 'build' },
        { id: 'package', type: 'package', needs: ['build', 'build'] },
      ],
    });

    expect(result.valid).toBe(true);
    expect(result.spec?.stages[1].needs).toEqual(['build']);
    expect(result.warnings).toEqual([
      'Stage "package" lists a dependency more than once',
      'Unknown top-level field "trigger" ignored',
    ]);
  });
});

describe('parsePipelineSpec', () => {
  test('aggregates every problem into one SpecError', () => {
    let caught: unknown;
    try {
      parsePipelineSpec({ name: '', concurrency: 0, stages: [{ id: 'build', type: 'build' }] });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(SpecError);
    if (!(caught instanceof SpecError)) return;
    expect(caught.code).toBe('SPEC.INVALID');
    expect(caught.errors.map((e) => e.message)).toEqual([
      'name must be a non-empty string',
      'concurrency must be an integer between 1 and 64',
    ]);
  });
});
