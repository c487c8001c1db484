import { buildPipelineGraph, descendantsOf, topologicalSort } from '../../src/dsl/compiler';
import { CyclicDependencyError, SpecError, UnknownDependencyError } from '../../src/domain/errors';
import { PipelineSpec } from '../../src/domain/pipeline';
import { StageDefinition, StageRegistry } from '../../src/engine/stage-registry';

function definition(type: string, extra: Partial<StageDefinition> = {}): StageDefinition {
  return {
    type,
    idempotent: true,
    async execute() {
      return { outputs: {} };
    },
    ...extra,
  };
}

function makeRegistry(): StageRegistry {
  return new StageRegistry()
    .register(definition('task'))
    .register(definition('release', { idempotent: false }))
    .register(
      definition('build', {
        inputContract: {
          command: { type: 'string', required: true },
          mode: { type: 'string', oneOf: ['debug', 'release'] },
        },
      }),
    );
}

function spec(stages: PipelineSpec['stages'], extra: Partial<PipelineSpec> = {}): PipelineSpec {
  return { name: 'shop', stages, ...extra };
}

describe('buildPipelineGraph', () => {
  const registry = makeRegistry();

  test('orders stages by dependency, breaking ties by declaration order', () => {
    const graph = buildPipelineGraph(
      spec([
        { id: 'deploy', type: 'task', needs: ['package'] },
        { id: 'scan', type: 'task' },
        { id: 'compile', type: 'task' },
        { id: 'package', type: 'task', needs: ['compile'] },
      ]),
      registry,
    );

    expect(graph.executionOrder).toEqual(['scan', 'compile', 'package', 'deploy']);
    expect(graph.stages.compile.dependents).toEqual(['package']);
    expect(graph.stages.deploy.dependencies).toEqual(['package']);
  });

  test('produces the same order and hash for the same spec', () => {
    const input = spec([
      { id: 'a', type: 'task' },
      { id: 'b', type: 'task', needs: ['a'] },
      { id: 'c', type: 'task' },
      { id: 'd', type: 'task', needs: ['b', 'c'] },
    ]);

    const first = buildPipelineGraph(input, registry);
    const second = buildPipelineGraph(input, registry);

    expect(first.executionOrder).toEqual(['a', 'b', 'c', 'd']);
    expect(second.executionOrder).toEqual(first.executionOrder);
    expect(second.graphHash).toBe(first.graphHash);
  });

  test('rejects a dependency on an undeclared stage', () => {
    const build = () =>
      buildPipelineGraph(
        spec([
          { id: 'compile', type: 'task' },
          { id: 'package', type: 'task', needs: ['link'] },
        ]),
        registry,
      );

    expect(build).toThrow(UnknownDependencyError);
    expect(build).toThrow('Stage "package" needs unknown stage "link"');
  });

  test('reports the cycle path', () => {
    let caught: unknown;
    try {
      buildPipelineGraph(
        spec([
          { id: 'a', type: 'task', needs: ['c'] },
          { id: 'b', type: 'task', needs: ['a'] },
          { id: 'c', type: 'task', needs: ['b'] },
        ]),
        registry,
      );
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(CyclicDependencyError);
    if (!(caught instanceof CyclicDependencyError)) return;
    expect(caught.cycle).toEqual(['a', 'c', 'b', 'a']);
    expect(caught.code).toBe('SPEC.CYCLIC_DEPENDENCY');
    expect(caught.message).toBe('Stage dependency graph contains a cycle: a -> c -> b -> a');
  });

  test('treats a stage needing itself as a cycle', () => {
    expect(() => buildPipelineGraph(spec([{ id: 'a', type: 'task', needs: ['a'] }]), registry)).toThrow(
      'Stage dependency graph contains a cycle: a -> a',
    );
  });

  test('layers engine defaults, spec defaults and stage policy', () => {
    const graph = buildPipelineGraph(
      spec([{ id: 'compile', type: 'task', policy: { backoffBaseMs: 10 } }], { defaults: { retries: 3 } }),
      registry,
      { defaults: { timeoutMs: 5000, retries: 1 } },
    );

    expect(graph.stages.compile.policy).toEqual({
      timeoutMs: 5000,
      retries: 3,
      backoffStrategy: 'exponential',
      backoffBaseMs: 10,
    });
  });

  test('takes idempotency from the stage definition', () => {
    const graph = buildPipelineGraph(
      spec([
        { id: 'compile', type: 'task' },
        { id: 'ship', type: 'release', needs: ['compile'] },
      ]),
      registry,
    );

    expect(graph.stages.compile.idempotent).toBe(true);
    expect(graph.stages.ship.idempotent).toBe(false);
  });

  test('rejects an unknown stage type', () => {
    let caught: unknown;
    try {
      buildPipelineGraph(spec([{ id: 'lint', type: 'lint' }]), registry);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(SpecError);
    if (!(caught instanceof SpecError)) return;
    expect(caught.code).toBe('SPEC.UNKNOWN_STAGE_TYPE');
    expect(caught.message).toBe('Stage "lint": unknown stage type "lint". Known types: task, release, build');
  });

  test('checks inputs against the input contract', () => {
    let caught: unknown;
    try {
      buildPipelineGraph(
        spec([
          { id: 'compile', type: 'build' },
          { id: 'bundle', type: 'build', with: { command: 'make', mode: 'fast' } },
        ]),
        registry,
      );
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(SpecError);
    if (!(caught instanceof SpecError)) return;
    expect(caught.code).toBe('SPEC.INVALID');
    expect(caught.errors.map((e) => e.message)).toEqual([
      'Stage "compile": missing required input "command" for stage type "build"',
      'Stage "bundle": input "mode" has invalid value "fast". Allowed: debug, release',
    ]);
  });

  test('reports definition-level validation messages', () => {
    const strict = new StageRegistry().register(
      definition('task', { validate: (stage) => (stage.dependencies.length === 0 ? ['needs a dependency'] : []) }),
    );

    expect(() => buildPipelineGraph(spec([{ id: 'ship', type: 'task' }]), strict)).toThrow('Stage "ship": needs a dependency');
  });

  test('fills target health checks with defaults', () => {
    const graph = buildPipelineGraph(
      spec([{ id: 'compile', type: 'task' }], {
        targets: [
          {
            id: 'web',
            host: 'web-1.internal',
            serviceName: 'shop',
            containerPort: 8080,
            slots: [
              { name: 'blue', port: 8081 },
              { name: 'green', port: 8082 },
            ],
            healthCheck: { path: '/healthz' },
          },
        ],
      }),
      registry,
    );

    expect(graph.targets[0].healthCheck).toEqual({ path: '/healthz', retries: 5, intervalMs: 2000, timeoutMs: 5000 });
  });

  test('layers engine health-check defaults under the target settings', () => {
    const graph = buildPipelineGraph(
      spec([{ id: 'compile', type: 'task' }], {
        targets: [
          {
            id: 'web',
            host: 'web-1.internal',
            serviceName: 'shop',
            containerPort: 8080,
            slots: [
              { name: 'blue', port: 8081 },
              { name: 'green', port: 8082 },
            ],
            healthCheck: { retries: 2 },
          },
        ],
      }),
      registry,
      { healthCheck: { path: '/ready', retries: 9, intervalMs: 100 } },
    );

    expect(graph.targets[0].healthCheck).toEqual({ path: '/ready', retries: 2, intervalMs: 100, timeoutMs: 5000 });
  });
});

describe('topologicalSort', () => {
  test('returns null when a cycle leaves stages unordered', () => {
    expect(
      topologicalSort([
        { id: 'a', type: 'task', needs: ['b'] },
        { id: 'b', type: 'task', needs: ['a'] },
        { id: 'c', type: 'task' },
      ]),
    ).toBeNull();
  });
});

describe('descendantsOf', () => {
  test('collects transitive dependents', () => {
    const graph = buildPipelineGraph(
      spec([
        { id: 'scan', type: 'task' },
        { id: 'compile', type: 'task' },
        { id: 'package', type: 'task', needs: ['compile'] },
        { id: 'deploy', type: 'task', needs: ['package'] },
      ]),
      makeRegistry(),
    );

    expect([...descendantsOf(graph, 'compile')].sort()).toEqual(['deploy', 'package']);
    expect(descendantsOf(graph, 'scan').size).toBe(0);
  });
});
