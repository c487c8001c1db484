/**
 * Pipeline graph builder.
 *
 * Compiles a validated spec into an executable DAG: resolves dependencies,
 * rejects unknown dependencies and cycles, checks every stage against its
 * registered definition, and fixes a deterministic topological order (ties
 * broken by declaration order) so re-runs of the same spec are reproducible.
 */

import { createHash } from 'crypto';
import { DeploymentTarget, DEFAULT_HEALTH_CHECK, HealthCheckPolicy } from '../domain/deployment';
import {
  CyclicDependencyError,
  SpecError,
  TypedError,
  UnknownDependencyError,
  createTypedError,
} from '../domain/errors';
import { PipelineSpec, StageDeclaration, StagePolicy } from '../domain/pipeline';
import { DEFAULT_STAGE_POLICY } from '../config';
import { StageRegistry } from '../engine/stage-registry';
import { validatePipelineSpec } from './validator';

/** A stage instance template with resolved policy and edges. */
export interface CompiledStage {
  id: string;
  type: string;
  /** Position in the pipeline spec; breaks ordering ties. */
  index: number;
  inputs: Record<string, unknown>;
  policy: StagePolicy;
  idempotent: boolean;
  /** Stages this one needs. */
  dependencies: string[];
  /** Stages that need this one directly. */
  dependents: string[];
}

export interface PipelineGraph {
  name: string;
  /** Spec-level concurrency, if declared. */
  concurrency?: number;
  executionOrder: string[];
  stages: Record<string, CompiledStage>;
  targets: DeploymentTarget[];
  /** sha256 of the compiled plan. */
  graphHash: string;
  warnings: string[];
}

export interface BuildGraphOptions {
  /** Engine-wide policy defaults, below the pipeline's own defaults. */
  defaults?: Partial<StagePolicy>;
  /** Engine-wide health-check defaults, below each target's own settings. */
  healthCheck?: Partial<HealthCheckPolicy>;
}

/**
 * Build the DAG for a spec.
 *
 * Throws SpecError for structural problems, UnknownDependencyError for a
 * `needs` entry naming no stage, CyclicDependencyError when no order exists.
 */
export function buildPipelineGraph(
  spec: PipelineSpec,
  registry: StageRegistry,
  options: BuildGraphOptions = {},
): PipelineGraph {
  // Phase 1: structure
  const validation = validatePipelineSpec(spec);
  if (!validation.valid) {
    throw SpecError.fromErrors(validation.errors);
  }

  // Phase 2: dependency resolution
  const declared = new Set(spec.stages.map((s) => s.id));
  for (const stage of spec.stages) {
    for (const dep of stage.needs ?? []) {
      if (!declared.has(dep)) {
        throw new UnknownDependencyError(stage.id, dep);
      }
    }
  }

  // Phase 3: ordering
  const executionOrder = topologicalSort(spec.stages);
  if (!executionOrder) {
    throw new CyclicDependencyError(findCycle(spec.stages));
  }

  // Phase 4: compile stages against their definitions
  const basePolicy: StagePolicy = { ...DEFAULT_STAGE_POLICY, ...options.defaults, ...spec.defaults };
  const stages: Record<string, CompiledStage> = {};
  spec.stages.forEach((declaration, index) => {
    stages[declaration.id] = compileStage(declaration, index, basePolicy, registry);
  });
  for (const stage of Object.values(stages)) {
    for (const dep of stage.dependencies) {
      stages[dep].dependents.push(stage.id);
    }
  }

  const contractErrors = validateStageContracts(spec, stages, registry);
  if (contractErrors.length > 0) {
    throw SpecError.fromErrors(contractErrors);
  }

  const targets = (spec.targets ?? []).map(
    (t): DeploymentTarget => ({
      id: t.id,
      host: t.host,
      user: t.user,
      credentialsRef: t.credentialsRef,
      serviceName: t.serviceName,
      containerPort: t.containerPort,
      slots: t.slots.map((s) => ({ ...s })),
      healthCheck: { ...DEFAULT_HEALTH_CHECK, ...options.healthCheck, ...t.healthCheck },
    }),
  );

  return {
    name: spec.name,
    concurrency: spec.concurrency,
    executionOrder,
    stages,
    targets,
    graphHash: computeHash(JSON.stringify({ executionOrder, stages })),
    warnings: validation.warnings,
  };
}

function compileStage(
  declaration: StageDeclaration,
  index: number,
  basePolicy: StagePolicy,
  registry: StageRegistry,
): CompiledStage {
  const definition = registry.get(declaration.type);
  return {
    id: declaration.id,
    type: declaration.type,
    index,
    inputs: { ...declaration.with },
    policy: { ...basePolicy, ...declaration.policy },
    idempotent: definition?.idempotent ?? false,
    dependencies: [...(declaration.needs ?? [])],
    dependents: [],
  };
}

/**
 * Kahn's algorithm; among ready stages the earliest declared goes first.
 * Returns null when a cycle leaves stages unordered.
 */
export function topologicalSort(stages: StageDeclaration[]): string[] | null {
  const position = new Map(stages.map((s, i) => [s.id, i]));
  const inDegree = new Map<string, number>();
  const adjacency = new Map<string, string[]>();

  for (const stage of stages) {
    inDegree.set(stage.id, 0);
    adjacency.set(stage.id, []);
  }
  // If B needs A, then A -> B
  for (const stage of stages) {
    for (const dep of stage.needs ?? []) {
      adjacency.get(dep)?.push(stage.id);
      inDegree.set(stage.id, (inDegree.get(stage.id) ?? 0) + 1);
    }
  }

  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  const ready = stages.filter((s) => inDegree.get(s.id) === 0).map((s) => s.id);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort(byPosition);
    const current = ready.shift();
    if (current === undefined) break;
    order.push(current);

    for (const neighbor of adjacency.get(current) ?? []) {
      const degree = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, degree);
      if (degree === 0) ready.push(neighbor);
    }
  }

  return order.length === stages.length ? order : null;
}

/** Find one dependency cycle, as a path that starts and ends on the same stage. */
function findCycle(stages: StageDeclaration[]): string[] {
  const needs = new Map(stages.map((s) => [s.id, s.needs ?? []]));
  const done = new Set<string>();
  const path: string[] = [];
  const onPath = new Set<string>();

  function visit(id: string): string[] | null {
    if (onPath.has(id)) {
      return [...path.slice(path.indexOf(id)), id];
    }
    if (done.has(id)) return null;
    onPath.add(id);
    path.push(id);
    for (const dep of needs.get(id) ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    path.pop();
    onPath.delete(id);
    done.add(id);
    return null;
  }

  for (const stage of stages) {
    const cycle = visit(stage.id);
    if (cycle) return cycle;
  }
  return [];
}

/**
 * Check each stage's inputs against its definition's input contract and run
 * the definition's own spec-level validation.
 */
function validateStageContracts(
  spec: PipelineSpec,
  stages: Record<string, CompiledStage>,
  registry: StageRegistry,
): TypedError[] {
  const errors: TypedError[] = [];

  for (const stage of Object.values(stages)) {
    const definition = registry.get(stage.type);
    if (!definition) {
      errors.push(
        createTypedError({
          code: 'SPEC.UNKNOWN_STAGE_TYPE',
          message: `Stage "${stage.id}": unknown stage type "${stage.type}". Known types: ${registry.types().join(', ')}`,
          stageId: stage.id,
          retryable: false,
          suggestedFixes: registry.types().map((type) => ({
            type: 'SET_STAGE_TYPE',
            params: { stageId: stage.id, type },
          })),
        }),
      );
      continue;
    }

    for (const [field, contract] of Object.entries(definition.inputContract ?? {})) {
      const value = stage.inputs[field];

      if (value === undefined || value === null) {
        if (contract.required) {
          errors.push(
            createTypedError({
              code: 'SPEC.STAGE_CONTRACT',
              message: `Stage "${stage.id}": missing required input "${field}" for stage type "${stage.type}"`,
              stageId: stage.id,
              retryable: false,
              suggestedFixes: [
                { type: 'ADD_INPUT', params: { field, stageId: stage.id }, description: `Provide the "${field}" input` },
              ],
            }),
          );
        }
        continue;
      }

      const actualType = Array.isArray(value) ? 'array' : typeof value;
      if (actualType !== contract.type) {
        errors.push(
          createTypedError({
            code: 'SPEC.STAGE_CONTRACT',
            message: `Stage "${stage.id}": input "${field}" must be type "${contract.type}", got "${actualType}"`,
            stageId: stage.id,
            retryable: false,
          }),
        );
        continue;
      }

      if (contract.oneOf && typeof value === 'string') {
        const allowed = typeof contract.oneOf === 'function' ? contract.oneOf() : contract.oneOf;
        if (!allowed.includes(value)) {
          errors.push(
            createTypedError({
              code: 'SPEC.STAGE_CONTRACT',
              message: `Stage "${stage.id}": input "${field}" has invalid value "${value}". Allowed: ${allowed.join(', ')}`,
              stageId: stage.id,
              retryable: false,
            }),
          );
        }
      }
    }

    for (const message of definition.validate?.(stage, spec) ?? []) {
      errors.push(
        createTypedError({
          code: 'SPEC.STAGE_CONTRACT',
          message: `Stage "${stage.id}": ${message}`,
          stageId: stage.id,
          retryable: false,
        }),
      );
    }
  }

  return errors;
}

/** Transitive dependents of a stage, in no particular order. */
export function descendantsOf(graph: Pick<PipelineGraph, 'stages'>, stageId: string): Set<string> {
  const result = new Set<string>();
  const queue = [...(graph.stages[stageId]?.dependents ?? [])];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || result.has(next)) continue;
    result.add(next);
    queue.push(...(graph.stages[next]?.dependents ?? []));
  }
  return result;
}

function computeHash(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}
