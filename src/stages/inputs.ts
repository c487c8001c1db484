import { isArtifactRef, ArtifactRef } from '../domain/artifact';
import { NonRetryableStageError } from '../domain/errors';
import { CompiledStage } from '../dsl/compiler';
import { DependencyOutput } from '../engine/stage-registry';

export function requiredString(stage: CompiledStage, field: string): string {
  const value = stage.inputs[field];
  if (typeof value !== 'string' || value === '') {
    throw new NonRetryableStageError(`Stage "${stage.id}": input "${field}" must be a non-empty string`);
  }
  return value;
}

export function optionalString(stage: CompiledStage, field: string): string | undefined {
  const value = stage.inputs[field];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function optionalBoolean(stage: CompiledStage, field: string, fallback: boolean): boolean {
  const value = stage.inputs[field];
  return typeof value === 'boolean' ? value : fallback;
}

/** An object input whose values are all strings (e.g. environment variables). */
export function stringRecord(stage: CompiledStage, field: string): Record<string, string> {
  const value = stage.inputs[field];
  const result: Record<string, string> = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      result[key] = String(entry);
    }
  }
  return result;
}

/**
 * The artifact of a dependency: the named one, or the first dependency (in
 * declaration order) that produced one.
 */
export function dependencyArtifact(
  dependencies: Record<string, DependencyOutput>,
  stage: CompiledStage,
  from?: string,
): { stageId: string; artifact: ArtifactRef } | undefined {
  const candidates = from ? [from] : stage.dependencies;
  for (const stageId of candidates) {
    const dep = dependencies[stageId];
    if (!dep) continue;
    const artifact = dep.artifact ?? (isArtifactRef(dep.outputs.artifact) ? dep.outputs.artifact : undefined);
    if (artifact) return { stageId, artifact };
  }
  return undefined;
}

/** A string output of the first dependency that has one. */
export function dependencyOutput(
  dependencies: Record<string, DependencyOutput>,
  stage: CompiledStage,
  key: string,
): string | undefined {
  for (const stageId of stage.dependencies) {
    const value = dependencies[stageId]?.outputs[key];
    if (typeof value === 'string' && value !== '') return value;
  }
  return undefined;
}
