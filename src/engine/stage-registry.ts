/**
 * Stage definition registry.
 *
 * A stage definition is the typed contract of one stage type: the inputs it
 * accepts, the outputs it promises, whether it is safe to retry, and the
 * implementation. The graph builder checks declarations against it; the
 * executor looks implementations up in it.
 */

import { ArtifactRef } from '../domain/artifact';
import { PipelineSpec } from '../domain/pipeline';
import { CompiledStage } from '../dsl/compiler';
import { Logger } from '../logger';

/** What a stage sees of one of its succeeded dependencies. */
export interface DependencyOutput {
  type: string;
  outputs: Record<string, unknown>;
  artifact?: ArtifactRef;
}

/** Execution context provided by the engine to a stage attempt. */
export interface StageExecutionContext {
  runId: string;
  commitSha: string;
  stageId: string;
  /** 1-based attempt number. */
  attempt: number;
  /** Outputs of declared dependencies only, keyed by stage id. */
  dependencies: Record<string, DependencyOutput>;
  /** Aborted on run cancellation, run abort or attempt timeout. */
  signal: AbortSignal;
  logger: Logger;
}

/** Input field constraint for a stage type. */
export interface InputFieldContract {
  type: 'string' | 'number' | 'boolean' | 'object' | 'array';
  required?: boolean;
  /** Static allowed values, or a function that resolves them at validation time. */
  oneOf?: readonly string[] | (() => string[]);
  description?: string;
}

/** What a stage attempt returns on success. */
export interface StageExecutionResult {
  outputs: Record<string, unknown>;
  artifact?: ArtifactRef;
}

export interface StageDefinition {
  type: string;
  description?: string;
  /** Idempotent stages are retried with backoff; others never auto-retry. */
  idempotent: boolean;
  inputContract?: Record<string, InputFieldContract>;
  /** Output keys every successful attempt must produce. */
  outputContract?: readonly string[];
  /**
   * Spec-level checks beyond the input contract (e.g. a deploy stage naming
   * a declared target). Returns error messages; empty means valid.
   */
  validate?(stage: CompiledStage, spec: PipelineSpec): string[];
  execute(stage: CompiledStage, context: StageExecutionContext): Promise<StageExecutionResult>;
}

export class StageRegistry {
  private definitions = new Map<string, StageDefinition>();

  /** Register a definition. Re-registering a type replaces it. */
  register(definition: StageDefinition): this {
    this.definitions.set(definition.type, definition);
    return this;
  }

  get(type: string): StageDefinition | undefined {
    return this.definitions.get(type);
  }

  has(type: string): boolean {
    return this.definitions.has(type);
  }

  types(): string[] {
    return [...this.definitions.keys()];
  }

  list(): StageDefinition[] {
    return [...this.definitions.values()];
  }

  clear(): void {
    this.definitions.clear();
  }
}
