/**
 * Typed error model.
 *
 * Every failure the engine reports carries a TypedError: a namespaced code,
 * a message, a retryable flag and machine-actionable suggested fixes. Run
 * status, the event stream and API responses all serialize the TypedError;
 * code paths that throw use a PipelineError subclass that wraps one.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'SPEC'
  | 'STAGE'
  | 'RUN'
  | 'ARTIFACT'
  | 'DEPLOYMENT'
  | 'REGISTRY'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in run status, events and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g. "STAGE.TIMEOUT"). */
  code: string;
  message: string;
  stageId?: string;
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stageId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stageId: params.stageId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error domain of a code ("STAGE.TIMEOUT" -> "STAGE"). */
export function errorDomainOf(code: string): string {
  const dot = code.indexOf('.');
  return dot === -1 ? code : code.slice(0, dot);
}

// --- SPEC ---

export function specValidationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'SPEC.INVALID_VALUE',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function cyclicDependencyError(cycle: string[]): TypedError {
  return createTypedError({
    code: 'SPEC.CYCLIC_DEPENDENCY',
    message: `Stage dependency graph contains a cycle: ${cycle.join(' -> ')}`,
    retryable: false,
    details: { cycle },
    suggestedFixes: [
      { type: 'REMOVE_DEPENDENCY', params: { from: cycle[cycle.length - 2], to: cycle[cycle.length - 1] } },
    ],
  });
}

export function unknownDependencyError(stageId: string, dependency: string): TypedError {
  return createTypedError({
    code: 'SPEC.UNKNOWN_DEPENDENCY',
    message: `Stage "${stageId}" needs unknown stage "${dependency}"`,
    stageId,
    retryable: false,
    details: { dependency },
    suggestedFixes: [
      { type: 'DECLARE_STAGE', params: { stageId: dependency }, description: `Declare a stage with id "${dependency}"` },
      { type: 'REMOVE_DEPENDENCY', params: { from: stageId, to: dependency } },
    ],
  });
}

// --- STAGE ---

export function stageTimeoutError(stageId: string, timeoutMs: number, attempt: number): TypedError {
  return createTypedError({
    code: 'STAGE.TIMEOUT',
    message: `Stage "${stageId}" timed out after ${timeoutMs}ms`,
    stageId,
    retryable: true,
    details: { timeoutMs, attempt },
    suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
  });
}

export function stageExecutionError(stageId: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'STAGE.EXECUTION',
    message,
    stageId,
    retryable: true,
    details,
  });
}

// --- RUN ---

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runCancelledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELLED',
    message: reason ? `Run cancelled: ${reason}` : 'Run cancelled',
    runId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function runInvalidStateError(runId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'RUN.INVALID_TRANSITION',
    message: `Cannot transition run from "${from}" to "${to}"`,
    runId,
    retryable: false,
    details: { from, to },
  });
}

// --- ARTIFACT ---

export function artifactConflictError(name: string, versionKey: string, existingHash: string, attemptedHash: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.CONFLICT',
    message: `Artifact ${name}@${versionKey} already exists with a different content hash`,
    retryable: false,
    details: { name, versionKey, existingHash, attemptedHash },
    suggestedFixes: [
      { type: 'BUMP_VERSION_KEY', params: { name }, description: 'Publish under a new commit or version key' },
    ],
  });
}

export function artifactNotFoundError(name: string, versionKey: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.NOT_FOUND',
    message: `Artifact not found: ${name}@${versionKey}`,
    retryable: false,
    details: { name, versionKey },
  });
}

// --- DEPLOYMENT ---

export function deploymentFailedError(targetId: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'DEPLOYMENT.FAILED',
    message: `Deployment to "${targetId}" failed: ${message}`,
    retryable: false,
    details: { targetId, ...details },
    suggestedFixes: [
      { type: 'RETRIGGER_DEPLOY', params: { targetId }, description: 'Fix the image and re-trigger the deployment explicitly' },
    ],
  });
}

export function targetBusyError(targetId: string, holder?: string): TypedError {
  return createTypedError({
    code: 'DEPLOYMENT.TARGET_BUSY',
    message: `Deployment target "${targetId}" is busy`,
    retryable: true,
    details: holder ? { targetId, holder } : { targetId },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { targetId } }],
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of each secret in a message with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

// ---------------------------------------------------------------------------
// Thrown errors
// ---------------------------------------------------------------------------

/** Base class for every error the engine throws. */
export class PipelineError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'PipelineError';
  }

  get code(): string {
    return this.typedError.code;
  }

  get retryable(): boolean {
    return this.typedError.retryable;
  }
}

/** Malformed pipeline spec. Fatal: no run starts. */
export class SpecError extends PipelineError {
  /** Every validation error found, in detection order. */
  readonly errors: TypedError[];

  constructor(typedError: TypedError, errors?: TypedError[]) {
    super(typedError);
    this.name = 'SpecError';
    this.errors = errors ?? [typedError];
  }

  /** Aggregate several validation errors into one SpecError. */
  static fromErrors(errors: TypedError[]): SpecError {
    if (errors.length === 1) return new SpecError(errors[0]);
    return new SpecError(
      createTypedError({
        code: 'SPEC.INVALID',
        message: `Pipeline spec is invalid (${errors.length} errors): ${errors.map((e) => e.message).join('; ')}`,
        retryable: false,
        details: { errorCount: errors.length },
      }),
      errors,
    );
  }
}

export class CyclicDependencyError extends SpecError {
  constructor(public readonly cycle: string[]) {
    super(cyclicDependencyError(cycle));
    this.name = 'CyclicDependencyError';
  }
}

export class UnknownDependencyError extends SpecError {
  constructor(public readonly stageId: string, public readonly dependency: string) {
    super(unknownDependencyError(stageId, dependency));
    this.name = 'UnknownDependencyError';
  }
}

export class StageTimeoutError extends PipelineError {
  constructor(stageId: string, public readonly timeoutMs: number, attempt: number) {
    super(stageTimeoutError(stageId, timeoutMs, attempt));
    this.name = 'StageTimeoutError';
  }
}

export class StageExecutionError extends PipelineError {
  constructor(stageId: string, message: string, details?: Record<string, unknown>) {
    super(stageExecutionError(stageId, message, details));
    this.name = 'StageExecutionError';
  }
}

/**
 * Thrown by stage implementations when retrying cannot help
 * (bad configuration, rejected credentials, a failed quality gate).
 */
export class NonRetryableStageError extends PipelineError {
  constructor(message: string, public readonly exitCode?: number) {
    super(
      createTypedError({
        code: 'STAGE.NON_RETRYABLE',
        message,
        retryable: false,
        details: exitCode !== undefined ? { exitCode } : undefined,
      }),
    );
    this.name = 'NonRetryableStageError';
  }
}

export class RunNotFoundError extends PipelineError {
  constructor(runId: string) {
    super(runNotFoundError(runId));
    this.name = 'RunNotFoundError';
  }
}

/** Reason attached to AbortSignals when a run is cancelled or aborted. */
export class RunCancelledError extends PipelineError {
  constructor(runId: string, reason?: string) {
    super(runCancelledError(runId, reason));
    this.name = 'RunCancelledError';
  }
}

export class InvalidRunStateError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'InvalidRunStateError';
  }
}

export class ArtifactConflictError extends PipelineError {
  constructor(name: string, versionKey: string, existingHash: string, attemptedHash: string) {
    super(artifactConflictError(name, versionKey, existingHash, attemptedHash));
    this.name = 'ArtifactConflictError';
  }
}

export class ArtifactNotFoundError extends PipelineError {
  constructor(name: string, versionKey: string) {
    super(artifactNotFoundError(name, versionKey));
    this.name = 'ArtifactNotFoundError';
  }
}

export class ArtifactIntegrityError extends PipelineError {
  constructor(name: string, versionKey: string, expectedHash: string, actualHash: string) {
    super(
      createTypedError({
        code: 'ARTIFACT.INTEGRITY',
        message: `Artifact ${name}@${versionKey} content does not match its hash`,
        retryable: true,
        details: { name, versionKey, expectedHash, actualHash },
      }),
    );
    this.name = 'ArtifactIntegrityError';
  }
}

/**
 * An artifact repository answered with a status the client cannot map to
 * found / not-found. Retryability follows the status code: 429 and 5xx are
 * transient, everything else is configuration.
 */
export class ArtifactRepositoryError extends PipelineError {
  constructor(message: string, public readonly statusCode: number) {
    const retryable = statusCode === 429 || statusCode >= 500;
    const fixes: SuggestedFix[] = [];
    if (statusCode === 401 || statusCode === 403) {
      fixes.push({ type: 'CHECK_CREDENTIALS', params: { statusCode }, description: 'Verify the repository credential reference' });
    } else if (retryable) {
      fixes.push({ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 } });
    }
    super(
      createTypedError({
        code: retryable ? 'ARTIFACT.REPOSITORY_TRANSIENT' : 'ARTIFACT.REPOSITORY',
        message,
        retryable,
        details: { statusCode },
        suggestedFixes: fixes,
      }),
    );
    this.name = 'ArtifactRepositoryError';
  }
}

export class ImageNotFoundError extends PipelineError {
  constructor(imageRef: string) {
    super(
      createTypedError({
        code: 'DEPLOYMENT.IMAGE_NOT_FOUND',
        message: `Image is not pullable: ${imageRef}`,
        retryable: false,
        details: { imageRef },
        suggestedFixes: [{ type: 'PUSH_IMAGE', params: { imageRef } }],
      }),
    );
    this.name = 'ImageNotFoundError';
  }
}

export class TargetBusyError extends PipelineError {
  constructor(targetId: string, holder?: string) {
    super(targetBusyError(targetId, holder));
    this.name = 'TargetBusyError';
  }
}

export class TargetNotFoundError extends PipelineError {
  constructor(targetId: string) {
    super(
      createTypedError({
        code: 'DEPLOYMENT.TARGET_NOT_FOUND',
        message: `Deployment target not found: ${targetId}`,
        retryable: false,
        details: { targetId },
      }),
    );
    this.name = 'TargetNotFoundError';
  }
}

/** Candidate failed to start or to become healthy; the previous instance keeps serving. */
export class DeploymentFailedError extends PipelineError {
  constructor(targetId: string, message: string, details?: Record<string, unknown>) {
    super(deploymentFailedError(targetId, message, details));
    this.name = 'DeploymentFailedError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(createTypedError({ code: 'CONFIG.INVALID', message, retryable: false, details }));
    this.name = 'ConfigError';
  }
}

/** Convert any thrown value to a TypedError. */
export function toTypedError(err: unknown, fallbackCode = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof PipelineError) return err.typedError;
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  });
}
