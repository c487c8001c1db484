/**
 * Pipeline spec validator.
 *
 * Checks the structure of a parsed spec document (YAML or JSON) and builds
 * the typed PipelineSpec from it. Graph-level checks (dependencies, cycles,
 * stage contracts) belong to the compiler.
 */

import { isCredentialRef } from '../domain/credentials';
import { HealthCheckPolicy, SlotConfig } from '../domain/deployment';
import { SpecError, TypedError, createTypedError } from '../domain/errors';
import { PipelineSpec, StageDeclaration, StagePolicy, TargetDeclaration } from '../domain/pipeline';
import {
  ID_PATTERN,
  REQUIRED_SPEC_FIELDS,
  REQUIRED_STAGE_FIELDS,
  REQUIRED_TARGET_FIELDS,
  SCHEMA_CONSTRAINTS,
  SERVICE_NAME_PATTERN,
  VALID_BACKOFF_STRATEGIES,
} from './schema';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
  /** The typed spec, present when valid. */
  spec?: PipelineSpec;
}

type Doc = Record<string, unknown>;

function isRecord(value: unknown): value is Doc {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function requiredFieldError(field: string, path: string, stageId?: string): TypedError {
  return createTypedError({
    code: 'SPEC.REQUIRED_FIELD',
    message: `Missing required field: ${path}${field}`,
    stageId,
    retryable: false,
    suggestedFixes: [{ type: 'ADD_FIELD', params: { field: `${path}${field}` } }],
  });
}

function invalidValueError(path: string, expected: string, stageId?: string): TypedError {
  return createTypedError({
    code: 'SPEC.INVALID_VALUE',
    message: `${path} must be ${expected}`,
    stageId,
    retryable: false,
    details: { path },
  });
}

/** Validate a parsed spec document. */
export function validatePipelineSpec(doc: unknown): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (!isRecord(doc)) {
    errors.push(
      createTypedError({
        code: 'SPEC.INVALID_DOCUMENT',
        message: 'Pipeline spec must be a mapping with "name" and "stages"',
        retryable: false,
      }),
    );
    return { valid: false, errors, warnings };
  }

  for (const field of REQUIRED_SPEC_FIELDS) {
    if (!isPresent(doc[field])) errors.push(requiredFieldError(field, ''));
  }
  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  const name = doc.name;
  if (typeof name !== 'string' || name.trim().length === 0) {
    errors.push(invalidValueError('name', 'a non-empty string'));
  }

  const description = doc.description;
  if (isPresent(description) && typeof description !== 'string') {
    errors.push(invalidValueError('description', 'a string'));
  }

  let concurrency: number | undefined;
  if (isPresent(doc.concurrency)) {
    concurrency = readInteger(doc.concurrency, 'concurrency', 1, SCHEMA_CONSTRAINTS.maxConcurrency, errors);
  }

  const defaults = isPresent(doc.defaults) ? validatePolicy(doc.defaults, 'defaults', errors) : undefined;
  const targets = isPresent(doc.targets) ? validateTargets(doc.targets, errors) : undefined;
  const stages = validateStages(doc.stages, errors, warnings);

  for (const key of Object.keys(doc)) {
    if (!['name', 'description', 'concurrency', 'defaults', 'targets', 'stages'].includes(key)) {
      warnings.push(`Unknown top-level field "${key}" ignored`);
    }
  }

  if (errors.length > 0 || typeof name !== 'string') {
    return { valid: false, errors, warnings };
  }

  const spec: PipelineSpec = {
    name,
    ...(typeof description === 'string' ? { description } : {}),
    ...(concurrency !== undefined ? { concurrency } : {}),
    ...(defaults ? { defaults } : {}),
    ...(targets ? { targets } : {}),
    stages,
  };
  return { valid: true, errors, warnings, spec };
}

/** Validate and return the typed spec, or throw a SpecError listing every problem. */
export function parsePipelineSpec(doc: unknown): PipelineSpec {
  const result = validatePipelineSpec(doc);
  if (!result.valid || !result.spec) {
    throw SpecError.fromErrors(result.errors);
  }
  return result.spec;
}

function readInteger(
  value: unknown,
  path: string,
  min: number,
  max: number,
  errors: TypedError[],
  stageId?: string,
): number | undefined {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    errors.push(invalidValueError(path, `an integer between ${min} and ${max}`, stageId));
    return undefined;
  }
  return value;
}

function validatePolicy(value: unknown, path: string, errors: TypedError[], stageId?: string): Partial<StagePolicy> {
  const policy: Partial<StagePolicy> = {};
  if (!isRecord(value)) {
    errors.push(invalidValueError(path, 'a mapping', stageId));
    return policy;
  }

  if (isPresent(value.timeoutMs)) {
    const timeoutMs = readInteger(
      value.timeoutMs,
      `${path}.timeoutMs`,
      SCHEMA_CONSTRAINTS.minTimeoutMs,
      SCHEMA_CONSTRAINTS.maxTimeoutMs,
      errors,
      stageId,
    );
    if (timeoutMs !== undefined) policy.timeoutMs = timeoutMs;
  }
  if (isPresent(value.retries)) {
    const retries = readInteger(value.retries, `${path}.retries`, 0, SCHEMA_CONSTRAINTS.maxRetries, errors, stageId);
    if (retries !== undefined) policy.retries = retries;
  }
  if (isPresent(value.backoffBaseMs)) {
    const base = readInteger(value.backoffBaseMs, `${path}.backoffBaseMs`, 0, SCHEMA_CONSTRAINTS.maxBackoffBaseMs, errors, stageId);
    if (base !== undefined) policy.backoffBaseMs = base;
  }
  if (isPresent(value.backoffStrategy)) {
    const strategy = VALID_BACKOFF_STRATEGIES.find((s) => s === value.backoffStrategy);
    if (strategy) {
      policy.backoffStrategy = strategy;
    } else {
      errors.push(invalidValueError(`${path}.backoffStrategy`, `one of ${VALID_BACKOFF_STRATEGIES.join(', ')}`, stageId));
    }
  }
  return policy;
}

function validateStages(value: unknown, errors: TypedError[], warnings: string[]): StageDeclaration[] {
  if (!Array.isArray(value) || value.length === 0) {
    errors.push(invalidValueError('stages', 'a non-empty list'));
    return [];
  }
  if (value.length > SCHEMA_CONSTRAINTS.maxStages) {
    errors.push(invalidValueError('stages', `at most ${SCHEMA_CONSTRAINTS.maxStages} entries`));
  }

  const stages: StageDeclaration[] = [];
  const seen = new Set<string>();

  value.forEach((raw: unknown, index: number) => {
    const path = `stages[${index}]`;
    if (!isRecord(raw)) {
      errors.push(invalidValueError(path, 'a mapping'));
      return;
    }

    const missing = REQUIRED_STAGE_FIELDS.filter((field) => !isPresent(raw[field]));
    if (missing.length > 0) {
      for (const field of missing) errors.push(requiredFieldError(field, `${path}.`));
      return;
    }

    const { id, type } = raw;
    if (typeof id !== 'string' || !ID_PATTERN.test(id)) {
      errors.push(invalidValueError(`${path}.id`, 'letters, digits, "-" or "_" (max 64 chars)'));
      return;
    }
    if (seen.has(id)) {
      errors.push(
        createTypedError({
          code: 'SPEC.DUPLICATE_ID',
          message: `Duplicate stage id: ${id}`,
          stageId: id,
          retryable: false,
        }),
      );
      return;
    }
    seen.add(id);

    if (typeof type !== 'string' || type.length === 0) {
      errors.push(invalidValueError(`${path}.type`, 'a non-empty string', id));
      return;
    }

    const stage: StageDeclaration = { id, type };

    if (isPresent(raw.needs)) {
      const needs = raw.needs;
      if (!Array.isArray(needs) || !needs.every((n): n is string => typeof n === 'string')) {
        errors.push(invalidValueError(`${path}.needs`, 'a list of stage ids', id));
      } else {
        const unique = [...new Set(needs)];
        if (unique.length !== needs.length) {
          warnings.push(`Stage "${id}" lists a dependency more than once`);
        }
        stage.needs = unique;
      }
    }

    if (isPresent(raw.with)) {
      if (isRecord(raw.with)) {
        stage.with = raw.with;
      } else {
        errors.push(invalidValueError(`${path}.with`, 'a mapping', id));
      }
    }

    if (isPresent(raw.policy)) {
      stage.policy = validatePolicy(raw.policy, `${path}.policy`, errors, id);
    }

    stages.push(stage);
  });

  return stages;
}

function validateTargets(value: unknown, errors: TypedError[]): TargetDeclaration[] {
  if (!Array.isArray(value)) {
    errors.push(invalidValueError('targets', 'a list'));
    return [];
  }
  if (value.length > SCHEMA_CONSTRAINTS.maxTargets) {
    errors.push(invalidValueError('targets', `at most ${SCHEMA_CONSTRAINTS.maxTargets} entries`));
  }

  const targets: TargetDeclaration[] = [];
  const seen = new Set<string>();

  value.forEach((raw: unknown, index: number) => {
    const path = `targets[${index}]`;
    if (!isRecord(raw)) {
      errors.push(invalidValueError(path, 'a mapping'));
      return;
    }
    const missing = REQUIRED_TARGET_FIELDS.filter((field) => !isPresent(raw[field]));
    if (missing.length > 0) {
      for (const field of missing) errors.push(requiredFieldError(field, `${path}.`));
      return;
    }

    const { id, host, serviceName, user, credentialsRef } = raw;
    const before = errors.length;

    if (typeof id !== 'string' || !ID_PATTERN.test(id)) {
      errors.push(invalidValueError(`${path}.id`, 'letters, digits, "-" or "_" (max 64 chars)'));
    } else if (seen.has(id)) {
      errors.push(
        createTypedError({ code: 'SPEC.DUPLICATE_ID', message: `Duplicate target id: ${id}`, retryable: false }),
      );
    }
    if (typeof host !== 'string' || host.length === 0) {
      errors.push(invalidValueError(`${path}.host`, 'a host name or address'));
    }
    if (typeof serviceName !== 'string' || !SERVICE_NAME_PATTERN.test(serviceName)) {
      errors.push(invalidValueError(`${path}.serviceName`, 'a lowercase container name'));
    }
    if (isPresent(user) && typeof user !== 'string') {
      errors.push(invalidValueError(`${path}.user`, 'a string'));
    }
    if (isPresent(credentialsRef) && (typeof credentialsRef !== 'string' || !isCredentialRef(credentialsRef))) {
      errors.push(invalidValueError(`${path}.credentialsRef`, 'a credential reference (env:<VAR> or literal:<value>)'));
    }
    const containerPort = readInteger(raw.containerPort, `${path}.containerPort`, 1, 65535, errors);
    const slots = validateSlots(raw.slots, `${path}.slots`, errors);
    const healthCheck = isPresent(raw.healthCheck)
      ? validateHealthCheck(raw.healthCheck, `${path}.healthCheck`, errors)
      : undefined;

    if (
      errors.length > before ||
      typeof id !== 'string' ||
      typeof host !== 'string' ||
      typeof serviceName !== 'string' ||
      containerPort === undefined
    ) {
      return;
    }
    seen.add(id);
    targets.push({
      id,
      host,
      serviceName,
      containerPort,
      slots,
      ...(typeof user === 'string' ? { user } : {}),
      ...(typeof credentialsRef === 'string' ? { credentialsRef } : {}),
      ...(healthCheck ? { healthCheck } : {}),
    });
  });

  return targets;
}

function validateSlots(value: unknown, path: string, errors: TypedError[]): SlotConfig[] {
  if (!Array.isArray(value) || value.length < SCHEMA_CONSTRAINTS.minSlots) {
    errors.push(invalidValueError(path, `a list of at least ${SCHEMA_CONSTRAINTS.minSlots} { name, port } entries`));
    return [];
  }
  const slots: SlotConfig[] = [];
  value.forEach((raw: unknown, index: number) => {
    if (!isRecord(raw) || typeof raw.name !== 'string' || raw.name.length === 0) {
      errors.push(invalidValueError(`${path}[${index}]`, 'a { name, port } mapping'));
      return;
    }
    const port = readInteger(raw.port, `${path}[${index}].port`, 1, 65535, errors);
    if (port !== undefined) slots.push({ name: raw.name, port });
  });
  if (new Set(slots.map((s) => s.name)).size !== slots.length || new Set(slots.map((s) => s.port)).size !== slots.length) {
    errors.push(invalidValueError(path, 'slots with distinct names and ports'));
  }
  return slots;
}

function validateHealthCheck(value: unknown, path: string, errors: TypedError[]): Partial<HealthCheckPolicy> {
  const policy: Partial<HealthCheckPolicy> = {};
  if (!isRecord(value)) {
    errors.push(invalidValueError(path, 'a mapping'));
    return policy;
  }
  if (isPresent(value.path)) {
    if (typeof value.path === 'string' && value.path.startsWith('/')) {
      policy.path = value.path;
    } else {
      errors.push(invalidValueError(`${path}.path`, 'an absolute URL path'));
    }
  }
  if (isPresent(value.retries)) {
    const retries = readInteger(value.retries, `${path}.retries`, 1, SCHEMA_CONSTRAINTS.maxHealthRetries, errors);
    if (retries !== undefined) policy.retries = retries;
  }
  if (isPresent(value.intervalMs)) {
    const intervalMs = readInteger(value.intervalMs, `${path}.intervalMs`, 0, SCHEMA_CONSTRAINTS.maxTimeoutMs, errors);
    if (intervalMs !== undefined) policy.intervalMs = intervalMs;
  }
  if (isPresent(value.timeoutMs)) {
    const timeoutMs = readInteger(value.timeoutMs, `${path}.timeoutMs`, 1, SCHEMA_CONSTRAINTS.maxTimeoutMs, errors);
    if (timeoutMs !== undefined) policy.timeoutMs = timeoutMs;
  }
  return policy;
}
