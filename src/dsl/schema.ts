/**
 * Pipeline spec schema constants.
 */

/** Required top-level fields of a spec document. */
export const REQUIRED_SPEC_FIELDS = ['name', 'stages'] as const;

/** Required fields for a stage declaration. */
export const REQUIRED_STAGE_FIELDS = ['id', 'type'] as const;

/** Required fields for a target declaration. */
export const REQUIRED_TARGET_FIELDS = ['id', 'host', 'serviceName', 'containerPort', 'slots'] as const;

/** Stage and target ids: letters, digits, dash and underscore. */
export const ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

/** Container names derived from serviceName must be valid docker names. */
export const SERVICE_NAME_PATTERN = /^[a-z0-9][a-z0-9_.-]{0,62}$/;

/** Commit identities: abbreviated or full hex SHA. */
export const COMMIT_SHA_PATTERN = /^[0-9a-f]{7,64}$/i;

export const VALID_BACKOFF_STRATEGIES = ['fixed', 'exponential'] as const;

export const SCHEMA_CONSTRAINTS = {
  maxStages: 200,
  maxTargets: 50,
  minTimeoutMs: 10,
  /** One hour. */
  maxTimeoutMs: 3_600_000,
  maxRetries: 10,
  maxBackoffBaseMs: 60_000,
  maxConcurrency: 64,
  minSlots: 2,
  maxHealthRetries: 100,
} as const;
