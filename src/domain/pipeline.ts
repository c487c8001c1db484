/**
 * Pipeline spec domain model.
 *
 * The declarative document a run is built from: an ordered list of stage
 * declarations with named dependencies, policy defaults and the deployment
 * targets the deploy stages refer to.
 */

import { SlotConfig, HealthCheckPolicy } from './deployment';

/** Per-stage execution policy. */
export interface StagePolicy {
  /** Bound on a single attempt. */
  timeoutMs: number;
  /** Extra attempts after the first; only idempotent stages use them. */
  retries: number;
  backoffStrategy: 'fixed' | 'exponential';
  backoffBaseMs: number;
}

/** A stage as declared in a pipeline spec. */
export interface StageDeclaration {
  id: string;
  type: string;
  /** Ids of stages that must succeed first. */
  needs?: string[];
  /** Stage inputs, checked against the stage type's input contract. */
  with?: Record<string, unknown>;
  policy?: Partial<StagePolicy>;
}

/** A deployment target as declared in a pipeline spec. */
export interface TargetDeclaration {
  id: string;
  host: string;
  user?: string;
  /** Opaque credential reference, e.g. "env:DEPLOY_KEY". */
  credentialsRef?: string;
  serviceName: string;
  containerPort: number;
  slots: SlotConfig[];
  healthCheck?: Partial<HealthCheckPolicy>;
}

/** The pipeline spec document. */
export interface PipelineSpec {
  name: string;
  description?: string;
  concurrency?: number;
  defaults?: Partial<StagePolicy>;
  targets?: TargetDeclaration[];
  stages: StageDeclaration[];
}
