/**
 * Deployment domain model.
 *
 * A DeploymentTarget is a lock-guarded resource record: one host running one
 * service in one of two slots. Only the deployment controller mutates it.
 */

/** A host port the service can be started on. */
export interface SlotConfig {
  name: string;
  port: number;
}

export interface HealthCheckPolicy {
  path: string;
  /** Checks attempted before the candidate is declared unhealthy. */
  retries: number;
  intervalMs: number;
  /** Bound on a single check. */
  timeoutMs: number;
}

export const DEFAULT_HEALTH_CHECK: Readonly<HealthCheckPolicy> = {
  path: '/',
  retries: 5,
  intervalMs: 2_000,
  timeoutMs: 5_000,
};

/** A container started by the controller. */
export interface ContainerInstance {
  containerName: string;
  slot: string;
  hostPort: number;
  image: string;
  digest?: string;
  deployedAt: string;
}

export interface DeploymentTarget {
  id: string;
  host: string;
  user?: string;
  /** Opaque credential reference handed to the runtime. */
  credentialsRef?: string;
  serviceName: string;
  containerPort: number;
  slots: SlotConfig[];
  healthCheck: HealthCheckPolicy;
  /** Instance currently serving traffic. */
  current?: ContainerInstance;
  updatedAt?: string;
}

export type DeploymentOutcome = 'deployed' | 'unchanged';

export interface DeploymentResult {
  targetId: string;
  imageRef: string;
  digest: string;
  outcome: DeploymentOutcome;
  instance: ContainerInstance;
  /** Instance that was replaced, if any. */
  previous?: ContainerInstance;
  healthChecks: number;
  durationMs: number;
}
