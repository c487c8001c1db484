/**
 * Ports the deployment controller drives. Production uses the registry HTTP
 * client, docker over ssh and HTTP health probes; tests plug in fakes.
 */

import { ContainerInstance, DeploymentTarget } from '../domain/deployment';
import { CommandResult } from '../process/command-runner';

/** Resolves an image reference to its content digest; null when not pullable. */
export interface ImageRegistry {
  resolve(imageRef: string, signal?: AbortSignal): Promise<string | null>;
}

export interface RunContainerRequest {
  containerName: string;
  image: string;
  hostPort: number;
  containerPort: number;
  /** Remove an existing container with the same name first. */
  replace: boolean;
  env?: Record<string, string>;
}

/** Container primitives on a deployment target. Non-zero exit codes mean failure. */
export interface ContainerRuntime {
  runContainer(target: DeploymentTarget, request: RunContainerRequest, signal?: AbortSignal): Promise<CommandResult>;
  removeContainer(target: DeploymentTarget, containerName: string, signal?: AbortSignal): Promise<CommandResult>;
  /** Point the service's entry at the instance. Runtimes without a router omit it. */
  switchTraffic?(target: DeploymentTarget, instance: ContainerInstance, signal?: AbortSignal): Promise<CommandResult>;
}

export interface HealthChecker {
  /** One bounded probe. Resolves false on an unhealthy answer or a transport error. */
  check(target: DeploymentTarget, instance: ContainerInstance, signal?: AbortSignal): Promise<boolean>;
}
