/**
 * Built-in stage definitions.
 */

import { ArtifactStoreClient } from '../artifacts/artifact-store';
import { DeploymentController } from '../deploy/deployment-controller';
import { ImageRegistry } from '../deploy/runtime';
import { StageRegistry } from '../engine/stage-registry';
import { CommandRunner } from '../process/command-runner';
import { createBuildStage } from './build';
import { createContainerizeStage } from './containerize';
import { createDeployStage } from './deploy';
import { createPackageStage } from './package';
import { createPublishStage } from './publish';
import { createScanStage } from './scan';

export interface BuiltinStageDeps {
  runner: CommandRunner;
  artifacts: ArtifactStoreClient;
  /** Publish target; the artifact store itself when omitted. */
  publishRepository?: ArtifactStoreClient;
  registry: ImageRegistry;
  deployments: DeploymentController;
  /** Base directory for relative paths in stage inputs. */
  workdir?: string;
}

export function createBuiltinRegistry(deps: BuiltinStageDeps): StageRegistry {
  const workdir = deps.workdir ?? process.cwd();
  const repository = deps.publishRepository ?? deps.artifacts;
  return new StageRegistry()
    .register(createScanStage({ runner: deps.runner, workdir }))
    .register(createBuildStage({ runner: deps.runner, workdir }))
    .register(createPackageStage({ artifacts: deps.artifacts, workdir }))
    .register(createPublishStage({ artifacts: deps.artifacts, repository, repositoryName: repository.backendKind }))
    .register(createContainerizeStage({ runner: deps.runner, registry: deps.registry, workdir }))
    .register(createDeployStage({ deployments: deps.deployments }));
}

export { createBuildStage, createContainerizeStage, createDeployStage, createPackageStage, createPublishStage, createScanStage };
export * from './command';
export * from './inputs';
