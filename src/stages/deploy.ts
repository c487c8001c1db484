import { DeploymentController } from '../deploy/deployment-controller';
import { NonRetryableStageError } from '../domain/errors';
import { StageDefinition } from '../engine/stage-registry';
import { dependencyOutput, optionalString, requiredString } from './inputs';

/**
 * Deploy an image to a declared target. The image is the `image` input or
 * the `imageRef` output of a dependency. Never retried automatically.
 */
export function createDeployStage(deps: { deployments: DeploymentController }): StageDefinition {
  return {
    type: 'deploy',
    description: 'Blue/green deploy of an image to a target',
    idempotent: false,
    inputContract: {
      target: { type: 'string', required: true, description: 'Id of a declared target' },
      image: { type: 'string', description: 'Image reference; defaults to a dependency\'s imageRef' },
    },
    outputContract: ['targetId', 'imageRef', 'digest', 'outcome', 'containerName'],
    validate(stage, spec) {
      const errors: string[] = [];
      const target = stage.inputs.target;
      if (typeof target === 'string' && !(spec.targets ?? []).some((t) => t.id === target)) {
        errors.push(`target "${target}" is not declared`);
      }
      if (stage.inputs.image === undefined && stage.dependencies.length === 0) {
        errors.push('needs an "image" input or a dependency producing "imageRef"');
      }
      return errors;
    },
    async execute(stage, context) {
      const targetId = requiredString(stage, 'target');
      const imageRef = optionalString(stage, 'image') ?? dependencyOutput(context.dependencies, stage, 'imageRef');
      if (!imageRef) {
        throw new NonRetryableStageError(`Stage "${stage.id}": no image to deploy`);
      }

      const result = await deps.deployments.deploy(targetId, imageRef, {
        signal: context.signal,
        runId: context.runId,
        stageId: stage.id,
      });
      return {
        outputs: {
          targetId: result.targetId,
          imageRef: result.imageRef,
          digest: result.digest,
          outcome: result.outcome,
          containerName: result.instance.containerName,
          slot: result.instance.slot,
          previous: result.previous?.containerName ?? null,
          healthChecks: result.healthChecks,
        },
      };
    },
  };
}
