import { ArtifactStoreClient } from '../artifacts/artifact-store';
import { NonRetryableStageError } from '../domain/errors';
import { StageDefinition } from '../engine/stage-registry';
import { dependencyArtifact, optionalString } from './inputs';

/**
 * Copy a dependency's artifact into the publish repository under the same
 * name and version. Publishing the same content twice is a no-op; different
 * content under a published version is an ArtifactConflictError.
 */
export function createPublishStage(deps: {
  artifacts: ArtifactStoreClient;
  repository: ArtifactStoreClient;
  repositoryName: string;
}): StageDefinition {
  return {
    type: 'publish',
    description: 'Publish an artifact to the artifact repository',
    idempotent: true,
    inputContract: {
      from: { type: 'string', description: 'Dependency whose artifact is published' },
    },
    outputContract: ['artifact', 'repository'],
    validate(stage) {
      const from = stage.inputs.from;
      if (typeof from === 'string' && !stage.dependencies.includes(from)) {
        return [`input "from" must name a dependency, got "${from}"`];
      }
      if (stage.dependencies.length === 0) {
        return ['needs a dependency that produces an artifact'];
      }
      return [];
    },
    async execute(stage, context) {
      const source = dependencyArtifact(context.dependencies, stage, optionalString(stage, 'from'));
      if (!source) {
        throw new NonRetryableStageError(`Stage "${stage.id}": no dependency produced an artifact`);
      }

      const bytes = await deps.artifacts.get(source.artifact);
      const artifact = await deps.repository.put(
        source.artifact.name,
        source.artifact.versionKey,
        bytes,
        `${context.runId}/${stage.id}`,
      );
      context.logger.info('Published artifact', {
        name: artifact.name,
        versionKey: artifact.versionKey,
        repository: deps.repositoryName,
        from: source.stageId,
      });
      return { outputs: { artifact, repository: deps.repositoryName }, artifact };
    },
  };
}
