import { readFile } from 'fs/promises';
import path from 'path';
import { ArtifactStoreClient } from '../artifacts/artifact-store';
import { NonRetryableStageError } from '../domain/errors';
import { StageDefinition } from '../engine/stage-registry';
import { optionalString, requiredString } from './inputs';

/** Store a build output as an artifact versioned by the run's commit SHA. */
export function createPackageStage(deps: { artifacts: ArtifactStoreClient; workdir: string }): StageDefinition {
  return {
    type: 'package',
    description: 'Store a build output in the artifact store',
    idempotent: true,
    inputContract: {
      path: { type: 'string', required: true, description: 'File to package' },
      name: { type: 'string', description: 'Artifact name; defaults to the file name' },
    },
    outputContract: ['artifact', 'sizeBytes'],
    async execute(stage, context) {
      const file = path.resolve(deps.workdir, requiredString(stage, 'path'));
      let bytes: Buffer;
      try {
        bytes = await readFile(file);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new NonRetryableStageError(`Cannot read ${file}: ${reason}`);
      }

      const name = optionalString(stage, 'name') ?? path.basename(file);
      const artifact = await deps.artifacts.put(name, context.commitSha, bytes, `${context.runId}/${stage.id}`);
      context.logger.info('Packaged artifact', { name, versionKey: artifact.versionKey, contentHash: artifact.contentHash });
      return { outputs: { artifact, sizeBytes: bytes.length }, artifact };
    },
  };
}
