import path from 'path';
import { ImageRegistry } from '../deploy/runtime';
import { StageExecutionError } from '../domain/errors';
import { StageDefinition } from '../engine/stage-registry';
import { CommandRunner, shellQuote } from '../process/command-runner';
import { runStageCommand } from './command';
import { optionalBoolean, optionalString, requiredString } from './inputs';

/** Length of the commit SHA prefix used as the default image tag. */
export const DEFAULT_TAG_LENGTH = 12;

/** Build and push `image:tag`, then resolve the pushed digest. */
export function createContainerizeStage(deps: {
  runner: CommandRunner;
  registry: ImageRegistry;
  workdir: string;
}): StageDefinition {
  return {
    type: 'containerize',
    description: 'Build and push a container image',
    idempotent: true,
    inputContract: {
      image: { type: 'string', required: true, description: 'Image repository, without tag' },
      tag: { type: 'string', description: 'Defaults to the short commit SHA' },
      context: { type: 'string', description: 'Build context directory' },
      dockerfile: { type: 'string' },
      push: { type: 'boolean', description: 'Push after building (default true)' },
    },
    outputContract: ['imageRef', 'digest'],
    validate(stage) {
      const image = stage.inputs.image;
      if (typeof image === 'string' && /[:@]/.test(image.split('/').pop() ?? '')) {
        return ['input "image" must not carry a tag or digest; use "tag"'];
      }
      return [];
    },
    async execute(stage, context) {
      const image = requiredString(stage, 'image');
      const tag = optionalString(stage, 'tag') ?? context.commitSha.slice(0, DEFAULT_TAG_LENGTH);
      const imageRef = `${image}:${tag}`;
      const buildContext = path.resolve(deps.workdir, optionalString(stage, 'context') ?? '.');
      const dockerfile = optionalString(stage, 'dockerfile');

      const build = ['docker', 'build', '-t', imageRef];
      if (dockerfile) build.push('-f', path.resolve(buildContext, dockerfile));
      build.push(buildContext);
      await runStageCommand(deps.runner, build.map(shellQuote).join(' '), context);

      if (!optionalBoolean(stage, 'push', true)) {
        return { outputs: { imageRef, digest: null } };
      }
      await runStageCommand(deps.runner, ['docker', 'push', imageRef].map(shellQuote).join(' '), context);

      const digest = await deps.registry.resolve(imageRef, context.signal);
      if (!digest) {
        throw new StageExecutionError(stage.id, `Pushed image ${imageRef} is not resolvable in the registry`, { imageRef });
      }
      context.logger.info('Image pushed', { imageRef, digest });
      return { outputs: { imageRef, digest } };
    },
  };
}
