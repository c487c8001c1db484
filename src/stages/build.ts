import path from 'path';
import { StageDefinition } from '../engine/stage-registry';
import { CommandRunner } from '../process/command-runner';
import { LOG_TAIL_LINES, runStageCommand } from './command';
import { optionalString, requiredString, stringRecord } from './inputs';

export function createBuildStage(deps: { runner: CommandRunner; workdir: string }): StageDefinition {
  return {
    type: 'build',
    description: 'Run the build command',
    idempotent: true,
    inputContract: {
      command: { type: 'string', required: true },
      workdir: { type: 'string' },
      env: { type: 'object', description: 'Extra environment variables' },
    },
    outputContract: ['exitCode', 'logTail'],
    async execute(stage, context) {
      const result = await runStageCommand(deps.runner, requiredString(stage, 'command'), context, {
        cwd: path.resolve(deps.workdir, optionalString(stage, 'workdir') ?? '.'),
        env: { COMMIT_SHA: context.commitSha, ...stringRecord(stage, 'env') },
      });
      return { outputs: { exitCode: result.exitCode, logTail: result.output.slice(-LOG_TAIL_LINES) } };
    },
  };
}
