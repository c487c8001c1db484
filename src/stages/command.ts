import { NonRetryableStageError, StageExecutionError } from '../domain/errors';
import { StageExecutionContext } from '../engine/stage-registry';
import { CommandResult, CommandRunner, EXIT_SPAWN_FAILED } from '../process/command-runner';

/** Lines of output kept in stage outputs and error details. */
export const LOG_TAIL_LINES = 50;

export interface StageCommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Resolve instead of throwing on a non-zero exit. */
  allowFailure?: boolean;
}

/**
 * Run a command line for a stage, forwarding output to the stage logger.
 * A missing executable fails without retry; any other non-zero exit is a
 * retryable execution failure.
 */
export async function runStageCommand(
  runner: CommandRunner,
  commandLine: string,
  context: StageExecutionContext,
  options: StageCommandOptions = {},
): Promise<CommandResult> {
  context.logger.info('Running command', { command: commandLine, cwd: options.cwd });
  const result = await runner.run('sh', ['-c', commandLine], {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    signal: context.signal,
    onLine: (line, stream) => context.logger.info(line, { stream }),
  });
  if (result.exitCode === 0 || options.allowFailure) return result;
  throw commandFailure(context.stageId, commandLine, result);
}

export function commandFailure(stageId: string, commandLine: string, result: CommandResult): Error {
  const message = `Command exited with ${result.exitCode}: ${commandLine}`;
  if (result.exitCode === EXIT_SPAWN_FAILED) {
    return new NonRetryableStageError(message, result.exitCode);
  }
  return new StageExecutionError(stageId, message, {
    exitCode: result.exitCode,
    logTail: result.output.slice(-LOG_TAIL_LINES),
  });
}
