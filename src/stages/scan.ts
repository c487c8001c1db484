import path from 'path';
import { NonRetryableStageError } from '../domain/errors';
import { StageDefinition } from '../engine/stage-registry';
import { CommandRunner } from '../process/command-runner';
import { runStageCommand } from './command';
import { optionalBoolean, optionalString, requiredString } from './inputs';

const DEFAULT_REPORT_URL_PATTERN = 'https?://\\S+';

/**
 * Static analysis. With the quality gate on (the default) a non-zero exit
 * fails the stage; with it off the result is reported as `passed: false`.
 */
export function createScanStage(deps: { runner: CommandRunner; workdir: string }): StageDefinition {
  return {
    type: 'scan',
    description: 'Run a static-analysis command over the source tree',
    idempotent: true,
    inputContract: {
      command: { type: 'string', required: true, description: 'Analyzer command line' },
      sourceRoot: { type: 'string', description: 'Directory the analyzer runs in' },
      qualityGate: { type: 'boolean', description: 'Fail the stage when the analyzer fails' },
      reportUrlPattern: { type: 'string', description: 'Regular expression locating the report URL in the output' },
    },
    outputContract: ['passed', 'exitCode', 'reportUrl'],
    validate(stage) {
      const pattern = stage.inputs.reportUrlPattern;
      if (typeof pattern !== 'string') return [];
      try {
        new RegExp(pattern);
        return [];
      } catch {
        return [`reportUrlPattern is not a valid regular expression: ${pattern}`];
      }
    },
    async execute(stage, context) {
      const command = requiredString(stage, 'command');
      const sourceRoot = path.resolve(deps.workdir, optionalString(stage, 'sourceRoot') ?? '.');
      const qualityGate = optionalBoolean(stage, 'qualityGate', true);

      const result = await runStageCommand(deps.runner, command, context, {
        cwd: sourceRoot,
        allowFailure: true,
      });

      const pattern = new RegExp(optionalString(stage, 'reportUrlPattern') ?? DEFAULT_REPORT_URL_PATTERN);
      let reportUrl: string | null = null;
      for (const line of result.output) {
        const match = pattern.exec(line);
        if (match) {
          reportUrl = match[0];
          break;
        }
      }

      if (result.exitCode !== 0 && qualityGate) {
        throw new NonRetryableStageError(`Quality gate failed (exit ${result.exitCode})`, result.exitCode);
      }
      return { outputs: { passed: result.exitCode === 0, exitCode: result.exitCode, reportUrl } };
    },
  };
}
