/**
 * Command-line interface.
 *
 *   pipeline run <spec-file> [--concurrency N] [--commit SHA] [--server URL]
 *   pipeline status <run-id> --server URL
 *   pipeline cancel <run-id> --server URL [--reason TEXT]
 *   pipeline serve [--port N]
 *
 * Exit codes: 0 success, 1 stage failure or cancellation, 2 malformed spec.
 */

import { Command, InvalidArgumentError } from 'commander';
import { Engine, createEngine } from '../bootstrap';
import { EngineConfig, loadConfig } from '../config';
import { COMMIT_SHA_PATTERN } from '../dsl/schema';
import { loadPipelineSpecFile } from '../dsl/loader';
import { errorContext, logger } from '../logger';
import { SpawnCommandRunner } from '../process/command-runner';
import { startServer } from '../server';
import { FetchFn } from '../artifacts/http-backend';
import { PipelineApiClient } from './client';
import {
  EXIT_FAILURE,
  EXIT_SPEC_ERROR,
  EXIT_SUCCESS,
  exitCodeForError,
  exitCodeForRun,
  formatEvent,
  formatRunReport,
} from './report';

const log = logger.child({ module: 'cli' });

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  io?: CliIO;
  createEngine?: (config: EngineConfig) => Engine;
  fetch?: FetchFn;
  env?: NodeJS.ProcessEnv;
  /** Resolves the commit when --commit is not given. */
  resolveCommit?: () => Promise<string>;
}

export interface RunCommandOptions {
  concurrency?: number;
  commit?: string;
  server?: string;
  pollIntervalMs?: number;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

/** HEAD of the git repository in the working directory. */
export async function gitHeadCommit(): Promise<string> {
  const result = await new SpawnCommandRunner().run('git', ['rev-parse', 'HEAD']);
  const sha = result.output[0]?.trim() ?? '';
  if (result.exitCode !== 0 || !COMMIT_SHA_PATTERN.test(sha)) {
    throw new Error('Cannot determine the commit: pass --commit or run inside a git repository');
  }
  return sha;
}

function reportError(io: CliIO, err: unknown): number {
  const code = exitCodeForError(err);
  io.err(`${code === EXIT_SPEC_ERROR ? 'Invalid pipeline spec' : 'Error'}: ${err instanceof Error ? err.message : String(err)}`);
  return code;
}

/** `pipeline run`: execute in-process, or on a server with --server. Returns the exit code. */
export async function runCommand(specFile: string, options: RunCommandOptions, deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  try {
    const spec = await loadPipelineSpecFile(specFile);
    const commitSha = options.commit ?? (await (deps.resolveCommit ?? gitHeadCommit)());

    if (options.server) {
      const client = new PipelineApiClient(options.server, { fetch: deps.fetch });
      const created = await client.createRun(spec, commitSha, options.concurrency);
      io.out(`Run ${created.id} submitted to ${options.server}`);
      const run = await client.waitForRun(created.id, { intervalMs: options.pollIntervalMs });
      formatRunReport(run).forEach((line) => io.out(line));
      return exitCodeForRun(run);
    }

    const engine = (deps.createEngine ?? createEngine)(loadConfig(deps.env ?? process.env));
    const created = await engine.executor.createRun({
      spec,
      commitSha,
      ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
    });
    const unsubscribe = engine.publisher.subscribe({
      id: `cli-${created.id}`,
      runId: created.id,
      callback: (event) => io.out(formatEvent(event)),
    });
    const onInterrupt = () => {
      engine.executor.cancelRun(created.id, 'cli', 'interrupted').catch((err: unknown) => {
        log.warn('Cancellation failed', { runId: created.id, ...errorContext(err) });
      });
    };
    process.once('SIGINT', onInterrupt);

    try {
      const run = await engine.executor.executeRun(created.id);
      formatRunReport(run).forEach((line) => io.out(line));
      return exitCodeForRun(run);
    } finally {
      process.off('SIGINT', onInterrupt);
      unsubscribe();
    }
  } catch (err) {
    return reportError(io, err);
  }
}

export async function statusCommand(runId: string, server: string, deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  try {
    const run = await new PipelineApiClient(server, { fetch: deps.fetch }).getRun(runId);
    formatRunReport(run).forEach((line) => io.out(line));
    return exitCodeForRun(run);
  } catch (err) {
    return reportError(io, err);
  }
}

export async function cancelCommand(runId: string, server: string, reason: string | undefined, deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIO;
  try {
    const run = await new PipelineApiClient(server, { fetch: deps.fetch }).cancelRun(runId, reason);
    io.out(`Run ${run.id} cancellation requested (status: ${run.status})`);
    return EXIT_SUCCESS;
  } catch (err) {
    return reportError(io, err);
  }
}

export function buildProgram(deps: CliDeps = {}, onExit: (code: number) => void = (code) => {
  process.exitCode = code;
}): Command {
  const program = new Command();
  program
    .name('pipeline')
    .description('Run build, package and deploy pipelines')
    .version('0.1.0');

  program
    .command('run')
    .description('Execute a pipeline spec for a commit')
    .argument('<spec-file>', 'YAML or JSON pipeline spec')
    .option('-c, --concurrency <n>', 'Maximum stages running at once', parsePositiveInt)
    .option('--commit <sha>', 'Commit SHA (defaults to git HEAD)')
    .option('--server <url>', 'Submit to a pipeline server instead of running locally')
    .action(async (specFile: string, options: RunCommandOptions) => {
      onExit(await runCommand(specFile, options, deps));
    });

  program
    .command('status')
    .description('Show the status of a run')
    .argument('<run-id>')
    .requiredOption('--server <url>', 'Pipeline server URL')
    .action(async (runId: string, options: { server: string }) => {
      onExit(await statusCommand(runId, options.server, deps));
    });

  program
    .command('cancel')
    .description('Cancel a run')
    .argument('<run-id>')
    .requiredOption('--server <url>', 'Pipeline server URL')
    .option('--reason <text>', 'Recorded with the cancellation')
    .action(async (runId: string, options: { server: string; reason?: string }) => {
      onExit(await cancelCommand(runId, options.server, options.reason, deps));
    });

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <n>', 'Port to listen on', parsePositiveInt)
    .action(async (options: { port?: number }) => {
      try {
        const config = loadConfig(deps.env ?? process.env, options.port !== undefined ? { port: options.port } : {});
        const engine = (deps.createEngine ?? createEngine)(config);
        const server = await startServer(engine, config.port);
        process.once('SIGTERM', () => server.close());
      } catch (err) {
        onExit(reportError(deps.io ?? consoleIO, err));
      }
    });

  return program;
}

export { EXIT_FAILURE, EXIT_SPEC_ERROR, EXIT_SUCCESS };
