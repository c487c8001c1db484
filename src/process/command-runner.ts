/**
 * External command execution.
 *
 * Every external tool (static analyzer, build tool, docker, ssh) is invoked
 * through a CommandRunner so stages map results uniformly: exit code 0 is
 * success, anything else is failure, and output lines are forwarded to the
 * caller as they arrive.
 */

import { spawn } from 'child_process';
import { abortReason } from '../util/abort';

export type OutputStream = 'stdout' | 'stderr';

export interface CommandRunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kills the process (SIGTERM) and rejects with the abort reason. */
  signal?: AbortSignal;
  onLine?: (line: string, stream: OutputStream) => void;
  /** Lines kept in the result; older lines are dropped. */
  maxLines?: number;
}

export interface CommandResult {
  exitCode: number;
  /** Last output lines, stdout and stderr interleaved. */
  output: string[];
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandRunOptions): Promise<CommandResult>;
}

/** Exit code reported when the executable cannot be started. */
export const EXIT_SPAWN_FAILED = 127;

const DEFAULT_MAX_LINES = 200;

/** Split a byte stream into lines, holding back the trailing partial line. */
export function createLineBuffer(onLine: (line: string) => void) {
  let buffer = '';

  return {
    write(chunk: string) {
      buffer += chunk;
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';
      for (const part of parts) {
        onLine(part);
      }
    },
    flush() {
      const remaining = buffer;
      buffer = '';
      if (remaining.length > 0) onLine(remaining);
    },
  };
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: CommandRunOptions = {}): Promise<CommandResult> {
    const maxLines = options.maxLines ?? DEFAULT_MAX_LINES;
    const output: string[] = [];
    const record = (stream: OutputStream) => (line: string) => {
      output.push(line);
      if (output.length > maxLines) output.shift();
      options.onLine?.(line, stream);
    };

    return new Promise<CommandResult>((resolve, reject) => {
      const signal = options.signal;
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      const stdout = createLineBuffer(record('stdout'));
      const stderr = createLineBuffer(record('stderr'));
      child.stdout.setEncoding('utf8').on('data', (chunk: string) => stdout.write(chunk));
      child.stderr.setEncoding('utf8').on('data', (chunk: string) => stderr.write(chunk));

      let settled = false;
      const onAbort = () => {
        if (settled || !signal) return;
        settled = true;
        child.kill('SIGTERM');
        reject(abortReason(signal));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.on('error', (err) => {
        signal?.removeEventListener('abort', onAbort);
        if (settled) return;
        settled = true;
        output.push(`${command}: ${err.message}`);
        resolve({ exitCode: EXIT_SPAWN_FAILED, output });
      });

      child.on('close', (code, killedBy) => {
        signal?.removeEventListener('abort', onAbort);
        stdout.flush();
        stderr.flush();
        if (settled) return;
        settled = true;
        // Killed by a signal without an exit code: report the shell convention 128+n.
        resolve({ exitCode: code ?? (killedBy ? 128 + signalNumber(killedBy) : 1), output });
      });
    });
  }

  /** Run a command line through `sh -c`. */
  runShell(commandLine: string, options: CommandRunOptions = {}): Promise<CommandResult> {
    return this.run('sh', ['-c', commandLine], options);
  }
}

function signalNumber(name: NodeJS.Signals): number {
  switch (name) {
    case 'SIGINT':
      return 2;
    case 'SIGKILL':
      return 9;
    case 'SIGTERM':
      return 15;
    default:
      return 0;
  }
}

/** Quote an argument for a POSIX shell. */
export function shellQuote(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Run a command line via `sh -c` on any runner. */
export function runShell(runner: CommandRunner, commandLine: string, options?: CommandRunOptions): Promise<CommandResult> {
  return runner.run('sh', ['-c', commandLine], options);
}
