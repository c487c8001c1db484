/**
 * Docker over ssh.
 *
 * Every primitive is one `ssh user@host <docker command>` invocation; the exit
 * status decides success and output lines are forwarded to the logger. The
 * target's credential reference, when set, resolves to an identity file.
 */

import { ContainerInstance, DeploymentTarget } from '../domain/deployment';
import { resolveCredential } from '../domain/credentials';
import { logger } from '../logger';
import { CommandResult, CommandRunner, shellQuote } from '../process/command-runner';
import { ContainerRuntime, RunContainerRequest } from './runtime';

const log = logger.child({ module: 'ssh-runtime' });

export interface SshDockerRuntimeOptions {
  runner: CommandRunner;
  /** Extra ssh arguments, e.g. ["-o", "BatchMode=yes"]. */
  sshOptions?: string[];
  /**
   * Remote command that routes the service to an instance. `{service}`,
   * `{container}` and `{port}` are substituted. Without it traffic follows
   * the instance's own port and switchTraffic is not offered.
   */
  switchCommand?: string;
  env?: NodeJS.ProcessEnv;
}

export class SshDockerRuntime implements ContainerRuntime {
  readonly switchTraffic?: (target: DeploymentTarget, instance: ContainerInstance, signal?: AbortSignal) => Promise<CommandResult>;

  constructor(private options: SshDockerRuntimeOptions) {
    const template = options.switchCommand;
    if (template) {
      this.switchTraffic = (target, instance, signal) =>
        this.remote(
          target,
          template
            .replace(/\{service\}/g, shellQuote(target.serviceName))
            .replace(/\{container\}/g, shellQuote(instance.containerName))
            .replace(/\{port\}/g, String(instance.hostPort)),
          signal,
        );
    }
  }

  async runContainer(target: DeploymentTarget, request: RunContainerRequest, signal?: AbortSignal): Promise<CommandResult> {
    const args = [
      'docker',
      'run',
      '-d',
      '--name',
      request.containerName,
      '--restart',
      'unless-stopped',
      '-p',
      `${request.hostPort}:${request.containerPort}`,
    ];
    for (const [key, value] of Object.entries(request.env ?? {})) {
      args.push('-e', `${key}=${value}`);
    }
    args.push(request.image);

    const run = args.map(shellQuote).join(' ');
    const command = request.replace
      ? `docker rm -f ${shellQuote(request.containerName)} >/dev/null 2>&1; ${run}`
      : run;
    return this.remote(target, command, signal);
  }

  async removeContainer(target: DeploymentTarget, containerName: string, signal?: AbortSignal): Promise<CommandResult> {
    return this.remote(target, `docker rm -f ${shellQuote(containerName)}`, signal);
  }

  /** ssh argv for a remote command line. */
  sshArgs(target: DeploymentTarget, command: string): string[] {
    const args = [...(this.options.sshOptions ?? [])];
    if (target.credentialsRef) {
      args.push('-i', resolveCredential(target.credentialsRef, this.options.env));
    }
    args.push(target.user ? `${target.user}@${target.host}` : target.host, command);
    return args;
  }

  private remote(target: DeploymentTarget, command: string, signal?: AbortSignal): Promise<CommandResult> {
    log.debug('Remote command', { targetId: target.id, host: target.host, command });
    return this.options.runner.run('ssh', this.sshArgs(target, command), {
      signal,
      onLine: (line, stream) => log.info(line, { targetId: target.id, stream }),
    });
  }
}
