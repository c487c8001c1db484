import { ContainerInstance, DeploymentTarget } from '../domain/deployment';
import { FetchFn } from '../artifacts/http-backend';
import { errorContext, logger } from '../logger';
import { abortReason } from '../util/abort';
import { HealthChecker } from './runtime';

const log = logger.child({ module: 'health-checker' });

/** GET http://host:port/path; any 2xx is healthy. */
export class HttpHealthChecker implements HealthChecker {
  private fetchFn: FetchFn;

  constructor(options: { fetch?: FetchFn } = {}) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async check(target: DeploymentTarget, instance: ContainerInstance, signal?: AbortSignal): Promise<boolean> {
    const url = healthCheckUrl(target, instance);
    const timeout = AbortSignal.timeout(target.healthCheck.timeoutMs);
    try {
      const res = await this.fetchFn(url, {
        method: 'GET',
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
      log.debug('Health probe answered', { targetId: target.id, url, status: res.status });
      // Only the status matters; free the connection between probes.
      await res.body?.cancel();
      return res.status >= 200 && res.status < 300;
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      log.debug('Health probe failed', { targetId: target.id, url, ...errorContext(err) });
      return false;
    }
  }
}

export function healthCheckUrl(target: DeploymentTarget, instance: ContainerInstance): string {
  const path = target.healthCheck.path.startsWith('/') ? target.healthCheck.path : `/${target.healthCheck.path}`;
  return `http://${target.host}:${instance.hostPort}${path}`;
}
