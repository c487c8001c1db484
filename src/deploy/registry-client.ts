/**
 * Container registry client (Docker Registry HTTP API v2).
 *
 * Resolves an image reference to its manifest digest with a HEAD request and
 * the Docker-Content-Digest header. Registries that answer 401 with a Bearer
 * challenge get one token request, authenticated with the configured
 * credential when there is one.
 */

import { basicAuthHeader, resolveCredential } from '../domain/credentials';
import { createTypedError, PipelineError } from '../domain/errors';
import { FetchFn } from '../artifacts/http-backend';
import { ImageRegistry } from './runtime';

export const DOCKER_HUB_HOST = 'docker.io';

const MANIFEST_ACCEPT = [
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.docker.distribution.manifest.v2+json',
  'application/vnd.oci.image.manifest.v1+json',
].join(', ');

export interface ImageReference {
  /** Registry host, or docker.io for the default registry. */
  registry: string;
  repository: string;
  /** Tag or digest. */
  reference: string;
}

/** Split `[host[:port]/]repo[:tag][@digest]`. */
export function parseImageReference(imageRef: string): ImageReference {
  let rest = imageRef.trim();
  let reference: string | undefined;

  const at = rest.indexOf('@');
  if (at >= 0) {
    reference = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  const slash = rest.indexOf('/');
  const first = slash >= 0 ? rest.slice(0, slash) : '';
  const hasHost = slash >= 0 && (first.includes('.') || first.includes(':') || first === 'localhost');
  const registry = hasHost ? first : DOCKER_HUB_HOST;
  let repository = hasHost ? rest.slice(slash + 1) : rest;

  const colon = repository.lastIndexOf(':');
  if (colon >= 0) {
    const tag = repository.slice(colon + 1);
    repository = repository.slice(0, colon);
    reference = reference ?? tag;
  }

  if (registry === DOCKER_HUB_HOST && !repository.includes('/')) {
    repository = `library/${repository}`;
  }
  if (!repository) {
    throw new RegistryError(`Invalid image reference "${imageRef}"`, 0);
  }
  return { registry, repository, reference: reference ?? 'latest' };
}

/** Registry answered with something other than found / not found. */
export class RegistryError extends PipelineError {
  constructor(message: string, public readonly statusCode: number) {
    const retryable = statusCode === 429 || statusCode >= 500;
    super(
      createTypedError({
        code: retryable ? 'REGISTRY.UNAVAILABLE' : 'REGISTRY.REQUEST_FAILED',
        message,
        retryable,
        details: { statusCode },
      }),
    );
    this.name = 'RegistryError';
  }
}

export interface RegistryHttpClientOptions {
  /** Base URL used for Docker Hub references. */
  defaultRegistryUrl: string;
  /** Reference to a "user:password" credential. */
  credentialsRef?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
  env?: NodeJS.ProcessEnv;
}

export class RegistryHttpClient implements ImageRegistry {
  private fetchFn: FetchFn;
  private timeoutMs: number;

  constructor(private options: RegistryHttpClientOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async resolve(imageRef: string, signal?: AbortSignal): Promise<string | null> {
    const ref = parseImageReference(imageRef);
    const url = `${this.baseUrl(ref)}/v2/${ref.repository}/manifests/${ref.reference}`;

    let res = await this.head(url, undefined, signal);
    if (res.status === 401) {
      const token = await this.fetchToken(res.headers.get('www-authenticate'), signal);
      if (token) res = await this.head(url, `Bearer ${token}`, signal);
    }

    if (res.status === 404) return null;
    if (!res.ok) {
      throw new RegistryError(`Manifest lookup for ${imageRef} failed: registry answered ${res.status}`, res.status);
    }
    const digest = res.headers.get('docker-content-digest');
    if (digest) return digest;
    // Digest references are their own digest.
    return ref.reference.startsWith('sha256:') ? ref.reference : null;
  }

  private baseUrl(ref: ImageReference): string {
    if (ref.registry === DOCKER_HUB_HOST) return this.options.defaultRegistryUrl.replace(/\/+$/, '');
    const scheme = ref.registry.startsWith('localhost') || ref.registry.startsWith('127.0.0.1') ? 'http' : 'https';
    return `${scheme}://${ref.registry}`;
  }

  private head(url: string, authorization: string | undefined, signal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = { Accept: MANIFEST_ACCEPT };
    if (authorization) headers.Authorization = authorization;
    return this.fetchFn(url, { method: 'HEAD', headers, signal: this.requestSignal(signal) });
  }

  private async fetchToken(challenge: string | null, signal?: AbortSignal): Promise<string | null> {
    const params = parseBearerChallenge(challenge);
    if (!params?.realm) return null;

    const url = new URL(params.realm);
    if (params.service) url.searchParams.set('service', params.service);
    if (params.scope) url.searchParams.set('scope', params.scope);

    const headers: Record<string, string> = {};
    if (this.options.credentialsRef) {
      headers.Authorization = basicAuthHeader(resolveCredential(this.options.credentialsRef, this.options.env));
    }
    const res = await this.fetchFn(url.toString(), { headers, signal: this.requestSignal(signal) });
    if (!res.ok) {
      throw new RegistryError(`Registry token request failed: ${res.status}`, res.status);
    }
    const body: unknown = await res.json();
    if (typeof body !== 'object' || body === null) return null;
    if ('token' in body && typeof body.token === 'string') return body.token;
    if ('access_token' in body && typeof body.access_token === 'string') return body.access_token;
    return null;
  }

  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}

/** Parse `Bearer realm="...",service="...",scope="..."`. */
export function parseBearerChallenge(header: string | null): Record<string, string> | null {
  if (!header || !/^bearer\s/i.test(header)) return null;
  const params: Record<string, string> = {};
  for (const match of header.slice(7).matchAll(/(\w+)="([^"]*)"/g)) {
    params[match[1]] = match[2];
  }
  return params;
}
