/**
 * HTTP artifact backend for raw-format artifact repositories.
 *
 * Layout: <baseUrl>/<name>/<versionKey>/<name> holds the content and
 * <name>.meta.json beside it holds the Artifact record. Requests use HTTP
 * PUT/GET with basic auth resolved from a credential reference; responses are
 * mapped by status code only.
 *
 * Raw repositories have no conditional PUT, so putIfAbsent is stat-then-write.
 * Puts of one key are serialized inside a process by ArtifactStoreClient.
 */

import { Artifact, isArtifactRef } from '../domain/artifact';
import { basicAuthHeader, resolveCredential } from '../domain/credentials';
import { ArtifactRepositoryError } from '../domain/errors';
import { ArtifactBackend } from './artifact-store';

export type FetchFn = typeof fetch;

export interface HttpArtifactBackendOptions {
  baseUrl: string;
  /** Reference to a "user:password" credential. */
  credentialsRef?: string;
  /** Bound on each request. */
  timeoutMs?: number;
  fetch?: FetchFn;
  env?: NodeJS.ProcessEnv;
}

const META_SUFFIX = '.meta.json';

export class HttpArtifactBackend implements ArtifactBackend {
  readonly kind = 'http';
  private baseUrl: string;
  private fetchFn: FetchFn;
  private timeoutMs: number;

  constructor(private options: HttpArtifactBackendOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async stat(name: string, versionKey: string): Promise<Artifact | null> {
    const res = await this.request('GET', this.url(name, versionKey, META_SUFFIX));
    if (res.status === 404) return null;
    this.assertOk(res, 'GET', name, versionKey);
    return parseArtifactRecord(await res.json(), name, versionKey);
  }

  async putIfAbsent(artifact: Artifact, bytes: Buffer): Promise<{ created: boolean; artifact: Artifact }> {
    const existing = await this.stat(artifact.name, artifact.versionKey);
    if (existing) return { created: false, artifact: existing };

    const content = await this.request('PUT', this.url(artifact.name, artifact.versionKey), bytes, 'application/octet-stream');
    this.assertOk(content, 'PUT', artifact.name, artifact.versionKey);

    const meta = await this.request(
      'PUT',
      this.url(artifact.name, artifact.versionKey, META_SUFFIX),
      Buffer.from(JSON.stringify(artifact), 'utf8'),
      'application/json',
    );
    this.assertOk(meta, 'PUT', artifact.name, artifact.versionKey);
    return { created: true, artifact };
  }

  async read(name: string, versionKey: string): Promise<Buffer | null> {
    const res = await this.request('GET', this.url(name, versionKey));
    if (res.status === 404) return null;
    this.assertOk(res, 'GET', name, versionKey);
    return Buffer.from(await res.arrayBuffer());
  }

  private url(name: string, versionKey: string, suffix = ''): string {
    const n = encodeURIComponent(name);
    return `${this.baseUrl}/${n}/${encodeURIComponent(versionKey)}/${n}${suffix}`;
  }

  private async request(method: 'GET' | 'PUT', url: string, body?: Buffer, contentType?: string): Promise<Response> {
    const headers: Record<string, string> = {};
    if (this.options.credentialsRef) {
      headers.Authorization = basicAuthHeader(resolveCredential(this.options.credentialsRef, this.options.env));
    }
    if (contentType) headers['Content-Type'] = contentType;
    return this.fetchFn(url, {
      method,
      headers,
      ...(body ? { body: new Uint8Array(body) } : {}),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  private assertOk(res: Response, method: string, name: string, versionKey: string): void {
    if (res.ok) return;
    throw new ArtifactRepositoryError(
      `${method} ${name}@${versionKey} failed: repository answered ${res.status}`,
      res.status,
    );
  }
}

function parseArtifactRecord(value: unknown, name: string, versionKey: string): Artifact {
  if (
    !isArtifactRef(value) ||
    !('sizeBytes' in value) ||
    typeof value.sizeBytes !== 'number' ||
    !('uploadedAt' in value) ||
    typeof value.uploadedAt !== 'string'
  ) {
    throw new ArtifactRepositoryError(`Metadata for ${name}@${versionKey} is malformed`, 502);
  }
  return {
    name: value.name,
    versionKey: value.versionKey,
    contentHash: value.contentHash,
    sizeBytes: value.sizeBytes,
    uploadedAt: value.uploadedAt,
    ...('producedBy' in value && typeof value.producedBy === 'string' ? { producedBy: value.producedBy } : {}),
  };
}
