/**
 * Artifact store client.
 *
 * put(name, versionKey, bytes) stores an immutable, commit-versioned blob and
 * returns its ArtifactRef; get(ref) returns the bytes. A key is written once:
 * putting identical content again is a no-op returning the same ref, putting
 * different content under an existing key fails with ArtifactConflictError so
 * a published build is never silently overwritten.
 */

import { createHash } from 'crypto';
import { Artifact, ArtifactRef, artifactKey, toArtifactRef } from '../domain/artifact';
import {
  ArtifactConflictError,
  ArtifactIntegrityError,
  ArtifactNotFoundError,
  PipelineError,
  createTypedError,
} from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'artifact-store' });

/** Names and version keys become path segments in repository URLs. */
const KEY_SEGMENT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._+-]{0,199}$/;

/** Storage behind the client. */
export interface ArtifactBackend {
  readonly kind: string;
  stat(name: string, versionKey: string): Promise<Artifact | null>;
  /**
   * Store the artifact unless the key already exists. Returns the record now
   * stored under the key: the new one when created, the existing one otherwise.
   */
  putIfAbsent(artifact: Artifact, bytes: Buffer): Promise<{ created: boolean; artifact: Artifact }>;
  /** Content, or null when the key does not exist. */
  read(name: string, versionKey: string): Promise<Buffer | null>;
}

export function sha256Hex(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export class ArtifactStoreClient {
  /** Per-key tail of in-flight puts; puts of one key run one at a time. */
  private inFlight = new Map<string, Promise<void>>();

  constructor(
    private backend: ArtifactBackend,
    private clock: () => Date = () => new Date(),
  ) {}

  get backendKind(): string {
    return this.backend.kind;
  }

  /** Store `bytes` as name@versionKey. Idempotent for identical content. */
  async put(
    name: string,
    versionKey: string,
    bytes: Buffer | Uint8Array | string,
    producedBy?: string,
  ): Promise<ArtifactRef> {
    assertKeySegment('name', name);
    assertKeySegment('versionKey', versionKey);

    const content = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : Buffer.from(bytes);
    const contentHash = sha256Hex(content);

    return this.withKeyLock(artifactKey(name, versionKey), async () => {
      const existing = await this.backend.stat(name, versionKey);
      if (existing) {
        return this.resolveExisting(existing, contentHash);
      }

      const artifact: Artifact = {
        name,
        versionKey,
        contentHash,
        sizeBytes: content.length,
        uploadedAt: this.clock().toISOString(),
        ...(producedBy ? { producedBy } : {}),
      };
      const result = await this.backend.putIfAbsent(artifact, content);
      if (!result.created) {
        return this.resolveExisting(result.artifact, contentHash);
      }

      log.info('Artifact stored', {
        name,
        versionKey,
        contentHash,
        sizeBytes: content.length,
        backend: this.backend.kind,
      });
      return toArtifactRef(result.artifact);
    });
  }

  /** Fetch the bytes of an artifact, verifying them against the ref's hash. */
  async get(ref: ArtifactRef): Promise<Buffer> {
    const content = await this.backend.read(ref.name, ref.versionKey);
    if (!content) {
      throw new ArtifactNotFoundError(ref.name, ref.versionKey);
    }
    const actualHash = sha256Hex(content);
    if (actualHash !== ref.contentHash) {
      throw new ArtifactIntegrityError(ref.name, ref.versionKey, ref.contentHash, actualHash);
    }
    return content;
  }

  /** Metadata of an artifact, or null. */
  async stat(name: string, versionKey: string): Promise<Artifact | null> {
    return this.backend.stat(name, versionKey);
  }

  private resolveExisting(existing: Artifact, contentHash: string): ArtifactRef {
    if (existing.contentHash !== contentHash) {
      throw new ArtifactConflictError(existing.name, existing.versionKey, existing.contentHash, contentHash);
    }
    log.debug('Artifact already stored with identical content', {
      name: existing.name,
      versionKey: existing.versionKey,
    });
    return toArtifactRef(existing);
  }

  private async withKeyLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.inFlight.get(key) ?? Promise.resolve();
    const run = previous.then(() => fn());
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.inFlight.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.inFlight.get(key) === tail) this.inFlight.delete(key);
    }
  }
}

function assertKeySegment(field: string, value: string): void {
  if (!KEY_SEGMENT_PATTERN.test(value) || value.includes('..')) {
    throw new PipelineError(
      createTypedError({
        code: 'ARTIFACT.INVALID_KEY',
        message: `Artifact ${field} "${value}" must be 1-200 characters of letters, digits, ".", "_", "+" or "-"`,
        retryable: false,
        details: { field, value },
      }),
    );
  }
}
