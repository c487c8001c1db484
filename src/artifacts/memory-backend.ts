/**
 * In-memory artifact backend. put-if-absent is atomic within the process.
 */

import { Artifact, artifactKey } from '../domain/artifact';
import { ArtifactBackend } from './artifact-store';

export class MemoryArtifactBackend implements ArtifactBackend {
  readonly kind = 'memory';
  private entries = new Map<string, { artifact: Artifact; content: Buffer }>();

  async stat(name: string, versionKey: string): Promise<Artifact | null> {
    const entry = this.entries.get(artifactKey(name, versionKey));
    return entry ? { ...entry.artifact } : null;
  }

  async putIfAbsent(artifact: Artifact, bytes: Buffer): Promise<{ created: boolean; artifact: Artifact }> {
    const key = artifactKey(artifact.name, artifact.versionKey);
    const existing = this.entries.get(key);
    if (existing) {
      return { created: false, artifact: { ...existing.artifact } };
    }
    this.entries.set(key, { artifact: { ...artifact }, content: Buffer.from(bytes) });
    return { created: true, artifact: { ...artifact } };
  }

  async read(name: string, versionKey: string): Promise<Buffer | null> {
    const entry = this.entries.get(artifactKey(name, versionKey));
    return entry ? Buffer.from(entry.content) : null;
  }

  /** Number of stored artifacts. */
  get size(): number {
    return this.entries.size;
  }
}
