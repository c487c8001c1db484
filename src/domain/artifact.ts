/**
 * Artifact domain model.
 *
 * An artifact is an immutable blob keyed by name + version key (the commit
 * SHA of the run that produced it). Stages pass ArtifactRefs, never bytes.
 */

/** Reference to one immutable artifact. */
export interface ArtifactRef {
  name: string;
  versionKey: string;
  /** sha256 hex digest of the content. */
  contentHash: string;
}

/** Stored artifact metadata. */
export interface Artifact extends ArtifactRef {
  sizeBytes: number;
  uploadedAt: string;
  /** Stage that produced the artifact ("<runId>/<stageId>"). */
  producedBy?: string;
}

/** Storage key for an artifact. */
export function artifactKey(name: string, versionKey: string): string {
  return `${name}@${versionKey}`;
}

export function toArtifactRef(artifact: Artifact): ArtifactRef {
  return { name: artifact.name, versionKey: artifact.versionKey, contentHash: artifact.contentHash };
}

/** Narrow an unknown stage output to an ArtifactRef. */
export function isArtifactRef(value: unknown): value is ArtifactRef {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'name' in value && typeof value.name === 'string' &&
    'versionKey' in value && typeof value.versionKey === 'string' &&
    'contentHash' in value && typeof value.contentHash === 'string'
  );
}
