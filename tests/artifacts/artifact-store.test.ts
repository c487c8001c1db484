import { ArtifactStoreClient, sha256Hex } from '../../src/artifacts/artifact-store';
import { MemoryArtifactBackend } from '../../src/artifacts/memory-backend';
import { ArtifactConflictError } from '../../src/domain/errors';

const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

/** Serves different bytes than it stored. */
class TamperingBackend extends MemoryArtifactBackend {
  async read(): Promise<Buffer | null> {
    return Buffer.from('tampered');
  }
}

describe('ArtifactStoreClient', () => {
  let backend: MemoryArtifactBackend;
  let client: ArtifactStoreClient;

  beforeEach(() => {
    backend = new MemoryArtifactBackend();
    client = new ArtifactStoreClient(backend, () => new Date('2026-01-01T00:00:00.000Z'));
  });

  test('stores content under name and version key', async () => {
    const ref = await client.put('shop.tar.gz', 'abc1234', 'hello', 'run_1/package');

    expect(ref).toEqual({ name: 'shop.tar.gz', versionKey: 'abc1234', contentHash: HELLO_SHA256 });
    expect(await client.stat('shop.tar.gz', 'abc1234')).toEqual({
      name: 'shop.tar.gz',
      versionKey: 'abc1234',
      contentHash: HELLO_SHA256,
      sizeBytes: 5,
      uploadedAt: '2026-01-01T00:00:00.000Z',
      producedBy: 'run_1/package',
    });
  });

  test('returns the stored bytes', async () => {
    const ref = await client.put('shop.tar.gz', 'abc1234', Buffer.from('hello'));

    expect((await client.get(ref)).toString('utf8')).toBe('hello');
  });

  test('putting identical content again is a no-op', async () => {
    const first = await client.put('shop.tar.gz', 'abc1234', 'hello');
    const second = await client.put('shop.tar.gz', 'abc1234', 'hello');

    expect(second).toEqual(first);
    expect(backend.size).toBe(1);
  });

  test('rejects different content under an existing key', async () => {
    await client.put('shop.tar.gz', 'abc1234', 'hello');

    await expect(client.put('shop.tar.gz', 'abc1234', 'goodbye')).rejects.toBeInstanceOf(ArtifactConflictError);
    expect((await client.get({ name: 'shop.tar.gz', versionKey: 'abc1234', contentHash: HELLO_SHA256 })).toString()).toBe(
      'hello',
    );
  });

  test('concurrent identical puts store one artifact', async () => {
    const refs = await Promise.all([
      client.put('shop.tar.gz', 'abc1234', 'hello'),
      client.put('shop.tar.gz', 'abc1234', 'hello'),
      client.put('shop.tar.gz', 'abc1234', 'hello'),
    ]);

    expect(new Set(refs.map((r) => r.contentHash)).size).toBe(1);
    expect(backend.size).toBe(1);
  });

  test('keeps versions of the same name apart', async () => {
    await client.put('shop.tar.gz', 'abc1234', 'hello');
    const v2 = await client.put('shop.tar.gz', 'def5678', 'v2');

    expect(v2.contentHash).toBe(sha256Hex(Buffer.from('v2')));
    expect(backend.size).toBe(2);
  });

  test('reports a missing artifact', async () => {
    await expect(
      client.get({ name: 'shop.tar.gz', versionKey: 'abc1234', contentHash: HELLO_SHA256 }),
    ).rejects.toMatchObject({ code: 'ARTIFACT.NOT_FOUND' });
  });

  test('verifies content against the reference hash', async () => {
    const tampering = new ArtifactStoreClient(new TamperingBackend());
    const ref = await tampering.put('shop.tar.gz', 'abc1234', 'hello');

    await expect(tampering.get(ref)).rejects.toMatchObject({ code: 'ARTIFACT.INTEGRITY', retryable: true });
  });

  test('rejects names that are not a single path segment', async () => {
    await expect(client.put('../shop', 'abc1234', 'hello')).rejects.toMatchObject({ code: 'ARTIFACT.INVALID_KEY' });
    await expect(client.put('shop', 'a..b', 'hello')).rejects.toMatchObject({ code: 'ARTIFACT.INVALID_KEY' });
  });
});
