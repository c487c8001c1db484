import { basicAuthHeader, isCredentialRef, parseCredentialRef, resolveCredential } from '../../src/domain/credentials';
import { ConfigError } from '../../src/domain/errors';

describe('credential references', () => {
  test('parses the source and key', () => {
    expect(parseCredentialRef('env:DEPLOY_KEY')).toEqual({ source: 'env', key: 'DEPLOY_KEY' });
    expect(parseCredentialRef('literal:ci:test-secret')).toEqual({ source: 'literal', key: 'ci:test-secret' });
  });

  test('rejects unknown sources and empty keys', () => {
    expect(() => parseCredentialRef('vault:deploy')).toThrow(ConfigError);
    expect(() => parseCredentialRef('env:')).toThrow(ConfigError);
    expect(() => parseCredentialRef('DEPLOY_KEY')).toThrow(ConfigError);
    expect(isCredentialRef('env:DEPLOY_KEY')).toBe(true);
    expect(isCredentialRef('vault:deploy')).toBe(false);
  });

  test('resolves env references only when invoked', () => {
    expect(resolveCredential('env:DEPLOY_KEY', { DEPLOY_KEY: 'test-secret' })).toBe('test-secret');
    expect(() => resolveCredential('env:DEPLOY_KEY', {})).toThrow('Credential environment variable DEPLOY_KEY is not set');
    expect(resolveCredential('literal:test-secret')).toBe('test-secret');
  });

  test('builds a basic authorization header', () => {
    expect(basicAuthHeader('ci:test-secret')).toBe('Basic Y2k6dGVzdC1zZWNyZXQ=');
  });
});
