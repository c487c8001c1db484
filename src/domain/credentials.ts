/**
 * Credential references.
 *
 * The engine never stores secrets. Specs and configuration carry opaque
 * references that are resolved only when a collaborator is invoked:
 *   env:<VAR>        value of an environment variable
 *   literal:<value>  inline value (tests and local runs)
 */

import { ConfigError } from './errors';

const CREDENTIAL_SOURCES = ['env', 'literal'] as const;

export type CredentialSource = (typeof CREDENTIAL_SOURCES)[number];

export interface ParsedCredentialRef {
  source: CredentialSource;
  key: string;
}

export function parseCredentialRef(ref: string): ParsedCredentialRef {
  const colon = ref.indexOf(':');
  const prefix = colon === -1 ? '' : ref.slice(0, colon);
  const key = ref.slice(colon + 1);
  const source = CREDENTIAL_SOURCES.find((s) => s === prefix);
  if (!source || key.length === 0) {
    throw new ConfigError(`Invalid credential reference "${ref}": expected env:<VAR> or literal:<value>`);
  }
  return { source, key };
}

export function isCredentialRef(ref: string): boolean {
  return /^(env|literal):.+/.test(ref);
}

/** Resolve a reference to its secret value. */
export function resolveCredential(ref: string, env: NodeJS.ProcessEnv = process.env): string {
  const parsed = parseCredentialRef(ref);
  if (parsed.source === 'literal') return parsed.key;
  const value = env[parsed.key];
  if (value === undefined || value === '') {
    throw new ConfigError(`Credential environment variable ${parsed.key} is not set`, { ref });
  }
  return value;
}

/** "user:password" credential to a Basic authorization header value. */
export function basicAuthHeader(credential: string): string {
  return `Basic ${Buffer.from(credential, 'utf8').toString('base64')}`;
}
