import { createHash } from 'node:crypto';
import { EmptyInputError, PolicyError } from './errors.js';

/**
 * Versioned digest algorithms.
 *
 * A version names both the hash function and the canonical encoding it is
 * applied to, so identifiers stay comparable across releases. A version is
 * never changed in place; a new encoding or hash gets a new version.
 */
export const DIGEST_VERSIONS = ['sha256-v1', 'sha512-v1', 'sha3-256-v1'] as const;

export type DigestVersion = (typeof DIGEST_VERSIONS)[number];

export const DEFAULT_DIGEST_VERSION: DigestVersion = 'sha256-v1';

interface DigestAlgorithm {
  hash: string;
  hexLength: number;
}

const ALGORITHMS: Record<DigestVersion, DigestAlgorithm> = {
  'sha256-v1': { hash: 'sha256', hexLength: 64 },
  'sha512-v1': { hash: 'sha512', hexLength: 128 },
  'sha3-256-v1': { hash: 'sha3-256', hexLength: 64 },
};

export interface Digest {
  id: string;
  algorithm: DigestVersion;
}

export function isDigestVersion(value: string): value is DigestVersion {
  return DIGEST_VERSIONS.some(v => v === value);
}

function resolveVersion(version: string): DigestVersion {
  if (!isDigestVersion(version)) {
    throw new PolicyError([`hashAlgorithmVersion: unknown version '${version}'`]);
  }
  return version;
}

/**
 * Hash canonical bytes into a lowercase hex identifier
 *
 * Same bytes and version always produce the same identifier.
 */
export function digest(bytes: Uint8Array, version: string = DEFAULT_DIGEST_VERSION): Digest {
  const resolved = resolveVersion(version);
  if (bytes.length === 0) {
    throw new EmptyInputError({ algorithm: resolved });
  }

  const hash = createHash(ALGORITHMS[resolved].hash);
  hash.update(bytes);
  return { id: hash.digest('hex'), algorithm: resolved };
}

/**
 * Check that a string has the shape of an identifier from the given version
 */
export function isValidIdentifier(id: string, version: string = DEFAULT_DIGEST_VERSION): boolean {
  const { hexLength } = ALGORITHMS[resolveVersion(version)];
  return id.length === hexLength && /^[a-f0-9]+$/.test(id);
}

/**
 * Leading characters of an identifier, for human-readable display
 */
export function abbreviateIdentifier(id: string, length: number = 8): string {
  return id.slice(0, length);
}

export function listDigestAlgorithms(): Array<{ version: DigestVersion; hash: string; hexLength: number }> {
  return DIGEST_VERSIONS.map(version => ({ version, ...ALGORITHMS[version] }));
}
