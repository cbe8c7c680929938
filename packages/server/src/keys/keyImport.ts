import * as jose from 'jose';

import { ALGORITHMS } from '@credcheck/shared';

import { KeyFetchError } from '../tokenVerifier/errors.js';
import { toError } from '../utils/guards.js';
import type { KeyMaterial } from './keySource.js';

const CERTIFICATE_LABEL = '-----BEGIN CERTIFICATE-----';
const PUBLIC_KEY_LABEL = '-----BEGIN PUBLIC KEY-----';

/**
 * Turn published key material into verification keys, indexed by key id
 * Certificates have their embedded public key extracted. One undecodable entry
 * fails the whole set.
 */
export async function importKeyMaterial(material: KeyMaterial): Promise<Map<string, jose.KeyLike>> {
  const keys = new Map<string, jose.KeyLike>();

  if (material.format === 'jwks') {
    for (const jwk of material.entries) {
      keys.set(jwk.kid, await importOne(jwk.kid, () => importRsaJwk(jwk.kid, jwk)));
    }
    return keys;
  }

  for (const [keyId, pem] of Object.entries(material.entries)) {
    keys.set(keyId, await importOne(keyId, () => importPem(keyId, pem)));
  }
  return keys;
}

async function importOne(
  keyId: string,
  load: () => Promise<jose.KeyLike>,
): Promise<jose.KeyLike> {
  try {
    return await load();
  } catch (error) {
    if (error instanceof KeyFetchError) {
      throw error;
    }
    throw new KeyFetchError(
      `Failed to decode public key "${keyId}": ${error instanceof Error ? error.message : 'Unknown error'}`,
      toError(error),
    );
  }
}

function importPem(keyId: string, pem: string): Promise<jose.KeyLike> {
  const trimmed = pem.trim();
  if (trimmed.startsWith(CERTIFICATE_LABEL)) {
    return jose.importX509(trimmed, ALGORITHMS.RS256);
  }
  if (trimmed.startsWith(PUBLIC_KEY_LABEL)) {
    return jose.importSPKI(trimmed, ALGORITHMS.RS256);
  }
  throw new KeyFetchError(
    `Public key "${keyId}" is neither an X.509 certificate nor a PEM public key`,
  );
}

async function importRsaJwk(
  keyId: string,
  jwk: { kty: string; n: string; e: string },
): Promise<jose.KeyLike> {
  if (jwk.kty !== 'RSA') {
    throw new KeyFetchError(`Public key "${keyId}" has key type "${jwk.kty}", expected "RSA"`);
  }
  const key = await jose.importJWK({ kty: jwk.kty, n: jwk.n, e: jwk.e }, ALGORITHMS.RS256);
  if (key instanceof Uint8Array) {
    throw new KeyFetchError(`Public key "${keyId}" is a symmetric key`);
  }
  return key;
}
