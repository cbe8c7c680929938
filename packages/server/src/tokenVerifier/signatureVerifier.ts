import * as jose from 'jose';
import { ALGORITHMS } from '@credcheck/shared';
import type { SignedToken } from './types.js';

/**
 * Check the token's RS256 signature against a public key
 * The signing input is rebuilt from the raw header and payload segments.
 * Only RS256 is allowed here; the claim validator has already rejected any
 * other declared algorithm.
 *
 * Resolves false on a signature mismatch. Any other failure (unusable key,
 * broken crypto setup) is thrown.
 */
export async function verifySignature(token: SignedToken, key: jose.KeyLike): Promise<boolean> {
  try {
    await jose.flattenedVerify(
      {
        protected: token.rawHeader,
        payload: token.rawPayload,
        signature: token.rawSignature,
      },
      key,
      { algorithms: [ALGORITHMS.RS256] },
    );
    return true;
  } catch (error) {
    if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
      return false;
    }
    throw error;
  }
}
