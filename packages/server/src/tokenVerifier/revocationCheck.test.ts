import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { AUTH_ERROR_CODES, ENDPOINTS, VERIFICATION_ERROR_KINDS } from '@credcheck/shared';
import { RevocationCheckingVerifier, type UserLookup, type UserRecordLike } from './revocationCheck.js';
import { FirebaseTokenVerifier } from './firebaseTokenVerifier.js';
import { TokenVerificationError } from './errors.js';
import { createVerifierConfig } from './verifierConfig.js';
import { PublicKeyCache } from '../keys/publicKeyCache.js';
import { StaticKeySource } from '../keys/keySource.js';
import {
  ISSUED_AT,
  PROJECT_ID,
  SESSION_COOKIE_ISSUER,
  fakeClock,
  idTokenClaims,
  unsignedToken,
} from '../test-utils/tokenFactory.js';

const clock = fakeClock((ISSUED_AT + 10) * 1000);

// Emulator-mode verifiers keep these tests free of key handling
function createIdTokenVerifier(): FirebaseTokenVerifier {
  return new FirebaseTokenVerifier(
    createVerifierConfig({
      shortName: 'ID token',
      method: 'verifyIdToken()',
      docUrl: ENDPOINTS.ID_TOKEN_DOC_URL,
      projectId: PROJECT_ID,
      expectedAudience: PROJECT_ID,
      issuerTemplate: (projectId) => `${ENDPOINTS.ID_TOKEN_ISSUER_PREFIX}${projectId}`,
      keyCache: new PublicKeyCache(new StaticKeySource({})),
      invalidTokenErrorCode: AUTH_ERROR_CODES.INVALID_ID_TOKEN,
      expiredTokenErrorCode: AUTH_ERROR_CODES.EXPIRED_ID_TOKEN,
    }),
    { emulatorMode: true, clock },
  );
}

function createSessionCookieVerifier(): FirebaseTokenVerifier {
  return new FirebaseTokenVerifier(
    createVerifierConfig({
      shortName: 'session cookie',
      method: 'verifySessionCookie()',
      docUrl: ENDPOINTS.SESSION_COOKIE_DOC_URL,
      projectId: PROJECT_ID,
      expectedAudience: PROJECT_ID,
      issuerTemplate: (projectId) => `${ENDPOINTS.SESSION_COOKIE_ISSUER_PREFIX}${projectId}`,
      keyCache: new PublicKeyCache(new StaticKeySource({})),
      invalidTokenErrorCode: AUTH_ERROR_CODES.INVALID_SESSION_COOKIE,
      expiredTokenErrorCode: AUTH_ERROR_CODES.EXPIRED_SESSION_COOKIE,
    }),
    { emulatorMode: true, clock },
  );
}

async function captureError(promise: Promise<unknown>): Promise<TokenVerificationError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof TokenVerificationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a TokenVerificationError');
}

describe('RevocationCheckingVerifier', () => {
  let getUser: Mock<[string], Promise<UserRecordLike>>;
  let userLookup: UserLookup;

  beforeEach(() => {
    getUser = vi.fn<[string], Promise<UserRecordLike>>();
    userLookup = { getUser };
  });

  it('should return the token of an active user whose tokens are still valid', async () => {
    getUser.mockResolvedValue({ disabled: false, tokensValidAfterTime: new Date((ISSUED_AT - 60) * 1000).toUTCString() });
    const verifier = RevocationCheckingVerifier.forIdTokens(createIdTokenVerifier(), userLookup);

    const verified = await verifier.verify(unsignedToken(idTokenClaims()));

    expect(verified.uid).toBe('u1');
    expect(getUser).toHaveBeenCalledWith('u1');
  });

  it('should accept a user that never had tokens revoked', async () => {
    getUser.mockResolvedValue({ disabled: false });
    const verifier = RevocationCheckingVerifier.forIdTokens(createIdTokenVerifier(), userLookup);

    await expect(verifier.verify(unsignedToken(idTokenClaims()))).resolves.toBeDefined();
  });

  it('should reject an ID token issued before the revocation time', async () => {
    getUser.mockResolvedValue({ disabled: false, tokensValidAfterTime: new Date((ISSUED_AT + 1) * 1000).toUTCString() });
    const verifier = RevocationCheckingVerifier.forIdTokens(createIdTokenVerifier(), userLookup);

    const error = await captureError(verifier.verify(unsignedToken(idTokenClaims())));

    expect(error.kind).toBe(VERIFICATION_ERROR_KINDS.TOKEN_REVOKED);
    expect(error.code).toBe(AUTH_ERROR_CODES.REVOKED_ID_TOKEN);
    expect(error.message).toBe('Firebase ID token is revoked.');
  });

  it('should accept a token issued at the revocation time', async () => {
    getUser.mockResolvedValue({ disabled: false, tokensValidAfterTime: new Date(ISSUED_AT * 1000).toUTCString() });
    const verifier = RevocationCheckingVerifier.forIdTokens(createIdTokenVerifier(), userLookup);

    await expect(verifier.verify(unsignedToken(idTokenClaims()))).resolves.toBeDefined();
  });

  it('should use the session cookie revocation code for session cookies', async () => {
    getUser.mockResolvedValue({ disabled: false, tokensValidAfterTime: new Date((ISSUED_AT + 1) * 1000).toUTCString() });
    const verifier = RevocationCheckingVerifier.forSessionCookies(createSessionCookieVerifier(), userLookup);

    const error = await captureError(
      verifier.verify(unsignedToken(idTokenClaims({ iss: SESSION_COOKIE_ISSUER }))),
    );

    expect(error.code).toBe(AUTH_ERROR_CODES.REVOKED_SESSION_COOKIE);
    expect(error.message).toBe('Firebase session cookie is revoked.');
  });

  it('should reject tokens of a disabled user', async () => {
    getUser.mockResolvedValue({ disabled: true });
    const verifier = RevocationCheckingVerifier.forIdTokens(createIdTokenVerifier(), userLookup);

    const error = await captureError(verifier.verify(unsignedToken(idTokenClaims())));

    expect(error.kind).toBe(VERIFICATION_ERROR_KINDS.USER_DISABLED);
    expect(error.code).toBe(AUTH_ERROR_CODES.USER_DISABLED);
  });

  it('should not look up the user when verification fails', async () => {
    const verifier = RevocationCheckingVerifier.forIdTokens(createIdTokenVerifier(), userLookup);

    const error = await captureError(verifier.verify(unsignedToken(idTokenClaims({ aud: 'proj-2' }))));

    expect(error.kind).toBe(VERIFICATION_ERROR_KINDS.AUDIENCE_MISMATCH);
    expect(getUser).not.toHaveBeenCalled();
  });

  it('should propagate lookup failures', async () => {
    getUser.mockRejectedValue(new Error('There is no user record corresponding to the provided identifier.'));
    const verifier = RevocationCheckingVerifier.forIdTokens(createIdTokenVerifier(), userLookup);

    await expect(verifier.verify(unsignedToken(idTokenClaims()))).rejects.toThrow(
      'There is no user record corresponding to the provided identifier.',
    );
  });

  it('should check tenant tokens against the tenant user store', async () => {
    const tenantGetUser = vi.fn().mockResolvedValue({ disabled: false });
    const verifier = RevocationCheckingVerifier.forIdTokens(createIdTokenVerifier(), userLookup).forTenant(
      'tenant-a',
      { getUser: tenantGetUser },
    );

    const verified = await verifier.verify(
      unsignedToken(idTokenClaims({ firebase: { tenant: 'tenant-a' } })),
    );

    expect(verified.tenantId).toBe('tenant-a');
    expect(tenantGetUser).toHaveBeenCalledWith('u1');
    expect(getUser).not.toHaveBeenCalled();
  });
});
