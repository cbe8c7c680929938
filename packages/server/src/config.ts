import type { AxiosInstance } from 'axios';

import { AUTH_ERROR_CODES, DEFAULTS, ENDPOINTS } from '@credcheck/shared';

import { HttpKeySource, type KeySource } from './keys/keySource.js';
import { PublicKeyCache, type PublicKeyCacheOptions } from './keys/publicKeyCache.js';
import { TokenVerifierConfigurationError } from './tokenVerifier/errors.js';
import { FirebaseTokenVerifier } from './tokenVerifier/firebaseTokenVerifier.js';
import { RevocationCheckingVerifier, type UserLookup } from './tokenVerifier/revocationCheck.js';
import type { TokenVerifierOptions } from './tokenVerifier/types.js';
import { createVerifierConfig } from './tokenVerifier/verifierConfig.js';

const ID_TOKEN_METHOD = 'verifyIdToken()';
const SESSION_COOKIE_METHOD = 'verifySessionCookie()';

export interface VerifierFactoryOptions extends TokenVerifierOptions {
  /**
   * Firebase project the tokens must be issued for
   */
  projectId?: string;

  /**
   * Only accept tokens of this tenant
   */
  tenantId?: string;

  /**
   * Where to get signing keys; defaults to the flavor's public endpoint
   */
  keySource?: KeySource;

  keyCacheOptions?: Pick<PublicKeyCacheOptions, 'fallbackLifetimeMs' | 'refreshSkewMs'>;

  keyFetchTimeoutMs?: number;

  /**
   * axios instance used by the default key source
   */
  httpClient?: AxiosInstance;
}

export interface TokenVerifiersOptions extends Omit<VerifierFactoryOptions, 'keySource'> {
  idTokenKeySource?: KeySource;
  sessionCookieKeySource?: KeySource;

  /**
   * Also reject tokens of disabled users and revoked tokens
   * Requires userLookup (e.g. firebase-admin's getAuth())
   */
  checkRevoked?: boolean;

  userLookup?: UserLookup;
}

export interface TokenVerifiers {
  idTokenVerifier: FirebaseTokenVerifier | RevocationCheckingVerifier;
  sessionCookieVerifier: FirebaseTokenVerifier | RevocationCheckingVerifier;
}

/**
 * Create a verifier for Firebase ID tokens
 *
 * @example
 * const verifier = createIdTokenVerifier({ projectId: 'my-project', logger });
 * const token = await verifier.verify(idToken);
 */
export function createIdTokenVerifier(options: VerifierFactoryOptions = {}): FirebaseTokenVerifier {
  const projectId = requireProjectId(options.projectId, ID_TOKEN_METHOD);

  const config = createVerifierConfig({
    shortName: 'ID token',
    method: ID_TOKEN_METHOD,
    docUrl: ENDPOINTS.ID_TOKEN_DOC_URL,
    projectId,
    expectedAudience: projectId,
    issuerTemplate: (id) => `${ENDPOINTS.ID_TOKEN_ISSUER_PREFIX}${id}`,
    keyCache: createKeyCache(options, ENDPOINTS.ID_TOKEN_CERT_URL),
    invalidTokenErrorCode: AUTH_ERROR_CODES.INVALID_ID_TOKEN,
    expiredTokenErrorCode: AUTH_ERROR_CODES.EXPIRED_ID_TOKEN,
    tenantId: options.tenantId,
  });

  return new FirebaseTokenVerifier(config, options);
}

/**
 * Create a verifier for Firebase session cookies
 *
 * @example
 * const verifier = createSessionCookieVerifier({ projectId: 'my-project' });
 * const token = await verifier.verify(req.cookies.session);
 */
export function createSessionCookieVerifier(
  options: VerifierFactoryOptions = {},
): FirebaseTokenVerifier {
  const projectId = requireProjectId(options.projectId, SESSION_COOKIE_METHOD);

  const config = createVerifierConfig({
    shortName: 'session cookie',
    method: SESSION_COOKIE_METHOD,
    docUrl: ENDPOINTS.SESSION_COOKIE_DOC_URL,
    projectId,
    expectedAudience: projectId,
    issuerTemplate: (id) => `${ENDPOINTS.SESSION_COOKIE_ISSUER_PREFIX}${id}`,
    keyCache: createKeyCache(options, ENDPOINTS.SESSION_COOKIE_CERT_URL),
    invalidTokenErrorCode: AUTH_ERROR_CODES.INVALID_SESSION_COOKIE,
    expiredTokenErrorCode: AUTH_ERROR_CODES.EXPIRED_SESSION_COOKIE,
    tenantId: options.tenantId,
  });

  return new FirebaseTokenVerifier(config, options);
}

/**
 * Create both verifiers, optionally wrapped with the revocation check
 *
 * @example
 * // Production, with revocation checking through firebase-admin
 * await initializeFirebaseAdmin(logger);
 * const { projectId, emulatorMode, auth } = getAuthContext();
 * const { idTokenVerifier } = createTokenVerifiers({
 *   projectId,
 *   emulatorMode,
 *   checkRevoked: true,
 *   userLookup: auth,
 *   logger,
 * });
 */
export function createTokenVerifiers(options: TokenVerifiersOptions = {}): TokenVerifiers {
  const { idTokenKeySource, sessionCookieKeySource, checkRevoked, userLookup, ...shared } = options;

  const idTokenVerifier = createIdTokenVerifier({ ...shared, keySource: idTokenKeySource });
  const sessionCookieVerifier = createSessionCookieVerifier({
    ...shared,
    keySource: sessionCookieKeySource,
  });

  if (!checkRevoked) {
    return { idTokenVerifier, sessionCookieVerifier };
  }

  if (!userLookup) {
    throw new TokenVerifierConfigurationError('userLookup is required when checkRevoked is enabled');
  }

  return {
    idTokenVerifier: RevocationCheckingVerifier.forIdTokens(idTokenVerifier, userLookup, options.logger),
    sessionCookieVerifier: RevocationCheckingVerifier.forSessionCookies(
      sessionCookieVerifier,
      userLookup,
      options.logger,
    ),
  };
}

function requireProjectId(projectId: string | undefined, method: string): string {
  if (!projectId) {
    throw new TokenVerifierConfigurationError(`Must provide a project ID to call ${method}`);
  }
  return projectId;
}

function createKeyCache(options: VerifierFactoryOptions, defaultUrl: string): PublicKeyCache {
  const source =
    options.keySource ??
    new HttpKeySource(defaultUrl, {
      timeoutMs: options.keyFetchTimeoutMs ?? DEFAULTS.KEY_FETCH_TIMEOUT_MS,
      httpClient: options.httpClient,
    });

  return new PublicKeyCache(source, {
    clock: options.clock,
    logger: options.logger,
    fallbackLifetimeMs: options.keyCacheOptions?.fallbackLifetimeMs,
    refreshSkewMs: options.keyCacheOptions?.refreshSkewMs,
  });
}
