// Firebase Admin
export {
  initializeFirebaseAdmin,
  getAuthInstance,
  getAppInstance,
  getAuthContext,
  resolveProjectId,
  isEmulatorMode,
} from './firebase/admin.js';
export type { AuthContext } from './firebase/admin.js';

// Verifier factories
export { createIdTokenVerifier, createSessionCookieVerifier, createTokenVerifiers } from './config.js';
export type { VerifierFactoryOptions, TokenVerifiersOptions, TokenVerifiers } from './config.js';

// Token verification
export { FirebaseTokenVerifier } from './tokenVerifier/firebaseTokenVerifier.js';
export { RevocationCheckingVerifier } from './tokenVerifier/revocationCheck.js';
export type { UserLookup, UserRecordLike } from './tokenVerifier/revocationCheck.js';
export { VerifiedToken } from './tokenVerifier/verifiedToken.js';
export { createVerifierConfig, withTenant } from './tokenVerifier/verifierConfig.js';
export {
  TokenVerificationError,
  TokenVerifierConfigurationError,
  KeyFetchError,
  isTokenVerificationError,
} from './tokenVerifier/errors.js';
export type {
  VerifierConfig,
  VerificationMode,
  TokenVerifierOptions,
} from './tokenVerifier/types.js';

// Signing keys
export { PublicKeyCache } from './keys/publicKeyCache.js';
export type { KeySnapshot, PublicKeyCacheOptions } from './keys/publicKeyCache.js';
export { HttpKeySource, StaticKeySource } from './keys/keySource.js';
export type { KeySource, KeySourceResponse, KeyMaterial } from './keys/keySource.js';

// Middleware
export { createAuthMiddleware } from './middleware/authMiddleware.js';
export type { AuthMiddlewareOptions } from './middleware/authMiddleware.js';
export type { UserTokenVerifier, UserTokenVerificationError, Logger } from './types/middleware.js';

// Re-export shared types
export type {
  ErrorResponse,
  ErrorCode,
  VerificationErrorKind,
  AuthErrorCode,
  Clock,
} from '@credcheck/shared';
