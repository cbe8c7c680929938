import type { VerificationErrorKind } from '@credcheck/shared';
import type { VerifiedToken } from '../tokenVerifier/verifiedToken.js';

/**
 * Interface for user token verifier
 * Implementations verify an ID token or session cookie (signature, expiration,
 * issuer, audience) and return the verified token.
 *
 * The implementation is provided via dependency injection to createAuthMiddleware().
 */
export interface UserTokenVerifier {
  verify(token: string, correlationId?: string): Promise<VerifiedToken>;
}

/**
 * Interface for user token verification error
 * Implementations should throw errors that match this interface
 */
export interface UserTokenVerificationError extends Error {
  kind?: VerificationErrorKind;
  isExpired?: boolean;
}

/**
 * Logger interface (compatible with winston)
 * Uses Record<string, unknown> for type-safe metadata
 */
export interface Logger {
  debug?: (message: string, meta?: Record<string, unknown>) => void;
  info?: (message: string, meta?: Record<string, unknown>) => void;
  warn?: (message: string, meta?: Record<string, unknown>) => void;
  error?: (message: string, meta?: Record<string, unknown>) => void;
}
