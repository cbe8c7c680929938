import { VERIFICATION_ERROR_KINDS } from '@credcheck/shared';
import type { AuthErrorCode, VerificationErrorKind } from '@credcheck/shared';

/**
 * Error thrown when token verification fails
 * `kind` says why; `code` is the Firebase Auth error code for the token flavor
 * Compatible with UserTokenVerificationError interface
 */
export class TokenVerificationError extends Error {
  constructor(
    public readonly kind: VerificationErrorKind,
    public readonly code: AuthErrorCode,
    message: string,
    public originalError?: Error,
  ) {
    super(message);
    this.name = 'TokenVerificationError';
  }

  get isExpired(): boolean {
    return this.kind === VERIFICATION_ERROR_KINDS.TOKEN_EXPIRED;
  }
}

/**
 * Error thrown when a token string cannot be decoded
 * Carries no flavor context; the verifier rewraps it as a MalformedToken failure
 */
export class TokenParseError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'TokenParseError';
  }
}

/**
 * Error thrown when the signing keys could not be fetched or decoded
 * Raised by the key cache; the verifier rewraps it with the token flavor's context
 */
export class KeyFetchError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'KeyFetchError';
  }
}

/**
 * Error thrown when no signing key matches the token's key id, even after a refresh
 */
export class KeyNotFoundError extends Error {
  constructor(public readonly keyId: string) {
    super(`No public key found for key id "${keyId}"`);
    this.name = 'KeyNotFoundError';
  }
}

/**
 * Error thrown when token verifier configuration is invalid
 */
export class TokenVerifierConfigurationError extends Error {
  constructor(message: string) {
    super(`Token Verifier Configuration Error: ${message}`);
    this.name = 'TokenVerifierConfigurationError';
  }
}

/**
 * Type guard for verification failures
 */
export function isTokenVerificationError(error: unknown): error is TokenVerificationError {
  return error instanceof TokenVerificationError;
}
