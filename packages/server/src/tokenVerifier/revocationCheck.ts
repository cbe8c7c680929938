import { AUTH_ERROR_CODES, VERIFICATION_ERROR_KINDS } from '@credcheck/shared';
import type { AuthErrorCode } from '@credcheck/shared';

import type { Logger, UserTokenVerifier } from '../types/middleware.js';
import { TokenVerificationError } from './errors.js';
import type { FirebaseTokenVerifier } from './firebaseTokenVerifier.js';
import type { VerifiedToken } from './verifiedToken.js';

/**
 * The parts of a user record the revocation check reads
 */
export interface UserRecordLike {
  disabled: boolean;
  /**
   * UTC date string; tokens issued before it are revoked
   */
  tokensValidAfterTime?: string;
}

/**
 * Looks users up by uid
 * firebase-admin's Auth satisfies this interface
 */
export interface UserLookup {
  getUser(uid: string): Promise<UserRecordLike>;
}

/**
 * Wraps a verifier and rejects tokens of disabled users and revoked tokens
 * Costs one user lookup per verify call. Lookup failures propagate unchanged.
 */
export class RevocationCheckingVerifier implements UserTokenVerifier {
  constructor(
    private readonly verifier: FirebaseTokenVerifier,
    private readonly userLookup: UserLookup,
    private readonly revokedErrorCode: AuthErrorCode,
    private readonly logger?: Logger,
  ) {}

  static forIdTokens(
    verifier: FirebaseTokenVerifier,
    userLookup: UserLookup,
    logger?: Logger,
  ): RevocationCheckingVerifier {
    return new RevocationCheckingVerifier(verifier, userLookup, AUTH_ERROR_CODES.REVOKED_ID_TOKEN, logger);
  }

  static forSessionCookies(
    verifier: FirebaseTokenVerifier,
    userLookup: UserLookup,
    logger?: Logger,
  ): RevocationCheckingVerifier {
    return new RevocationCheckingVerifier(
      verifier,
      userLookup,
      AUTH_ERROR_CODES.REVOKED_SESSION_COOKIE,
      logger,
    );
  }

  async verify(token: string, correlationId?: string): Promise<VerifiedToken> {
    const verified = await this.verifier.verify(token, correlationId);
    const { shortName } = this.verifier.config;
    const user = await this.userLookup.getUser(verified.uid);

    if (user.disabled) {
      this.logger?.warn?.('Token belongs to a disabled user', {
        event: 'token_user_disabled',
        userId: verified.uid,
        correlationId,
      });
      throw new TokenVerificationError(
        VERIFICATION_ERROR_KINDS.USER_DISABLED,
        AUTH_ERROR_CODES.USER_DISABLED,
        'The user record is disabled.',
      );
    }

    if (isRevoked(verified, user)) {
      this.logger?.warn?.('Token has been revoked', {
        event: 'token_revoked',
        userId: verified.uid,
        tokensValidAfterTime: user.tokensValidAfterTime,
        correlationId,
      });
      throw new TokenVerificationError(
        VERIFICATION_ERROR_KINDS.TOKEN_REVOKED,
        this.revokedErrorCode,
        `Firebase ${shortName} is revoked.`,
      );
    }

    return verified;
  }

  /**
   * Same check over a tenant-scoped verifier
   * Tenant users live in the tenant's own user store, e.g.
   * `auth.tenantManager().authForTenant(tenantId)`; pass it as userLookup.
   */
  forTenant(tenantId: string, userLookup: UserLookup = this.userLookup): RevocationCheckingVerifier {
    return new RevocationCheckingVerifier(
      this.verifier.forTenant(tenantId),
      userLookup,
      this.revokedErrorCode,
      this.logger,
    );
  }
}

function isRevoked(token: VerifiedToken, user: UserRecordLike): boolean {
  if (!user.tokensValidAfterTime) {
    return false;
  }
  const validSinceMs = Date.parse(user.tokensValidAfterTime);
  return Number.isFinite(validSinceMs) && validSinceMs > token.issuedAt * 1000;
}
