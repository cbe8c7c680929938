import { AUTH_ERROR_CODES, VERIFICATION_ERROR_KINDS, systemClock } from '@credcheck/shared';
import type { Clock } from '@credcheck/shared';

import type { Logger, UserTokenVerifier } from '../types/middleware.js';
import { toError } from '../utils/guards.js';
import { docHint, validateClaims, validateStructure } from './claimValidator.js';
import {
  KeyFetchError,
  KeyNotFoundError,
  TokenParseError,
  TokenVerificationError,
} from './errors.js';
import { verifySignature } from './signatureVerifier.js';
import { parseToken } from './tokenParser.js';
import type {
  ParsedToken,
  SignedToken,
  TokenVerifierOptions,
  VerificationMode,
  VerifierConfig,
} from './types.js';
import { VerifiedToken } from './verifiedToken.js';
import { withTenant } from './verifierConfig.js';

/**
 * Verifies Firebase ID tokens or session cookies, depending on its config
 * parse -> structural checks -> key lookup -> signature -> claim checks.
 * Key lookup and signature are skipped in emulator mode.
 */
export class FirebaseTokenVerifier implements UserTokenVerifier {
  readonly mode: VerificationMode;
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(
    readonly config: VerifierConfig,
    private readonly options: TokenVerifierOptions = {},
  ) {
    this.mode = options.emulatorMode ? 'emulator' : 'signed';
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  async verify(token: string, correlationId?: string): Promise<VerifiedToken> {
    try {
      const parsed = this.parse(token);

      this.logger?.debug?.('Token decoded for verification', {
        event: 'token_decoded',
        tokenType: this.config.shortName,
        header: {
          alg: parsed.header.algorithm,
          kid: parsed.header.keyId,
        },
        payload: {
          sub: parsed.payload.subject,
          iat: parsed.payload.issuedAt,
          exp: parsed.payload.expiresAt,
        },
        mode: this.mode,
        correlationId,
      });

      const structural = validateStructure(parsed, this.mode, this.config);
      if (structural.path === 'signed') {
        await this.checkSignature(structural.token, structural.keyId);
      }

      const verified = new VerifiedToken(
        validateClaims(parsed.payload, this.config, this.clock.now()),
      );

      this.logger?.info?.('Token verification successful', {
        event: 'token_verification_success',
        tokenType: this.config.shortName,
        userId: verified.uid,
        tenantId: verified.tenantId,
        correlationId,
      });

      return verified;
    } catch (error) {
      if (error instanceof TokenVerificationError) {
        this.logger?.warn?.('Token verification failed', {
          event: 'token_verification_failed',
          tokenType: this.config.shortName,
          kind: error.kind,
          code: error.code,
          error: error.message,
          correlationId,
        });
      } else {
        this.logger?.error?.('Unexpected error during token verification', {
          event: 'token_verification_error',
          tokenType: this.config.shortName,
          error: {
            name: error instanceof Error ? error.name : 'Unknown',
            message: error instanceof Error ? error.message : 'Unknown error',
          },
          correlationId,
        });
      }
      throw error;
    }
  }

  /**
   * Verifier for the same flavor that only accepts tokens of one tenant
   * Shares this verifier's key cache.
   */
  forTenant(tenantId: string): FirebaseTokenVerifier {
    return new FirebaseTokenVerifier(withTenant(this.config, tenantId), this.options);
  }

  private parse(token: string): ParsedToken {
    try {
      return parseToken(token);
    } catch (error) {
      if (!(error instanceof TokenParseError)) {
        throw error;
      }
      throw new TokenVerificationError(
        VERIFICATION_ERROR_KINDS.MALFORMED_TOKEN,
        this.config.invalidTokenErrorCode,
        `Failed to parse Firebase ${this.config.shortName}. Make sure you passed a string that represents a complete and valid JWT. ${docHint(this.config)}`,
        error,
      );
    }
  }

  private async checkSignature(token: SignedToken, keyId: string): Promise<void> {
    const { shortName, invalidTokenErrorCode } = this.config;

    let valid: boolean;
    try {
      const key = await this.config.keyCache.getKey(keyId);
      valid = await verifySignature(token, key);
    } catch (error) {
      if (error instanceof KeyFetchError) {
        throw new TokenVerificationError(
          VERIFICATION_ERROR_KINDS.KEY_FETCH_FAILED,
          AUTH_ERROR_CODES.CERTIFICATE_FETCH_FAILED,
          error.message,
          error,
        );
      }
      if (error instanceof KeyNotFoundError) {
        throw new TokenVerificationError(
          VERIFICATION_ERROR_KINDS.KEY_NOT_FOUND,
          invalidTokenErrorCode,
          `Firebase ${shortName} has "kid" claim "${keyId}" which does not correspond to a known public key. Most likely the ${shortName} is expired, so get a fresh token from your client app and try again. ${docHint(this.config)}`,
          error,
        );
      }
      throw new TokenVerificationError(
        VERIFICATION_ERROR_KINDS.INVALID_SIGNATURE,
        invalidTokenErrorCode,
        `Unexpected error while verifying ${shortName}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        toError(error),
      );
    }

    if (!valid) {
      throw new TokenVerificationError(
        VERIFICATION_ERROR_KINDS.INVALID_SIGNATURE,
        invalidTokenErrorCode,
        `Failed to verify the signature of Firebase ${shortName}. ${docHint(this.config)}`,
      );
    }
  }
}
