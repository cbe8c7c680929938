import type { AuthErrorCode, Clock } from '@credcheck/shared';
import type { PublicKeyCache } from '../keys/publicKeyCache.js';
import type { Logger } from '../types/middleware.js';

/**
 * Per-flavor verifier configuration (ID token, session cookie)
 * Frozen at construction and shared by every verify call
 */
export interface VerifierConfig {
  /**
   * Human-facing token name used in error messages, e.g. 'ID token'
   */
  readonly shortName: string;

  /**
   * shortName with its indefinite article, e.g. 'an ID token'
   */
  readonly articledShortName: string;

  /**
   * Public method name used in error messages, e.g. 'verifyIdToken()'
   */
  readonly method: string;

  /**
   * Where to read about obtaining this kind of token
   */
  readonly docUrl: string;

  readonly projectId: string;

  /**
   * Expected `aud` claim
   */
  readonly expectedAudience: string;

  /**
   * Maps the project id to the expected `iss` claim
   */
  readonly issuerTemplate: (projectId: string) => string;

  /**
   * Signing keys for this flavor
   */
  readonly keyCache: PublicKeyCache;

  readonly invalidTokenErrorCode: AuthErrorCode;
  readonly expiredTokenErrorCode: AuthErrorCode;

  /**
   * When set, tokens must carry this tenant id
   */
  readonly tenantId?: string;
}

/**
 * The claim checks only need the descriptive and expected-value parts of the config
 */
export type ClaimValidationConfig = Omit<VerifierConfig, 'keyCache'>;

/**
 * Whether tokens must be RS256-signed, or unsigned ones minted by the Auth emulator
 * Chosen by the application, never inferred from the token
 */
export type VerificationMode = 'signed' | 'emulator';

/**
 * Decoded JOSE header
 */
export interface TokenHeader {
  algorithm?: string;
  keyId?: string;
  type?: string;
}

/**
 * Decoded claims with the registered ones lifted into typed fields
 */
export interface TokenPayload {
  issuer?: string;
  audience: string[];
  subject?: string;
  /**
   * Seconds since the epoch
   */
  issuedAt: number;
  /**
   * Seconds since the epoch
   */
  expiresAt: number;
  tenantId?: string;
  claims: Readonly<Record<string, unknown>>;
}

interface ParsedTokenBase {
  header: TokenHeader;
  payload: TokenPayload;
  rawHeader: string;
  rawPayload: string;
}

export interface SignedToken extends ParsedTokenBase {
  kind: 'signed';
  rawSignature: string;
}

/**
 * Token with an empty signature segment
 */
export interface UnsignedToken extends ParsedTokenBase {
  kind: 'unsigned';
}

export type ParsedToken = SignedToken | UnsignedToken;

/**
 * Options for FirebaseTokenVerifier
 */
export interface TokenVerifierOptions {
  /**
   * Accept unsigned tokens from the Auth emulator instead of RS256-signed ones
   * Development/test only
   */
  emulatorMode?: boolean;

  clock?: Clock;

  logger?: Logger;
}

/**
 * Outcome of the structural checks: which verification path the token takes
 */
export type StructurallyValidToken =
  | { path: 'signed'; token: SignedToken; keyId: string }
  | { path: 'emulator'; token: UnsignedToken };
