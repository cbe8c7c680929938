import { ALGORITHMS, AUTH_ERROR_CODES, DEFAULTS, ENDPOINTS, VERIFICATION_ERROR_KINDS } from '@credcheck/shared';
import type { VerificationErrorKind } from '@credcheck/shared';

import { isRecord } from '../utils/guards.js';
import { TokenVerificationError } from './errors.js';
import type {
  ClaimValidationConfig,
  ParsedToken,
  StructurallyValidToken,
  TokenHeader,
  TokenPayload,
  VerificationMode,
} from './types.js';
import type { ValidatedClaims } from './verifiedToken.js';

const LEGACY_CUSTOM_TOKEN_ALGORITHM = 'HS256';

/**
 * Header checks that run before any key is fetched
 * Decides between the signed and the emulator path. The mode comes from the
 * caller; a token whose shape does not match it is rejected.
 */
export function validateStructure(
  parsed: ParsedToken,
  mode: VerificationMode,
  config: ClaimValidationConfig,
): StructurallyValidToken {
  const { header, payload } = parsed;

  if (mode === 'emulator') {
    if (parsed.kind === 'signed') {
      throw invalid(
        config,
        VERIFICATION_ERROR_KINDS.EMULATOR_MODE_VIOLATION,
        `Firebase ${config.shortName} is signed, but this verifier only accepts unsigned tokens from the Auth emulator.`,
      );
    }
    if (header.algorithm !== ALGORITHMS.NONE) {
      throw invalid(
        config,
        VERIFICATION_ERROR_KINDS.UNSUPPORTED_ALGORITHM,
        `Firebase ${config.shortName} has incorrect algorithm. Expected "${ALGORITHMS.NONE}" but got "${header.algorithm ?? ''}". ${docHint(config)}`,
      );
    }
    return { path: 'emulator', token: parsed };
  }

  if (parsed.kind === 'unsigned') {
    throw invalid(
      config,
      VERIFICATION_ERROR_KINDS.EMULATOR_MODE_VIOLATION,
      `Firebase ${config.shortName} has no signature. Unsigned tokens are only accepted when verifying against the Auth emulator. ${docHint(config)}`,
    );
  }

  if (header.algorithm !== ALGORITHMS.RS256) {
    const message = isLegacyCustomToken(header, payload)
      ? `${config.method} expects ${config.articledShortName}, but was given a legacy custom token.`
      : `Firebase ${config.shortName} has incorrect algorithm. Expected "${ALGORITHMS.RS256}" but got "${header.algorithm ?? ''}".`;
    throw invalid(config, VERIFICATION_ERROR_KINDS.UNSUPPORTED_ALGORITHM, `${message} ${docHint(config)}`);
  }

  if (!header.keyId) {
    const message = isCustomToken(payload)
      ? `${config.method} expects ${config.articledShortName}, but was given a custom token.`
      : `Firebase ${config.shortName} has no "kid" claim.`;
    throw invalid(config, VERIFICATION_ERROR_KINDS.MISSING_KEY_ID, `${message} ${docHint(config)}`);
  }

  return { path: 'signed', token: parsed, keyId: header.keyId };
}

/**
 * Claim checks that run once the token is known to be authentic
 * First failure wins.
 */
export function validateClaims(
  payload: TokenPayload,
  config: ClaimValidationConfig,
  nowMs: number,
): ValidatedClaims {
  const expectedIssuer = config.issuerTemplate(config.projectId);
  if (payload.issuer !== expectedIssuer) {
    throw invalid(
      config,
      VERIFICATION_ERROR_KINDS.ISSUER_MISMATCH,
      `Firebase ${config.shortName} has incorrect "iss" (issuer) claim. Expected "${expectedIssuer}" but got "${payload.issuer ?? ''}". ${projectMatchHint(config)} ${docHint(config)}`,
    );
  }

  const [audience] = payload.audience;
  if (payload.audience.length !== 1 || audience !== config.expectedAudience) {
    throw invalid(
      config,
      VERIFICATION_ERROR_KINDS.AUDIENCE_MISMATCH,
      `Firebase ${config.shortName} has incorrect "aud" (audience) claim. Expected "${config.expectedAudience}" but got "${payload.audience.join(',')}". ${projectMatchHint(config)} ${docHint(config)}`,
    );
  }

  const subject = payload.subject;
  if (subject === undefined) {
    throw invalid(
      config,
      VERIFICATION_ERROR_KINDS.MISSING_SUBJECT,
      `Firebase ${config.shortName} has no "sub" (subject) claim. ${docHint(config)}`,
    );
  }
  if (subject === '') {
    throw invalid(
      config,
      VERIFICATION_ERROR_KINDS.MISSING_SUBJECT,
      `Firebase ${config.shortName} has an empty string "sub" (subject) claim. ${docHint(config)}`,
    );
  }
  if (subject.length > DEFAULTS.MAX_SUBJECT_LENGTH) {
    throw invalid(
      config,
      VERIFICATION_ERROR_KINDS.INVALID_SUBJECT,
      `Firebase ${config.shortName} has "sub" (subject) claim longer than ${DEFAULTS.MAX_SUBJECT_LENGTH} characters. ${docHint(config)}`,
    );
  }

  if (payload.issuedAt * 1000 > nowMs) {
    throw invalid(
      config,
      VERIFICATION_ERROR_KINDS.NOT_YET_VALID,
      `Firebase ${config.shortName} is not yet valid. ${docHint(config)}`,
    );
  }

  if (payload.expiresAt * 1000 <= nowMs) {
    throw new TokenVerificationError(
      VERIFICATION_ERROR_KINDS.TOKEN_EXPIRED,
      config.expiredTokenErrorCode,
      `Firebase ${config.shortName} has expired. Get a fresh ${config.shortName} and try again. ${docHint(config)}`,
    );
  }

  if (config.tenantId !== undefined && config.tenantId !== payload.tenantId) {
    throw new TokenVerificationError(
      VERIFICATION_ERROR_KINDS.TENANT_MISMATCH,
      AUTH_ERROR_CODES.TENANT_ID_MISMATCH,
      `The tenant ID ('${payload.tenantId ?? ''}') of the token did not match the expected value ('${config.tenantId}')`,
    );
  }

  return {
    issuer: expectedIssuer,
    audience,
    subject,
    issuedAt: payload.issuedAt,
    expiresAt: payload.expiresAt,
    tenantId: payload.tenantId,
    claims: payload.claims,
  };
}

/**
 * Trailing sentence pointing at the docs for obtaining a valid token
 */
export function docHint(config: ClaimValidationConfig): string {
  return `See ${config.docUrl} for details on how to retrieve ${config.articledShortName}.`;
}

function projectMatchHint(config: ClaimValidationConfig): string {
  return `Make sure the ${config.shortName} comes from the same Firebase project as the one this verifier is configured for.`;
}

function invalid(
  config: ClaimValidationConfig,
  kind: VerificationErrorKind,
  message: string,
): TokenVerificationError {
  return new TokenVerificationError(kind, config.invalidTokenErrorCode, message);
}

function isCustomToken(payload: TokenPayload): boolean {
  return payload.audience.length === 1 && payload.audience[0] === ENDPOINTS.CUSTOM_TOKEN_AUDIENCE;
}

// Tokens minted by the pre-v3 SDKs: HS256 with the uid nested under "d"
function isLegacyCustomToken(header: TokenHeader, payload: TokenPayload): boolean {
  const data = payload.claims.d;
  return (
    header.algorithm === LEGACY_CUSTOM_TOKEN_ALGORITHM &&
    payload.claims.v === 0 &&
    isRecord(data) &&
    data.uid !== undefined &&
    data.uid !== null
  );
}
