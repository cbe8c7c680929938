/**
 * Error codes returned in HTTP error responses
 * Type is derived from these constants in types.ts (single source of truth)
 */
export const ERROR_CODES = {
  TOKEN_EXPIRED: 'TOKEN_EXPIRED',
  TOKEN_REVOKED: 'TOKEN_REVOKED',
  AUTH_FAILED: 'AUTH_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

/**
 * Verification failure kinds, one per rejection reason
 */
export const VERIFICATION_ERROR_KINDS = {
  MALFORMED_TOKEN: 'MalformedToken',
  UNSUPPORTED_ALGORITHM: 'UnsupportedAlgorithm',
  MISSING_KEY_ID: 'MissingKeyId',
  KEY_FETCH_FAILED: 'KeyFetchFailed',
  KEY_NOT_FOUND: 'KeyNotFound',
  INVALID_SIGNATURE: 'InvalidSignature',
  ISSUER_MISMATCH: 'IssuerMismatch',
  AUDIENCE_MISMATCH: 'AudienceMismatch',
  TENANT_MISMATCH: 'TenantMismatch',
  MISSING_SUBJECT: 'MissingSubject',
  INVALID_SUBJECT: 'InvalidSubject',
  TOKEN_EXPIRED: 'TokenExpired',
  NOT_YET_VALID: 'NotYetValid',
  EMULATOR_MODE_VIOLATION: 'EmulatorModeViolation',
  TOKEN_REVOKED: 'TokenRevoked',
  USER_DISABLED: 'UserDisabled',
} as const;

/**
 * Firebase Auth error codes attached to verification failures
 * Each token flavor picks its own invalid/expired pair
 */
export const AUTH_ERROR_CODES = {
  INVALID_ID_TOKEN: 'INVALID_ID_TOKEN',
  EXPIRED_ID_TOKEN: 'EXPIRED_ID_TOKEN',
  REVOKED_ID_TOKEN: 'REVOKED_ID_TOKEN',
  INVALID_SESSION_COOKIE: 'INVALID_SESSION_COOKIE',
  EXPIRED_SESSION_COOKIE: 'EXPIRED_SESSION_COOKIE',
  REVOKED_SESSION_COOKIE: 'REVOKED_SESSION_COOKIE',
  CERTIFICATE_FETCH_FAILED: 'CERTIFICATE_FETCH_FAILED',
  TENANT_ID_MISMATCH: 'TENANT_ID_MISMATCH',
  USER_DISABLED: 'USER_DISABLED',
} as const;

/**
 * Signing algorithms
 */
export const ALGORITHMS = {
  /**
   * The only algorithm the identity backend signs with
   */
  RS256: 'RS256',

  /**
   * Header marker for unsigned tokens minted by the Auth emulator
   */
  NONE: 'none',
} as const;

/**
 * Identity backend endpoints and issuer prefixes
 */
export const ENDPOINTS = {
  ID_TOKEN_CERT_URL:
    'https://www.googleapis.com/robot/v1/metadata/x509/securetoken@system.gserviceaccount.com',
  ID_TOKEN_ISSUER_PREFIX: 'https://securetoken.google.com/',
  ID_TOKEN_DOC_URL: 'https://firebase.google.com/docs/auth/admin/verify-id-tokens',

  SESSION_COOKIE_CERT_URL: 'https://www.googleapis.com/identitytoolkit/v3/relyingparty/publicKeys',
  SESSION_COOKIE_ISSUER_PREFIX: 'https://session.firebase.google.com/',
  SESSION_COOKIE_DOC_URL: 'https://firebase.google.com/docs/auth/admin/manage-cookies',

  /**
   * Audience of custom tokens minted by the Admin SDK
   * Used to tell the caller they passed a custom token instead of an ID token
   */
  CUSTOM_TOKEN_AUDIENCE:
    'https://identitytoolkit.googleapis.com/google.identity.identitytoolkit.v1.IdentityToolkit',
} as const;

/**
 * Default configuration values
 */
export const DEFAULTS = {
  /**
   * Key cache lifetime used when the key source sends no max-age: 5 minutes
   */
  KEY_CACHE_FALLBACK_MS: 5 * 60 * 1000,

  /**
   * Keys are refreshed this long before the source's stated expiry: 5 minutes
   */
  KEY_REFRESH_SKEW_MS: 5 * 60 * 1000,

  /**
   * Default key fetch timeout: 10 seconds
   */
  KEY_FETCH_TIMEOUT_MS: 10 * 1000,

  /**
   * Longest subject (uid) the backend issues
   */
  MAX_SUBJECT_LENGTH: 128,

  /**
   * Default cookie read by the session cookie middleware
   */
  SESSION_COOKIE_NAME: 'session',
} as const;
