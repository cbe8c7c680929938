import { AUTH_ERROR_CODES, ERROR_CODES, VERIFICATION_ERROR_KINDS } from './constants.js';

/**
 * Error codes returned by the authentication middleware
 * Type derived from ERROR_CODES in constants.ts (single source of truth)
 * This extracts the union of all values from the ERROR_CODES object
 */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Why a token was rejected
 */
export type VerificationErrorKind =
  (typeof VERIFICATION_ERROR_KINDS)[keyof typeof VERIFICATION_ERROR_KINDS];

/**
 * Firebase Auth error code carried by a verification failure
 */
export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[keyof typeof AUTH_ERROR_CODES];

/**
 * Error response format from server
 */
export interface ErrorResponse {
  error: {
    code: ErrorCode;
    kind?: VerificationErrorKind;
    message: string;
    requiresReauthentication: boolean;
    timestamp: string;
  };
}

/**
 * Source of the current time, in milliseconds since the epoch
 * Injected so verification can be tested against a fixed instant
 */
export interface Clock {
  now(): number;
}
