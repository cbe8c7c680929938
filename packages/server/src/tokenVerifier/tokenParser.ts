import * as jose from 'jose';
import type { ParsedToken, TokenHeader, TokenPayload } from './types.js';
import { TokenParseError } from './errors.js';
import { isRecord, toError } from '../utils/guards.js';

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+$/;

/**
 * Split and decode a compact-serialized token into header, payload and signature
 * Purely structural: no trust, time or claim-value decisions are made here.
 * An empty third segment yields an unsigned token; whether that is acceptable
 * is decided by the claim validator.
 */
export function parseToken(token: string): ParsedToken {
  if (typeof token !== 'string' || token.length === 0) {
    throw new TokenParseError('Token must be a non-empty string');
  }

  const segments = token.split('.');
  if (segments.length !== 3) {
    throw new TokenParseError(
      `Token must have 3 dot-separated segments but has ${segments.length}`,
    );
  }

  const [rawHeader, rawPayload, rawSignature] = segments;
  if (!rawHeader || !rawPayload) {
    throw new TokenParseError('Token header and payload segments must not be empty');
  }

  // The decoder skips characters outside the alphabet instead of failing
  if (!BASE64URL_SEGMENT.test(rawHeader) || !BASE64URL_SEGMENT.test(rawPayload)) {
    throw new TokenParseError('Token header or payload is not base64url-encoded');
  }

  let decodedHeader: Record<string, unknown>;
  let decodedPayload: Record<string, unknown>;
  try {
    decodedHeader = jose.decodeProtectedHeader(token);
    decodedPayload = jose.decodeJwt(token);
  } catch (error) {
    throw new TokenParseError(
      'Token header or payload is not base64url-encoded JSON',
      toError(error),
    );
  }

  const header = parseHeader(decodedHeader);
  const payload = parsePayload(decodedPayload);

  if (rawSignature === '') {
    return { kind: 'unsigned', header, payload, rawHeader, rawPayload };
  }

  if (!BASE64URL_SEGMENT.test(rawSignature)) {
    throw new TokenParseError('Token signature is not base64url-encoded');
  }

  return { kind: 'signed', header, payload, rawHeader, rawPayload, rawSignature };
}

function parseHeader(header: Record<string, unknown>): TokenHeader {
  return {
    algorithm: optionalString(header, 'alg'),
    keyId: optionalString(header, 'kid'),
    type: optionalString(header, 'typ'),
  };
}

function parsePayload(claims: Record<string, unknown>): TokenPayload {
  const firebase = claims.firebase;
  const tenant = isRecord(firebase) ? firebase.tenant : undefined;

  return {
    issuer: optionalString(claims, 'iss'),
    audience: parseAudience(claims.aud),
    subject: optionalString(claims, 'sub'),
    issuedAt: requiredNumber(claims, 'iat'),
    expiresAt: requiredNumber(claims, 'exp'),
    tenantId: typeof tenant === 'string' ? tenant : undefined,
    claims,
  };
}

function parseAudience(aud: unknown): string[] {
  if (aud === undefined) {
    return [];
  }
  if (typeof aud === 'string') {
    return [aud];
  }
  if (Array.isArray(aud) && aud.every((entry): entry is string => typeof entry === 'string')) {
    return aud;
  }
  throw new TokenParseError('"aud" claim must be a string or an array of strings');
}

function optionalString(source: Record<string, unknown>, name: string): string | undefined {
  const value = source[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new TokenParseError(`"${name}" must be a string`);
  }
  return value;
}

function requiredNumber(source: Record<string, unknown>, name: string): number {
  const value = source[name];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new TokenParseError(`"${name}" claim must be a number`);
  }
  return value;
}
