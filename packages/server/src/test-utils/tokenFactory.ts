import { readFileSync } from 'fs';
import * as jose from 'jose';

import type { Clock } from '@credcheck/shared';

export const PROJECT_ID = 'proj-1';
export const KEY_ID = 'K1';

/**
 * Fixed instant the test tokens are issued at, in seconds
 */
export const ISSUED_AT = 1_700_000_000;

export const ID_TOKEN_ISSUER = `https://securetoken.google.com/${PROJECT_ID}`;
export const SESSION_COOKIE_ISSUER = `https://session.firebase.google.com/${PROJECT_ID}`;

export interface TestKeyPair {
  privateKey: jose.KeyLike;
  publicKey: jose.KeyLike;
  publicKeyPem: string;
}

export interface FakeClock extends Clock {
  set(ms: number): void;
  advance(ms: number): void;
}

/**
 * Clock frozen at the given epoch ms
 */
export function fakeClock(startMs: number): FakeClock {
  let current = startMs;
  return {
    now: () => current,
    set: (ms) => {
      current = ms;
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

export async function createKeyPair(): Promise<TestKeyPair> {
  const { privateKey, publicKey } = await jose.generateKeyPair('RS256', { extractable: true });
  return { privateKey, publicKey, publicKeyPem: await jose.exportSPKI(publicKey) };
}

/**
 * Claims of a valid ID token for PROJECT_ID, issued at ISSUED_AT for one hour
 */
export function idTokenClaims(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    iss: ID_TOKEN_ISSUER,
    aud: PROJECT_ID,
    sub: 'u1',
    iat: ISSUED_AT,
    exp: ISSUED_AT + 3600,
    auth_time: ISSUED_AT,
    email: 'user@example.com',
    email_verified: true,
    firebase: { sign_in_provider: 'password' },
    ...overrides,
  };
}

export function signToken(
  privateKey: jose.KeyLike,
  claims: Record<string, unknown>,
  header: jose.JWTHeaderParameters = { alg: 'RS256', kid: KEY_ID },
): Promise<string> {
  return new jose.SignJWT(claims).setProtectedHeader(header).sign(privateKey);
}

/**
 * Compact token built from raw parts; the signature is not a real one
 */
export function encodeToken(
  header: Record<string, unknown>,
  payload: Record<string, unknown>,
  signature = 'bm90LWEtc2lnbmF0dXJl',
): string {
  return `${encodeSegment(header)}.${encodeSegment(payload)}.${signature}`;
}

/**
 * Token as minted by the Auth emulator: alg none, empty signature segment
 */
export function unsignedToken(payload: Record<string, unknown>): string {
  return encodeToken({ alg: 'none', typ: 'JWT' }, payload, '');
}

export function encodeSegment(value: unknown): string {
  return jose.base64url.encode(JSON.stringify(value));
}

export function readFixture(name: string): string {
  return readFileSync(new URL(`../__fixtures__/${name}`, import.meta.url), 'utf-8');
}
