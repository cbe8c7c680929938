import axios, { type AxiosInstance } from 'axios';

import { DEFAULTS } from '@credcheck/shared';

import { KeyFetchError } from '../tokenVerifier/errors.js';
import { isRecord } from '../utils/guards.js';

/**
 * RSA public key in JWK form, as published by JWKS-style endpoints
 */
export interface RsaPublicJwk {
  kid: string;
  kty: string;
  n: string;
  e: string;
  alg?: string;
}

/**
 * Signing keys as published by a key source
 * - pem: key id -> X.509 certificate or SPKI public key PEM
 * - jwks: a `{ keys: [...] }` JSON Web Key Set
 */
export type KeyMaterial =
  | { format: 'pem'; entries: Readonly<Record<string, string>> }
  | { format: 'jwks'; entries: readonly RsaPublicJwk[] };

export interface KeySourceResponse {
  material: KeyMaterial;

  /**
   * How long the source says the keys may be cached
   * Undefined when the source sent no caching directive
   */
  cacheLifetimeMs?: number;
}

/**
 * Where the public key cache gets its keys from
 */
export interface KeySource {
  readonly description: string;
  fetchKeys(): Promise<KeySourceResponse>;
}

export interface HttpKeySourceOptions {
  /**
   * Request timeout, defaults to DEFAULTS.KEY_FETCH_TIMEOUT_MS
   */
  timeoutMs?: number;

  /**
   * Preconfigured axios instance (proxies, retries, tests)
   */
  httpClient?: AxiosInstance;
}

/**
 * Fetches signing keys over HTTP
 * Understands the certificate map served by the ID token endpoint, the public
 * key map served by the session cookie endpoint and plain JWKS documents.
 */
export class HttpKeySource implements KeySource {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(
    public readonly url: string,
    options: HttpKeySourceOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.KEY_FETCH_TIMEOUT_MS;
    this.client =
      options.httpClient ??
      axios.create({
        headers: {
          Accept: 'application/json',
        },
      });
  }

  get description(): string {
    return this.url;
  }

  async fetchKeys(): Promise<KeySourceResponse> {
    const response = await this.client.get<unknown>(this.url, { timeout: this.timeoutMs });

    return {
      material: toKeyMaterial(response.data),
      cacheLifetimeMs: parseCacheLifetime(response.headers),
    };
  }
}

/**
 * Serves a fixed set of PEM keys
 * Useful for pinned keys and for tests; replaceKeys() simulates a rotation
 */
export class StaticKeySource implements KeySource {
  readonly description = 'static keys';

  constructor(
    private entries: Record<string, string>,
    private readonly cacheLifetimeMs?: number,
  ) {}

  replaceKeys(entries: Record<string, string>): void {
    this.entries = { ...entries };
  }

  async fetchKeys(): Promise<KeySourceResponse> {
    return {
      material: { format: 'pem', entries: { ...this.entries } },
      cacheLifetimeMs: this.cacheLifetimeMs,
    };
  }
}

/**
 * Classify a key endpoint response body
 */
export function toKeyMaterial(body: unknown): KeyMaterial {
  if (!isRecord(body)) {
    throw new KeyFetchError('Key source response is not a JSON object');
  }

  if (Array.isArray(body.keys)) {
    return { format: 'jwks', entries: body.keys.map(toRsaPublicJwk) };
  }

  const entries: Record<string, string> = {};
  for (const [keyId, value] of Object.entries(body)) {
    if (typeof value !== 'string') {
      throw new KeyFetchError(`Key source entry "${keyId}" is not a PEM string`);
    }
    entries[keyId] = value;
  }
  return { format: 'pem', entries };
}

function toRsaPublicJwk(entry: unknown): RsaPublicJwk {
  if (
    !isRecord(entry) ||
    typeof entry.kid !== 'string' ||
    typeof entry.kty !== 'string' ||
    typeof entry.n !== 'string' ||
    typeof entry.e !== 'string'
  ) {
    throw new KeyFetchError('Key source JWKS entry must be an RSA key with kid, kty, n and e');
  }

  return {
    kid: entry.kid,
    kty: entry.kty,
    n: entry.n,
    e: entry.e,
    alg: typeof entry.alg === 'string' ? entry.alg : undefined,
  };
}

/**
 * Cache lifetime from Cache-Control max-age, less the Age of the response
 */
export function parseCacheLifetime(headers: Record<string, unknown>): number | undefined {
  const cacheControl = headers['cache-control'];
  if (typeof cacheControl !== 'string') {
    return undefined;
  }

  const match = /(?:^|,)\s*max-age\s*=\s*(\d+)/i.exec(cacheControl);
  if (!match) {
    return undefined;
  }

  const maxAgeSeconds = Number(match[1]);
  const ageSeconds = Number(headers.age ?? 0);
  const remainingSeconds = maxAgeSeconds - (Number.isFinite(ageSeconds) ? ageSeconds : 0);
  return Math.max(0, remainingSeconds) * 1000;
}
