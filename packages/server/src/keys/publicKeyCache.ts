import type * as jose from 'jose';

import { DEFAULTS, systemClock } from '@credcheck/shared';
import type { Clock } from '@credcheck/shared';

import { KeyFetchError, KeyNotFoundError } from '../tokenVerifier/errors.js';
import type { Logger } from '../types/middleware.js';
import { toError } from '../utils/guards.js';
import { importKeyMaterial } from './keyImport.js';
import type { KeySource, KeySourceResponse } from './keySource.js';

/**
 * One complete, immutable generation of signing keys
 */
export interface KeySnapshot {
  readonly keys: ReadonlyMap<string, jose.KeyLike>;
  /**
   * Epoch ms at which the fetch started
   */
  readonly fetchedAt: number;
  /**
   * Epoch ms until which the snapshot is served without refetching
   */
  readonly expiresAt: number;
}

export interface PublicKeyCacheOptions {
  clock?: Clock;
  logger?: Logger;

  /**
   * Lifetime used when the source states none
   */
  fallbackLifetimeMs?: number;

  /**
   * How long before the source's stated expiry the keys are refreshed
   */
  refreshSkewMs?: number;
}

/**
 * In-memory cache of the public keys used to verify token signatures
 * The whole key set is replaced in a single assignment on refresh, so a lookup
 * always sees one complete generation of keys. Concurrent refreshes share a
 * single in-flight fetch.
 */
export class PublicKeyCache {
  private snapshot: KeySnapshot | null = null;
  private refreshPromise: Promise<KeySnapshot> | null = null;
  private generation = 0;
  private readonly clock: Clock;
  private readonly logger?: Logger;
  private readonly fallbackLifetimeMs: number;
  private readonly refreshSkewMs: number;

  constructor(
    private readonly source: KeySource,
    options: PublicKeyCacheOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.fallbackLifetimeMs = options.fallbackLifetimeMs ?? DEFAULTS.KEY_CACHE_FALLBACK_MS;
    this.refreshSkewMs = options.refreshSkewMs ?? DEFAULTS.KEY_REFRESH_SKEW_MS;
  }

  /**
   * Get the key with the given id
   * Served from the cache while it is fresh and holds the key; otherwise the
   * keys are refetched once before giving up with KeyNotFoundError.
   */
  async getKey(keyId: string): Promise<jose.KeyLike> {
    const current = this.snapshot;
    if (current && this.isFresh(current)) {
      const cached = current.keys.get(keyId);
      if (cached) {
        return cached;
      }
    }

    const refreshed = await this.refresh();
    const key = refreshed.keys.get(keyId);
    if (!key) {
      this.logger?.warn?.('Signing key not found after refresh', {
        event: 'public_key_not_found',
        keyId,
        source: this.source.description,
        availableKeyIds: Array.from(refreshed.keys.keys()),
      });
      throw new KeyNotFoundError(keyId);
    }
    return key;
  }

  /**
   * Refetch the keys from the source
   * If a refresh is already in progress, returns the same promise
   */
  refresh(): Promise<KeySnapshot> {
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    const generation = this.generation;
    this.refreshPromise = (async () => {
      try {
        const next = await this.load();
        // A clear() during the fetch discards its result
        if (generation === this.generation) {
          this.snapshot = next;
        }
        return next;
      } finally {
        if (generation === this.generation) {
          this.refreshPromise = null;
        }
      }
    })();

    return this.refreshPromise;
  }

  /**
   * Copy of the current snapshot, or null before the first successful fetch
   */
  getSnapshot(): KeySnapshot | null {
    const current = this.snapshot;
    if (!current) {
      return null;
    }
    return Object.freeze({ ...current, keys: new Map(current.keys) });
  }

  /**
   * Drop cached keys (useful for testing or forced key rotation)
   * A refresh still in flight is detached and its keys are not kept.
   */
  clear(): void {
    this.generation += 1;
    this.snapshot = null;
    this.refreshPromise = null;

    this.logger?.debug?.('Public key cache cleared', {
      event: 'public_key_cache_cleared',
      source: this.source.description,
    });
  }

  private isFresh(snapshot: KeySnapshot): boolean {
    return this.clock.now() < snapshot.expiresAt;
  }

  private async load(): Promise<KeySnapshot> {
    const fetchedAt = this.clock.now();

    let response: KeySourceResponse;
    let keys: Map<string, jose.KeyLike>;
    try {
      response = await this.source.fetchKeys();
      keys = await importKeyMaterial(response.material);
    } catch (error) {
      this.logger?.error?.('Failed to fetch public keys', {
        event: 'public_key_fetch_failed',
        source: this.source.description,
        error: error instanceof Error ? error.message : 'Unknown error',
      });

      if (error instanceof KeyFetchError) {
        throw error;
      }
      throw new KeyFetchError(
        `Error while fetching public key certificates: ${error instanceof Error ? error.message : 'Unknown error'}`,
        toError(error),
      );
    }

    const lifetimeMs =
      response.cacheLifetimeMs === undefined
        ? this.fallbackLifetimeMs
        : Math.max(0, response.cacheLifetimeMs - this.refreshSkewMs);

    const snapshot: KeySnapshot = Object.freeze({
      keys,
      fetchedAt,
      expiresAt: fetchedAt + lifetimeMs,
    });

    this.logger?.debug?.('Public keys refreshed', {
      event: 'public_keys_refreshed',
      source: this.source.description,
      keyIds: Array.from(keys.keys()),
      expiresAt: new Date(snapshot.expiresAt).toISOString(),
    });

    return snapshot;
  }
}
