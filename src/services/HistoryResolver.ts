/**
 * HistoryResolver - turns an identifier and an optional version into one
 * concrete snapshot of a site history.
 *
 * Version selection:
 * - absent or 0      -> latest (maxVersion)
 * - above maxVersion -> clamped down to maxVersion, a stale link to a
 *                       future version still opens the newest one
 * - below 1          -> invalid-version, the address is malformed
 *
 * resolve() never rejects: every failure comes back as a ResolveError.
 */

import type { ResolveError, ResolveErrorCode, ResolveResult, Snapshot, VersionBounds } from '../types/dweb';
import { HistoryStoreError, type HistoryStore } from './types/HistoryTypes';
import { DWEB_CONFIG } from '../config/dweb.config';

export interface HistoryResolverOptions {
  /** Complete with `unavailable` when the store takes longer than this */
  timeoutMs?: number;
  /** Snapshots kept in memory (default: DWEB_CONFIG.SNAPSHOT_CACHE_SIZE) */
  cacheSize?: number;
}

function resolveError(code: ResolveErrorCode, message: string): { ok: false; error: ResolveError } {
  return { ok: false, error: { kind: 'resolve', code, message, retryable: code === 'unavailable' } };
}

function fromStoreError(error: unknown): { ok: false; error: ResolveError } {
  if (error instanceof HistoryStoreError) {
    return resolveError(error.kind, error.message);
  }
  const message = error instanceof Error ? error.message : String(error);
  return resolveError('unavailable', `History lookup failed: ${message}`);
}

export class HistoryResolver {
  private readonly store: HistoryStore;
  private readonly timeoutMs?: number;
  private readonly cacheSize: number;
  private readonly snapshots = new Map<string, Snapshot>();

  constructor(store: HistoryStore, options: HistoryResolverOptions = {}) {
    this.store = store;
    this.timeoutMs = options.timeoutMs;
    this.cacheSize = options.cacheSize ?? DWEB_CONFIG.SNAPSHOT_CACHE_SIZE;
  }

  async resolve(identifier: string, requestedVersion?: number): Promise<ResolveResult> {
    if (this.timeoutMs === undefined) {
      return this.resolveFromStore(identifier, requestedVersion);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<ResolveResult>((resolve) => {
      timer = setTimeout(() => {
        console.warn(`⏱️ [Resolver] ${identifier} not resolved within ${this.timeoutMs}ms`);
        resolve(resolveError('unavailable', `Timed out after ${this.timeoutMs}ms resolving ${identifier}`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.resolveFromStore(identifier, requestedVersion), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async resolveFromStore(identifier: string, requestedVersion?: number): Promise<ResolveResult> {
    if (requestedVersion !== undefined && requestedVersion !== 0) {
      if (!Number.isInteger(requestedVersion) || requestedVersion < 1) {
        return resolveError('invalid-version', `Invalid site version: ${requestedVersion}`);
      }
    }

    let bounds: VersionBounds;
    try {
      bounds = await this.store.lookupBounds(identifier);
    } catch (error) {
      console.warn(`🔍 [Resolver] Failed to read history bounds for ${identifier}:`, error);
      return fromStoreError(error);
    }

    if (bounds.maxVersion < 1) {
      return resolveError('not-found', `History ${identifier} has no published versions`);
    }

    let version = bounds.maxVersion;
    if (requestedVersion !== undefined && requestedVersion !== 0) {
      if (requestedVersion < bounds.minVersion) {
        return resolveError(
          'invalid-version',
          `Version ${requestedVersion} is below the first version (${bounds.minVersion}) of ${identifier}`
        );
      }
      version = Math.min(requestedVersion, bounds.maxVersion);
      if (version !== requestedVersion) {
        console.log(`🔍 [Resolver] Version ${requestedVersion} too large for ${identifier}, using ${version}`);
      }
    }

    const cached = this.snapshots.get(this.cacheKey(identifier, version));
    if (cached) {
      return { ok: true, snapshot: cached, bounds };
    }

    let snapshot: Snapshot;
    try {
      snapshot = await this.store.fetchSnapshot(identifier, version);
    } catch (error) {
      console.warn(`🔍 [Resolver] Failed to fetch ${identifier} version ${version}:`, error);
      return fromStoreError(error);
    }

    this.remember(snapshot);
    console.log(`✅ [Resolver] ${identifier} resolved to version ${snapshot.version} of ${bounds.maxVersion}`);
    return { ok: true, snapshot, bounds };
  }

  private cacheKey(identifier: string, version: number): string {
    return `${identifier}@${version}`;
  }

  private remember(snapshot: Snapshot): void {
    const key = this.cacheKey(snapshot.identifier, snapshot.version);
    this.snapshots.delete(key);
    this.snapshots.set(key, snapshot);
    // Map iteration order is insertion order, so the first key is the oldest
    while (this.snapshots.size > this.cacheSize) {
      const oldest = this.snapshots.keys().next();
      if (oldest.done) break;
      this.snapshots.delete(oldest.value);
    }
  }
}
