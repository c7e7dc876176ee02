/**
 * GatewayHistoryStore - reads site histories through the HTTP gateway.
 *
 * Endpoints:
 *   GET {gateway}/history/{identifier}                    -> { minVersion, maxVersion }
 *   GET {gateway}/history/{identifier}/versions/{version} -> { version, contentRoot }
 *
 * 404/400 mean the identifier is unknown to the network. Everything else
 * (network errors, 5xx, payloads failing validation) is reported as
 * `unavailable` after a few retries.
 */

import type { z } from 'zod';
import type { Snapshot, VersionBounds } from '../types/dweb';
import {
  HistoryStoreError,
  SnapshotPayloadSchema,
  VersionBoundsSchema,
  type HistoryStore,
} from './types/HistoryTypes';
import { retryWithBackoff, type RetryOptions } from '../utils/retry';
import { DWEB_CONFIG } from '../config/dweb.config';

const NOT_FOUND_STATUSES = new Set([400, 404]);

export const GATEWAY_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 2,
  baseDelay: 500,
  maxDelay: 4000,
  jitter: 0.2,
  shouldRetry: (error) => !(error instanceof HistoryStoreError && error.kind === 'not-found'),
  onRetry: (error, attempt, delay) => {
    console.warn(`🌐 [Gateway] Retry ${attempt} in ${Math.round(delay)}ms: ${error.message}`);
  },
};

export class GatewayHistoryStore implements HistoryStore {
  private readonly baseUrl: string;
  private readonly retryOptions: RetryOptions;

  constructor(baseUrl: string = DWEB_CONFIG.GATEWAY_URL, retryOptions: RetryOptions = GATEWAY_RETRY_OPTIONS) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.retryOptions = retryOptions;
  }

  async lookupBounds(identifier: string): Promise<VersionBounds> {
    const url = `${this.baseUrl}/history/${encodeURIComponent(identifier)}`;
    return this.getJson(url, VersionBoundsSchema, `history ${identifier}`);
  }

  async fetchSnapshot(identifier: string, version: number): Promise<Snapshot> {
    const url = `${this.baseUrl}/history/${encodeURIComponent(identifier)}/versions/${version}`;
    const payload = await this.getJson(url, SnapshotPayloadSchema, `${identifier} version ${version}`);
    if (payload.version !== version) {
      console.warn(`🌐 [Gateway] Asked for ${identifier} version ${version}, got version ${payload.version}`);
      throw new HistoryStoreError(
        'unavailable',
        `Gateway answered version ${payload.version} for ${identifier} version ${version}`
      );
    }
    return { identifier, version: payload.version, contentRoot: payload.contentRoot };
  }

  private getJson<T>(url: string, schema: z.ZodType<T>, what: string): Promise<T> {
    return retryWithBackoff(async () => {
      let response: Response;
      try {
        response = await fetch(url, { headers: { Accept: 'application/json' } });
      } catch (error) {
        throw new HistoryStoreError('unavailable', `Gateway unreachable while fetching ${what}`, { cause: error });
      }

      if (NOT_FOUND_STATUSES.has(response.status)) {
        throw new HistoryStoreError('not-found', `Not found on network: ${what}`);
      }
      if (!response.ok) {
        throw new HistoryStoreError('unavailable', `Gateway returned ${response.status} for ${what}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new HistoryStoreError('unavailable', `Gateway sent invalid JSON for ${what}`, { cause: error });
      }

      const result = schema.safeParse(body);
      if (!result.success) {
        console.warn(`🌐 [Gateway] Unexpected payload for ${what}:`, result.error.format());
        throw new HistoryStoreError('unavailable', `Gateway sent an unexpected payload for ${what}`);
      }
      return result.data;
    }, this.retryOptions);
  }
}
