/**
 * Site history storage contract.
 *
 * The resolver reads only version bounds and single snapshots; how the
 * history is stored and retrieved on the network is up to the store.
 */

import { z } from 'zod';
import type { Snapshot, VersionBounds } from '../../types/dweb';

export type HistoryStoreErrorKind = 'not-found' | 'unavailable';

export class HistoryStoreError extends Error {
  readonly kind: HistoryStoreErrorKind;

  constructor(kind: HistoryStoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HistoryStoreError';
    this.kind = kind;
  }
}

export interface HistoryStore {
  /** Rejects with HistoryStoreError */
  lookupBounds(identifier: string): Promise<VersionBounds>;
  /** Rejects with HistoryStoreError */
  fetchSnapshot(identifier: string, version: number): Promise<Snapshot>;
}

// ==========================================
// Gateway payload schemas
// ==========================================

const versionNumber = z.number().int().nonnegative();

export const VersionBoundsSchema = z.object({
  minVersion: versionNumber,
  maxVersion: versionNumber,
});

export const SnapshotPayloadSchema = z.object({
  version: versionNumber.min(1),
  contentRoot: z.string().min(1),
});

export const ExampleSiteSchema = z.object({
  label: z.string().min(1),
  address: z.string().min(1),
  description: z.string().optional(),
});

export const ExampleCatalogSchema = z.array(ExampleSiteSchema);
