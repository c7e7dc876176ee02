/**
 * Core types for versioned site browsing.
 *
 * An address names a site history on the network; a snapshot is one
 * immutable version of that history.
 */

export const DWEB_SCHEME = 'awx';

export interface DwebAddress {
  readonly scheme: typeof DWEB_SCHEME;
  readonly identifier: string;
  readonly path: string;
  /** Positive integer, or undefined for "latest" */
  readonly requestedVersion?: number;
}

export interface Snapshot {
  readonly identifier: string;
  readonly version: number;
  readonly contentRoot: string;
}

export interface VersionBounds {
  readonly minVersion: number;
  readonly maxVersion: number;
}

// ==========================================
// Errors
// ==========================================

export type ParseErrorCode =
  | 'invalid-version'
  | 'empty-identifier'
  | 'unsupported-scheme'
  | 'malformed';

export interface ParseError {
  readonly kind: 'parse';
  readonly code: ParseErrorCode;
  readonly message: string;
}

export type ResolveErrorCode = 'not-found' | 'unavailable' | 'invalid-version';

export interface ResolveError {
  readonly kind: 'resolve';
  readonly code: ResolveErrorCode;
  readonly message: string;
  /** Only `unavailable` is worth retrying */
  readonly retryable: boolean;
}

export type NavigationError = ParseError | ResolveError;

export type ParseResult =
  | { ok: true; address: DwebAddress }
  | { ok: false; error: ParseError };

export type ResolveResult =
  | { ok: true; snapshot: Snapshot; bounds: VersionBounds }
  | { ok: false; error: ResolveError };

// ==========================================
// Navigation session
// ==========================================

export type NavigationStatus =
  | { kind: 'idle' }
  | { kind: 'resolving'; requestId: number }
  | { kind: 'loaded'; snapshot: Snapshot }
  | { kind: 'failed'; error: NavigationError };

export interface VersionControlState {
  enabled: boolean;
  version: number;
  maxVersion: number;
}

export interface NavigationState {
  readonly address: DwebAddress | null;
  /** 0 means latest */
  readonly requestedVersion: number;
  readonly resolvedVersion: number;
  readonly maxVersion: number;
  readonly status: NavigationStatus;
  readonly requestId: number;
  /** Formatted address of the loaded snapshot */
  readonly canonicalAddress: string | null;
  readonly versionControl: VersionControlState;
}

/**
 * The embedded viewer as seen from the session. `display` is fire and
 * forget; load completion comes back through `NavigationSession.viewerLoaded`.
 */
export interface ContentViewer {
  display(contentRoot: string, canonicalAddress: string): void;
}

export interface LaunchArgs {
  address?: string;
  version?: number;
}

export interface ExampleSite {
  label: string;
  address: string;
  description?: string;
}
