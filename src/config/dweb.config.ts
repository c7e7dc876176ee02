/**
 * Browser Configuration
 *
 * Gateway endpoints and resolution settings for the versioned site browser.
 * Every value can be overridden through a VITE_* environment variable.
 */

const DEFAULT_GATEWAY_URL = 'http://localhost:8080';

/**
 * Parse a positive integer from an environment variable.
 * Returns undefined when unset or not a positive integer.
 */
export function parsePositiveInt(envValue: string | undefined): number | undefined {
  if (!envValue || !/^\d+$/.test(envValue.trim())) {
    return undefined;
  }
  const parsed = Number(envValue.trim());
  return parsed > 0 ? parsed : undefined;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export const DWEB_CONFIG = {
  /**
   * HTTP gateway serving history bounds, snapshots and site content.
   * Override with VITE_GATEWAY_URL
   */
  GATEWAY_URL: trimTrailingSlash(import.meta.env.VITE_GATEWAY_URL || DEFAULT_GATEWAY_URL),

  /** Query parameter carrying the site version */
  VERSION_PARAM: 'v',

  /**
   * Resolver timeout in milliseconds. Unset means no timeout, a slow
   * lookup simply stays in progress until superseded.
   */
  RESOLVE_TIMEOUT_MS: parsePositiveInt(import.meta.env.VITE_RESOLVE_TIMEOUT_MS),

  /** Immutable snapshots kept in the resolver cache */
  SNAPSHOT_CACHE_SIZE: 64,
} as const;

/**
 * Whether the browser talks to a local test network.
 * Only used to pick which example catalog is offered.
 */
export function isLocalNetwork(): boolean {
  return import.meta.env.VITE_LOCAL_NETWORK === 'true';
}

/** URL the embedded viewer loads for a snapshot's content */
export function buildContentUrl(contentRoot: string, path: string): string {
  const resourcePath = path.startsWith('/') ? path : `/${path}`;
  return `${DWEB_CONFIG.GATEWAY_URL}/content/${encodeURIComponent(contentRoot)}${resourcePath}`;
}
