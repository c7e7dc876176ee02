/**
 * TanStack Query keys, kept in one place so invalidation and tests agree.
 */
export const QUERY_KEYS = {
  EXAMPLE_SITES: (catalog: 'local' | 'public') => ['example-sites', catalog] as const,
  THEME: ['theme'] as const,
} as const;
