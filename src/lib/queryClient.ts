import { QueryClient } from '@tanstack/react-query';
import { QUERY_KEYS } from '../config/queryKeys';

export { QUERY_KEYS };

/**
 * Shared QueryClient instance for TanStack Query.
 *
 * Catalogs change rarely, so data stays fresh for five minutes and is
 * never refetched just because the window regained focus.
 */
export const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      refetchOnWindowFocus: false,
      retry: 1,
      staleTime: 5 * 60 * 1000,
      gcTime: 10 * 60 * 1000,
    },
  },
});
