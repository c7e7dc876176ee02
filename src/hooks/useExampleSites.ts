import { useQuery } from '@tanstack/react-query';
import { QUERY_KEYS } from '../config/queryKeys';
import { isLocalNetwork } from '../config/dweb.config';
import { catalogNameFor, fetchExampleSites } from '../services/ExampleSitesService';

/**
 * Example addresses for the current network.
 */
export function useExampleSites(localNetwork: boolean = isLocalNetwork()) {
  return useQuery({
    queryKey: QUERY_KEYS.EXAMPLE_SITES(catalogNameFor(localNetwork)),
    queryFn: () => fetchExampleSites(localNetwork),
  });
}
