/**
 * ExampleSitesService - the catalog of example addresses offered to the
 * user. Local test networks and the public network publish different
 * sites, so the catalog is chosen by network; resolution is unaffected.
 */

import type { ExampleSite } from '../types/dweb';
import { ExampleCatalogSchema } from './types/HistoryTypes';
import { DWEB_CONFIG } from '../config/dweb.config';
import bundledCatalogs from '../data/exampleSites.json';

export type CatalogName = 'local' | 'public';

export function catalogNameFor(localNetwork: boolean): CatalogName {
  return localNetwork ? 'local' : 'public';
}

export function getBundledCatalog(name: CatalogName): ExampleSite[] {
  return ExampleCatalogSchema.parse(bundledCatalogs[name]);
}

/**
 * Fetch the catalog published by the gateway, falling back to the copy
 * bundled with the app when the gateway has none or cannot be reached.
 */
export async function fetchExampleSites(
  localNetwork: boolean,
  gatewayUrl: string = DWEB_CONFIG.GATEWAY_URL
): Promise<ExampleSite[]> {
  const name = catalogNameFor(localNetwork);
  const url = `${gatewayUrl}/catalog/${name}.json`;

  try {
    const response = await fetch(url, { headers: { Accept: 'application/json' } });
    if (!response.ok) {
      console.warn(`📚 [Catalog] Gateway returned ${response.status} for ${name} catalog, using bundled copy`);
      return getBundledCatalog(name);
    }

    const result = ExampleCatalogSchema.safeParse(await response.json());
    if (!result.success) {
      console.warn(`📚 [Catalog] Invalid ${name} catalog from gateway:`, result.error.format());
      return getBundledCatalog(name);
    }
    return result.data;
  } catch (error) {
    console.warn(`📚 [Catalog] Failed to fetch ${name} catalog, using bundled copy:`, error);
    return getBundledCatalog(name);
  }
}
