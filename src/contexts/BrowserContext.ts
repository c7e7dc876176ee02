/**
 * Browser context types and context definition
 *
 * Separated from BrowserProvider for React Fast Refresh compliance.
 */

import { createContext } from 'react';
import type { NavigationSession } from '../services/NavigationSession';

/** What the embedded viewer was last told to show */
export interface DisplayedPage {
  contentRoot: string;
  canonicalAddress: string;
  /** Bumped on every display so the same page can be shown again */
  seq: number;
}

export interface BrowserContextType {
  session: NavigationSession;
  page: DisplayedPage | null;
}

export const BrowserContext = createContext<BrowserContextType | undefined>(undefined);
