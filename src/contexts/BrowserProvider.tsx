import React, { useEffect, useState, type ReactNode } from 'react';
import { BrowserContext, type DisplayedPage } from './BrowserContext';
import { NavigationSession } from '../services/NavigationSession';
import { HistoryResolver } from '../services/HistoryResolver';
import { GatewayHistoryStore } from '../services/GatewayHistoryStore';
import { StartupHandoff } from '../services/StartupHandoff';
import type { HistoryStore } from '../services/types/HistoryTypes';
import { DWEB_CONFIG } from '../config/dweb.config';
import { readLaunchArgs } from '../utils/launchArgs';

interface BrowserProviderProps {
  children: ReactNode;
  /** Defaults to the HTTP gateway */
  store?: HistoryStore;
  /** Query string carrying the launch address (defaults to the page's own) */
  launchSearch?: string;
}

interface BrowserRuntime {
  session: NavigationSession;
  handoff: StartupHandoff;
}

export const BrowserProvider: React.FC<BrowserProviderProps> = ({ children, store, launchSearch }) => {
  const [page, setPage] = useState<DisplayedPage | null>(null);

  // One session per process: created on first render, never replaced
  const [runtime] = useState<BrowserRuntime>(() => {
    const resolver = new HistoryResolver(store ?? new GatewayHistoryStore(), {
      timeoutMs: DWEB_CONFIG.RESOLVE_TIMEOUT_MS,
    });
    const session = new NavigationSession(resolver, {
      display: (contentRoot, canonicalAddress) => {
        setPage((previous) => ({ contentRoot, canonicalAddress, seq: (previous?.seq ?? 0) + 1 }));
      },
    });
    return { session, handoff: new StartupHandoff(session) };
  });

  useEffect(() => {
    // StrictMode runs this twice; the handoff only honours the first call
    const { address, version } = readLaunchArgs(launchSearch ?? window.location.search);
    void runtime.handoff.takeInitial(address, version);
  }, [runtime, launchSearch]);

  return (
    <BrowserContext.Provider value={{ session: runtime.session, page }}>
      {children}
    </BrowserContext.Provider>
  );
};
