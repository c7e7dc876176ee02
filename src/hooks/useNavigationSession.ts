/**
 * useNavigationSession - current navigation state plus the actions that
 * drive it. Re-renders on every session transition.
 */

import { useCallback, useSyncExternalStore } from 'react';
import { useBrowser } from '../contexts/useBrowser';
import type { NavigationState } from '../types/dweb';

export interface NavigationSessionApi {
  state: NavigationState;
  isResolving: boolean;
  navigate: (raw: string, requestedVersion?: number) => Promise<void>;
  submitVersion: (version: number) => Promise<void>;
  reload: () => Promise<void>;
  viewerLoaded: () => void;
}

export function useNavigationSession(): NavigationSessionApi {
  const { session } = useBrowser();

  const subscribe = useCallback((onChange: () => void) => session.subscribe(onChange), [session]);
  const getSnapshot = useCallback(() => session.getState(), [session]);
  const state = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);

  const navigate = useCallback(
    (raw: string, requestedVersion?: number) => session.navigate(raw, requestedVersion),
    [session]
  );
  const submitVersion = useCallback((version: number) => session.submitVersion(version), [session]);
  const reload = useCallback(() => session.reload(), [session]);
  const viewerLoaded = useCallback(() => session.viewerLoaded(), [session]);

  return {
    state,
    isResolving: state.status.kind === 'resolving',
    navigate,
    submitVersion,
    reload,
    viewerLoaded,
  };
}
