/**
 * NavigationSession - owns the one "current page" of the browser.
 *
 * Every navigation gets a fresh request id. A resolution is applied only
 * if its id is still the latest one issued and the session is still
 * waiting on it; anything older is dropped without a trace. Superseded
 * lookups are never aborted, only ignored when they complete.
 *
 * Failures never touch the viewer, so the previous page stays visible
 * until a replacement has actually been resolved. The version control is
 * usable again after a failure if that page had finished loading.
 */

import type {
  ContentViewer,
  DwebAddress,
  NavigationError,
  NavigationState,
  ResolveResult,
} from '../types/dweb';
import { formatDwebAddress, parseDwebAddress } from '../utils/dwebAddress';
import type { HistoryResolver } from './HistoryResolver';

export type NavigationListener = (state: NavigationState) => void;

export const INITIAL_NAVIGATION_STATE: NavigationState = {
  address: null,
  requestedVersion: 0,
  resolvedVersion: 0,
  maxVersion: 0,
  status: { kind: 'idle' },
  requestId: 0,
  canonicalAddress: null,
  versionControl: { enabled: false, version: 0, maxVersion: 0 },
};

/** 0, undefined and NaN (an empty number input) all mean "latest" */
function normalizeRequestedVersion(version: number | undefined): number {
  return version === undefined || Number.isNaN(version) ? 0 : version;
}

export class NavigationSession {
  private state: NavigationState = INITIAL_NAVIGATION_STATE;
  private readonly listeners = new Set<NavigationListener>();
  /** The page currently in the viewer has reported load */
  private viewerReady = false;

  constructor(
    private readonly resolver: HistoryResolver,
    private readonly viewer: ContentViewer
  ) {}

  getState(): NavigationState {
    return this.state;
  }

  subscribe(listener: NavigationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Navigate to user or launch input. A `v` parameter inside `raw` wins
   * over `requestedVersion`.
   *
   * The returned promise settles once this navigation's resolution has been
   * applied or discarded; it never rejects.
   */
  navigate(raw: string, requestedVersion?: number): Promise<void> {
    const parsed = parseDwebAddress(raw);
    if (!parsed.ok) {
      console.warn(`🧭 [Navigation] ${parsed.error.message}`);
      this.fail(parsed.error);
      return Promise.resolve();
    }

    const version = parsed.address.requestedVersion ?? normalizeRequestedVersion(requestedVersion);
    return this.begin(parsed.address, version);
  }

  /** The version field was submitted: same address, different version */
  submitVersion(version: number): Promise<void> {
    const { address } = this.state;
    if (!address) {
      console.warn('🧭 [Navigation] Version submitted before any address was entered');
      return Promise.resolve();
    }
    return this.begin(address, normalizeRequestedVersion(version));
  }

  /** Re-issue the last navigation, e.g. after an `unavailable` failure */
  reload(): Promise<void> {
    const { address, requestedVersion } = this.state;
    if (!address) {
      return Promise.resolve();
    }
    return this.begin(address, requestedVersion);
  }

  /**
   * The embedded viewer finished loading. Makes the resolved version and
   * bounds authoritative for the version control; status is unchanged.
   */
  viewerLoaded(): void {
    const { status, resolvedVersion, maxVersion } = this.state;
    if (status.kind !== 'loaded') {
      console.debug(`🧭 [Navigation] Ignoring viewer load while ${status.kind}`);
      return;
    }
    this.viewerReady = true;
    this.setState({
      ...this.state,
      versionControl: { enabled: true, version: resolvedVersion, maxVersion },
    });
  }

  private async begin(address: DwebAddress, requestedVersion: number): Promise<void> {
    const requestId = this.state.requestId + 1;
    console.log(`🧭 [Navigation] #${requestId} ${formatDwebAddress(address)} (requested version ${requestedVersion || 'latest'})`);

    this.setState({
      ...this.state,
      address,
      requestedVersion,
      requestId,
      status: { kind: 'resolving', requestId },
      versionControl: { ...this.state.versionControl, enabled: false },
    });

    const result = await this.resolver.resolve(
      address.identifier,
      requestedVersion === 0 ? undefined : requestedVersion
    );
    this.complete(requestId, address, result);
  }

  private complete(requestId: number, address: DwebAddress, result: ResolveResult): void {
    const { status } = this.state;
    if (requestId !== this.state.requestId || status.kind !== 'resolving' || status.requestId !== requestId) {
      console.debug(`🧭 [Navigation] Discarding stale resolution #${requestId} (current #${this.state.requestId})`);
      return;
    }

    if (!result.ok) {
      console.warn(`🧭 [Navigation] #${requestId} failed: ${result.error.message}`);
      this.fail(result.error);
      return;
    }

    const { snapshot, bounds } = result;
    const canonicalAddress = formatDwebAddress(address, snapshot.version);
    this.viewerReady = false;
    this.setState({
      ...this.state,
      resolvedVersion: snapshot.version,
      maxVersion: bounds.maxVersion,
      status: { kind: 'loaded', snapshot },
      canonicalAddress,
    });

    try {
      this.viewer.display(snapshot.contentRoot, canonicalAddress);
    } catch (error) {
      console.error(`🧭 [Navigation] Viewer failed to display ${canonicalAddress}:`, error);
    }
  }

  private fail(error: NavigationError): void {
    this.setState({
      ...this.state,
      status: { kind: 'failed', error },
      versionControl: { ...this.state.versionControl, enabled: this.viewerReady },
    });
  }

  private setState(next: NavigationState): void {
    this.state = next;
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        console.error('🧭 [Navigation] Listener threw:', error);
      }
    }
  }
}
