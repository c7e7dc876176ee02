import type { NavigationSession } from './NavigationSession';

/**
 * Feeds the address and version the browser was launched with into the
 * session. Only the first call counts; launch arguments are consumed once
 * per process, unlike interactive navigation which can repeat forever.
 */
export class StartupHandoff {
  private consumed = false;
  private readonly session: NavigationSession;

  constructor(session: NavigationSession) {
    this.session = session;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  takeInitial(address?: string, version?: number): Promise<void> {
    if (this.consumed) {
      return Promise.resolve();
    }
    this.consumed = true;

    if (!address) {
      console.log('🚀 [Startup] No launch address, starting idle');
      return Promise.resolve();
    }

    console.log(`🚀 [Startup] Opening launch address ${address}${version ? ` at version ${version}` : ''}`);
    return this.session.navigate(address, version);
  }
}
