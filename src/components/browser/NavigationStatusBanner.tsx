import { AlertTriangle, RotateCw } from 'lucide-react';
import { useNavigationSession } from '../../hooks/useNavigationSession';
import type { NavigationError } from '../../types/dweb';

function describeError(error: NavigationError): string {
  if (error.kind === 'parse') {
    switch (error.code) {
      case 'invalid-version':
        return 'The version in this address is not a number.';
      case 'empty-identifier':
        return 'This address does not name a site.';
      case 'unsupported-scheme':
        return 'Only awx:// addresses can be opened here.';
      case 'malformed':
        return 'This address could not be read.';
    }
  }
  switch (error.code) {
    case 'not-found':
      return 'No site history was found at this address.';
    case 'invalid-version':
      return 'Site versions start at 1.';
    case 'unavailable':
      return 'The network could not be reached. Try again in a moment.';
  }
}

export function NavigationStatusBanner() {
  const { state, reload } = useNavigationSession();
  const { status } = state;

  if (status.kind !== 'failed') {
    return null;
  }

  const { error } = status;
  const retryable = error.kind === 'resolve' && error.retryable;

  return (
    <div role="alert" className="flex items-center gap-3 px-4 py-2 text-sm border-b border-red-500/20 bg-red-500/10 text-red-700 dark:text-red-300">
      <AlertTriangle className="w-4 h-4 shrink-0" />
      <span className="flex-1">{describeError(error)}</span>
      {retryable && (
        <button
          type="button"
          onClick={() => void reload()}
          className="flex items-center gap-1 px-2 py-1 rounded-lg hover:bg-red-500/10 transition-colors"
        >
          <RotateCw className="w-3.5 h-3.5" />
          Retry
        </button>
      )}
    </div>
  );
}
