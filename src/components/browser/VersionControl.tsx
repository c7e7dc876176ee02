import { useEffect, useState, type FormEvent } from 'react';
import { ChevronLeft, ChevronRight, History } from 'lucide-react';
import { useNavigationSession } from '../../hooks/useNavigationSession';

/**
 * Version input for the current site. Disabled until the viewer reports
 * that the resolved version has finished loading.
 */
export function VersionControl() {
  const { state, submitVersion } = useNavigationSession();
  const { enabled, version, maxVersion } = state.versionControl;
  const [draft, setDraft] = useState(version > 0 ? String(version) : '');

  useEffect(() => {
    setDraft(version > 0 ? String(version) : '');
  }, [version]);

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    // Empty input means latest
    void submitVersion(draft.trim() === '' ? 0 : Number(draft));
  };

  return (
    <form aria-label="Version" onSubmit={handleSubmit} className="flex items-center gap-1 shrink-0">
      <History className="w-4 h-4 text-neutral-400" />
      <button
        type="button"
        aria-label="Older version"
        disabled={!enabled || version <= 1}
        onClick={() => void submitVersion(version - 1)}
        className="p-1.5 rounded-lg text-neutral-500 hover:bg-neutral-100 dark:hover:bg-neutral-800 disabled:opacity-40"
      >
        <ChevronLeft className="w-4 h-4" />
      </button>
      <input
        type="number"
        aria-label="Site version"
        min={1}
        max={maxVersion > 0 ? maxVersion : undefined}
        step={1}
        value={draft}
        disabled={!enabled}
        onChange={(event) => setDraft(event.target.value)}
        className="w-16 px-2 py-1.5 text-sm text-center rounded-lg bg-neutral-100 dark:bg-neutral-800 text-neutral-900 dark:text-white disabled:opacity-50 focus:outline-none focus:ring-1 focus:ring-orange-500"
      />
      <button
        type="button"
        aria-label="Newer version"
        disabled={!enabled || version >= maxVersion}
        onClick={() => void submitVersion(version + 1)}
        className="p-1.5 rounded-lg text-neutral-500 hover:bg-neutral-100 dark:hover:bg-neutral-800 disabled:opacity-40"
      >
        <ChevronRight className="w-4 h-4" />
      </button>
      <span className="text-xs text-neutral-500 dark:text-neutral-400 whitespace-nowrap">
        {maxVersion > 0 ? `of ${maxVersion}` : ''}
      </span>
    </form>
  );
}
