import { BookOpen } from 'lucide-react';
import { useExampleSites } from '../../hooks/useExampleSites';
import { useNavigationSession } from '../../hooks/useNavigationSession';

export function ExampleSitesMenu() {
  const { data: sites, isLoading } = useExampleSites();
  const { navigate } = useNavigationSession();

  if (isLoading || !sites || sites.length === 0) {
    return null;
  }

  return (
    <nav aria-label="Example sites" className="flex items-center gap-1 px-3 py-1.5 border-b border-neutral-200 dark:border-neutral-800/50 overflow-x-auto">
      <BookOpen className="w-3.5 h-3.5 text-neutral-400 shrink-0" />
      {sites.map((site) => (
        <button
          key={site.address}
          type="button"
          title={site.description ?? site.address}
          onClick={() => void navigate(site.address)}
          className="px-2.5 py-1 text-xs font-medium rounded-lg whitespace-nowrap text-neutral-600 dark:text-neutral-400 hover:bg-neutral-200/60 dark:hover:bg-neutral-700/40 transition-colors"
        >
          {site.label}
        </button>
      ))}
    </nav>
  );
}
