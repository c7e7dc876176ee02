import { AddressBar } from './AddressBar';
import { VersionControl } from './VersionControl';
import { ContentViewer } from './ContentViewer';
import { NavigationStatusBanner } from './NavigationStatusBanner';
import { ExampleSitesMenu } from './ExampleSitesMenu';
import { ThemeToggle } from './ThemeToggle';

export function BrowserShell() {
  return (
    <div className="h-screen flex flex-col bg-neutral-50 dark:bg-neutral-900">
      <header className="flex items-center gap-3 px-3 py-2 border-b border-neutral-200 dark:border-neutral-800/50 bg-white/80 dark:bg-neutral-900/80 backdrop-blur-2xl">
        <AddressBar />
        <VersionControl />
        <ThemeToggle />
      </header>
      <ExampleSitesMenu />
      <NavigationStatusBanner />
      <ContentViewer />
    </div>
  );
}
