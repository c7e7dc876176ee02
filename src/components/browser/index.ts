export { BrowserShell } from './BrowserShell';
export { AddressBar } from './AddressBar';
export { VersionControl } from './VersionControl';
export { ContentViewer } from './ContentViewer';
export { NavigationStatusBanner } from './NavigationStatusBanner';
export { ExampleSitesMenu } from './ExampleSitesMenu';
export { ThemeToggle } from './ThemeToggle';
