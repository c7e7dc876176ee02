export { BrowserProvider } from './BrowserProvider';
export { useBrowser } from './useBrowser';
export { BrowserContext } from './BrowserContext';
export type { BrowserContextType, DisplayedPage } from './BrowserContext';
