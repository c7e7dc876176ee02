import { useContext } from 'react';
import { BrowserContext } from './BrowserContext';
import type { BrowserContextType } from './BrowserContext';

export const useBrowser = (): BrowserContextType => {
  const context = useContext(BrowserContext);
  if (!context) {
    throw new Error('useBrowser must be used within BrowserProvider');
  }
  return context;
};
