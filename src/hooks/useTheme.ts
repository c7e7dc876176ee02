import { useQuery, useQueryClient } from '@tanstack/react-query';
import { useCallback, useEffect } from 'react';
import { QUERY_KEYS } from '../config/queryKeys';

export type Theme = 'light' | 'dark';

export const THEME_STORAGE_KEY = 'site-browser-theme';

const DARK_QUERY = '(prefers-color-scheme: dark)';

function getStoredTheme(): Theme {
  const stored = localStorage.getItem(THEME_STORAGE_KEY);
  if (stored === 'light' || stored === 'dark') {
    return stored;
  }
  // No explicit choice yet: follow the system
  return window.matchMedia(DARK_QUERY).matches ? 'dark' : 'light';
}

function applyTheme(theme: Theme) {
  const root = document.documentElement;
  root.classList.toggle('dark', theme === 'dark');
  root.classList.toggle('light', theme === 'light');
}

/**
 * Light/dark theme of the browser chrome. Drives the `.dark` class the
 * Tailwind `dark:` variant keys on; the viewed site is unaffected.
 */
export function useTheme() {
  const queryClient = useQueryClient();

  const { data: theme = 'light' } = useQuery<Theme>({
    queryKey: QUERY_KEYS.THEME,
    queryFn: getStoredTheme,
    staleTime: Infinity,
    gcTime: Infinity,
  });

  useEffect(() => {
    applyTheme(theme);
  }, [theme]);

  useEffect(() => {
    const mediaQuery = window.matchMedia(DARK_QUERY);

    const handleChange = (event: MediaQueryListEvent) => {
      // A stored choice wins over the system
      if (!localStorage.getItem(THEME_STORAGE_KEY)) {
        queryClient.setQueryData<Theme>(QUERY_KEYS.THEME, event.matches ? 'dark' : 'light');
      }
    };

    mediaQuery.addEventListener('change', handleChange);
    return () => mediaQuery.removeEventListener('change', handleChange);
  }, [queryClient]);

  const setTheme = useCallback((next: Theme) => {
    localStorage.setItem(THEME_STORAGE_KEY, next);
    queryClient.setQueryData<Theme>(QUERY_KEYS.THEME, next);
  }, [queryClient]);

  const toggleTheme = useCallback(() => {
    setTheme(theme === 'dark' ? 'light' : 'dark');
  }, [theme, setTheme]);

  return {
    theme,
    setTheme,
    toggleTheme,
    isDark: theme === 'dark',
  };
}
