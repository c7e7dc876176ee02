import { AnimatePresence, motion } from 'framer-motion';
import { Compass, Loader2 } from 'lucide-react';
import { useBrowser } from '../../contexts/useBrowser';
import { useNavigationSession } from '../../hooks/useNavigationSession';
import { buildContentUrl } from '../../config/dweb.config';
import { parseDwebAddress } from '../../utils/dwebAddress';

export function ContentViewer() {
  const { page } = useBrowser();
  const { isResolving, viewerLoaded } = useNavigationSession();

  const parsed = page ? parseDwebAddress(page.canonicalAddress) : null;
  const src = page && parsed?.ok ? buildContentUrl(page.contentRoot, parsed.address.path) : null;

  return (
    <div className="relative flex-1 min-h-0 bg-white dark:bg-neutral-950">
      <AnimatePresence>
        {isResolving && (
          <motion.div
            key="resolving"
            initial={{ opacity: 0 }}
            animate={{ opacity: 1 }}
            exit={{ opacity: 0 }}
            className="absolute inset-0 z-10 flex items-center justify-center bg-white/70 dark:bg-neutral-900/70"
          >
            <div className="flex flex-col items-center gap-3">
              <Loader2 className="w-8 h-8 text-orange-500 animate-spin" />
              <span className="text-sm text-neutral-500 dark:text-neutral-400">Resolving site version...</span>
            </div>
          </motion.div>
        )}
      </AnimatePresence>

      {src && page ? (
        <iframe
          // A new key per display, so showing the same URL again still fires onLoad
          key={page.seq}
          src={src}
          title={page.canonicalAddress}
          className="w-full h-full border-0"
          onLoad={viewerLoaded}
          sandbox="allow-scripts allow-forms allow-popups"
        />
      ) : (
        <div className="h-full flex flex-col items-center justify-center gap-3 text-neutral-400">
          <Compass className="w-10 h-10" />
          <p className="text-sm">Enter a site address to start browsing</p>
        </div>
      )}
    </div>
  );
}
