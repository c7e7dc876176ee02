import { useEffect, useState, type FormEvent } from 'react';
import { Globe, Loader2, RotateCw } from 'lucide-react';
import { motion } from 'framer-motion';
import { useBrowser } from '../../contexts/useBrowser';
import { useNavigationSession } from '../../hooks/useNavigationSession';

export function AddressBar() {
  const { page } = useBrowser();
  const { state, isResolving, navigate, reload } = useNavigationSession();
  const [text, setText] = useState(state.canonicalAddress ?? '');
  const displaySeq = page?.seq ?? 0;

  // Show the address that was actually loaded, version included, after every
  // load, even when it matches the previous one
  useEffect(() => {
    if (state.canonicalAddress) {
      setText(state.canonicalAddress);
    }
  }, [state.canonicalAddress, displaySeq]);

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!text.trim()) return;
    void navigate(text);
  };

  return (
    <form aria-label="Address" onSubmit={handleSubmit} className="flex flex-1 items-center gap-2 min-w-0">
      <div className="relative flex-1 min-w-0">
        <div className="absolute left-3 top-1/2 -translate-y-1/2 pointer-events-none">
          {isResolving ? (
            <Loader2 className="w-4 h-4 text-orange-500 animate-spin" />
          ) : (
            <Globe className="w-4 h-4 text-neutral-400" />
          )}
        </div>
        <input
          type="text"
          aria-label="Site address"
          value={text}
          onChange={(event) => setText(event.target.value)}
          placeholder="awx://<site history address>"
          spellCheck={false}
          className="w-full pl-9 pr-3 py-2 text-sm font-mono rounded-xl bg-neutral-100 dark:bg-neutral-800 text-neutral-900 dark:text-white border border-transparent focus:border-orange-500 focus:outline-none transition-colors"
        />
      </div>
      <motion.button
        type="button"
        aria-label="Reload"
        onClick={() => void reload()}
        disabled={!state.address || isResolving}
        whileTap={{ scale: 0.95 }}
        className="p-2 rounded-lg text-neutral-500 hover:bg-neutral-100 dark:hover:bg-neutral-800 disabled:opacity-40 transition-colors"
      >
        <RotateCw className="w-4 h-4" />
      </motion.button>
    </form>
  );
}
