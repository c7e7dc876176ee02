import { BrowserProvider } from './contexts';
import { BrowserShell } from './components/browser';

export default function App() {
  return (
    <BrowserProvider>
      <BrowserShell />
    </BrowserProvider>
  );
}
