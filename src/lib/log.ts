import { isDebugEnabled } from '@/lib/env';

export type Logger = {
  debug: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

// Everything goes to stderr so stdout stays free for CSV output.
export function createLogger(
  scope: string,
  options: { debug?: boolean } = {},
): Logger {
  const debugEnabled = options.debug ?? isDebugEnabled();
  return {
    debug: (message) => {
      if (!debugEnabled) return;
      console.error(`[${scope}] ${message}`);
    },
    warn: (message) => console.error(`[${scope}] warning: ${message}`),
    error: (message) => console.error(`[${scope}] ${message}`),
  };
}
