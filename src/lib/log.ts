// Tagged console logging, greppable by run and variant:
//   [assess:BRAF:V600E] assessment complete { tier: 'Tier I', confidence: 0.95 }

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export type Logger = {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
};

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const args = (message: string, context?: Record<string, unknown>) =>
    context === undefined ? [prefix, message] : [prefix, message, context];

  return {
    debug: (message, context) => {
      if (verbose) console.debug(...args(message, context));
    },
    info: (message, context) => console.log(...args(message, context)),
    warn: (message, context) => console.warn(...args(message, context)),
    error: (message, context) => console.error(...args(message, context)),
  };
}
