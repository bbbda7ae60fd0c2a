export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
}

// stdout carries the calendar text, so every diagnostic goes to stderr.
export function createConsoleLogger(options: { quiet?: boolean } = {}): Logger {
  const quiet = options.quiet ?? false;
  return {
    info(message) {
      if (!quiet) {
        console.error(message);
      }
    },
    warn(message) {
      if (!quiet) {
        console.error(`warning: ${message}`);
      }
    },
    error(message, cause) {
      if (cause === undefined) {
        console.error(message);
      } else {
        console.error(message, cause);
      }
    },
  };
}
