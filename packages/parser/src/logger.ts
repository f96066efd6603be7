/**
 * Logger interface for analysis operations.
 * Analyzers take one as their diagnostics sink so the same code can log
 * to the terminal from the CLI and stay quiet when embedded as a library.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Simple console-based logger.
 *
 * WARNING: writes info to stdout. Do NOT use it where stdout carries a
 * machine-readable report (e.g. `--format json`); use createStderrLogger.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[info] ${message}`),
  warning: (message: string) => console.warn(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.debug(`[debug] ${message}`),
};

/** Logger that discards everything. Library default. */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Logger writing every level to stderr, so stdout stays clean for reports.
 * Debug lines are dropped unless `verbose` is set.
 */
export function createStderrLogger(opts?: { verbose?: boolean }): Logger {
  const verbose = opts?.verbose ?? false;
  const write = (level: string, message: string) => {
    process.stderr.write(`[${level}] ${message}\n`);
  };

  return {
    info: (message: string) => write('info', message),
    warning: (message: string) => write('warning', message),
    error: (message: string) => write('error', message),
    debug: (message: string) => {
      if (verbose) write('debug', message);
    },
  };
}
