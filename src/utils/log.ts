/**
 * Progress logging.
 *
 * Components take a `Logger` in their options instead of writing to the
 * console directly, so the CLI can route progress to stderr when stdout
 * carries a payload, or silence it with --quiet.
 */

export type Logger = (...args: unknown[]) => void;

export interface LoggerOptions {
  verbose?: boolean;
  /** Write to stderr instead of stdout */
  stderr?: boolean;
}

export const silentLogger: Logger = () => {};

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = true, stderr = false } = options;
  if (!verbose) return silentLogger;
  return stderr
    ? (...args: unknown[]) => console.error(...args)
    : (...args: unknown[]) => console.log(...args);
}
