/**
 * Sink for degraded-path warnings. `console` satisfies it.
 */
export interface Logger {
  warn(message: string): void;
}

export const defaultLogger: Logger = console;

/**
 * Emit a `[tag] message` warning.
 */
export function logWarn(logger: Logger, tag: string, message: string): void {
  logger.warn(`[${tag}] ${message}`);
}

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "warn" in value &&
    typeof value.warn === "function"
  );
}
