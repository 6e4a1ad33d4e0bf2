/**
 * Tagged console logger. Everything goes to stderr so stdout stays free for
 * the MCP stdio transport.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let debugEnabled = false;
let silenced = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Suppress all output (used by the test suite)
 */
export function setSilent(silent: boolean): void {
  silenced = silent;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (debugEnabled && !silenced) {
        console.error(`[DEBUG] ${prefix} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      if (!silenced) console.error(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (!silenced) console.error(`${prefix} ⚠️ ${message}`, ...details);
    },
    error(message, ...details) {
      if (!silenced) console.error(`${prefix} ✗ ${message}`, ...details);
    },
  };
}
