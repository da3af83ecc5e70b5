export interface LoggerBackend {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

const PREFIX = "[phrase-curator]";

let backend: LoggerBackend = console;
let debugEnabled = false;

/**
 * Point the module-level logger at a backend. Call once early with debug
 * off, then again after config has been parsed.
 */
export function initLogger(next: LoggerBackend, debug: boolean): void {
  backend = next;
  debugEnabled = debug;
}

export const log = {
  debug(msg: string, ...args: unknown[]): void {
    if (!debugEnabled) return;
    backend.debug(`${PREFIX} ${msg}`, ...args);
  },
  info(msg: string, ...args: unknown[]): void {
    backend.info(`${PREFIX} ${msg}`, ...args);
  },
  warn(msg: string, ...args: unknown[]): void {
    backend.warn(`${PREFIX} ${msg}`, ...args);
  },
  error(msg: string, ...args: unknown[]): void {
    backend.error(`${PREFIX} ${msg}`, ...args);
  },
};
