/**
 * Component-prefixed logging on stderr
 * stdout belongs to the MCP stdio transport, so nothing here writes to it
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Create a logger whose lines read `[Component] message`.
 * Lines are dropped under NODE_ENV=test; debug lines need TRIAGE_DEBUG=1.
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  const silenced = () => process.env.NODE_ENV === 'test';

  return {
    debug(message: string): void {
      if (silenced() || process.env.TRIAGE_DEBUG !== '1') return;
      console.error(`${prefix} ${message}`);
    },
    info(message: string): void {
      if (silenced()) return;
      console.error(`${prefix} ${message}`);
    },
    warn(message: string): void {
      if (silenced()) return;
      console.error(`${prefix} WARN: ${message}`);
    },
    error(message: string, error?: unknown): void {
      if (silenced()) return;
      if (error === undefined) {
        console.error(`${prefix} ERROR: ${message}`);
      } else {
        console.error(`${prefix} ERROR: ${message}`, error);
      }
    },
  };
}
