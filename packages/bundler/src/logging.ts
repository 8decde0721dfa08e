import type { BundleLogEvent } from './types.js';

export type Logger = (event: BundleLogEvent) => void;

export interface LoggerOptions {
  readonly pretty?: boolean;
  /**
   * Defaults to stderr. Stdout belongs to the `cargo:rerun-if-changed`
   * directives, which the host build parses line by line.
   */
  readonly stream?: NodeJS.WritableStream;
}

export function formatLogEvent(event: BundleLogEvent, pretty = false): string {
  return `${JSON.stringify(event, undefined, pretty ? 2 : undefined)}\n`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { pretty = false, stream = process.stderr } = options;
  return (event) => {
    stream.write(formatLogEvent(event, pretty));
  };
}

/** Used when the caller does not ask for events. */
export const silentLogger: Logger = () => {};
