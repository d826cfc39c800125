export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger for interactive CLI use: progress on stdout, problems on stderr.
 */
export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.error(message),
  error: (message) => console.error(message),
};

/**
 * Logger for stdio servers. Everything goes to stderr since stdout carries the protocol.
 */
export const stderrLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(message),
  error: (message) => console.error(message),
};

/**
 * Logger that keeps messages in memory, for callers that report them some other way.
 */
export class BufferedLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(message);
  }

  warn(message: string): void {
    this.lines.push(message);
  }

  error(message: string): void {
    this.lines.push(message);
  }

  drain(): string[] {
    return this.lines.splice(0, this.lines.length);
  }
}
