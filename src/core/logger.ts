export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Writes to the console, prefixing every line with the component name
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly prefix: string = '[sas-records]') {}

  log(message: string): void {
    console.log(`${this.prefix} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${this.prefix} ${message}`);
  }

  error(message: string): void {
    console.error(`${this.prefix} ${message}`);
  }
}

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const defaultLogger = new ConsoleLogger();
