/**
 * Logging contract shared by the runner, the debug controller and the CLI.
 *
 * Components take a Logger through their options and default to ConsoleLogger.
 */
export interface Logger {
  log(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  /** Verbose diagnostics. Optional to implement. */
  debug?(message: string): void;
}

export type LogLevel = 'log' | 'error' | 'warn' | 'info' | 'debug';

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }

  error(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  info(message: string): void {
    console.info(message);
  }

  debug(message: string): void {
    if (process.env.DEBUG || process.env.VERBOSE) {
      console.debug(message);
    }
  }
}

export class SilentLogger implements Logger {
  log(_message: string): void {}
  error(_message: string): void {}
  warn(_message: string): void {}
  info(_message: string): void {}
  debug(_message: string): void {}
}

/**
 * Keeps every line in memory. Used by tests and by the debug REPL transcript.
 */
export class MemoryLogger implements Logger {
  readonly entries: Array<{ level: LogLevel; message: string }> = [];

  log(message: string): void {
    this.entries.push({ level: 'log', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}
