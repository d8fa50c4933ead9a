export type LogLevel = 'debug' | 'info' | 'warn';

export type LogFields = Readonly<Record<string, unknown>>;

export interface ProcessingLogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
}

// Subset of the global console used by the logger; injectable for tests.
export interface LoggerConsole {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel;
  readonly prefix?: string;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
};

export const NOOP_PROCESSING_LOGGER: ProcessingLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

export function createConsoleLogger(
  output: LoggerConsole = console,
  options: ConsoleLoggerOptions = {},
): ProcessingLogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.prefix ?? '[ScenarioProcessor]';

  const write = (level: LogLevel, message: string, fields: LogFields | undefined): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = `${prefix} ${message}`;
    if (fields === undefined) {
      output[level](line);
    } else {
      output[level](line, fields);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
  };
}
