import chalk from 'chalk';

export type LogContext = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

function formatContext(context?: LogContext): string {
  if (!context) return '';
  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return pairs.length > 0 ? ' ' + chalk.gray(pairs.join(' ')) : '';
}

/**
 * Level-prefixed lines on stderr, so stdout stays clean for JSON and CSV reports.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug(message, context) {
      if (options.verbose) {
        console.error(`${chalk.gray('[debug]')} ${message}${formatContext(context)}`);
      }
    },
    info(message, context) {
      if (options.verbose) {
        console.error(`${chalk.cyan('[info]')} ${message}${formatContext(context)}`);
      }
    },
    warn(message, context) {
      console.error(`${chalk.yellow('[warn]')} ${message}${formatContext(context)}`);
    },
    error(message, context) {
      console.error(`${chalk.red('[error]')} ${message}${formatContext(context)}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
