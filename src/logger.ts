import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  return isLogLevel(value) ? value : 'info';
}

export function createLogger(source: string, minLevel: LogLevel = resolveLogLevel()): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  const prefix = (): string => `${chalk.gray(`[${new Date().toLocaleTimeString()}]`)} ${chalk.cyan(`[${source}]`)}`;

  return {
    debug(message) {
      if (enabled('debug')) {
        console.debug(prefix(), chalk.gray(message));
      }
    },

    info(message) {
      if (enabled('info')) {
        console.info(prefix(), message);
      }
    },

    warn(message) {
      if (enabled('warn')) {
        console.warn(prefix(), chalk.yellow(message));
      }
    },

    error(message, error) {
      if (!enabled('error')) {
        return;
      }

      console.error(prefix(), chalk.red(message));

      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(`      ${error.stack}`));
      } else if (error !== undefined) {
        console.error(chalk.gray(`      Detail: ${String(error)}`));
      }
    },
  };
}
