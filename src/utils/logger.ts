import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.MCP_LOG_LEVEL?.toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

// Everything goes to stderr: stdout belongs to the stdio transport.
let sink: (line: string) => void = (line) => {
  process.stderr.write(line + '\n');
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Replaces the output sink. Returns the previous one.
 */
export function setLogSink(next: (line: string) => void): (line: string) => void {
  const previous = sink;
  sink = next;
  return previous;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Creates a logger whose lines carry the given scope
 */
export function createLogger(scope: string): Logger {
  const tag = chalk.dim(`[${scope}]`);
  return {
    debug: (message: string) => {
      if (enabled('debug')) {
        sink(chalk.gray(`[DEBUG] ${tag} ${message}`));
      }
    },
    info: (message: string) => {
      if (enabled('info')) {
        sink(chalk.blue(`[INFO] ${tag} ${message}`));
      }
    },
    warn: (message: string) => {
      if (enabled('warn')) {
        sink(chalk.yellow(`[WARN] ${tag} ${message}`));
      }
    },
    error: (message: string) => {
      if (enabled('error')) {
        sink(chalk.red(`[ERROR] ${tag} ${message}`));
      }
    }
  };
}
