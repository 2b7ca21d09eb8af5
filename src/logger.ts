import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  warn: message => chalk.yellow(`[WARN] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`),
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

// Everything goes to stderr: stdout carries the MCP transport.
function write(level: LogLevel, message: string): void {
  if (levelWeight[level] < levelWeight[activeLevel]) {
    return;
  }
  console.error(formatters[level](message));
}

export function debug(message: string): void {
  write('debug', message);
}

export function info(message: string): void {
  write('info', message);
}

export function warn(message: string): void {
  write('warn', message);
}

export function error(message: string): void {
  write('error', message);
}
