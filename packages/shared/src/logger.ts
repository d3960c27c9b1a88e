import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type Logger = winston.Logger;

const { combine, timestamp, colorize, printf, json } = winston.format;

const pretty = printf(({ level, message, timestamp: ts, component }) => {
  const scope = typeof component === 'string' ? ` [${component}]` : '';
  return `${String(ts)} ${level}${scope}: ${String(message)}`;
});

const root = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: process.stdout.isTTY
    ? combine(colorize(), timestamp(), pretty)
    : combine(timestamp(), json()),
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === 'test',
});

/** Child logger tagged with the component that emits it. */
export function createLogger(component: string): Logger {
  return root.child({ component });
}

export function setLogLevel(level: LogLevel): void {
  root.level = level;
}
