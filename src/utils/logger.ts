import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type EmittedLevel = Exclude<LogLevel, 'silent'>;

/** Where log lines go; the CLI points this at its stderr stream. */
export interface LogSink {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

let currentLevel: LogLevel = 'warn';
let sink: LogSink = process.stderr;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

export function setLogSink(next: LogSink): void {
  sink = next;
}

export function resetLogSink(): void {
  sink = process.stderr;
}

function paint(colors: ChalkInstance, level: EmittedLevel, line: string): string {
  switch (level) {
    case 'debug':
      return colors.gray(line);
    case 'info':
      return colors.blue(line);
    case 'warn':
      return colors.yellow(line);
    case 'error':
      return colors.red(line);
  }
}

function emit(level: EmittedLevel, msg: string): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;
  const colors = new Chalk({ level: sink.isTTY ? chalk.level : 0 });
  sink.write(paint(colors, level, `pullcraft ${level}: ${msg}`) + '\n');
}

export const logger = {
  debug(msg: string): void {
    emit('debug', msg);
  },
  info(msg: string): void {
    emit('info', msg);
  },
  warn(msg: string): void {
    emit('warn', msg);
  },
  error(msg: string): void {
    emit('error', msg);
  },
};
