// Simple logging utility
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const levels: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levels;
}

function maxLevel(): number {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? levels[configured] : levels.info;
}

export function logger(level: LogLevel, message: string, source = 'parser') {
  if (levels[level] > maxLevel()) return;

  const timestamp = new Date().toLocaleTimeString('en-US', {
    hour: 'numeric',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  });
  const line = `${timestamp} [${level.toUpperCase()}] [${source}] ${message}`;

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}
