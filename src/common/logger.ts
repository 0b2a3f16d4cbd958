export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze(['DEBUG', 'INFO', 'WARN', 'ERROR']);

let threshold: LogLevel = 'INFO';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local time formatted as `YYYY.MM.DD hh:mm:ss.mmm`.
 */
export function timestamp(dt = new Date()): string {
  const date = `${dt.getFullYear()}.${pad(dt.getMonth() + 1)}.${pad(dt.getDate())}`;
  const time = `${pad(dt.getHours())}:${pad(dt.getMinutes())}:${pad(dt.getSeconds())}.${pad(dt.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Write a jsonl log entry to stdout. The log entry will include a timestamp, log level, event name, and any additional fields provided.
 * Entries below the current log level are dropped.
 */
export function logJsonl(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  if (!isLevelEnabled(level)) {
    return;
  }

  console.log(
    JSON.stringify({
      timestamp: timestamp(),
      level,
      event,
      ...fields,
    }),
  );
}

export function log(level: LogLevel, message: string): void {
  if (!isLevelEnabled(level)) {
    return;
  }

  console.log(`[${timestamp()}] ${level} - ${message}`);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
