type LogLevel = 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

function write(level: LogLevel, message: string, meta?: LogMeta): void {
  if (process.env.LOG_SILENT === 'true') return;
  const line = JSON.stringify({
    level,
    time: new Date().toISOString(),
    message,
    ...(meta ?? {}),
  });
  if (level === 'error') {
    console.error(line);
    return;
  }
  if (level === 'warn') {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logInfo(message: string, meta?: LogMeta): void {
  write('info', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  write('warn', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  write('error', message, meta);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown';
}
