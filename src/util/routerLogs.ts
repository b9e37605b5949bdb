import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { errorMessage, logWarn } from './logger';

export const LOG_TYPES = ['requests', 'errors', 'context'] as const;
export type LogType = (typeof LOG_TYPES)[number];

export type RouterLogPaths = Record<LogType, string>;

/**
 * Append-only JSON-lines files tailed by the operator dashboard. Writes never
 * throw; a failed write is reported through the console logger instead.
 */
export class RouterLogs {
  constructor(private readonly paths: RouterLogPaths) {}

  append(type: LogType, record: Record<string, unknown>): void {
    const path = this.paths[type];
    try {
      mkdirSync(dirname(path), { recursive: true });
      appendFileSync(
        path,
        JSON.stringify({ timestamp: new Date().toISOString(), ...record }) + '\n',
        'utf8'
      );
    } catch (error) {
      logWarn('router_log_write_failed', { type, path, error: errorMessage(error) });
    }
  }

  tail(type: LogType, limit: number): string[] {
    const path = this.paths[type];
    if (!existsSync(path)) return [];
    try {
      const lines = readFileSync(path, 'utf8').split('\n');
      if (lines[lines.length - 1] === '') lines.pop();
      return lines.slice(-limit);
    } catch (error) {
      logWarn('router_log_read_failed', { type, path, error: errorMessage(error) });
      return [];
    }
  }
}

export function isLogType(value: unknown): value is LogType {
  return LOG_TYPES.some((type) => type === value);
}
