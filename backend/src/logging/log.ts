/**
 * Logger - per-service console + JSON-lines file logger
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  data?: unknown;
}

/** In-memory history kept per service */
const MAX_ENTRIES = 500;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function parseLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
}

export class Log {
  private static instances = new Map<string, Log>();
  private static logFilePath = process.env.LOG_FILE_PATH || path.join(process.cwd(), 'logs', 'gateway.log');
  private static fileEnabled = (process.env.LOG_TO_FILE ?? 'true').toLowerCase() === 'true';
  private static minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL);
  private static fileReady = false;

  private entries: LogEntry[] = [];

  private constructor(private readonly service: string) {}

  static create(config: { service: string }): Log {
    const { service } = config;
    let instance = Log.instances.get(service);
    if (!instance) {
      instance = new Log(service);
      Log.instances.set(service, instance);
    }
    return instance;
  }

  static configure(options: { level?: LogLevel; filePath?: string; toFile?: boolean }): void {
    if (options.level) Log.minLevel = options.level;
    if (options.filePath) {
      Log.logFilePath = options.filePath;
      Log.fileReady = false;
    }
    if (options.toFile !== undefined) Log.fileEnabled = options.toFile;
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      data,
    };
    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.shift();
    }

    if (LEVEL_ORDER[level] < LEVEL_ORDER[Log.minLevel]) {
      return;
    }

    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${this.service}] [${level.toUpperCase()}]`;
    const output = `${prefix} ${message}`;

    if (level === 'error') {
      console.error(output, data ?? '');
    } else if (level === 'warn') {
      console.warn(output, data ?? '');
    } else {
      console.log(output, data ?? '');
    }

    this.writeToFile(entry);
  }

  private writeToFile(entry: LogEntry): void {
    if (!Log.fileEnabled) {
      return;
    }
    try {
      if (!Log.fileReady) {
        fs.mkdirSync(path.dirname(Log.logFilePath), { recursive: true });
        Log.fileReady = true;
      }
      const payload = JSON.stringify({
        ...entry,
        data: serializeData(entry.data),
        service: this.service,
      });
      fs.appendFileSync(Log.logFilePath, `${payload}\n`, { encoding: 'utf8' });
    } catch (error) {
      // Keep logger non-fatal.
      console.warn('[Log] Failed to persist log entry:', error);
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear() {
    this.entries = [];
  }
}

// Error instances serialize to `{}`, also one level down
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]) =>
        value instanceof Error ? [key, { name: value.name, message: value.message }] : [key, value],
      ),
    );
  }
  return data;
}

export function createLogger(service: string): Log {
  return Log.create({ service });
}
