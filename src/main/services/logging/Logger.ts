import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

export interface UpdaterLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

interface LoggerOptions {
  minLevel?: LogLevel;
  mirrorFilePath?: string | null;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger implements UpdaterLogger {
  private readonly filePath: string;
  private readonly mirrorFilePath: string | null;
  private readonly minLevel: LogLevel;
  private readonly maxBytes = 2 * 1024 * 1024;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, 'updater.log');
    this.minLevel = options?.minLevel ?? 'info';
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  entries(limit?: number): LogEntry[] {
    const files = [`${this.filePath}.1`, this.filePath];
    const entries: LogEntry[] = [];

    for (const file of files) {
      if (!fs.existsSync(file)) {
        continue;
      }

      const lines = fs.readFileSync(file, 'utf-8').split('\n');
      for (const raw of lines) {
        const line = raw.trim();
        if (!line) {
          continue;
        }

        entries.push(parseLogLine(line));
      }
    }

    if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0 || entries.length <= limit) {
      return entries;
    }

    return entries.slice(-Math.trunc(limit));
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.minLevel]) {
      return;
    }

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    try {
      this.rotateIfNeeded();
      fs.appendFileSync(this.filePath, `${line}\n`);
    } catch {
      // log em disco e best-effort
      return;
    }

    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, `${line}\n`);
      } catch {
        // espelho opcional
      }
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    const stats = fs.statSync(this.filePath);
    if (stats.size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    if (fs.existsSync(rotated)) {
      fs.rmSync(rotated, { force: true });
    }
    fs.renameSync(this.filePath, rotated);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseLogLine(line: string): LogEntry {
  try {
    const parsed: unknown = JSON.parse(line);
    if (!parsed || typeof parsed !== 'object') {
      throw new Error('invalid log line');
    }

    const ts = 'ts' in parsed ? parsed.ts : undefined;
    const level = 'level' in parsed ? parsed.level : undefined;
    const message = 'message' in parsed ? parsed.message : undefined;
    return {
      ts: typeof ts === 'string' ? ts : new Date().toISOString(),
      level: isLogLevel(level) ? level : 'info',
      message: typeof message === 'string' ? message : line,
      meta: 'meta' in parsed ? parsed.meta : undefined
    };
  } catch {
    return {
      ts: new Date().toISOString(),
      level: 'info',
      message: line
    };
  }
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
