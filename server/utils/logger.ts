import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let currentLogLevel: LogLevel = 'info';
let logDir: string | null = null;

export interface LogMeta {
  correlationId?: string;
  stage?: string;
  intent?: string;
  route?: string;
  tool?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

/**
 * Applies the logging section of the application config.
 * Called once from the entry point; tests run with the defaults.
 */
export function configureLogging(options: { level: LogLevel; dir?: string }): void {
  currentLogLevel = options.level;
  logDir = options.dir ? path.resolve(options.dir) : null;
  if (logDir && !fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel]) return;

  if (logDir) {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...meta
    };
    const dateStr = new Date().toISOString().split('T')[0];
    const logFile = path.join(logDir, `assistant-${dateStr}.log`);

    try {
      fs.appendFileSync(logFile, JSON.stringify(logEntry) + '\n');
    } catch (err) {
      console.error('[Logger] Failed to write to log file:', err);
    }
  }

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : '';
  const { correlationId: _omit, ...rest } = meta ?? {};
  const metaStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  log('info', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  log('error', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  log('warn', message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  log('debug', message, meta);
}

/**
 * Per-turn logger. Every line it writes carries the turn's correlation id
 * and the time elapsed since the turn started.
 */
export class TurnTrace {
  private correlationId: string;
  private startTime: number;
  private stages: Map<string, number> = new Map();

  constructor(correlationId: string = generateCorrelationId()) {
    this.correlationId = correlationId;
    this.startTime = Date.now();
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      duration: Date.now() - this.startTime,
      ...extra
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    this.debug(`Stage ${name} finished`, { stage: name, stageMs: duration });
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err !== undefined) {
      errorMeta.error = String(err);
    }
    logError(message, this.getMeta({ ...errorMeta, ...extra }));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  getDuration(): number {
    return Date.now() - this.startTime;
  }
}
