import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type RuntimeLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type RuntimeLogRecord = {
  ts: string;
  level: RuntimeLogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
};

type RuntimeLoggerOptions = {
  logDir: string;
  component: string;
  level?: RuntimeLogLevel;
  echoToConsole?: boolean;
  /** Fields merged into every record written by this logger and its children. */
  bindings?: Record<string, unknown>;
};

const LOG_LEVELS: readonly RuntimeLogLevel[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string): value is RuntimeLogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const normalizeLogLevel = (value: string | undefined): RuntimeLogLevel => {
  const lowered = value?.trim().toLowerCase() ?? '';
  return isLogLevel(lowered) ? lowered : 'info';
};

export const isLevelEnabled = (level: RuntimeLogLevel, threshold: RuntimeLogLevel) =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);

export function serializeError(err: unknown): { name: string; message: string; stack?: string } | string {
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }

  return String(err);
}

/** `2026-01-02T03:04:05.000Z INFO  botline.telegram: polling mode set` */
export function formatConsoleLine(record: RuntimeLogRecord): string {
  return `${record.ts} ${record.level.toUpperCase().padEnd(5)} ${record.component}: ${record.message}`;
}

export type RuntimeLogger = {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  child: (name: string, bindings?: Record<string, unknown>) => RuntimeLogger;
};

export function createRuntimeLogger(options: RuntimeLoggerOptions): RuntimeLogger {
  const threshold = options.level ?? normalizeLogLevel(process.env.BOTLINE_LOG_LEVEL);
  const echoToConsole = options.echoToConsole ?? process.env.NODE_ENV !== 'test';
  const logPath = path.join(options.logDir, 'runtime.jsonl');
  const bindings = options.bindings ?? {};

  const buildRecord = (
    level: RuntimeLogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): RuntimeLogRecord => {
    const merged = { ...bindings, ...data };
    return {
      ts: new Date().toISOString(),
      level,
      component: options.component,
      message,
      ...(Object.keys(merged).length > 0 ? { data: merged } : {}),
    };
  };

  const write = async (record: RuntimeLogRecord) => {
    await mkdir(path.dirname(logPath), { recursive: true });
    await appendFile(logPath, JSON.stringify(record) + '\n', 'utf8');

    if (!echoToConsole) return;

    const line = formatConsoleLine(record);
    const stream = record.level === 'error' || record.level === 'warn' ? console.error : console.log;
    stream(line, record.data ?? '');
  };

  const log = (level: RuntimeLogLevel, message: string, data?: Record<string, unknown>) => {
    if (!isLevelEnabled(level, threshold)) {
      return;
    }
    void write(buildRecord(level, message, data)).catch((err) => {
      console.error(`[runtime-logger-failure] ${options.component}`, serializeError(err));
    });
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    child: (name, childBindings) =>
      createRuntimeLogger({
        ...options,
        level: threshold,
        component: `${options.component}.${name}`,
        bindings: { ...bindings, ...childBindings },
      }),
  };
}
