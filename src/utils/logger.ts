import path from 'node:path';

import winston, { type Logger } from 'winston';

export type LoggingSettings = {
  enabled: boolean;
  level: string;
  directory: string;
};

export type LogMeta = {
  event?: string;
  step?: string;
  durationMs?: number;
  [key: string]: unknown;
};

/** The subset of a winston logger the render pipeline writes to. */
export type RenderLogger = Pick<Logger, 'info' | 'warn' | 'error'>;

/**
 * Everything one generation run needs for diagnostics. Passed explicitly to
 * the renderer instead of binding fields onto a shared logger.
 */
export type GenerationContext = {
  requestId: string;
  language: string;
  logger: RenderLogger;
};

export const LOG_FILE_NAME = 'cv-generator.log';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export function normalizeLevel(level: string, enabled: boolean): string {
  if (!enabled) return 'warn';
  const normalized = level.trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  if (normalized === 'critical') return 'error';
  return LEVELS.includes(normalized) ? normalized : 'info';
}

const lineFormat = winston.format.printf((info) => {
  const { level, message, timestamp, event, step, requestId, language, durationMs } = info;
  const parts = [
    String(timestamp),
    level.toUpperCase().padEnd(5),
    String(event ?? '-'),
    `request_id=${String(requestId ?? '-')}`,
    `language=${String(language ?? '-')}`,
    `step=${String(step ?? '-')}`,
  ];
  if (durationMs !== undefined) parts.push(`duration_ms=${String(durationMs)}`);
  const stack = typeof info.stack === 'string' ? `\n${info.stack}` : '';
  return `${parts.join(' | ')} | ${String(message)}${stack}`;
});

export function createAppLogger(settings: LoggingSettings): Logger {
  const format = winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    lineFormat,
  );

  return winston.createLogger({
    level: normalizeLevel(settings.level, settings.enabled),
    format,
    transports: [
      new winston.transports.Console({ stderrLevels: LEVELS }),
      new winston.transports.File({
        filename: path.join(settings.directory, LOG_FILE_NAME),
        maxsize: 5 * 1024 * 1024,
        maxFiles: 14,
        tailable: true,
      }),
    ],
  });
}

export function createSilentLogger(): Logger {
  return winston.createLogger({ silent: true, transports: [new winston.transports.Console({ silent: true })] });
}
