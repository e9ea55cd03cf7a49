import winston from 'winston';
import fs from 'fs';
import path from 'path';

export interface LogLine {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

const formatValue = (value: unknown): string => {
  if (typeof value === 'string') {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return JSON.stringify(value) ?? String(value);
};

/**
 * One console line per entry: `<timestamp> [<level>] <message> key=value ...`,
 * with the stack, when present, on the lines below. The service name is left
 * to the JSON file logs.
 */
export const formatConsoleLine = (info: LogLine): string => {
  const {
    level, message, timestamp, stack, service: _service, ...meta
  } = info;
  const head = typeof timestamp === 'string' ? `${timestamp} [${level}]` : `[${level}]`;
  const fields = Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  const line = [head, String(message), ...fields].join(' ');
  return typeof stack === 'string' ? `${line}\n${stack}` : line;
};

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(formatConsoleLine),
    ),
  }),
];

// Files are written only on request; LOG_DIR moves them out of the working directory
if (process.env.LOG_TO_FILES === 'true') {
  const logDir = process.env.LOG_DIR || 'logs';
  fs.mkdirSync(logDir, { recursive: true });
  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'interaction-errors.log'),
      level: 'error',
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'interactions.log'),
    }),
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'interaction-matcher' },
  transports,
});

export default logger;
