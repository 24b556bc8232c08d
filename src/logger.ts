import path from 'path';
import winston from 'winston';
import { config } from './config.js';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const MAX_LOG_SIZE = 5242880; // 5MB

// Console line: timestamp [level]: message {meta}
const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  let log = `${timestamp} [${level}]: ${message}`;

  if (stack) {
    log += `\n${stack}`;
  }

  if (Object.keys(meta).length > 0) {
    log += ` ${JSON.stringify(meta)}`;
  }

  return log;
});

// Entries tied to a market window (ticks, orders, settlements)
const windowEntriesOnly = winston.format((info) =>
  typeof info.slug === 'string' || typeof info.window === 'string' ? info : false
);

function fileTransport(filename: string, options: winston.transports.FileTransportOptions = {}) {
  return new winston.transports.File({
    filename: path.join(config.logging.dir, filename),
    maxsize: MAX_LOG_SIZE,
    maxFiles: 5,
    ...options,
  });
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: combine(colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), logFormat),
  }),
];

if (config.logging.toFile) {
  transports.push(
    fileTransport('error.log', { level: 'error', format: json() }),
    fileTransport('combined.log', { format: json() }),
    fileTransport('windows.log', { format: combine(windowEntriesOnly(), json()) })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })),
  transports,
});

// Mask sensitive data in logs
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '****';
  }
  return `${secret.substring(0, 4)}****${secret.substring(secret.length - 4)}`;
}

export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
