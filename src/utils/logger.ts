import winston from 'winston';
import path from 'path';

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
  const moduleTag = mod ? `[${String(mod)}]` : '';
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level} ${moduleTag} ${String(message)}${metaStr}`;
});

const silent = process.env.LOG_SILENT === 'true';
const logDir = process.env.LOG_DIR ?? 'logs';

const fileTransports = silent
  ? []
  : [
      new winston.transports.File({
        filename: path.join(logDir, 'sniper.log'),
        maxsize: 10_000_000, // 10MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'errors.log'),
        level: 'error',
        maxsize: 10_000_000,
        maxFiles: 3,
      }),
    ];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent,
  format: combine(
    timestamp({ format: 'HH:mm:ss.SSS' }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), timestamp({ format: 'HH:mm:ss.SSS' }), logFormat),
    }),
    ...fileTransports,
  ],
});

export function createModuleLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

/** First characters of an address, for log lines. */
export function short(address: string, len = 8): string {
  return address.length > len ? `${address.slice(0, len)}...` : address;
}
