import winston from 'winston';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

const LEVELS = new Set(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

const isProduction = process.env.NODE_ENV === 'production';

function resolveLevel(): string {
  const requested = process.env.LOG_LEVEL?.toLowerCase();
  if (requested && LEVELS.has(requested)) return requested;
  return isProduction ? 'info' : 'debug';
}

const devFormat = combine(
  colorize(),
  timestamp({ format: 'HH:mm:ss.SSS' }),
  printf(({ level, message, timestamp, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} ${level}: ${message} ${metaStr}`;
  })
);

const prodFormat = combine(
  errors({ stack: true }),
  timestamp(),
  json()
);

export const logger = winston.createLogger({
  level: resolveLevel(),
  format: isProduction ? prodFormat : devFormat,
  defaultMeta: { service: 'generation-router' },
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console(),
  ],
});

export default logger;
