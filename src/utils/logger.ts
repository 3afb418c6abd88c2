import winston from 'winston';

// ═══════════════════════════════════════════════════════════
// Logger
// ═══════════════════════════════════════════════════════════

const consoleFormat = winston.format.printf(({ level, message, timestamp, service: _service, stack, ...meta }) => {
  const metaText = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const stackText = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(timestamp)} [${level}] ${String(message)}${metaText}${stackText}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'follower-tracker' },
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
  ),
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === 'test',
      format: winston.format.combine(winston.format.colorize(), consoleFormat),
    }),
  ],
});
