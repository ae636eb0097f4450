import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  let line = `${timestamp} [${level}]: ${message}`;

  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }

  if (stack) {
    line += `\n${stack}`;
  }

  return line;
});

const isTest = process.env['NODE_ENV'] === 'test';

// Passes only lines written through a batch logger
export const batchLinesOnly = winston.format((info) => ('batchId' in info ? info : false));

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  // Test runs keep the console quiet unless LOG_LEVEL is set explicitly
  silent: isTest && process.env['LOG_LEVEL'] === undefined,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  defaultMeta: { service: 'catalog-loader' },
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize({ all: true }),
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
      ),
    }),
  ],
});

if (process.env['NODE_ENV'] === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  // Lines of catalog loads, one batchId each
  logger.add(
    new winston.transports.File({
      filename: 'logs/catalog-loads.log',
      format: batchLinesOnly(),
      maxsize: 5242880, // 5MB
      maxFiles: 10,
    })
  );
}

/**
 * Logger that stamps every line with the batch it belongs to.
 */
export const batchLogger = (batchId: string): winston.Logger => logger.child({ batchId });

export default logger;
