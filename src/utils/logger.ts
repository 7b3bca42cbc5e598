import winston from 'winston';
import path from 'path';
import { config } from './config';

const logDir = path.dirname(config.logging.file);

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
  winston.format.prettyPrint()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    // Only include essential metadata in console output to reduce noise
    const essentialMeta = Object.keys(meta).filter(key => key !== 'service');

    let output = `${String(timestamp)} [${level}]: ${String(message)}`;

    if (typeof component === 'string') {
      output += ` (${component})`;
    }

    if (essentialMeta.length > 0) {
      const essentialData = Object.fromEntries(essentialMeta.map(key => [key, meta[key]]));

      // Only show if it's small and useful
      if (JSON.stringify(essentialData).length < 200) {
        output += ` ${JSON.stringify(essentialData)}`;
      }
    }

    return output;
  })
);

const isTest = config.nodeEnv === 'test';

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: 'reexport-mapper' },
  transports: isTest
    ? [new winston.transports.Console({ silent: true })]
    : [
        // File transport for all logs
        new winston.transports.File({
          filename: config.logging.file,
          maxsize: 5 * 1024 * 1024, // 5MB
          maxFiles: 5,
        }),
        // Error-specific file
        new winston.transports.File({
          filename: path.join(logDir, 'error.log'),
          level: 'error',
          maxsize: 5 * 1024 * 1024,
          maxFiles: 5,
        }),
      ],
});

// Add console transport for development
if (!isTest && config.nodeEnv !== 'production') {
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
      level: config.logging.consoleLevel,
    })
  );
}

export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};

export const flushLogs = async (): Promise<void> => {
  return new Promise(resolve => {
    setImmediate(() => {
      setImmediate(() => {
        setTimeout(resolve, 200);
      });
    });
  });
};
