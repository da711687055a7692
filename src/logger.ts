import winston from 'winston';
import { LauncherConfig } from './config.js';

export function createLogger(logging: LauncherConfig['logging']): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      // Diagnostics go to stderr so operator output on stdout stays clean
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: logging.format === 'json'
        ? winston.format.json()
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp(),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
              const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
              return `${timestamp} [${level}] ${message}${metaStr}`;
            })
          ),
    }),
  ];

  if (logging.file) {
    transports.push(
      new winston.transports.File({
        filename: logging.file,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        ),
      })
    );
  }

  return winston.createLogger({
    level: logging.level,
    transports,
  });
}
