import winston from 'winston';

import type { LogLevel } from '../common/types.js';


const createLogger = () => winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.splat(),
    winston.format.printf((info) => `${String(info['timestamp'])} ${info.level}: ${String(info.message)}`),
  ),
});

const logger = createLogger();
// log to stderr
logger.add(new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] }));

export function configureLogger({ level, logFile }: {
  level: LogLevel,
  logFile?: string | undefined,
}) {
  logger.level = level;
  if (logFile != null) {
    logger.add(new winston.transports.File({ level: 'debug', filename: logFile, options: { flags: 'a' }, maxsize: 1e6, maxFiles: 100, tailable: true }));
  }
}

export default logger;
