import { mkdirSync } from 'fs';
import { join } from 'path';
import winston from 'winston';
import { Logger } from '../types/index.js';

const lineFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)}${details}`;
});

const baseLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(winston.format.timestamp(), lineFormat),
  transports: [new winston.transports.Console()],
});

export const logger: Logger = baseLogger;

export function setLogLevel(level: string): void {
  baseLogger.level = level;
}

/**
 * Also write log lines to <dataDir>/logs/scraper_<YYYY-MM-DD>.log
 */
export function enableFileLogging(dataDir: string, date = new Date()): string {
  const logDir = join(dataDir, 'logs');
  mkdirSync(logDir, { recursive: true });

  const filename = join(logDir, `scraper_${date.toISOString().split('T')[0]}.log`);
  baseLogger.add(new winston.transports.File({ filename }));

  return filename;
}
