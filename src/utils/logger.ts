/**
 * Winston Logger Configuration
 * Logs to the console, and to a plain-text file when LOG_FILE is set
 */

import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';

const { combine, timestamp, printf, colorize, errors } = winston.format;

/**
 * Custom log format for console output
 */
const consoleFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const stackStr = stack ? `\n${stack}` : '';
    return `${timestamp} [${level}] ${message}${metaStr}${stackStr}`;
});

/**
 * Custom log format for file output (no colors)
 */
const fileFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const stackStr = stack ? `\n${stack}` : '';
    return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}${stackStr}`;
});

/**
 * Winston logger instance
 * - Console: Colorized output with timestamps, on stderr so stdout stays clean
 * - File: Plain text output to LOG_FILE (optional)
 */
const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
    ),
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'debug'],
            format: combine(
                colorize({ all: true }),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                consoleFormat
            ),
        }),
    ],
});

/**
 * Add the plain-text file transport
 */
export function enableFileLogging(filename: string): void {
    const target = path.resolve(filename);
    fs.mkdirSync(path.dirname(target), { recursive: true });

    logger.add(
        new winston.transports.File({
            filename: target,
            format: combine(
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                fileFormat
            ),
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        })
    );
}

/**
 * Change the level of the logger and all its transports
 */
export function setLogLevel(level: string): void {
    logger.level = level;
    for (const transport of logger.transports) {
        transport.level = level;
    }
}

/**
 * Log a section header for visual separation
 */
export function logSection(title: string): void {
    const separator = '═'.repeat(60);
    logger.info(separator);
    logger.info(`  ${title.toUpperCase()}`);
    logger.info(separator);
}

/**
 * Log a success message with checkmark
 */
export function logSuccess(message: string): void {
    logger.info(`✓ ${message}`);
}

/**
 * Log a failure message with X
 */
export function logFailure(message: string): void {
    logger.error(`✗ ${message}`);
}

/**
 * Log a warning message
 */
export function logWarning(message: string): void {
    logger.warn(`⚠ ${message}`);
}

export { logger };
export default logger;
