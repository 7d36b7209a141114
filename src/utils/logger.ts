import type { LogLevel } from '../types/loggingTypes.js';

// Defines the numeric level for each log type, used for filtering.
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Leveled console logger for the design standards agent.
 * Everything goes to stderr: stdout carries CLI answers and the stdio MCP transport.
 */
export class Logger {
    private currentLevel: LogLevel = 'info';
    private currentLevelValue: number = LOG_LEVEL_VALUES[this.currentLevel];

    /**
     * Sets the minimum log level to output.
     * Messages with a level lower than this will be ignored.
     * @param level - The minimum log level ('error', 'warn', 'info', 'debug').
     */
    public setLevel(level: LogLevel): void {
        if (level === this.currentLevel) {
            return;
        }
        this.currentLevel = level;
        this.currentLevelValue = LOG_LEVEL_VALUES[level];
        this.debug(`Log level set to: ${level}`);
    }

    /**
     * Gets the current log level.
     * @returns The current log level.
     */
    public getLevel(): LogLevel {
        return this.currentLevel;
    }

    /**
     * Checks whether messages at a level would be written.
     * @param level - The level to check.
     * @returns True when the level is at or above the current level.
     */
    public isLevelEnabled(level: LogLevel): boolean {
        return LOG_LEVEL_VALUES[level] >= this.currentLevelValue;
    }

    /**
     * Logs a debug message (lowest level).
     * @param message - The message to log.
     * @param args - Additional arguments to log.
     */
    public debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, args);
    }

    /**
     * Logs an informational message.
     * @param message - The message to log.
     * @param args - Additional arguments to log.
     */
    public info(message: string, ...args: unknown[]): void {
        this.log('info', message, args);
    }

    /**
     * Logs a warning message.
     * @param message - The message to log.
     * @param args - Additional arguments to log.
     */
    public warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, args);
    }

    /**
     * Logs an error message (highest level).
     * @param message - The message to log.
     * @param args - Additional arguments to log (often an Error object).
     */
    public error(message: string, ...args: unknown[]): void {
        this.log('error', message, args);
    }

    private log(level: LogLevel, message: string, args: unknown[] = []): void {
        if (!this.isLevelEnabled(level)) {
            return;
        }
        const timestamp = new Date().toISOString();
        const formattedMessage = `${timestamp} [${level.toUpperCase()}] ${message}`;

        if (args.length > 0) {
            console.error(formattedMessage, ...args);
        } else {
            console.error(formattedMessage);
        }
    }
}

// Export a singleton instance
export const logger = new Logger();
