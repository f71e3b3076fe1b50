import { ILogger, LogLevel } from '../../types/logger';
import type { Serializable } from '../../types/utils';

/**
 * Base class for external logger adapter
 */
export abstract class LoggerAdapter implements ILogger {
  protected level: LogLevel = LogLevel.INFO;

  /**
   * Sets logging level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Gets current logging level
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Checks if specified logging level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * Logs message with specified level
   * This method must be implemented in concrete adapters
   */
  abstract log(level: LogLevel, message: string, ...args: unknown[]): void;

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }

  fatal(message: string, ...args: unknown[]): void {
    this.log(LogLevel.FATAL, message, ...args);
  }

  /**
   * Logs event with metadata
   * @param category Event category (e.g., 'flow', 'executor', 'player')
   * @param eventName Event name
   * @param metadata Additional metadata
   */
  logEvent(
    category: string,
    eventName: string,
    metadata?: Readonly<Record<string, Serializable>>
  ): void {
    if (!this.isLevelEnabled(LogLevel.INFO)) {
      return;
    }

    let message = `[EVENT][${category}][${eventName}]`;

    if (metadata) {
      try {
        message += ` ${JSON.stringify(metadata)}`;
      } catch (error) {
        message += ` (metadata serialization error: ${error instanceof Error ? error.message : String(error)})`;
      }
    }

    this.log(LogLevel.INFO, message);
  }
}
