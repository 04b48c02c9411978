import { ILogger, LogLevel } from '../../types/logger';
import { ConsoleLoggerAdapter } from './console-logger-adapter';

/**
 * Logger type
 */
export enum LoggerType {
  CONSOLE = 'console',
}

/**
 * Factory for creating loggers
 */
export class LoggerFactory {
  private static instance: LoggerFactory | undefined;
  private readonly loggers: Map<string, ILogger> = new Map();

  private constructor() {
    // Private constructor for singleton
  }

  public static getInstance(): LoggerFactory {
    if (!LoggerFactory.instance) {
      LoggerFactory.instance = new LoggerFactory();
    }
    return LoggerFactory.instance;
  }

  /**
   * Create or get logger by name and type
   *
   * @param name Logger name
   * @param type Logger type
   * @param level Initial logging level
   */
  public getLogger(
    name: string,
    type: LoggerType = LoggerType.CONSOLE,
    level: LogLevel = LogLevel.INFO
  ): ILogger {
    const loggerKey = `${name}:${type}`;

    const existingLogger = this.loggers.get(loggerKey);
    if (existingLogger) {
      return existingLogger;
    }

    const logger = new ConsoleLoggerAdapter();
    logger.setLevel(level);

    this.loggers.set(loggerKey, logger);
    return logger;
  }

  public resetLoggers(): void {
    this.loggers.clear();
  }
}
