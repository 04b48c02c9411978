import { ILogger, LogLevel } from '../../types/logger';
import { LoggerFactory, LoggerType } from './logger-factory';

/**
 * Process-wide logger used by modules that are not handed a logger explicitly
 */
export class LoggerManager {
  private static instance: LoggerManager | undefined;
  private logger: ILogger;
  private readonly defaultLoggerName = 'opgraph';

  private constructor() {
    this.logger = LoggerFactory.getInstance().getLogger(
      this.defaultLoggerName,
      LoggerType.CONSOLE,
      LogLevel.INFO
    );
  }

  public static getInstance(): LoggerManager {
    if (!LoggerManager.instance) {
      LoggerManager.instance = new LoggerManager();
    }
    return LoggerManager.instance;
  }

  /**
   * Set custom logger (IoC implementation)
   */
  public setLogger(logger: ILogger): void {
    this.logger = logger;
  }

  public getLogger(): ILogger {
    return this.logger;
  }

  /**
   * Enables logs with specified level (default INFO)
   */
  public static enableLogs(level: LogLevel = LogLevel.INFO): void {
    LoggerManager.getInstance().logger.setLevel(level);
  }

  /**
   * Disables all logs
   */
  public static disableLogs(): void {
    LoggerManager.getInstance().logger.setLevel(LogLevel.OFF);
  }

  public static debug(message: string, ...args: readonly unknown[]): void {
    LoggerManager.getInstance().logger.debug(message, ...args);
  }

  public static info(message: string, ...args: readonly unknown[]): void {
    LoggerManager.getInstance().logger.info(message, ...args);
  }

  public static warn(message: string, ...args: readonly unknown[]): void {
    LoggerManager.getInstance().logger.warn(message, ...args);
  }

  public static error(message: string, ...args: readonly unknown[]): void {
    LoggerManager.getInstance().logger.error(message, ...args);
  }
}
