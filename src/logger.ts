import { ConsoleLogger, LogLevel, Logger } from '@slack/logger';

export { LogLevel };
export type { Logger };

export type LoggerFactory = (name: string) => Logger;

/**
 * Every component gets its own named logger; they all share one level so that
 * LOG_LEVEL applies to the Slack SDK and to our services alike.
 */
export const createLoggerFactory = (level: LogLevel): LoggerFactory => {
  return (name: string) => {
    const logger = new ConsoleLogger();
    logger.setName(name);
    logger.setLevel(level);
    return logger;
  };
};
