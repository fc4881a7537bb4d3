import { LogLevel, type Logger as NotionLogger } from '@notionhq/client';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
}

// Routes the SDK's own log output through a scoped logger.
export function notionLogger(log: Logger): NotionLogger {
  return (level, message, extraInfo) => {
    const detail = Object.keys(extraInfo).length ? ` ${JSON.stringify(extraInfo)}` : '';
    if (level === LogLevel.ERROR) log.error(`${message}${detail}`);
    else if (level === LogLevel.WARN) log.warn(`${message}${detail}`);
    else log.info(`${message}${detail}`);
  };
}
