import { Logger } from '@nestjs/common';

type LogFn = (...args: unknown[]) => void;

export interface YahooLogger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

// Global settings of the yahoo-finance2 default export used at startup
export interface YahooFinanceSettings {
  suppressNotices(notices: Array<'yahooSurvey'>): void;
  setGlobalConfig(config: { logger: YahooLogger; validation: { logErrors: boolean } }): void;
}

function formatArgs(args: unknown[]): string {
  return args
    .map(arg => {
      if (typeof arg === 'string') {
        return arg;
      }
      if (arg instanceof Error) {
        return arg.message;
      }
      try {
        return JSON.stringify(arg) ?? String(arg);
      } catch {
        return String(arg);
      }
    })
    .join(' ');
}

/**
 * Routes the library's own console output through a Nest logger.
 * info/debug (crumb fetching, notices) -> debug, so stdout carries only results.
 */
export function createYahooLogger(logger: Logger): YahooLogger {
  return {
    info: (...args) => logger.debug(formatArgs(args)),
    debug: (...args) => logger.debug(formatArgs(args)),
    warn: (...args) => logger.warn(formatArgs(args)),
    error: (...args) => logger.error(formatArgs(args)),
  };
}

export function configureYahooFinance(
  yahoo: YahooFinanceSettings,
  logger = new Logger('YahooFinance'),
): void {
  yahoo.suppressNotices(['yahooSurvey']);
  yahoo.setGlobalConfig({
    logger: createYahooLogger(logger),
    validation: { logErrors: false },
  });
}
