import { ConsoleLogger, LogLevel } from '@nestjs/common';

// Every log level goes to stderr; stdout is reserved for the table/JSON result.
export class StderrConsoleLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context = '',
    logLevel: LogLevel = 'log',
    _writeStreamType?: 'stdout' | 'stderr',
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}

export function createCliLogger(logLevels: LogLevel[]): StderrConsoleLogger {
  const logger = new StderrConsoleLogger();
  logger.setLogLevels(logLevels);
  return logger;
}
