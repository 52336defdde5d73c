#!/usr/bin/env node
import 'reflect-metadata';
import { CommandFactory } from 'nest-commander';
import { AppModule } from './app.module';
import { resolveLogLevels } from './config/env.util';
import { createCliLogger } from './common/logger/stderr-console.logger';

const logger = createCliLogger(resolveLogLevels(process.env.TRADEDESK_LOG_LEVEL));

async function bootstrap(): Promise<void> {
  await CommandFactory.run(AppModule, { logger });
}

bootstrap().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
  process.exitCode = 1;
});
