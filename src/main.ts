/**
 * Demo entry point: read a file that does not exist through the
 * error handler and print whatever came back.
 */
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { loadErrorHandlerConfigFromEnv } from '@/config/loader.js';
import { createErrorHandlerFromConfig } from '@/handler/from-config.js';
import { createLogger } from '@/observability/logger.js';

const configResult = loadErrorHandlerConfigFromEnv();
if (!configResult.ok) {
  createLogger().fatal(configResult.error.message, {
    component: 'main',
    context: configResult.error.context,
  });
  process.exit(1);
}

const config = configResult.value;
const logger = createLogger({ level: config.logLevel, name: config.loggerName });
const errorHandler = createErrorHandlerFromConfig(config, logger);

const fileContent = errorHandler.wrap(() => readFileSync('doesNotExist', 'utf-8'));

logger.info('File read finished', {
  component: 'main',
  fileContent: fileContent ?? null,
});
