/**
 * Extraction API - server entry point
 */

import { config, logger, createExtractionRuntime } from '@inbox-entities/shared';
import { createApp } from './app';

const runtime = createExtractionRuntime(config);
const app = createApp(runtime, config);

// Start server
const server = app.listen(config.port, () => {
  logger.info('Extraction API started', {
    port: config.port,
    model: config.llmModel,
    worker_concurrency: config.workerConcurrency,
  });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
