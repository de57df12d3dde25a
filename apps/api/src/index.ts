import 'dotenv/config';
import './instrument';
import * as Sentry from '@sentry/node';
import { createApp } from './app';
import { config, validateConfig } from './config';
import { logger } from './utils/logger';
import { ConfigurationError } from './utils/errors';
import { loadApnsCredentials, type ApnsCredentials } from './services/apns';
import { createRuntime, startRuntime, stopRuntime } from './runtime';

function loadCredentialsOrExit(): ApnsCredentials {
  try {
    return loadApnsCredentials(config.apns);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`❌ ${error.message}`, { fields: error.fields });
      process.exit(1);
    }
    throw error;
  }
}

validateConfig();

const credentials = loadCredentialsOrExit();
const runtime = createRuntime({ credentials });
const app = createApp(runtime);

const PORT = config.port;

const server = app.listen(PORT, () => {
  logger.info(`🚀 Activity Relay API running on port ${PORT}`);
  logger.info(`📍 Environment: ${config.nodeEnv}, APNs ${credentials.environment}`);
  logger.info(`🔗 Health check: http://localhost:${PORT}/health`);
  startRuntime(runtime);
});

// Graceful shutdown
let shuttingDown = false;

const gracefulShutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received. Shutting down gracefully...`);

  // Force close after 10 seconds
  setTimeout(() => {
    logger.error('Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 10000).unref();

  try {
    await stopRuntime(runtime);
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await Sentry.close(2000);
    logger.info('HTTP server closed.');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
};

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
