import 'dotenv/config';
import { createApp } from './app.js';
import { getEnvironmentConfig, resetEnvironmentConfig } from './config/environment.js';
import { loadProtobufDefinitions } from './protobufLoader.js';
import { getDatabaseService } from '../services/database.js';
import { logger } from '../utils/logger.js';

// Reset cached environment config so .env values are picked up
resetEnvironmentConfig();
const env = getEnvironmentConfig();

async function start(): Promise<void> {
  await loadProtobufDefinitions();
  const databaseService = getDatabaseService();

  const app = createApp(env);
  const server = app.listen(env.port, () => {
    logger.info(`🚀 MeshLinks API listening on port ${env.port}`);
    logger.info(`Environment: ${env.nodeEnv}`);
    if (env.isDevelopment) {
      logger.info(`🔧 Port: ${env.port} ${env.portProvided ? '📄 (from .env)' : '⚙️ (default)'}`);
      logger.info(
        `🔧 Database: ${env.databasePath} ${env.databasePathProvided ? '📄 (from .env)' : '⚙️ (default)'}`
      );
    }
  });

  function gracefulShutdown(reason: string): void {
    logger.info(`🛑 Initiating graceful shutdown: ${reason}`);

    // Stop accepting new connections
    server.close(() => {
      logger.debug('✅ HTTP server closed');

      try {
        databaseService.close();
        logger.debug('✅ Database connections closed');
      } catch (error) {
        logger.error('Error closing database:', error);
      }

      logger.info('✅ Graceful shutdown complete');
      process.exit(0);
    });

    // Force shutdown after 10 seconds if graceful shutdown hangs
    setTimeout(() => {
      logger.warn('⚠️ Graceful shutdown timeout - forcing exit');
      process.exit(1);
    }, 10000).unref();
  }

  process.on('SIGINT', () => gracefulShutdown('SIGINT received'));
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM received'));
}

start().catch(error => {
  logger.error('❌ Failed to start server:', error);
  process.exit(1);
});
