import { createApp } from './app';
import { createDependencies } from './dependencies';
import { appConfig } from './connections/config/app.config';
import { connectDatabase } from './connections';
import { logger } from './utils/logging';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    logger.info('Connecting to database...');
    await connectDatabase();

    const app = createApp(createDependencies());
    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    logger.error('Exiting application...');
    process.exit(1);
  }
};

// Start the application
void startServer();
