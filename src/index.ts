import app from './app';
import { appConfig } from './connections/config/app.config';
import { connectDatabase } from './connections';
import { logger } from './utils/logging';
import { toError } from './utils/errors';

const PORT = appConfig.port;

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    logger.info('Connecting to database...');
    await connectDatabase();

    app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });
  } catch (error: unknown) {
    const err = toError(error);
    logger.error('Failed to start server:', { error: err.message, stack: err.stack });
    logger.error('Exiting application...');
    process.exit(1);
  }
};

void startServer();
