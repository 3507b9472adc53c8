import { startServer } from './server.js';
import { logger } from './utils/logger.js';

try {
  startServer();
} catch (error) {
  logger.error('Failed to start server:', error);
  process.exit(1);
}
