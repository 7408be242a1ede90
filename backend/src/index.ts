import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';

import { getConfig } from './lib/config.js';
import { logger } from './lib/logger.js';
import { closeRedis } from './lib/redis.js';
import { errorHandler } from './middleware/errorHandler.js';
import { notFoundHandler } from './middleware/notFoundHandler.js';
import { correlationMiddleware } from './middleware/correlation.js';

// Routes
import healthRoutes from './routes/health.js';
import catalogRoutes from './routes/catalog.js';

const config = getConfig();
const app = express();

// Middleware
app.use(helmet());
app.use(morgan(config.NODE_ENV === 'production' ? 'combined' : 'dev'));
// Scraped batches run to a few thousand records
app.use(express.json({ limit: '10mb' }));
app.use(correlationMiddleware);

// Routes
app.use('/api/health', healthRoutes);
app.use('/api/catalog', catalogRoutes);

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

if (config.NODE_ENV !== 'test') {
  const server = app.listen(config.PORT, () => {
    logger.info(`Server running on http://localhost:${config.PORT}`);
    logger.info(`Health check: http://localhost:${config.PORT}/api/health`);
  });

  const shutdown = () => {
    server.close();
    closeRedis().catch((error: unknown) => {
      logger.error('Redis shutdown failed', { error: String(error) });
    });
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

export default app;
