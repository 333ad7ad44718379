import 'reflect-metadata';
import './types/express';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { settings } from './config/settings';
import { sequelize } from './config/database';
import { swaggerSpec } from './config/swagger';
import apiRoutes from './routes/api';
import { requestIdMiddleware } from './middlewares/requestId';
import { requestLogger } from './middlewares/requestLogger';
import { notFoundHandler, errorHandler } from './middlewares/errorHandler';
import { logger } from './utils/logger';

const app = express();

app.use(cors());
app.use(helmet());
// The payment webhook signature is computed over the exact bytes received.
app.use(express.json({
  verify: (req, _res, buf) => {
    Object.assign(req, { rawBody: Buffer.from(buf) });
  },
}));
app.use(requestIdMiddleware);
app.use(requestLogger);

// Routes
app.use('/api/v1', apiRoutes);

// Swagger
if (settings.swaggerEnabled) {
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));
  logger.info('Swagger Docs available at /api-docs');
}

// Health Check
app.get('/health', async (_req, res) => {
  try {
    await sequelize.authenticate();
    res.json({ status: 'UP', database: 'connected' });
  } catch (error) {
    logger.error('Health check failed', { error: error instanceof Error ? error.message : String(error) });
    res.status(503).json({ status: 'DOWN', database: 'disconnected' });
  }
});

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
