// src/index.ts
import dotenv from 'dotenv';
dotenv.config(); // Load environment variables from .env file

import express, { Express } from 'express';
import { getConfig } from './config';
import mainRouter from './api';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import logger from './utils/logger';

export const createApp = (): Express => {
  logger.info(`Ledger API initializing (NODE_ENV: ${getConfig().nodeEnv})`);

  const app = express();

  app.use(express.json({ limit: '10mb' })); // attachments arrive as data URLs
  app.use(express.urlencoded({ extended: true }));

  app.get('/', (req, res) => {
    res.send('Ledger API Running');
  });

  app.get('/health', (req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use('/api/v1', mainRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

// This part is for running the actual server, not for tests
if (require.main === module) {
  const { port } = getConfig();
  createApp().listen(port, () => {
    logger.info(`Ledger API server listening on port ${port}`);
  });
}
