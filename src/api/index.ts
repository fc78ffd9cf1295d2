// src/api/index.ts
import { Router } from 'express';
import authRoutes from './authRoutes';
import transactionRoutes from './transactionRoutes';
import contactRoutes from './contactRoutes';
import messageRoutes from './messageRoutes';
import draftRoutes from './draftRoutes';
import aiRoutes from './aiRoutes';
import budgetRoutes from './budgetRoutes';
import logger from '../utils/logger';

const mainRouter = Router();

mainRouter.use('/auth', authRoutes);
mainRouter.use('/transactions', transactionRoutes);
mainRouter.use('/contacts', contactRoutes);
mainRouter.use('/messages', messageRoutes);
mainRouter.use('/drafts', draftRoutes);
mainRouter.use('/ai', aiRoutes);
mainRouter.use('/budgets', budgetRoutes);
logger.info('API routes mounted: /auth, /transactions, /contacts, /messages, /drafts, /ai, /budgets');

export default mainRouter;
