// src/api/messageRoutes.ts
import { Router, Response, NextFunction } from 'express';
import * as messageService from '../services/messageService';
import {
  CreateMessageInput,
  MESSAGE_ROLES,
  UpdateMessageInput,
} from '../models/message.types';
import { authenticateJWT, AuthenticatedRequest, getAuthUserId } from '../middleware/authMiddleware';
import logger from '../utils/logger';
import {
  Body,
  optionalRecordArray,
  parseAttachment,
  parsePagination,
  requireBody,
  requireOneOf,
  requireString,
} from './validation';

const router = Router();

router.use(authenticateJWT);

const parseCreateInput = (body: Body): CreateMessageInput => {
  const attachments = optionalRecordArray(body, 'attachments');
  return {
    role: requireOneOf(MESSAGE_ROLES, body, 'role'),
    content: requireString(body, 'content'),
    drafts: optionalRecordArray(body, 'drafts'),
    attachments: attachments ? attachments.map(parseAttachment) : attachments,
  };
};

const parseUpdateInput = (body: Body): UpdateMessageInput => ({
  content: body.content !== undefined ? requireString(body, 'content') : undefined,
  drafts: optionalRecordArray(body, 'drafts'),
});

// GET / (oldest first)
router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(messageService.listMessages(getAuthUserId(req), parsePagination(req.query)));
  } catch (error) {
    next(error);
  }
});

// POST /
router.post('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const message = messageService.createMessage(userId, parseCreateInput(requireBody(req.body)));
    logger.info(`POST /messages - ${message.role} message ${message.id} stored for user ${userId}`);
    res.status(201).json(message);
  } catch (error) {
    next(error);
  }
});

// DELETE / (clear the conversation)
router.delete('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const removed = messageService.clearMessages(userId);
    logger.info(`DELETE /messages - Cleared ${removed} message(s) for user ${userId}`);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});

// GET /:id
router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(messageService.getMessage(getAuthUserId(req), req.params.id));
  } catch (error) {
    next(error);
  }
});

// PATCH /:id
router.patch('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const message = messageService.updateMessage(userId, req.params.id, parseUpdateInput(requireBody(req.body)));
    logger.info(`PATCH /messages/${message.id} - Updated for user ${userId}`);
    res.status(200).json(message);
  } catch (error) {
    next(error);
  }
});

// DELETE /:id
router.delete('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    messageService.deleteMessage(userId, req.params.id);
    logger.info(`DELETE /messages/${req.params.id} - Deleted for user ${userId}`);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});

export default router;
