// src/api/draftRoutes.ts
import { Router, Response, NextFunction } from 'express';
import * as draftService from '../services/draftService';
import { CreateDraftInput, DRAFT_STATUSES, UpdateDraftInput } from '../models/draft.types';
import { ACCOUNT_TYPES, TRANSACTION_TYPES } from '../models/transaction.types';
import { authenticateJWT, AuthenticatedRequest, getAuthUserId } from '../middleware/authMiddleware';
import { ValidationError } from '../utils/errors';
import logger from '../utils/logger';
import {
  Body,
  optionalAmount,
  optionalOneOf,
  optionalRecordArray,
  optionalString,
  optionalTimestamp,
  parsePagination,
  queryOneOf,
  requireAmount,
  requireBody,
  requireOneOf,
  requireString,
} from './validation';

const router = Router();

router.use(authenticateJWT);

const MAX_BATCH_SIZE = 50;

const parseCreateInput = (body: Body): CreateDraftInput => ({
  messageId: optionalString(body, 'messageId'),
  occurredAt: optionalTimestamp(body, 'occurredAt') ?? undefined,
  amount: requireAmount(body),
  description: requireString(body, 'description', { allowEmpty: true }),
  category: optionalString(body, 'category'),
  type: requireOneOf(TRANSACTION_TYPES, body, 'type'),
  account: optionalOneOf(ACCOUNT_TYPES, body, 'account') ?? 'cash',
  contactName: optionalString(body, 'contactName'),
  contactId: optionalString(body, 'contactId'),
  dueDate: optionalTimestamp(body, 'dueDate'),
  linkedTransactionId: optionalString(body, 'linkedTransactionId'),
});

const parseUpdateInput = (body: Body): UpdateDraftInput => {
  const occurredAt = optionalTimestamp(body, 'occurredAt');
  if (occurredAt === null) {
    throw new ValidationError('occurredAt cannot be cleared.');
  }
  return {
    occurredAt,
    amount: optionalAmount(body),
    description: body.description !== undefined ? requireString(body, 'description', { allowEmpty: true }) : undefined,
    category: optionalString(body, 'category'),
    type: optionalOneOf(TRANSACTION_TYPES, body, 'type'),
    account: optionalOneOf(ACCOUNT_TYPES, body, 'account'),
    contactName: optionalString(body, 'contactName'),
    contactId: optionalString(body, 'contactId'),
    dueDate: optionalTimestamp(body, 'dueDate'),
    linkedTransactionId: optionalString(body, 'linkedTransactionId'),
  };
};

// GET / (?status=pending by default)
router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const result = draftService.listDrafts(getAuthUserId(req), {
      ...parsePagination(req.query),
      status: queryOneOf(DRAFT_STATUSES, req.query, 'status') ?? 'pending',
    });
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
});

// POST /
router.post('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const draft = draftService.createDraft(userId, parseCreateInput(requireBody(req.body)));
    logger.info(`POST /drafts - Draft ${draft.id} created for user ${userId}`);
    res.status(201).json(draft);
  } catch (error) {
    next(error);
  }
});

// POST /batch {drafts: [...]}
router.post('/batch', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const items = optionalRecordArray(requireBody(req.body), 'drafts');
    // Batch size check
    if (!items || items.length === 0 || items.length > MAX_BATCH_SIZE) {
      throw new ValidationError(`drafts must be an array of 1 to ${MAX_BATCH_SIZE} drafts.`);
    }
    // Every item is validated before any is written
    const drafts = draftService.createDraftsBatch(userId, items.map(parseCreateInput));
    logger.info(`POST /drafts/batch - ${drafts.length} draft(s) created for user ${userId}`);
    res.status(201).json(drafts);
  } catch (error) {
    next(error);
  }
});

// GET /:id
router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(draftService.getDraft(getAuthUserId(req), req.params.id));
  } catch (error) {
    next(error);
  }
});

// PATCH /:id
router.patch('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const draft = draftService.updateDraft(userId, req.params.id, parseUpdateInput(requireBody(req.body)));
    logger.info(`PATCH /drafts/${draft.id} - Updated for user ${userId}`);
    res.status(200).json(draft);
  } catch (error) {
    next(error);
  }
});

// POST /:id/confirm; responds with the transaction it created
router.post('/:id/confirm', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const transaction = draftService.confirmDraft(getAuthUserId(req), req.params.id);
    res.status(201).json(transaction);
  } catch (error) {
    next(error);
  }
});

// POST /:id/discard
router.post('/:id/discard', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const draft = draftService.discardDraft(userId, req.params.id);
    logger.info(`POST /drafts/${draft.id}/discard - Discarded for user ${userId}`);
    res.status(200).json(draft);
  } catch (error) {
    next(error);
  }
});

// DELETE /:id
router.delete('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    draftService.deleteDraft(userId, req.params.id);
    logger.info(`DELETE /drafts/${req.params.id} - Deleted for user ${userId}`);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});

export default router;
