// src/api/transactionRoutes.ts
import { Router, Response, NextFunction } from 'express';
import * as transactionService from '../services/transactionService';
import * as balanceService from '../services/balanceService';
import {
  ACCOUNT_TYPES,
  CreateTransactionInput,
  DEBT_STATUSES,
  TRANSACTION_TYPES,
  UpdateTransactionInput,
} from '../models/transaction.types';
import { authenticateJWT, AuthenticatedRequest, getAuthUserId } from '../middleware/authMiddleware';
import { ValidationError } from '../utils/errors';
import { isWholeCents } from '../utils/guards';
import logger from '../utils/logger';
import {
  Body,
  optionalAmount,
  optionalBoolean,
  optionalOneOf,
  optionalRecord,
  optionalString,
  optionalTimestamp,
  parsePagination,
  queryBoolean,
  queryOneOf,
  queryString,
  requireAmount,
  requireBody,
  requireOneOf,
  requireString,
} from './validation';

const router = Router();

router.use(authenticateJWT);

const parseCreateInput = (body: Body): CreateTransactionInput => ({
  amount: requireAmount(body),
  type: requireOneOf(TRANSACTION_TYPES, body, 'type'),
  account: optionalOneOf(ACCOUNT_TYPES, body, 'account') ?? 'cash',
  description: requireString(body, 'description'),
  category: optionalString(body, 'category'),
  contactId: optionalString(body, 'contactId'),
  contactName: optionalString(body, 'contactName'),
  isShared: optionalBoolean(body, 'isShared'),
  occurredAt: optionalTimestamp(body, 'occurredAt') ?? undefined,
  dueDate: optionalTimestamp(body, 'dueDate'),
  linkedTransactionId: optionalString(body, 'linkedTransactionId'),
  metadata: optionalRecord(body, 'metadata'),
});

const parseUpdateInput = (body: Body): UpdateTransactionInput => {
  const patch: UpdateTransactionInput = {
    amount: optionalAmount(body),
    type: optionalOneOf(TRANSACTION_TYPES, body, 'type'),
    account: optionalOneOf(ACCOUNT_TYPES, body, 'account'),
    category: optionalString(body, 'category'),
    contactId: optionalString(body, 'contactId'),
    contactName: optionalString(body, 'contactName'),
    isShared: optionalBoolean(body, 'isShared'),
    dueDate: optionalTimestamp(body, 'dueDate'),
    linkedTransactionId: optionalString(body, 'linkedTransactionId'),
    metadata: optionalRecord(body, 'metadata'),
  };
  if (body.description !== undefined) {
    patch.description = requireString(body, 'description');
  }
  const occurredAt = optionalTimestamp(body, 'occurredAt');
  if (occurredAt === null) {
    throw new ValidationError('occurredAt cannot be cleared.');
  }
  patch.occurredAt = occurredAt;
  if (body.remainingAmount !== undefined) {
    const remaining = body.remainingAmount;
    if (remaining !== null && (typeof remaining !== 'number' || !Number.isFinite(remaining) || remaining < 0)) {
      throw new ValidationError('remainingAmount must be zero or a positive number.');
    }
    if (remaining !== null && !isWholeCents(remaining)) {
      throw new ValidationError('remainingAmount must be a whole number of cents.');
    }
    patch.remainingAmount = remaining;
  }
  if (body.status !== undefined) {
    patch.status = body.status === null ? null : requireOneOf(DEBT_STATUSES, body, 'status');
  }
  return patch;
};

// GET / (list)
router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const result = transactionService.listTransactions(getAuthUserId(req), {
      ...parsePagination(req.query),
      type: queryOneOf(TRANSACTION_TYPES, req.query, 'type'),
      contactId: queryString(req.query, 'contactId'),
    });
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
});

// POST / (create); the response is the primary row of what was written
router.post('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const [primary] = transactionService.createTransaction(userId, parseCreateInput(requireBody(req.body)));
    logger.info(`POST /transactions - ${primary.type} ${primary.id} created for user ${userId}`);
    res.status(201).json(primary);
  } catch (error) {
    next(error);
  }
});

// Aggregate views come before /:id so they are not taken for an id.
router.get('/balances', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const balances = balanceService.computeBalances(getAuthUserId(req), {
      includeSettled: queryBoolean(req.query, 'includeSettled'),
    });
    res.status(200).json(balances);
  } catch (error) {
    next(error);
  }
});

router.get('/open-debts', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const debts = balanceService.listOpenDebts(getAuthUserId(req), {
      contactId: queryString(req.query, 'contactId'),
      contactName: queryString(req.query, 'contactName'),
    });
    res.status(200).json(debts);
  } catch (error) {
    next(error);
  }
});

router.get('/summary', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(balanceService.computeAccountSummary(getAuthUserId(req)));
  } catch (error) {
    next(error);
  }
});

// GET /:id
router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(transactionService.getTransaction(getAuthUserId(req), req.params.id));
  } catch (error) {
    next(error);
  }
});

// GET /:id/payments
router.get('/:id/payments', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(transactionService.listDebtPayments(getAuthUserId(req), req.params.id));
  } catch (error) {
    next(error);
  }
});

// PATCH /:id
router.patch('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const updated = transactionService.updateTransaction(userId, req.params.id, parseUpdateInput(requireBody(req.body)));
    logger.info(`PATCH /transactions/${updated.id} - Updated for user ${userId}`);
    res.status(200).json(updated);
  } catch (error) {
    next(error);
  }
});

// DELETE /:id
router.delete('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    transactionService.deleteTransaction(userId, req.params.id);
    logger.info(`DELETE /transactions/${req.params.id} - Deleted for user ${userId}`);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});

export default router;
