// src/api/budgetRoutes.ts
import { Router, Response, NextFunction } from 'express';
import * as budgetService from '../services/budgetService';
import { BUDGET_PERIODS, BUDGET_TYPES, CreateBudgetInput, UpdateBudgetInput } from '../models/budget.types';
import { authenticateJWT, AuthenticatedRequest, getAuthUserId } from '../middleware/authMiddleware';
import { ValidationError } from '../utils/errors';
import logger from '../utils/logger';
import {
  Body,
  optionalAmount,
  optionalBoolean,
  optionalOneOf,
  optionalString,
  requireAmount,
  requireBody,
  requireOneOf,
  requireString,
} from './validation';

const router = Router();

router.use(authenticateJWT);

const optionalAlertPercent = (body: Body): number | undefined => {
  const value = body.alertAtPercent;
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0 || value > 100) {
    throw new ValidationError('alertAtPercent must be a number greater than 0 and at most 100.');
  }
  return value;
};

const parseCreateInput = (body: Body): CreateBudgetInput => ({
  name: requireString(body, 'name'),
  type: requireOneOf(BUDGET_TYPES, body, 'type'),
  amount: requireAmount(body),
  category: optionalString(body, 'category'),
  period: optionalOneOf(BUDGET_PERIODS, body, 'period'),
  alertAtPercent: optionalAlertPercent(body),
});

const parseUpdateInput = (body: Body): UpdateBudgetInput => {
  // The kind of budget is fixed once created
  if (body.type !== undefined) {
    throw new ValidationError('type cannot be changed.');
  }
  return {
    name: body.name !== undefined ? requireString(body, 'name') : undefined,
    amount: optionalAmount(body),
    category: optionalString(body, 'category'),
    period: optionalOneOf(BUDGET_PERIODS, body, 'period'),
    alertAtPercent: optionalAlertPercent(body),
    isActive: optionalBoolean(body, 'isActive'),
  };
};

// GET / (every budget with its progress)
router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(budgetService.listBudgets(getAuthUserId(req)));
  } catch (error) {
    next(error);
  }
});

// POST /
router.post('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const budget = budgetService.createBudget(userId, parseCreateInput(requireBody(req.body)));
    logger.info(`POST /budgets - Budget ${budget.id} created for user ${userId}`);
    res.status(201).json(budget);
  } catch (error) {
    next(error);
  }
});

// GET /:id
router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(budgetService.getBudget(getAuthUserId(req), req.params.id));
  } catch (error) {
    next(error);
  }
});

// PATCH /:id
router.patch('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const budget = budgetService.updateBudget(userId, req.params.id, parseUpdateInput(requireBody(req.body)));
    logger.info(`PATCH /budgets/${budget.id} - Updated for user ${userId}`);
    res.status(200).json(budget);
  } catch (error) {
    next(error);
  }
});

// DELETE /:id
router.delete('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    budgetService.deleteBudget(userId, req.params.id);
    logger.info(`DELETE /budgets/${req.params.id} - Deleted for user ${userId}`);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});

export default router;
