// src/services/budgetService.ts
import { v4 as uuidv4 } from 'uuid';
import { db } from '../database';
import {
  BUDGET_PERIODS,
  BUDGET_TYPES,
  Budget,
  BudgetPeriod,
  BudgetProgress,
  BudgetStatus,
  BudgetStored,
  CreateBudgetInput,
  UpdateBudgetInput,
} from '../models/budget.types';
import { NotFound } from '../utils/errors';
import { expectOneOf, fromCents, toCents, toLikePattern } from '../utils/guards';
import logger from '../utils/logger';

const DEFAULT_ALERT_PERCENT = 80;

const mapStoredToBudget = (stored: BudgetStored): Budget => ({
  id: stored.id,
  userId: stored.user_id,
  name: stored.name,
  type: expectOneOf(BUDGET_TYPES, stored.type, 'budgets.type'),
  category: stored.category,
  amount: stored.amount,
  period: expectOneOf(BUDGET_PERIODS, stored.period, 'budgets.period'),
  alertAtPercent: stored.alert_at_percent,
  isActive: stored.is_active === 1,
  createdAt: stored.created_at,
  updatedAt: stored.updated_at,
});

const mapBudgetToStored = (budget: Budget): BudgetStored => ({
  id: budget.id,
  user_id: budget.userId,
  name: budget.name,
  type: budget.type,
  category: budget.category,
  amount: budget.amount,
  period: budget.period,
  alert_at_percent: budget.alertAtPercent,
  is_active: budget.isActive ? 1 : 0,
  created_at: budget.createdAt,
  updated_at: budget.updatedAt,
});

/**
 * Start of the period containing `now`, in UTC: Monday for weekly budgets,
 * the first of the month or of the year otherwise.
 */
export const periodStart = (period: BudgetPeriod, now: number): number => {
  const date = new Date(now);
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();
  switch (period) {
    case 'weekly': {
      const sinceMonday = (date.getUTCDay() + 6) % 7;
      return Date.UTC(year, month, date.getUTCDate() - sinceMonday);
    }
    case 'monthly':
      return Date.UTC(year, month, 1);
    case 'yearly':
      return Date.UTC(year, 0, 1);
  }
};

// Sum of income or expense amounts since `from`, in cents.
const sumCents = (userId: string, type: 'income' | 'expense', from: number, category: string | null = null): number => {
  let sql = 'SELECT amount FROM transactions WHERE user_id = @userId AND type = @type AND occurred_at >= @from';
  const params: { userId: string; type: string; from: number; pattern?: string } = { userId, type, from };
  if (category) {
    sql += " AND category LIKE @pattern ESCAPE '\\'";
    params.pattern = toLikePattern(category);
  }
  const rows = db.prepare<typeof params, { amount: number }>(sql).all(params);
  return rows.reduce((sum, row) => sum + toCents(row.amount), 0);
};

const currentCentsFor = (budget: Budget, from: number): number => {
  switch (budget.type) {
    case 'spending_limit':
      return sumCents(budget.userId, 'expense', from, budget.category);
    case 'income_goal':
      return sumCents(budget.userId, 'income', from);
    case 'savings_goal':
      return Math.max(0, sumCents(budget.userId, 'income', from) - sumCents(budget.userId, 'expense', from));
    case 'profit_goal':
      // May go negative
      return sumCents(budget.userId, 'income', from) - sumCents(budget.userId, 'expense', from);
  }
};

const statusFor = (budget: Budget, currentCents: number, targetCents: number, percent: number): BudgetStatus => {
  if (budget.type !== 'spending_limit') {
    return currentCents >= targetCents ? 'achieved' : 'on_track';
  }
  if (currentCents >= targetCents) {
    return 'over_budget';
  }
  return percent >= budget.alertAtPercent ? 'warning' : 'on_track';
};

/** Progress of a budget over the period that contains `now`. */
export const computeProgress = (budget: Budget, now: number = Date.now()): BudgetProgress => {
  const start = periodStart(budget.period, now);
  const currentCents = currentCentsFor(budget, start);
  const targetCents = toCents(budget.amount);
  const percent = targetCents > 0 ? (currentCents / targetCents) * 100 : 0;

  return {
    ...budget,
    periodStart: start,
    currentAmount: fromCents(currentCents),
    progressPercent: Math.round(percent * 10) / 10,
    isOverBudget: budget.type === 'spending_limit' && currentCents >= targetCents,
    status: statusFor(budget, currentCents, targetCents, percent),
  };
};

const findBudget = (userId: string, budgetId: string): Budget => {
  const stored = db
    .prepare<[string, string], BudgetStored>('SELECT * FROM budgets WHERE id = ? AND user_id = ?')
    .get(budgetId, userId);
  if (!stored) {
    throw new NotFound('Budget');
  }
  return mapStoredToBudget(stored);
};

/** Every budget of the user with its progress, newest first. */
export const listBudgets = (userId: string, now: number = Date.now()): BudgetProgress[] => {
  const rows = db
    .prepare<[string], BudgetStored>('SELECT * FROM budgets WHERE user_id = ? ORDER BY created_at DESC, id DESC')
    .all(userId);
  return rows.map((row) => computeProgress(mapStoredToBudget(row), now));
};

export const getBudget = (userId: string, budgetId: string, now: number = Date.now()): BudgetProgress =>
  computeProgress(findBudget(userId, budgetId), now);

export const createBudget = (userId: string, input: CreateBudgetInput, now: number = Date.now()): BudgetProgress => {
  const budget: Budget = {
    id: uuidv4(),
    userId,
    name: input.name,
    type: input.type,
    category: input.category ?? null,
    amount: input.amount,
    period: input.period ?? 'monthly',
    alertAtPercent: input.alertAtPercent ?? DEFAULT_ALERT_PERCENT,
    isActive: true,
    createdAt: now,
    updatedAt: now,
  };

  db.prepare(
    `INSERT INTO budgets (id, user_id, name, type, category, amount, period, alert_at_percent, is_active, created_at, updated_at)
     VALUES (@id, @user_id, @name, @type, @category, @amount, @period, @alert_at_percent, @is_active, @created_at, @updated_at)`
  ).run(mapBudgetToStored(budget));

  logger.info(`Budget ${budget.id} (${budget.type}) created for user ${userId}`);
  return computeProgress(budget, now);
};

export const updateBudget = (
  userId: string,
  budgetId: string,
  updateData: UpdateBudgetInput,
  now: number = Date.now()
): BudgetProgress => {
  const existing = findBudget(userId, budgetId);

  const updated: Budget = {
    ...existing,
    name: updateData.name ?? existing.name,
    amount: updateData.amount ?? existing.amount,
    category: updateData.category !== undefined ? updateData.category : existing.category,
    period: updateData.period ?? existing.period,
    alertAtPercent: updateData.alertAtPercent ?? existing.alertAtPercent,
    isActive: updateData.isActive ?? existing.isActive,
    updatedAt: now,
  };

  db.prepare(
    `UPDATE budgets SET name = @name, category = @category, amount = @amount, period = @period,
       alert_at_percent = @alert_at_percent, is_active = @is_active, updated_at = @updated_at
     WHERE id = @id AND user_id = @user_id`
  ).run(mapBudgetToStored(updated));

  return computeProgress(updated, now);
};

export const deleteBudget = (userId: string, budgetId: string): void => {
  const result = db.prepare('DELETE FROM budgets WHERE id = ? AND user_id = ?').run(budgetId, userId);
  if (result.changes === 0) {
    throw new NotFound('Budget');
  }
};
