// tests/services/budgetService.test.ts
import { clearAllTables } from '../../src/database';
import { createUser } from '../../src/services/userService';
import { createTransaction } from '../../src/services/transactionService';
import { createBudget, deleteBudget, getBudget, listBudgets, periodStart, updateBudget } from '../../src/services/budgetService';
import { CreateTransactionInput } from '../../src/models/transaction.types';
import { NotFound } from '../../src/utils/errors';

// Wednesday 15 May 2024, noon UTC
const NOW = Date.UTC(2024, 4, 15, 12);

let userId: string;

const record = (type: 'income' | 'expense', amount: number, category: string | null, occurredAt: number): void => {
  const input: CreateTransactionInput = { type, amount, category, occurredAt, account: 'cash', description: `${type} ${amount}` };
  createTransaction(userId, input);
};

describe('Budget Service', () => {
  beforeEach(() => {
    clearAllTables();
    userId = createUser({ email: 'budget@example.com', passwordHash: 'not-a-real-hash' }).id;
  });

  describe('periodStart', () => {
    it.each([
      ['weekly', NOW, Date.UTC(2024, 4, 13)],
      ['weekly', Date.UTC(2024, 4, 19, 23), Date.UTC(2024, 4, 13)],
      ['weekly', Date.UTC(2024, 4, 13, 0, 30), Date.UTC(2024, 4, 13)],
      ['monthly', NOW, Date.UTC(2024, 4, 1)],
      ['yearly', NOW, Date.UTC(2024, 0, 1)],
    ] as const)('should start a %s period containing %d at %d', (period, now, expected) => {
      expect(periodStart(period, now)).toBe(expected);
    });
  });

  describe('progress', () => {
    beforeEach(() => {
      record('expense', 30, 'food', Date.UTC(2024, 4, 10));
      record('expense', 25, 'Fast food', Date.UTC(2024, 4, 14));
      record('expense', 500, 'rent', Date.UTC(2024, 4, 2));
      record('expense', 40, 'food', Date.UTC(2024, 3, 28)); // previous month
      record('income', 1000, 'salary', Date.UTC(2024, 4, 3));
    });

    it('should count matching expenses of the period against a spending limit', () => {
      const budget = createBudget(userId, { name: 'Food', type: 'spending_limit', category: 'FOOD', amount: 100 }, NOW);
      expect(budget.periodStart).toBe(Date.UTC(2024, 4, 1));
      expect(budget.currentAmount).toBe(55);
      expect(budget.progressPercent).toBe(55);
      expect(budget.status).toBe('on_track');
      expect(budget.isOverBudget).toBe(false);
    });

    it('should warn past the alert threshold and flag an exceeded limit', () => {
      const warned = createBudget(userId, { name: 'Food', type: 'spending_limit', category: 'food', amount: 100, alertAtPercent: 50 }, NOW);
      expect(warned.status).toBe('warning');

      const exceeded = createBudget(userId, { name: 'Tight food', type: 'spending_limit', category: 'food', amount: 50 }, NOW);
      expect(exceeded.progressPercent).toBe(110);
      expect(exceeded.status).toBe('over_budget');
      expect(exceeded.isOverBudget).toBe(true);
    });

    it('should track income, savings and profit goals', () => {
      const income = createBudget(userId, { name: 'Earn', type: 'income_goal', amount: 800 }, NOW);
      expect(income.currentAmount).toBe(1000);
      expect(income.progressPercent).toBe(125);
      expect(income.status).toBe('achieved');
      expect(income.isOverBudget).toBe(false);

      const savings = createBudget(userId, { name: 'Save', type: 'savings_goal', amount: 1000 }, NOW);
      expect(savings.currentAmount).toBe(445);
      expect(savings.progressPercent).toBe(44.5);
      expect(savings.status).toBe('on_track');

      const weeklyProfit = createBudget(userId, { name: 'Week', type: 'profit_goal', amount: 100, period: 'weekly' }, NOW);
      expect(weeklyProfit.currentAmount).toBe(-25);
      expect(weeklyProfit.progressPercent).toBe(-25);

      const weeklySavings = createBudget(userId, { name: 'Week savings', type: 'savings_goal', amount: 100, period: 'weekly' }, NOW);
      expect(weeklySavings.currentAmount).toBe(0);
    });
  });

  it('should update, list newest first, and delete budgets', () => {
    const first = createBudget(userId, { name: 'First', type: 'income_goal', amount: 10 }, NOW);
    const second = createBudget(userId, { name: 'Second', type: 'spending_limit', amount: 20 }, NOW + 1);
    expect(first.period).toBe('monthly');
    expect(first.alertAtPercent).toBe(80);
    expect(first.isActive).toBe(true);

    const updated = updateBudget(userId, first.id, { amount: 15, period: 'yearly', isActive: false }, NOW);
    expect(updated.amount).toBe(15);
    expect(updated.period).toBe('yearly');
    expect(updated.isActive).toBe(false);
    expect(updated.name).toBe('First');

    expect(listBudgets(userId, NOW).map((b) => b.id)).toEqual([second.id, first.id]);

    deleteBudget(userId, first.id);
    expect(() => getBudget(userId, first.id)).toThrow(new NotFound('Budget'));
    expect(() => deleteBudget(userId, first.id)).toThrow(NotFound);
  });

  it('should keep budgets private to their owner', () => {
    const budget = createBudget(userId, { name: 'Mine', type: 'income_goal', amount: 10 }, NOW);
    const otherId = createUser({ email: 'someone@example.com', passwordHash: 'not-a-real-hash' }).id;

    expect(listBudgets(otherId)).toEqual([]);
    expect(() => getBudget(otherId, budget.id)).toThrow(NotFound);
    expect(() => updateBudget(otherId, budget.id, { amount: 1 })).toThrow(NotFound);
    expect(() => deleteBudget(otherId, budget.id)).toThrow(NotFound);
  });
});
