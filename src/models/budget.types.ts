// src/models/budget.types.ts
export const BUDGET_TYPES = ['spending_limit', 'income_goal', 'savings_goal', 'profit_goal'] as const;

export type BudgetType = typeof BUDGET_TYPES[number];

export const BUDGET_PERIODS = ['weekly', 'monthly', 'yearly'] as const;

export type BudgetPeriod = typeof BUDGET_PERIODS[number];

export type BudgetStatus = 'on_track' | 'warning' | 'over_budget' | 'achieved';

export interface Budget {
  id: string;
  userId: string;
  name: string;
  type: BudgetType;
  category: string | null; // spending limits only; null covers every expense
  amount: number;
  period: BudgetPeriod;
  alertAtPercent: number;
  isActive: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface BudgetStored {
  id: string;
  user_id: string;
  name: string;
  type: string;
  category: string | null;
  amount: number;
  period: string;
  alert_at_percent: number;
  is_active: number;
  created_at: number;
  updated_at: number;
}

/** A budget together with where the current period stands. */
export interface BudgetProgress extends Budget {
  periodStart: number;
  currentAmount: number;
  progressPercent: number;
  isOverBudget: boolean;
  status: BudgetStatus;
}

export interface CreateBudgetInput {
  name: string;
  type: BudgetType;
  amount: number;
  category?: string | null;
  period?: BudgetPeriod;
  alertAtPercent?: number;
}

export type UpdateBudgetInput = Partial<Omit<CreateBudgetInput, 'type'> & { isActive: boolean }>;
