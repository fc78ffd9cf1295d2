// src/models/balance.types.ts
export type BalanceStatus = 'owed_to_you' | 'you_owe' | 'settled';

export interface ContactBalance {
  contactId: string;
  contactName: string;
  netAmount: number; // > 0: the contact owes the user
  status: BalanceStatus;
}

export interface BalanceQuery {
  includeSettled?: boolean;
}

export interface OpenDebtQuery {
  contactId?: string;
  contactName?: string;
}

export interface AccountSummary {
  cash: number;
  bank: number;
  credit: number; // receivables
  loan: number; // payables
}
