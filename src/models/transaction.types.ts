// src/models/transaction.types.ts
export const TRANSACTION_TYPES = [
  'expense',
  'income',
  'transfer',
  'credit_receivable',
  'credit_payable',
  'loan_receivable',
  'loan_payable',
  'payment_received',
  'payment_made',
] as const;

export type TransactionType = typeof TRANSACTION_TYPES[number];

export const ACCOUNT_TYPES = ['cash', 'bank'] as const;

export type AccountType = typeof ACCOUNT_TYPES[number];

export const DEBT_STATUSES = ['open', 'partial', 'settled'] as const;

export type DebtStatus = typeof DEBT_STATUSES[number];

export type DebtType = Extract<TransactionType, 'credit_receivable' | 'credit_payable' | 'loan_receivable' | 'loan_payable'>;

export type PaymentType = Extract<TransactionType, 'payment_received' | 'payment_made'>;

export const DEBT_TYPES: readonly DebtType[] = ['credit_receivable', 'credit_payable', 'loan_receivable', 'loan_payable'];

export const isDebtType = (type: TransactionType): type is DebtType => DEBT_TYPES.some((debtType) => debtType === type);

export const isPaymentType = (type: TransactionType): type is PaymentType =>
  type === 'payment_received' || type === 'payment_made';

export type TransactionMetadata = Record<string, unknown>;

export interface Transaction {
  id: string;
  userId: string;
  contactId: string | null;
  contactName: string | null;
  amount: number;
  type: TransactionType;
  account: AccountType;
  description: string;
  category: string | null;
  isShared: boolean;
  occurredAt: number;
  dueDate: number | null;
  linkedTransactionId: string | null;
  remainingAmount: number | null;
  status: DebtStatus | null;
  metadata: TransactionMetadata | null;
  createdAt: number;
  updatedAt: number;
}

export interface TransactionStored {
  id: string;
  user_id: string;
  contact_id: string | null;
  contact_name: string | null;
  amount: number;
  type: string;
  account: string;
  description: string;
  category: string | null;
  is_shared: number;
  occurred_at: number;
  due_date: number | null;
  linked_transaction_id: string | null;
  remaining_amount: number | null;
  status: string | null;
  metadata_json: string | null;
  created_at: number;
  updated_at: number;
}

export interface CreateTransactionInput {
  amount: number;
  type: TransactionType;
  account: AccountType;
  description: string;
  category?: string | null;
  contactId?: string | null;
  contactName?: string | null;
  isShared?: boolean;
  occurredAt?: number;
  dueDate?: number | null;
  linkedTransactionId?: string | null;
  metadata?: TransactionMetadata | null;
}

export type UpdateTransactionInput = Partial<
  Omit<CreateTransactionInput, 'occurredAt'> & {
    occurredAt: number;
    remainingAmount: number | null;
    status: DebtStatus | null;
  }
>;

export interface TransactionListQuery {
  skip: number;
  limit: number;
  type?: TransactionType;
  contactId?: string;
}

export interface TransactionListResponse {
  transactions: Transaction[];
  total: number;
}
