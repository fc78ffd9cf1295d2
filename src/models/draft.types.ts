// src/models/draft.types.ts
import { AccountType, TransactionType } from './transaction.types';

export const DRAFT_STATUSES = ['pending', 'confirmed', 'discarded'] as const;

export type DraftStatus = typeof DRAFT_STATUSES[number];

export interface Draft {
  id: string;
  userId: string;
  messageId: string | null;
  occurredAt: number;
  amount: number;
  description: string;
  category: string | null;
  type: TransactionType;
  account: AccountType;
  contactName: string | null;
  contactId: string | null;
  dueDate: number | null;
  linkedTransactionId: string | null;
  status: DraftStatus;
  createdAt: number;
  updatedAt: number;
}

export interface DraftStored {
  id: string;
  user_id: string;
  message_id: string | null;
  occurred_at: number;
  amount: number;
  description: string;
  category: string | null;
  type: string;
  account: string;
  contact_name: string | null;
  contact_id: string | null;
  due_date: number | null;
  linked_transaction_id: string | null;
  status: string;
  created_at: number;
  updated_at: number;
}

export interface CreateDraftInput {
  messageId?: string | null;
  occurredAt?: number;
  amount: number;
  description: string;
  category?: string | null;
  type: TransactionType;
  account: AccountType;
  contactName?: string | null;
  contactId?: string | null;
  dueDate?: number | null;
  linkedTransactionId?: string | null;
}

export type UpdateDraftInput = Partial<Omit<CreateDraftInput, 'messageId'>>;

export interface DraftListQuery {
  status: DraftStatus;
  skip: number;
  limit: number;
}

export interface DraftListResponse {
  drafts: Draft[];
  total: number;
}
