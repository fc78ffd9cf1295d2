// src/models/ai.types.ts
import { Attachment } from './message.types';

export interface ChatHistoryEntry {
  role: string;
  content: string;
}

export interface PendingDraftContext {
  type?: string;
  account?: string;
  amount?: number;
  description?: string;
}

export interface OpenDebtContext {
  id: string;
  contact?: string | null;
  amount: number;
  remainingAmount?: number | null;
  type: string;
}

export interface ParseRequest {
  text: string; // may be empty when attachments carry the content
  attachments?: Attachment[];
  history?: ChatHistoryEntry[];
  pendingDrafts?: PendingDraftContext[];
  openDebts?: OpenDebtContext[];
  currencyCode?: string;
  currencySymbol?: string;
  languageCode?: string;
}

export interface ParsedTransaction {
  amount: number;
  description: string;
  category: string | null;
  type: string; // provider output, not checked against TransactionType
  account: string;
  contact: string | null;
  date: string | null;
  dueDate: string | null;
  interestRate: number | null;
  termMonths: number | null;
  linkedTransactionId: string | null;
}

export interface ParseResult {
  transactions: ParsedTransaction[];
  isQuestion: boolean;
  questionResponse: string | null;
  isCorrection: boolean | null;
}
