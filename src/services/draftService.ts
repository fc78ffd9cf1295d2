// src/services/draftService.ts
import { v4 as uuidv4 } from 'uuid';
import { db } from '../database';
import {
  CreateDraftInput,
  DRAFT_STATUSES,
  Draft,
  DraftListQuery,
  DraftListResponse,
  DraftStored,
  UpdateDraftInput,
} from '../models/draft.types';
import { ACCOUNT_TYPES, TRANSACTION_TYPES, Transaction } from '../models/transaction.types';
import { InvalidState, NotFound } from '../utils/errors';
import { expectOneOf } from '../utils/guards';
import logger from '../utils/logger';
import { findContact } from './contactService';
import { createTransaction } from './transactionService';

const mapStoredToDraft = (stored: DraftStored): Draft => ({
  id: stored.id,
  userId: stored.user_id,
  messageId: stored.message_id,
  occurredAt: stored.occurred_at,
  amount: stored.amount,
  description: stored.description,
  category: stored.category,
  type: expectOneOf(TRANSACTION_TYPES, stored.type, 'drafts.type'),
  account: expectOneOf(ACCOUNT_TYPES, stored.account, 'drafts.account'),
  contactName: stored.contact_name,
  contactId: stored.contact_id,
  dueDate: stored.due_date,
  linkedTransactionId: stored.linked_transaction_id,
  status: expectOneOf(DRAFT_STATUSES, stored.status, 'drafts.status'),
  createdAt: stored.created_at,
  updatedAt: stored.updated_at,
});

const mapDraftToStored = (draft: Draft): DraftStored => ({
  id: draft.id,
  user_id: draft.userId,
  message_id: draft.messageId,
  occurred_at: draft.occurredAt,
  amount: draft.amount,
  description: draft.description,
  category: draft.category,
  type: draft.type,
  account: draft.account,
  contact_name: draft.contactName,
  contact_id: draft.contactId,
  due_date: draft.dueDate,
  linked_transaction_id: draft.linkedTransactionId,
  status: draft.status,
  created_at: draft.createdAt,
  updated_at: draft.updatedAt,
});

// References to rows the user does not own are dropped rather than stored.
const ownedOrNull = (table: 'messages' | 'transactions', userId: string, id: string | null | undefined): string | null => {
  if (!id) {
    return null;
  }
  const row = db.prepare<[string, string], { id: string }>(`SELECT id FROM ${table} WHERE id = ? AND user_id = ?`).get(id, userId);
  return row ? row.id : null;
};

const insertDraft = (userId: string, data: CreateDraftInput): Draft => {
  const now = Date.now();
  const contact = data.contactId ? findContact(userId, data.contactId) : null;
  const draft: Draft = {
    id: uuidv4(),
    userId,
    messageId: ownedOrNull('messages', userId, data.messageId),
    occurredAt: data.occurredAt ?? now,
    amount: data.amount,
    description: data.description,
    category: data.category ?? null,
    type: data.type,
    account: data.account,
    contactName: data.contactName ?? (contact ? contact.name : null),
    contactId: contact ? contact.id : null,
    dueDate: data.dueDate ?? null,
    linkedTransactionId: ownedOrNull('transactions', userId, data.linkedTransactionId),
    status: 'pending',
    createdAt: now,
    updatedAt: now,
  };

  db.prepare(
    `INSERT INTO drafts (
       id, user_id, message_id, occurred_at, amount, description, category, type, account,
       contact_name, contact_id, due_date, linked_transaction_id, status, created_at, updated_at
     ) VALUES (
       @id, @user_id, @message_id, @occurred_at, @amount, @description, @category, @type, @account,
       @contact_name, @contact_id, @due_date, @linked_transaction_id, @status, @created_at, @updated_at
     )`
  ).run(mapDraftToStored(draft));

  return draft;
};

const writeDraft = (draft: Draft): void => {
  db.prepare(
    `UPDATE drafts SET
       occurred_at = @occurred_at, amount = @amount, description = @description, category = @category,
       type = @type, account = @account, contact_name = @contact_name, contact_id = @contact_id,
       due_date = @due_date, linked_transaction_id = @linked_transaction_id, status = @status, updated_at = @updated_at
     WHERE id = @id AND user_id = @user_id`
  ).run(mapDraftToStored(draft));
};

const requirePending = (draft: Draft, action: string): void => {
  if (draft.status !== 'pending') {
    throw new InvalidState(`Only pending drafts can be ${action}.`);
  }
};

export const listDrafts = (userId: string, query: DraftListQuery): DraftListResponse => {
  const rows = db
    .prepare<[string, string, number, number], DraftStored>(
      'SELECT * FROM drafts WHERE user_id = ? AND status = ? ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?'
    )
    .all(userId, query.status, query.limit, query.skip);
  const countRow = db
    .prepare<[string, string], { total: number }>('SELECT COUNT(*) AS total FROM drafts WHERE user_id = ? AND status = ?')
    .get(userId, query.status);
  return { drafts: rows.map(mapStoredToDraft), total: countRow ? countRow.total : 0 };
};

export const getDraft = (userId: string, draftId: string): Draft => {
  const stored = db
    .prepare<[string, string], DraftStored>('SELECT * FROM drafts WHERE id = ? AND user_id = ?')
    .get(draftId, userId);
  if (!stored) {
    throw new NotFound('Draft');
  }
  return mapStoredToDraft(stored);
};

export const createDraft = (userId: string, data: CreateDraftInput): Draft => insertDraft(userId, data);

/** Creates several drafts at once, all or none. */
export const createDraftsBatch = (userId: string, items: CreateDraftInput[]): Draft[] => {
  const createAll = db.transaction((batch: CreateDraftInput[]): Draft[] => batch.map((item) => insertDraft(userId, item)));
  return createAll(items);
};

export const updateDraft = (userId: string, draftId: string, updateData: UpdateDraftInput): Draft => {
  const existing = getDraft(userId, draftId);
  requirePending(existing, 'updated');

  // An explicit contact id must be one of the user's contacts
  let contactId = existing.contactId;
  let contactName = existing.contactName;
  if (updateData.contactId !== undefined) {
    const contact = updateData.contactId ? findContact(userId, updateData.contactId) : null;
    if (updateData.contactId && !contact) {
      throw new NotFound('Contact');
    }
    contactId = contact ? contact.id : null;
    contactName = contact ? contact.name : contactName;
  }
  if (updateData.contactName !== undefined) {
    contactName = updateData.contactName;
  }

  const updated: Draft = {
    ...existing,
    occurredAt: updateData.occurredAt ?? existing.occurredAt,
    amount: updateData.amount ?? existing.amount,
    description: updateData.description ?? existing.description,
    category: updateData.category !== undefined ? updateData.category : existing.category,
    type: updateData.type ?? existing.type,
    account: updateData.account ?? existing.account,
    contactName,
    contactId,
    dueDate: updateData.dueDate !== undefined ? updateData.dueDate : existing.dueDate,
    linkedTransactionId:
      updateData.linkedTransactionId !== undefined
        ? ownedOrNull('transactions', userId, updateData.linkedTransactionId)
        : existing.linkedTransactionId,
    updatedAt: Date.now(),
  };

  writeDraft(updated);
  return updated;
};

/**
 * Turns a pending draft into real transaction(s) and marks it confirmed,
 * both in one database transaction. Returns the first transaction written;
 * a payment spread over several debts writes more than one.
 */
export const confirmDraft = (userId: string, draftId: string): Transaction => {
  const confirm = db.transaction((): Transaction[] => {
    const draft = getDraft(userId, draftId);
    requirePending(draft, 'confirmed');

    // Same path as a direct POST /transactions
    const created = createTransaction(userId, {
      amount: draft.amount,
      type: draft.type,
      account: draft.account,
      description: draft.description,
      category: draft.category,
      contactId: draft.contactId,
      contactName: draft.contactName,
      occurredAt: draft.occurredAt,
      dueDate: draft.dueDate,
      linkedTransactionId: draft.linkedTransactionId,
    });

    // Mark confirmed
    writeDraft({ ...draft, status: 'confirmed', updatedAt: Date.now() });
    return created;
  });

  const [first, ...rest] = confirm();
  logger.info(`Draft ${draftId} confirmed for user ${userId} (${rest.length + 1} transaction(s))`);
  return first;
};

export const discardDraft = (userId: string, draftId: string): Draft => {
  const draft = getDraft(userId, draftId);
  requirePending(draft, 'discarded');
  const discarded: Draft = { ...draft, status: 'discarded', updatedAt: Date.now() };
  writeDraft(discarded);
  return discarded;
};

export const deleteDraft = (userId: string, draftId: string): void => {
  const result = db.prepare('DELETE FROM drafts WHERE id = ? AND user_id = ?').run(draftId, userId);
  if (result.changes === 0) {
    throw new NotFound('Draft');
  }
};
