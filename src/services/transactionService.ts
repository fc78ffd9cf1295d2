// src/services/transactionService.ts
import { v4 as uuidv4 } from 'uuid';
import { db } from '../database';
import {
  ACCOUNT_TYPES,
  CreateTransactionInput,
  DEBT_STATUSES,
  DebtStatus,
  DebtType,
  PaymentType,
  TRANSACTION_TYPES,
  Transaction,
  TransactionListQuery,
  TransactionListResponse,
  TransactionStored,
  UpdateTransactionInput,
  isDebtType,
  isPaymentType,
} from '../models/transaction.types';
import { NotFound, ValidationError } from '../utils/errors';
import { expectOneOf, fromCents, parseJsonRecord, toCents } from '../utils/guards';
import logger from '../utils/logger';
import { findContact, findOrCreateContactByName } from './contactService';

export const mapStoredToTransaction = (stored: TransactionStored): Transaction => ({
  id: stored.id,
  userId: stored.user_id,
  contactId: stored.contact_id,
  contactName: stored.contact_name,
  amount: stored.amount,
  type: expectOneOf(TRANSACTION_TYPES, stored.type, 'transactions.type'),
  account: expectOneOf(ACCOUNT_TYPES, stored.account, 'transactions.account'),
  description: stored.description,
  category: stored.category,
  isShared: stored.is_shared === 1,
  occurredAt: stored.occurred_at,
  dueDate: stored.due_date,
  linkedTransactionId: stored.linked_transaction_id,
  remainingAmount: stored.remaining_amount,
  status: stored.status === null ? null : expectOneOf(DEBT_STATUSES, stored.status, 'transactions.status'),
  metadata: parseJsonRecord(stored.metadata_json),
  createdAt: stored.created_at,
  updatedAt: stored.updated_at,
});

const mapTransactionToStored = (tx: Transaction): TransactionStored => ({
  id: tx.id,
  user_id: tx.userId,
  contact_id: tx.contactId,
  contact_name: tx.contactName,
  amount: tx.amount,
  type: tx.type,
  account: tx.account,
  description: tx.description,
  category: tx.category,
  is_shared: tx.isShared ? 1 : 0,
  occurred_at: tx.occurredAt,
  due_date: tx.dueDate,
  linked_transaction_id: tx.linkedTransactionId,
  remaining_amount: tx.remainingAmount,
  status: tx.status,
  metadata_json: tx.metadata === null ? null : JSON.stringify(tx.metadata),
  created_at: tx.createdAt,
  updated_at: tx.updatedAt,
});

const insertTransaction = (tx: Transaction): void => {
  db.prepare(
    `INSERT INTO transactions (
       id, user_id, contact_id, contact_name, amount, type, account, description, category, is_shared,
       occurred_at, due_date, linked_transaction_id, remaining_amount, status, metadata_json, created_at, updated_at
     ) VALUES (
       @id, @user_id, @contact_id, @contact_name, @amount, @type, @account, @description, @category, @is_shared,
       @occurred_at, @due_date, @linked_transaction_id, @remaining_amount, @status, @metadata_json, @created_at, @updated_at
     )`
  ).run(mapTransactionToStored(tx));
};

const writeTransaction = (tx: Transaction): void => {
  db.prepare(
    `UPDATE transactions SET
       contact_id = @contact_id, contact_name = @contact_name, amount = @amount, type = @type, account = @account,
       description = @description, category = @category, is_shared = @is_shared, occurred_at = @occurred_at,
       due_date = @due_date, linked_transaction_id = @linked_transaction_id, remaining_amount = @remaining_amount,
       status = @status, metadata_json = @metadata_json, updated_at = @updated_at
     WHERE id = @id AND user_id = @user_id`
  ).run(mapTransactionToStored(tx));
};

// Debts start open with their full amount outstanding.
const withDebtDefaults = (tx: Transaction): Transaction => {
  if (isDebtType(tx.type) && tx.status === null) {
    return { ...tx, status: 'open', remainingAmount: tx.amount };
  }
  return tx;
};

const debtStatusFor = (leftCents: number, amountCents: number): DebtStatus => {
  if (leftCents === 0) {
    return 'settled';
  }
  return leftCents === amountCents ? 'open' : 'partial';
};

// Total of the payment portions applied to a debt, in cents.
const paidCents = (userId: string, debtId: string): number => {
  const rows = db
    .prepare<[string, string], { amount: number }>(
      `SELECT amount FROM transactions
       WHERE linked_transaction_id = ? AND user_id = ? AND type IN ('payment_received', 'payment_made')`
    )
    .all(debtId, userId);
  return rows.reduce((sum, row) => sum + toCents(row.amount), 0);
};

export const findTransaction = (userId: string, transactionId: string): Transaction | null => {
  const stored = db
    .prepare<[string, string], TransactionStored>('SELECT * FROM transactions WHERE id = ? AND user_id = ?')
    .get(transactionId, userId);
  return stored ? mapStoredToTransaction(stored) : null;
};

export const getTransaction = (userId: string, transactionId: string): Transaction => {
  const tx = findTransaction(userId, transactionId);
  if (!tx) {
    throw new NotFound('Transaction');
  }
  return tx;
};

export const listTransactions = (userId: string, query: TransactionListQuery): TransactionListResponse => {
  let where = 'WHERE user_id = @userId';
  const params: { userId: string; type?: string; contactId?: string } = { userId };
  if (query.type) {
    where += ' AND type = @type';
    params.type = query.type;
  }
  if (query.contactId) {
    where += ' AND contact_id = @contactId';
    params.contactId = query.contactId;
  }

  const rows = db
    .prepare<typeof params & { limit: number; skip: number }, TransactionStored>(
      `SELECT * FROM transactions ${where} ORDER BY occurred_at DESC, id DESC LIMIT @limit OFFSET @skip`
    )
    .all({ ...params, limit: query.limit, skip: query.skip });
  const countRow = db
    .prepare<typeof params, { total: number }>(`SELECT COUNT(*) AS total FROM transactions ${where}`)
    .get(params);

  return { transactions: rows.map(mapStoredToTransaction), total: countRow ? countRow.total : 0 };
};

const resolveContact = (
  userId: string,
  contactId: string | null | undefined,
  contactName: string | null | undefined
): { contactId: string | null; contactName: string | null } => {
  if (contactId) {
    const contact = findContact(userId, contactId);
    if (!contact) {
      throw new NotFound('Contact');
    }
    return { contactId: contact.id, contactName: contactName || contact.name };
  }
  if (contactName && contactName.trim() !== '') {
    const contact = findOrCreateContactByName(userId, contactName);
    return { contactId: contact.id, contactName: contactName.trim() };
  }
  return { contactId: null, contactName: null };
};

const assertLinkable = (userId: string, linkedTransactionId: string | null): void => {
  if (linkedTransactionId && !findTransaction(userId, linkedTransactionId)) {
    throw new NotFound('Linked transaction');
  }
};

const debtTypesSettledBy = (type: PaymentType): DebtType[] =>
  type === 'payment_received' ? ['credit_receivable', 'loan_receivable'] : ['credit_payable', 'loan_payable'];

const collectDebtsForPayment = (userId: string, payment: Transaction, linkedTransactionId: string | null): Transaction[] => {
  if (!isPaymentType(payment.type)) {
    return [];
  }
  const settles = debtTypesSettledBy(payment.type);
  const debts: Transaction[] = [];

  if (linkedTransactionId) {
    const linked = findTransaction(userId, linkedTransactionId);
    if (!linked) {
      throw new NotFound('Linked transaction');
    }
    if (!settles.some((type) => type === linked.type)) {
      throw new ValidationError(`A ${payment.type} cannot settle a ${linked.type} transaction.`);
    }
    if (linked.status !== 'settled') {
      debts.push(linked);
    }
  }

  if (payment.contactId) {
    // Oldest first
    const rows = db
      .prepare<{ userId: string; contactId: string; debtA: string; debtB: string; excludeId: string }, TransactionStored>(
        `SELECT * FROM transactions
         WHERE user_id = @userId AND contact_id = @contactId AND type IN (@debtA, @debtB)
           AND (status IS NULL OR status != 'settled') AND id != @excludeId
         ORDER BY occurred_at ASC, id ASC`
      )
      .all({ userId, contactId: payment.contactId, debtA: settles[0], debtB: settles[1], excludeId: linkedTransactionId ?? '' });
    debts.push(...rows.map(mapStoredToTransaction));
  }

  return debts;
};

/**
 * Spreads a payment over outstanding debts: the explicitly linked debt first,
 * then the contact's other debts of the matching direction, oldest first.
 * Writes one payment row per debt touched plus one unlinked row for any
 * remainder. Must run inside a database transaction.
 */
const applyPayment = (userId: string, payment: Transaction, linkedTransactionId: string | null): Transaction[] => {
  const debts = collectDebtsForPayment(userId, payment, linkedTransactionId);
  const created: Transaction[] = [];
  let remainingCents = toCents(payment.amount);

  for (const debt of debts) {
    if (remainingCents <= 0) {
      break;
    }
    const outstandingCents = toCents(debt.remainingAmount ?? debt.amount);
    if (outstandingCents <= 0) {
      continue;
    }
    const appliedCents = Math.min(remainingCents, outstandingCents);
    const leftCents = outstandingCents - appliedCents;

    writeTransaction({
      ...debt,
      remainingAmount: fromCents(leftCents),
      status: debtStatusFor(leftCents, toCents(debt.amount)),
      updatedAt: payment.updatedAt,
    });

    const portion: Transaction = {
      ...payment,
      id: created.length === 0 ? payment.id : uuidv4(),
      amount: fromCents(appliedCents),
      linkedTransactionId: debt.id,
    };
    insertTransaction(portion);
    created.push(portion);
    remainingCents -= appliedCents;
  }

  // Whatever no debt absorbed becomes one unlinked payment.
  if (remainingCents > 0) {
    const rest: Transaction = {
      ...payment,
      id: created.length === 0 ? payment.id : uuidv4(),
      amount: fromCents(remainingCents),
      linkedTransactionId: null,
    };
    insertTransaction(rest);
    created.push(rest);
  }

  return created;
};

/**
 * Records a transaction for the user. Payments may be split across several
 * debts, so the result lists every row written; the first is the primary one.
 */
export const createTransaction = (userId: string, input: CreateTransactionInput): Transaction[] => {
  if (toCents(input.amount) <= 0) {
    throw new ValidationError('amount must be at least 0.01.');
  }

  const create = db.transaction((): Transaction[] => {
    // Link or create the contact
    const contact = resolveContact(userId, input.contactId, input.contactName);
    const now = Date.now();

    const tx = withDebtDefaults({
      id: uuidv4(),
      userId,
      contactId: contact.contactId,
      contactName: contact.contactName,
      amount: input.amount,
      type: input.type,
      account: input.account,
      description: input.description,
      category: input.category ?? null,
      isShared: input.isShared ?? false,
      occurredAt: input.occurredAt ?? now,
      dueDate: input.dueDate ?? null,
      linkedTransactionId: input.linkedTransactionId ?? null,
      remainingAmount: null,
      status: null,
      metadata: input.metadata ?? null,
      createdAt: now,
      updatedAt: now,
    });

    // Payments are spread over debts
    if (isPaymentType(tx.type)) {
      return applyPayment(userId, tx, tx.linkedTransactionId);
    }

    assertLinkable(userId, tx.linkedTransactionId);
    insertTransaction(tx);
    return [tx];
  });

  const created = create();
  logger.info(`Transaction(s) created for user ${userId}: ${created.map((tx) => tx.id).join(', ')}`);
  return created;
};

export const updateTransaction = (
  userId: string,
  transactionId: string,
  updateData: UpdateTransactionInput
): Transaction => {
  const existing = getTransaction(userId, transactionId);

  // Contact
  let contactId = existing.contactId;
  let contactName = existing.contactName;
  // A new name alone moves the transaction to the contact with that name.
  if (updateData.contactId !== undefined || updateData.contactName !== undefined) {
    const contact =
      updateData.contactId !== undefined
        ? resolveContact(userId, updateData.contactId, updateData.contactName)
        : resolveContact(userId, null, updateData.contactName);
    contactId = contact.contactId;
    contactName = contact.contactName;
  }

  // Link target must exist and differ from the transaction itself
  if (updateData.linkedTransactionId !== undefined) {
    if (updateData.linkedTransactionId === transactionId) {
      throw new ValidationError('A transaction cannot be linked to itself.');
    }
    assertLinkable(userId, updateData.linkedTransactionId);
  }

  const type = updateData.type ?? existing.type;
  const amount = updateData.amount ?? existing.amount;
  if (toCents(amount) <= 0) {
    throw new ValidationError('amount must be at least 0.01.');
  }

  // Debt bookkeeping: recomputed from applied payments when the amount or the kind of debt changes.
  let remainingAmount: number | null = null;
  let status: DebtStatus | null = null;
  if (isDebtType(type)) {
    if (amount !== existing.amount || !isDebtType(existing.type)) {
      const leftCents = toCents(amount) - paidCents(userId, transactionId);
      if (leftCents < 0) {
        throw new ValidationError('amount cannot be less than what has already been paid.');
      }
      remainingAmount = fromCents(leftCents);
      status = debtStatusFor(leftCents, toCents(amount));
    } else {
      remainingAmount = existing.remainingAmount;
      status = existing.status;
    }
    // Explicit corrections win.
    if (updateData.remainingAmount !== undefined) {
      remainingAmount = updateData.remainingAmount;
    }
    if (updateData.status !== undefined) {
      status = updateData.status;
    }
    if (remainingAmount !== null && toCents(remainingAmount) > toCents(amount)) {
      throw new ValidationError('remainingAmount cannot exceed amount.');
    }
  }

  const updated = withDebtDefaults({
    ...existing,
    contactId,
    contactName,
    amount,
    type,
    account: updateData.account ?? existing.account,
    description: updateData.description ?? existing.description,
    category: updateData.category !== undefined ? updateData.category : existing.category,
    isShared: updateData.isShared ?? existing.isShared,
    occurredAt: updateData.occurredAt ?? existing.occurredAt,
    dueDate: updateData.dueDate !== undefined ? updateData.dueDate : existing.dueDate,
    linkedTransactionId:
      updateData.linkedTransactionId !== undefined ? updateData.linkedTransactionId : existing.linkedTransactionId,
    remainingAmount,
    status,
    metadata: updateData.metadata !== undefined ? updateData.metadata : existing.metadata,
    updatedAt: Date.now(),
  });

  writeTransaction(updated);
  return updated;
};

/**
 * Deletes a transaction. Removing a payment gives its amount back to the
 * debt it was applied to.
 */
export const deleteTransaction = (userId: string, transactionId: string): void => {
  const remove = db.transaction(() => {
    const tx = getTransaction(userId, transactionId);

    // Restore the debt this payment portion settled
    if (isPaymentType(tx.type) && tx.linkedTransactionId) {
      const debt = findTransaction(userId, tx.linkedTransactionId);
      if (debt && isDebtType(debt.type)) {
        const outstandingCents = Math.min(
          toCents(debt.remainingAmount ?? 0) + toCents(tx.amount),
          toCents(debt.amount)
        );
        writeTransaction({
          ...debt,
          remainingAmount: fromCents(outstandingCents),
          status: debtStatusFor(outstandingCents, toCents(debt.amount)),
          updatedAt: Date.now(),
        });
      }
    }

    db.prepare('DELETE FROM transactions WHERE id = ? AND user_id = ?').run(transactionId, userId);
  });

  remove();
};

/** Payments that were applied to the given debt, oldest first. */
export const listDebtPayments = (userId: string, debtId: string): Transaction[] => {
  getTransaction(userId, debtId);
  const rows = db
    .prepare<[string, string], TransactionStored>(
      `SELECT * FROM transactions
       WHERE linked_transaction_id = ? AND user_id = ? AND type IN ('payment_received', 'payment_made')
       ORDER BY occurred_at ASC, id ASC`
    )
    .all(debtId, userId);
  return rows.map(mapStoredToTransaction);
};
