// src/services/balanceService.ts
import { db } from '../database';
import { AccountSummary, BalanceQuery, BalanceStatus, ContactBalance, OpenDebtQuery } from '../models/balance.types';
import { Transaction, TransactionStored } from '../models/transaction.types';
import { fromCents, toCents } from '../utils/guards';
import { mapStoredToTransaction } from './transactionService';

/**
 * Signed effect of a transaction on what a contact owes the user, in cents.
 * Positive: the contact owes more. Null: the transaction is personal and
 * does not take part in the contact's balance.
 */
export const contributionCents = (tx: Pick<Transaction, 'type' | 'amount' | 'isShared'>): number | null => {
  const cents = toCents(tx.amount);
  switch (tx.type) {
    case 'loan_receivable':
    case 'credit_receivable':
    case 'payment_made':
      return cents;
    case 'loan_payable':
    case 'credit_payable':
    case 'payment_received':
      return -cents;
    case 'expense':
      return tx.isShared ? cents : null;
    case 'income':
      return tx.isShared ? -cents : null;
    case 'transfer':
      return null;
  }
};

const statusFor = (netCents: number): BalanceStatus => {
  if (netCents > 0) {
    return 'owed_to_you';
  }
  return netCents < 0 ? 'you_owe' : 'settled';
};

interface ContactLedgerEntry {
  contactId: string;
  contactName: string;
  netCents: number;
  transactions: Transaction[];
}

// Every contributing transaction of the user, grouped per contact.
const buildContactLedger = (userId: string): Map<string, ContactLedgerEntry> => {
  const rows = db
    .prepare<[string], TransactionStored & { joined_contact_name: string }>(
      `SELECT t.*, c.name AS joined_contact_name
       FROM transactions t
       JOIN contacts c ON c.id = t.contact_id AND c.user_id = t.user_id
       WHERE t.user_id = ? AND t.contact_id IS NOT NULL`
    )
    .all(userId);

  const ledger = new Map<string, ContactLedgerEntry>();
  for (const row of rows) {
    const tx = mapStoredToTransaction(row);
    const cents = contributionCents(tx);
    if (cents === null || tx.contactId === null) {
      continue;
    }
    let entry = ledger.get(tx.contactId);
    if (!entry) {
      entry = { contactId: tx.contactId, contactName: row.joined_contact_name, netCents: 0, transactions: [] };
      ledger.set(tx.contactId, entry);
    }
    entry.netCents += cents;
    entry.transactions.push(tx);
  }
  return ledger;
};

/**
 * Net balance per contact. Contacts with no contributing transaction are
 * absent; settled contacts are included only on request.
 */
export const computeBalances = (userId: string, query: BalanceQuery = {}): ContactBalance[] => {
  const balances: ContactBalance[] = [];
  for (const entry of buildContactLedger(userId).values()) {
    if (entry.netCents === 0 && !query.includeSettled) {
      continue;
    }
    balances.push({
      contactId: entry.contactId,
      contactName: entry.contactName,
      netAmount: fromCents(entry.netCents),
      status: statusFor(entry.netCents),
    });
  }

  return balances.sort((a, b) => {
    const byName = a.contactName.toLowerCase().localeCompare(b.contactName.toLowerCase());
    if (byName !== 0) {
      return byName;
    }
    return a.contactId < b.contactId ? -1 : a.contactId > b.contactId ? 1 : 0;
  });
};

/** Transactions of every contact whose net balance is not zero, newest first. */
export const listOpenDebts = (userId: string, query: OpenDebtQuery = {}): Transaction[] => {
  const wantedName = query.contactName ? query.contactName.trim().toLowerCase() : undefined;
  const open: Transaction[] = [];

  for (const entry of buildContactLedger(userId).values()) {
    if (entry.netCents === 0) {
      continue;
    }
    if (query.contactId && entry.contactId !== query.contactId) {
      continue;
    }
    if (wantedName !== undefined && entry.contactName.toLowerCase() !== wantedName) {
      continue;
    }
    open.push(...entry.transactions);
  }

  return open.sort((a, b) => {
    if (a.occurredAt !== b.occurredAt) {
      return b.occurredAt - a.occurredAt;
    }
    return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
  });
};

/** Liquidity per account plus receivable (credit) and payable (loan) totals. */
export const computeAccountSummary = (userId: string): AccountSummary => {
  const rows = db.prepare<[string], TransactionStored>('SELECT * FROM transactions WHERE user_id = ?').all(userId);
  const cents = { cash: 0, bank: 0, credit: 0, loan: 0 };

  for (const row of rows) {
    const tx = mapStoredToTransaction(row);
    const amount = toCents(tx.amount);
    const account = tx.account;
    switch (tx.type) {
      case 'income':
        cents[account] += amount;
        break;
      case 'expense':
      case 'transfer':
        cents[account] -= amount;
        break;
      case 'credit_receivable':
        cents.credit += amount;
        break;
      case 'credit_payable':
        cents.loan += amount;
        break;
      case 'loan_receivable':
        cents[account] -= amount;
        cents.credit += amount;
        break;
      case 'loan_payable':
        cents[account] += amount;
        cents.loan += amount;
        break;
      case 'payment_received':
        cents[account] += amount;
        cents.credit -= amount;
        break;
      case 'payment_made':
        cents[account] -= amount;
        cents.loan -= amount;
        break;
    }
  }

  return {
    cash: fromCents(cents.cash),
    bank: fromCents(cents.bank),
    credit: fromCents(cents.credit),
    loan: fromCents(cents.loan),
  };
};
