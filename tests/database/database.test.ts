// tests/database/database.test.ts
import { db, initializeSchema, clearAllTables } from '../../src/database';

const namesOf = (type: 'table' | 'index', table?: string): string[] => {
  const rows = table
    ? db.prepare<[string, string], { name: string }>('SELECT name FROM sqlite_master WHERE type = ? AND tbl_name = ?').all(type, table)
    : db.prepare<[string], { name: string }>('SELECT name FROM sqlite_master WHERE type = ?').all(type);
  return rows.map((row) => row.name);
};

const insertUser = (id: string): void => {
  db.prepare(
    "INSERT INTO users (id, email, password_hash, created_at, updated_at) VALUES (?, ?, 'hash', 0, 0)"
  ).run(id, `${id}@example.com`);
};

const insertContact = (id: string, userId: string): void => {
  db.prepare("INSERT INTO contacts (id, user_id, name, created_at, updated_at) VALUES (?, ?, 'Contact', 0, 0)").run(id, userId);
};

describe('Database Module Tests (Integration with In-Memory DB)', () => {
  beforeEach(() => {
    clearAllTables();
  });

  test('initializeSchema should create all tables and indexes', () => {
    expect(namesOf('table')).toEqual(expect.arrayContaining(['users', 'contacts', 'transactions', 'messages', 'drafts', 'budgets']));
    expect(namesOf('index', 'transactions')).toEqual(
      expect.arrayContaining([
        'idx_transactions_user_id_occurred_at',
        'idx_transactions_contact_id',
        'idx_transactions_linked_transaction_id',
      ])
    );
    expect(namesOf('index', 'drafts')).toContain('idx_drafts_user_id_status');
    expect(namesOf('index', 'budgets')).toContain('idx_budgets_user_id');
  });

  test('initializeSchema should be safe to run again', () => {
    expect(() => initializeSchema()).not.toThrow();
  });

  test('foreign keys should be enforced', () => {
    const row = db.prepare<[], { foreign_keys: number }>('PRAGMA foreign_keys').get();
    expect(row?.foreign_keys).toBe(1);
  });

  test('a contact referenced by a transaction cannot be deleted at the database level', () => {
    insertUser('u1');
    insertContact('c1', 'u1');
    db.prepare(
      `INSERT INTO transactions (id, user_id, contact_id, amount, type, account, description, occurred_at, created_at, updated_at)
       VALUES ('t1', 'u1', 'c1', 10, 'loan_receivable', 'cash', 'Lent', 0, 0, 0)`
    ).run();

    expect(() => db.prepare("DELETE FROM contacts WHERE id = 'c1'").run()).toThrow(/FOREIGN KEY constraint failed/);
  });

  test('deleting a contact should unlink drafts that pointed at it', () => {
    insertUser('u1');
    insertContact('c1', 'u1');
    db.prepare(
      `INSERT INTO drafts (id, user_id, contact_id, occurred_at, amount, description, type, account, created_at, updated_at)
       VALUES ('d1', 'u1', 'c1', 0, 5, 'Draft', 'expense', 'cash', 0, 0)`
    ).run();

    db.prepare("DELETE FROM contacts WHERE id = 'c1'").run();

    const draft = db.prepare<[], { contact_id: string | null }>("SELECT contact_id FROM drafts WHERE id = 'd1'").get();
    expect(draft?.contact_id).toBeNull();
  });

  test('emails should be unique regardless of case', () => {
    insertUser('u1');
    expect(() =>
      db.prepare("INSERT INTO users (id, email, password_hash, created_at, updated_at) VALUES ('u2', 'U1@EXAMPLE.COM', 'hash', 0, 0)").run()
    ).toThrow(/UNIQUE constraint failed: users.email/);
  });
});
