import Database from 'better-sqlite3';
import { getConfig } from '../config';
import logger from '../utils/logger';

const dbFilePath = process.env.NODE_ENV === 'test' ? ':memory:' : getConfig().databasePath;

function openDatabase(filePath: string): Database.Database {
  try {
    const connection = new Database(filePath);
    connection.pragma('journal_mode = WAL');
    connection.pragma('foreign_keys = ON');
    if (filePath === ':memory:') {
      logger.info('Connected to in-memory SQLite database for testing.');
    } else {
      logger.info(`Connected to the SQLite database (${filePath}).`);
    }
    return connection;
  } catch (error) {
    logger.error('Error connecting to the database:', error);
    throw error;
  }
}

const db = openDatabase(dbFilePath);

// Creates every table and index; safe to call repeatedly.
function initializeSchema(): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      email TEXT NOT NULL UNIQUE COLLATE NOCASE,
      password_hash TEXT NOT NULL,
      full_name TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      preferred_currency TEXT NOT NULL DEFAULT 'USD',
      preferred_language TEXT NOT NULL DEFAULT 'en',
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS contacts (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      phone TEXT,
      email TEXT,
      note TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE
    );
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_contacts_user_id ON contacts (user_id);');
  db.exec('CREATE INDEX IF NOT EXISTS idx_contacts_user_id_name ON contacts (user_id, name COLLATE NOCASE);');

  // contact_id has no ON DELETE action: a referenced contact cannot be removed.
  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      contact_id TEXT,
      contact_name TEXT,
      amount REAL NOT NULL,
      type TEXT NOT NULL,
      account TEXT NOT NULL,
      description TEXT NOT NULL,
      category TEXT,
      is_shared INTEGER NOT NULL DEFAULT 0,
      occurred_at INTEGER NOT NULL,
      due_date INTEGER,
      linked_transaction_id TEXT,
      remaining_amount REAL,
      status TEXT,
      metadata_json TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE,
      FOREIGN KEY(contact_id) REFERENCES contacts(id),
      FOREIGN KEY(linked_transaction_id) REFERENCES transactions(id) ON DELETE SET NULL
    );
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_transactions_user_id_occurred_at ON transactions (user_id, occurred_at);');
  db.exec('CREATE INDEX IF NOT EXISTS idx_transactions_contact_id ON transactions (contact_id);');
  db.exec('CREATE INDEX IF NOT EXISTS idx_transactions_linked_transaction_id ON transactions (linked_transaction_id);');

  db.exec(`
    CREATE TABLE IF NOT EXISTS messages (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      role TEXT NOT NULL,
      content TEXT NOT NULL,
      drafts_json TEXT,
      attachments_json TEXT,
      created_at INTEGER NOT NULL,
      FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE
    );
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_messages_user_id_created_at ON messages (user_id, created_at);');

  db.exec(`
    CREATE TABLE IF NOT EXISTS drafts (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      message_id TEXT,
      occurred_at INTEGER NOT NULL,
      amount REAL NOT NULL,
      description TEXT NOT NULL,
      category TEXT,
      type TEXT NOT NULL,
      account TEXT NOT NULL,
      contact_name TEXT,
      contact_id TEXT,
      due_date INTEGER,
      linked_transaction_id TEXT,
      status TEXT NOT NULL DEFAULT 'pending',
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE,
      FOREIGN KEY(message_id) REFERENCES messages(id) ON DELETE SET NULL,
      FOREIGN KEY(contact_id) REFERENCES contacts(id) ON DELETE SET NULL,
      FOREIGN KEY(linked_transaction_id) REFERENCES transactions(id) ON DELETE SET NULL
    );
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_drafts_user_id_status ON drafts (user_id, status);');

  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      type TEXT NOT NULL,
      category TEXT,
      amount REAL NOT NULL,
      period TEXT NOT NULL DEFAULT 'monthly',
      alert_at_percent REAL NOT NULL DEFAULT 80,
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE
    );
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_budgets_user_id ON budgets (user_id);');

  logger.info('Database schema initialized successfully.');
}

initializeSchema();

// Removes every row, children first. Test environments only.
function clearAllTables(): void {
  if (process.env.NODE_ENV !== 'test') {
    logger.warn('clearAllTables was called outside of a test environment. Operation skipped.');
    return;
  }
  db.exec('DELETE FROM budgets; DELETE FROM drafts; DELETE FROM messages; DELETE FROM transactions; DELETE FROM contacts; DELETE FROM users;');
}

export { db, initializeSchema, clearAllTables };
