// src/services/contactService.ts
import { v4 as uuidv4 } from 'uuid';
import { db } from '../database';
import {
  Contact,
  ContactListQuery,
  ContactListResponse,
  ContactStored,
  CreateContactInput,
  UpdateContactInput,
} from '../models/contact.types';
import { ContactInUse, NotFound } from '../utils/errors';
import { toLikePattern } from '../utils/guards';

const mapStoredToContact = (stored: ContactStored): Contact => ({
  id: stored.id,
  userId: stored.user_id,
  name: stored.name,
  phone: stored.phone,
  email: stored.email,
  note: stored.note,
  createdAt: stored.created_at,
  updatedAt: stored.updated_at,
});

export const listContacts = (userId: string, query: ContactListQuery): ContactListResponse => {
  let where = 'WHERE user_id = @userId';
  const params: { userId: string; pattern?: string } = { userId };
  if (query.search) {
    where += " AND name LIKE @pattern ESCAPE '\\'";
    params.pattern = toLikePattern(query.search);
  }

  const rows = db
    .prepare<typeof params & { limit: number; skip: number }, ContactStored>(
      `SELECT * FROM contacts ${where} ORDER BY name COLLATE NOCASE ASC, id ASC LIMIT @limit OFFSET @skip`
    )
    .all({ ...params, limit: query.limit, skip: query.skip });
  const countRow = db
    .prepare<typeof params, { total: number }>(`SELECT COUNT(*) AS total FROM contacts ${where}`)
    .get(params);

  return { contacts: rows.map(mapStoredToContact), total: countRow ? countRow.total : 0 };
};

export const findContact = (userId: string, contactId: string): Contact | null => {
  const stored = db
    .prepare<[string, string], ContactStored>('SELECT * FROM contacts WHERE id = ? AND user_id = ?')
    .get(contactId, userId);
  return stored ? mapStoredToContact(stored) : null;
};

export const getContact = (userId: string, contactId: string): Contact => {
  const contact = findContact(userId, contactId);
  if (!contact) {
    throw new NotFound('Contact');
  }
  return contact;
};

export const createContact = (userId: string, data: CreateContactInput): Contact => {
  const now = Date.now();
  const contact: Contact = {
    id: uuidv4(),
    userId,
    name: data.name,
    phone: data.phone ?? null,
    email: data.email ?? null,
    note: data.note ?? null,
    createdAt: now,
    updatedAt: now,
  };

  db.prepare(
    `INSERT INTO contacts (id, user_id, name, phone, email, note, created_at, updated_at)
     VALUES (@id, @userId, @name, @phone, @email, @note, @createdAt, @updatedAt)`
  ).run(contact);

  return contact;
};

/** Case-insensitive lookup by name; creates the contact when none matches. */
export const findOrCreateContactByName = (userId: string, name: string): Contact => {
  const stored = db
    .prepare<[string, string], ContactStored>(
      'SELECT * FROM contacts WHERE user_id = ? AND lower(name) = lower(?) ORDER BY created_at ASC, id ASC LIMIT 1'
    )
    .get(userId, name.trim());
  if (stored) {
    return mapStoredToContact(stored);
  }
  return createContact(userId, { name: name.trim() });
};

export const updateContact = (userId: string, contactId: string, updateData: UpdateContactInput): Contact => {
  const existing = getContact(userId, contactId);

  const updated: Contact = {
    ...existing,
    name: updateData.name !== undefined ? updateData.name : existing.name,
    phone: updateData.phone !== undefined ? updateData.phone : existing.phone,
    email: updateData.email !== undefined ? updateData.email : existing.email,
    note: updateData.note !== undefined ? updateData.note : existing.note,
    updatedAt: Date.now(),
  };

  db.prepare(
    `UPDATE contacts SET name = @name, phone = @phone, email = @email, note = @note, updated_at = @updatedAt
     WHERE id = @id AND user_id = @userId`
  ).run(updated);

  return updated;
};

/**
 * Deletes a contact that no transaction references.
 * The check and the delete share one database transaction.
 */
export const deleteContact = (userId: string, contactId: string): void => {
  const remove = db.transaction(() => {
    if (!findContact(userId, contactId)) {
      throw new NotFound('Contact');
    }

    const usage = db
      .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM transactions WHERE contact_id = ?')
      .get(contactId);
    const referencing = usage ? usage.total : 0;
    if (referencing > 0) {
      throw new ContactInUse(referencing);
    }

    db.prepare('DELETE FROM contacts WHERE id = ? AND user_id = ?').run(contactId, userId);
  });

  remove();
};
