// src/services/messageService.ts
import { v4 as uuidv4 } from 'uuid';
import { db } from '../database';
import {
  ATTACHMENT_TYPES,
  Attachment,
  CreateMessageInput,
  MESSAGE_ROLES,
  Message,
  MessageListQuery,
  MessageListResponse,
  MessageStored,
  UpdateMessageInput,
} from '../models/message.types';
import { NotFound } from '../utils/errors';
import { expectOneOf, parseJsonRecordArray } from '../utils/guards';

const toAttachments = (raw: string | null): Attachment[] | null => {
  const records = parseJsonRecordArray(raw);
  if (records === null) {
    return null;
  }
  return records.map((record) => ({
    id: String(record.id),
    type: expectOneOf(ATTACHMENT_TYPES, record.type, 'messages.attachments_json.type'),
    mimeType: String(record.mimeType),
    dataUrl: String(record.dataUrl),
    ...(typeof record.name === 'string' ? { name: record.name } : {}),
    ...(typeof record.durationMs === 'number' ? { durationMs: record.durationMs } : {}),
  }));
};

const mapStoredToMessage = (stored: MessageStored): Message => ({
  id: stored.id,
  userId: stored.user_id,
  role: expectOneOf(MESSAGE_ROLES, stored.role, 'messages.role'),
  content: stored.content,
  drafts: parseJsonRecordArray(stored.drafts_json),
  attachments: toAttachments(stored.attachments_json),
  createdAt: stored.created_at,
});

const toJsonColumn = (value: unknown[] | null | undefined): string | null =>
  value === null || value === undefined ? null : JSON.stringify(value);

export const listMessages = (userId: string, query: MessageListQuery): MessageListResponse => {
  const rows = db
    .prepare<[string, number, number], MessageStored>(
      'SELECT * FROM messages WHERE user_id = ? ORDER BY created_at ASC, rowid ASC LIMIT ? OFFSET ?'
    )
    .all(userId, query.limit, query.skip);
  const countRow = db
    .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM messages WHERE user_id = ?')
    .get(userId);
  return { messages: rows.map(mapStoredToMessage), total: countRow ? countRow.total : 0 };
};

export const getMessage = (userId: string, messageId: string): Message => {
  const stored = db
    .prepare<[string, string], MessageStored>('SELECT * FROM messages WHERE id = ? AND user_id = ?')
    .get(messageId, userId);
  if (!stored) {
    throw new NotFound('Message');
  }
  return mapStoredToMessage(stored);
};

export const createMessage = (userId: string, data: CreateMessageInput): Message => {
  const message: Message = {
    id: uuidv4(),
    userId,
    role: data.role,
    content: data.content,
    drafts: data.drafts ?? null,
    attachments: data.attachments ?? null,
    createdAt: Date.now(),
  };

  db.prepare<[string, string, string, string, string | null, string | null, number]>(
    `INSERT INTO messages (id, user_id, role, content, drafts_json, attachments_json, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  ).run(
    message.id,
    message.userId,
    message.role,
    message.content,
    toJsonColumn(message.drafts),
    toJsonColumn(message.attachments),
    message.createdAt
  );

  return message;
};

export const updateMessage = (userId: string, messageId: string, updateData: UpdateMessageInput): Message => {
  const existing = getMessage(userId, messageId);
  const updated: Message = {
    ...existing,
    content: updateData.content ?? existing.content,
    drafts: updateData.drafts !== undefined ? updateData.drafts : existing.drafts,
  };

  db.prepare<[string, string | null, string, string]>(
    'UPDATE messages SET content = ?, drafts_json = ? WHERE id = ? AND user_id = ?'
  ).run(updated.content, toJsonColumn(updated.drafts), messageId, userId);

  return updated;
};

export const deleteMessage = (userId: string, messageId: string): void => {
  const result = db.prepare('DELETE FROM messages WHERE id = ? AND user_id = ?').run(messageId, userId);
  if (result.changes === 0) {
    throw new NotFound('Message');
  }
};

/** Removes the user's whole conversation; returns how many messages went. */
export const clearMessages = (userId: string): number =>
  db.prepare('DELETE FROM messages WHERE user_id = ?').run(userId).changes;
